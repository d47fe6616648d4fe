/**
 * Validation for enumerated configuration values.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";
import type { GroupingStrategy, LinkFilterMode } from "./types.js";

// Older releases of the reader spelled the modes "sent_id" / "trans_id".
const FILTER_MODE_ALIASES: Record<string, string> = {
  sent_id: "sentence_id",
  trans_id: "translation_id",
};

const LinkFilterModeSchema = z
  .string()
  .transform((value) => {
    const lowered = value.trim().toLowerCase();
    return FILTER_MODE_ALIASES[lowered] ?? lowered;
  })
  .pipe(z.enum(["sentence_id", "translation_id", "both"]));

const GroupingStrategySchema = z.enum(["greedy", "union-find"]);

/**
 * Normalize a link filter mode. Case-insensitive, accepts legacy aliases.
 *
 * @throws InvalidArgumentError for anything else
 */
export function parseLinkFilterMode(value: string): LinkFilterMode {
  const result = LinkFilterModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid sentence ids filter: ${value}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function parseGroupingStrategy(value: string): GroupingStrategy {
  const result = GroupingStrategySchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid grouping strategy: ${value}`, {
      cause: result.error,
    });
  }
  return result.data;
}
