/**
 * Parser for the Tanaka-corpus word annotation grammar used by
 * `jpn_indices`.
 *
 * Each space-separated token is
 *
 *   headword (reading) [sense] {display} ~ trailing
 *
 * where every part after the headword is optional but must appear in this
 * order. Examples:
 * - "は" → headword only
 * - "彼(かれ)[1]" → reading and sense
 * - "劣る{劣らない}" → display form
 * - "生きる{生きている}~" → checked example
 * - "は|1" → trailing index, ignored
 *
 * See http://www.edrdg.org/wiki/index.php/Sentence-Dictionary_Linking
 */

import { EntryGrammarError } from "./errors.js";
import { TaggedWord } from "./tagged-word.js";
import type { SentenceSplitter } from "./types.js";

const WORD_PATTERN =
  /^(?<headword>[^([{|~]+)(?:\((?<reading>[^)]+)\))?(?:\[(?<sense>\d+)\])?(?:\{(?<display>[^}]+)\})?(?<example>~)?(?:\|?\d+)?$/u;

/**
 * Default splitter: single spaces, like the corpus itself.
 */
export const splitOnSpace: SentenceSplitter = (text) => text.split(" ");

export interface ParseSentenceOptions {
  /** Custom tokenizer for alternate tokenizations. */
  splitSentence?: SentenceSplitter;
}

/**
 * Decode one annotated token.
 *
 * @returns the word, or null if the token does not follow the grammar
 */
export function parseWord(token: string): TaggedWord | null {
  const match = WORD_PATTERN.exec(token);
  if (!match?.groups) {
    return null;
  }

  const { headword, reading, sense, display, example } = match.groups;
  return new TaggedWord({
    headword,
    reading,
    sense: sense === undefined ? undefined : parseInt(sense, 10),
    display,
    example: example !== undefined,
  });
}

/**
 * Decode a whole annotated sentence into words, in order.
 * Empty tokens (doubled spaces) are skipped.
 *
 * @throws EntryGrammarError on the first token that does not parse
 */
export function parseSentence(
  text: string,
  options: ParseSentenceOptions = {}
): TaggedWord[] {
  const split = options.splitSentence ?? splitOnSpace;
  const words: TaggedWord[] = [];

  for (const token of split(text)) {
    if (token.length === 0) continue;

    const word = parseWord(token);
    if (!word) {
      throw new EntryGrammarError(token, text);
    }
    words.push(word);
  }

  return words;
}
