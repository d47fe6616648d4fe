/**
 * Load summary for a corpus, as printed by `scripts/corpus-stats.ts`.
 */

import type { CorpusIndex } from "./corpus-index.js";
import type { CorpusLogger } from "./types.js";

export interface CorpusStats {
  sentences: number;
  /** Present only when links were loaded. */
  groups?: number;
  largestGroup?: number;
  annotatedSentences?: number;
}

export function corpusStats(corpus: CorpusIndex): CorpusStats {
  const stats: CorpusStats = { sentences: corpus.sentenceCount };

  if (corpus.hasLinks) {
    const groups = corpus.groups();
    stats.groups = groups.length;
    // The full links file has hundreds of thousands of groups, too many
    // to spread into Math.max.
    stats.largestGroup = groups.reduce(
      (largest, group) => Math.max(largest, group.size),
      0
    );
  }

  if (corpus.hasAnnotations) {
    stats.annotatedSentences = corpus.annotatedSentenceCount;
  }

  return stats;
}

/**
 * Logger for command-line tools: debug lines go to stderr so stdout stays
 * machine-readable.
 */
export const stderrLogger: CorpusLogger = {
  debug: (message) => console.error(message),
};
