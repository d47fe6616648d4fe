/**
 * Fills in readings the annotation left implicit.
 *
 * `jpn_indices` only spells out a reading where the headword alone is
 * ambiguous. Given a dictionary we can recover most of the rest:
 * 1. An explicit sense picks `readings[sense - 1]`
 * 2. Without a usable sense, an entry whose readings are all the same
 *    gives that reading
 * 3. Otherwise the word is left alone
 *
 * A reading identical to the headword (kana-only words) is never set.
 */

import type { TaggedWord } from "./tagged-word.js";
import type { Dictionary, DictionaryEntry } from "./types.js";

export class ReadingResolver {
  private dictionary: Dictionary | undefined;

  constructor(dictionary?: Dictionary) {
    this.dictionary = dictionary;
  }

  /**
   * Whether a dictionary is configured. Without one, words pass through.
   */
  get enabled(): boolean {
    return this.dictionary !== undefined;
  }

  /**
   * Resolve one word. Returns the same instance when nothing changes.
   */
  resolveWord(word: TaggedWord): TaggedWord {
    if (!this.dictionary || word.reading !== undefined) {
      return word;
    }

    const entry = this.dictionary.lookup(word.headword);
    if (!entry) {
      return word;
    }

    const candidate = pickReading(entry, word.sense);
    if (candidate === undefined || candidate === word.headword) {
      return word;
    }

    return word.withReading(candidate);
  }

  /**
   * Resolve a sentence. The input array is not modified.
   */
  resolve(words: readonly TaggedWord[]): TaggedWord[] {
    return words.map((word) => this.resolveWord(word));
  }
}

function pickReading(
  entry: DictionaryEntry,
  sense: number | undefined
): string | undefined {
  const { readings } = entry;

  if (sense !== undefined && sense >= 1 && sense <= readings.length) {
    return readings[sense - 1];
  }

  if (readings.length > 0 && new Set(readings).size === 1) {
    return readings[0];
  }

  return undefined;
}

/**
 * Wrap in-memory headword → readings data as a {@link Dictionary}.
 *
 * @example
 * ```ts
 * const dictionary = dictionaryFromEntries({ 英語: ["えいご"] });
 * new ReadingResolver(dictionary);
 * ```
 */
export function dictionaryFromEntries(
  entries:
    | ReadonlyMap<string, readonly string[]>
    | Readonly<Record<string, readonly string[]>>
): Dictionary {
  const map = isEntryMap(entries) ? entries : new Map(Object.entries(entries));

  return {
    lookup(headword: string): DictionaryEntry | undefined {
      const readings = map.get(headword);
      return readings === undefined ? undefined : { readings };
    },
  };
}

function isEntryMap(
  value: unknown
): value is ReadonlyMap<string, readonly string[]> {
  return value instanceof Map;
}
