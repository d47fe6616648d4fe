/**
 * Shared type definitions to avoid circular imports.
 */

/**
 * Numeric sentence identifier, unique within a loaded sentence file.
 */
export type SentenceId = number;

/**
 * Three-letter Tatoeba language code ("jpn", "eng", "fra", ...).
 */
export type LanguageTag = string;

/**
 * Extra columns carried by `sentences_detailed.csv`.
 * `\N` in the source becomes `null`.
 */
export interface SentenceDetails {
  username: string | null;
  dateAdded: Date | null;
  dateModified: Date | null;
}

/**
 * A set of sentences that are translations of one another.
 * Every member of a group resolves to the same set instance, and its
 * `add`, `delete` and `clear` throw a TypeError.
 */
export type TranslationGroup = ReadonlySet<SentenceId>;

/**
 * How the links file groups its edges.
 *
 * - `greedy`: one pass, attaches each edge to the group of whichever
 *   endpoint was seen first. Never merges two existing groups.
 * - `union-find`: full connected components.
 */
export type GroupingStrategy = "greedy" | "union-find";

/**
 * Which endpoint(s) of a link must be in the sentence id subset.
 */
export type LinkFilterMode = "sentence_id" | "translation_id" | "both";

/**
 * A dictionary entry as far as reading resolution is concerned.
 * `readings[0]` belongs to sense 1.
 */
export interface DictionaryEntry {
  readonly readings: readonly string[];
}

/**
 * Headword lookup supplied by the caller (EDICT, JMdict, ...).
 */
export interface Dictionary {
  lookup(headword: string): DictionaryEntry | undefined;
}

/**
 * One tab-delimited source row.
 */
export type Row = readonly string[];

/**
 * Row predicate. A row is kept when it returns true.
 */
export type RowFilter = (row: Row) => boolean;

/**
 * Splits an annotated sentence into word tokens.
 */
export type SentenceSplitter = (text: string) => string[];

/**
 * Read-only keyed access shared by every reader.
 */
export interface ReadonlyLookup<K, V> extends Iterable<K> {
  get(key: K): V | undefined;
  has(key: K): boolean;
  keys(): IterableIterator<K>;
  readonly size: number;
}

/**
 * Receives one-line load summaries. `console` fits.
 */
export interface CorpusLogger {
  debug(message: string): void;
}
