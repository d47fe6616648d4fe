/**
 * Reader for Tatoeba `sentences.csv` and `sentences_detailed.csv`.
 *
 * Both are tab-separated:
 * - sentences:          id, lang, text
 * - sentences_detailed: id, lang, text, username, date added, date modified
 *
 * The first row decides which of the two a source is.
 *
 * @example
 * ```ts
 * const reader = await SentenceReader.load("sentences.csv", {
 *   languages: ["jpn", "eng"],
 * });
 * reader.sentence(6381);
 * reader.language(6381); // "eng"
 * ```
 */

import { InvalidFileError, InvalidIdError, MissingDataError } from "./errors.js";
import { decodeBuffer, parseIdColumn, readSource, splitRows } from "./rows.js";
import type {
  LanguageTag,
  ReadonlyLookup,
  RowFilter,
  SentenceDetails,
  SentenceId,
} from "./types.js";

export const DEFAULT_LANGUAGES: readonly LanguageTag[] = ["jpn", "eng"];

const PLAIN_COLUMNS = 3;
const DETAILED_COLUMNS = 6;
const NULL_FIELD = "\\N";
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export interface SentenceReaderOptions {
  /**
   * Languages to keep. Defaults to Japanese and English;
   * `null` keeps every language.
   */
  languages?: Iterable<LanguageTag> | null;
  /** Rows for which this returns false are skipped. */
  includeRow?: RowFilter;
  /** Label used by `toString()`, e.g. the file path. */
  sourceName?: string;
}

export class SentenceReader implements ReadonlyLookup<SentenceId, string> {
  readonly source: string;
  readonly languages: ReadonlySet<LanguageTag> | null;

  private sentences: Map<SentenceId, string>;
  private languageBuckets: Map<LanguageTag, Set<SentenceId>>;
  private detailed: Map<SentenceId, SentenceDetails> | null;

  private constructor(text: string, options: SentenceReaderOptions) {
    this.source = options.sourceName ?? "<string>";
    this.languages =
      options.languages === null
        ? null
        : new Set(options.languages ?? DEFAULT_LANGUAGES);

    const rows = splitRows(text);
    const columns = rows.length > 0 ? rows[0].row.length : PLAIN_COLUMNS;
    if (columns !== PLAIN_COLUMNS && columns !== DETAILED_COLUMNS) {
      throw new InvalidFileError(
        "Invalid sentences file, files must have either 3 or 6 columns",
        rows[0].line
      );
    }

    this.sentences = new Map();
    this.languageBuckets = new Map();
    this.detailed = columns === DETAILED_COLUMNS ? new Map() : null;

    for (const { line, row } of rows) {
      if (row.length !== columns) {
        throw new InvalidFileError(
          `Expected ${columns} columns, got ${row.length}`,
          line
        );
      }

      if (options.includeRow && !options.includeRow(row)) continue;

      const [idText, lang, sentence] = row;
      if (this.languages && !this.languages.has(lang)) continue;

      const id = parseIdColumn(idText, line);
      let bucket = this.languageBuckets.get(lang);
      if (!bucket) {
        bucket = new Set();
        this.languageBuckets.set(lang, bucket);
      }
      bucket.add(id);
      this.sentences.set(id, sentence);

      if (this.detailed) {
        const [username, added, modified] = row.slice(3);
        this.detailed.set(id, {
          username: username === NULL_FIELD ? null : username,
          dateAdded: parseTimestamp(added, line),
          dateModified: parseTimestamp(modified, line),
        });
      }
    }
  }

  static fromString(
    text: string,
    options: SentenceReaderOptions = {}
  ): SentenceReader {
    return new SentenceReader(text, options);
  }

  static fromBuffer(
    buffer: Buffer | Uint8Array,
    options: SentenceReaderOptions = {}
  ): SentenceReader {
    return new SentenceReader(decodeBuffer(buffer), options);
  }

  /**
   * Read a sentences file from disk (`.gz` is decompressed).
   */
  static async load(
    path: string,
    options: SentenceReaderOptions = {}
  ): Promise<SentenceReader> {
    const text = await readSource(path);
    return new SentenceReader(text, {
      ...options,
      sourceName: options.sourceName ?? path,
    });
  }

  /**
   * Text of a sentence.
   *
   * @throws InvalidIdError if the sentence was not loaded
   */
  sentence(id: SentenceId): string {
    const text = this.sentences.get(id);
    if (text === undefined) {
      throw new InvalidIdError(`Could not find sentence with ID ${id}`, id);
    }
    return text;
  }

  /**
   * Language of a sentence. Scans the per-language id sets, of which there
   * are only as many as loaded languages.
   *
   * @throws InvalidIdError if the sentence was not loaded
   */
  language(id: SentenceId): LanguageTag {
    for (const [lang, ids] of this.languageBuckets) {
      if (ids.has(id)) return lang;
    }
    throw new InvalidIdError(`No language found for sentence id ${id}`, id);
  }

  /**
   * Username and timestamps from `sentences_detailed`.
   *
   * @throws MissingDataError if the source had no detail columns
   * @throws InvalidIdError if the sentence was not loaded
   */
  details(id: SentenceId): SentenceDetails {
    if (!this.detailed) {
      throw new MissingDataError("Detailed information not loaded.");
    }
    const details = this.detailed.get(id);
    if (!details) {
      throw new InvalidIdError(
        `Detailed information not found for sentence ID ${id}`,
        id
      );
    }
    return details;
  }

  get hasDetails(): boolean {
    return this.detailed !== null;
  }

  sentenceIds(): IterableIterator<SentenceId> {
    return this.sentences.keys();
  }

  /**
   * Languages that actually occur in the loaded sentences.
   */
  languageTags(): LanguageTag[] {
    return [...this.languageBuckets.keys()];
  }

  get(id: SentenceId): string | undefined {
    return this.sentences.get(id);
  }

  has(id: SentenceId): boolean {
    return this.sentences.has(id);
  }

  keys(): IterableIterator<SentenceId> {
    return this.sentences.keys();
  }

  get size(): number {
    return this.sentences.size;
  }

  [Symbol.iterator](): IterableIterator<SentenceId> {
    return this.sentences.keys();
  }

  toString(): string {
    return `SentenceReader(sentences='${this.source}')`;
  }
}

/**
 * Parse a `YYYY-MM-DD HH:MM:SS` timestamp as UTC. `\N` is null.
 */
export function parseTimestamp(value: string, line?: number): Date | null {
  if (value === NULL_FIELD) return null;

  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new InvalidFileError(`Invalid timestamp: ${JSON.stringify(value)}`, line);
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls 2010-02-30 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new InvalidFileError(`Invalid timestamp: ${JSON.stringify(value)}`, line);
  }

  return date;
}
