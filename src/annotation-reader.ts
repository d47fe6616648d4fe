/**
 * Reader for the Tanaka-corpus sentence/dictionary linking file
 * (`jpn_indices.csv`): sentence id, linked meaning id, annotated text.
 *
 * Every sentence is parsed when the reader is built; a malformed word
 * fails the whole load.
 */

import { InvalidFileError, InvalidIdError } from "./errors.js";
import { ReadingResolver } from "./reading-resolver.js";
import { decodeBuffer, parseIdColumn, readSource, splitRows } from "./rows.js";
import type { TaggedWord } from "./tagged-word.js";
import { parseSentence } from "./word-grammar.js";
import type {
  Dictionary,
  ReadonlyLookup,
  RowFilter,
  SentenceId,
  SentenceSplitter,
} from "./types.js";

export interface AnnotationReaderOptions {
  /** Fills in readings the annotation leaves out. */
  dictionary?: Dictionary;
  /** Only load these sentences. */
  sentenceIds?: Iterable<SentenceId> | null;
  /** Tokenizer for the annotated text. Defaults to single spaces. */
  splitSentence?: SentenceSplitter;
  /** Rows for which this returns false are skipped. */
  includeRow?: RowFilter;
  sourceName?: string;
}

export class AnnotationReader
  implements ReadonlyLookup<SentenceId, readonly TaggedWord[]>
{
  readonly source: string;
  readonly sentenceIdSubset: ReadonlySet<SentenceId> | null;

  private sentences = new Map<SentenceId, readonly TaggedWord[]>();
  private meanings = new Map<SentenceId, SentenceId>();

  private constructor(text: string, options: AnnotationReaderOptions) {
    this.source = options.sourceName ?? "<string>";
    this.sentenceIdSubset = options.sentenceIds
      ? new Set(options.sentenceIds)
      : null;

    const resolver = new ReadingResolver(options.dictionary);

    for (const { line, row } of splitRows(text)) {
      if (row.length !== 3) {
        throw new InvalidFileError(
          "Invalid index file - files must have 3 columns",
          line
        );
      }
      if (options.includeRow && !options.includeRow(row)) continue;

      const [idText, meaningText, annotated] = row;
      const id = parseIdColumn(idText, line);
      const meaningId = parseIdColumn(meaningText, line);
      if (this.sentenceIdSubset && !this.sentenceIdSubset.has(id)) continue;

      const words = parseSentence(annotated, {
        splitSentence: options.splitSentence,
      });
      this.sentences.set(id, resolver.resolve(words));
      this.meanings.set(id, meaningId);
    }
  }

  static fromString(
    text: string,
    options: AnnotationReaderOptions = {}
  ): AnnotationReader {
    return new AnnotationReader(text, options);
  }

  static fromBuffer(
    buffer: Buffer | Uint8Array,
    options: AnnotationReaderOptions = {}
  ): AnnotationReader {
    return new AnnotationReader(decodeBuffer(buffer), options);
  }

  static async load(
    path: string,
    options: AnnotationReaderOptions = {}
  ): Promise<AnnotationReader> {
    const text = await readSource(path);
    return new AnnotationReader(text, {
      ...options,
      sourceName: options.sourceName ?? path,
    });
  }

  /**
   * Annotated words of a sentence, readings resolved.
   *
   * @throws InvalidIdError if the sentence was not loaded
   */
  words(id: SentenceId): readonly TaggedWord[] {
    const words = this.sentences.get(id);
    if (!words) {
      throw new InvalidIdError(`Sentence ID ${id} not found`, id);
    }
    return words;
  }

  /**
   * Id of the translation the index file pairs this sentence with.
   *
   * @throws InvalidIdError if the sentence was not loaded
   */
  link(id: SentenceId): SentenceId {
    const meaning = this.meanings.get(id);
    if (meaning === undefined) {
      throw new InvalidIdError(`Sentence ID ${id} not found`, id);
    }
    return meaning;
  }

  get(id: SentenceId): readonly TaggedWord[] | undefined {
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
    return `AnnotationReader(jpn_indices='${this.source}')`;
  }
}
