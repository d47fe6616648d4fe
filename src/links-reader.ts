/**
 * Reader for Tatoeba `links.csv`: two integer columns per row, sentence id
 * and translation id.
 */

import { InvalidFileError, InvalidIdError } from "./errors.js";
import { LinkGraphBuilder, type LinkGraph } from "./link-graph.js";
import { decodeBuffer, parseIdColumn, readSource, splitRows } from "./rows.js";
import type {
  GroupingStrategy,
  LinkFilterMode,
  ReadonlyLookup,
  SentenceId,
  TranslationGroup,
} from "./types.js";

export interface LinksReaderOptions {
  /**
   * Restrict links to these sentences. Which endpoint is checked depends
   * on `filterMode`.
   */
  sentenceIds?: Iterable<SentenceId> | null;
  /** "sentence_id", "translation_id" or "both" (default). */
  filterMode?: LinkFilterMode | string;
  /** "greedy" (default) or "union-find". */
  strategy?: GroupingStrategy | string;
  sourceName?: string;
}

export class LinksReader implements ReadonlyLookup<SentenceId, TranslationGroup> {
  readonly source: string;
  readonly filterMode: LinkFilterMode;
  readonly strategy: GroupingStrategy;
  readonly sentenceIdSubset: ReadonlySet<SentenceId> | null;

  private graph: LinkGraph;

  private constructor(text: string, options: LinksReaderOptions) {
    this.source = options.sourceName ?? "<string>";

    const builder = new LinkGraphBuilder({
      sentenceIds: options.sentenceIds,
      filterMode: options.filterMode,
      strategy: options.strategy,
    });
    this.filterMode = builder.filterMode;
    this.strategy = builder.strategy;
    this.sentenceIdSubset = builder.sentenceIdSubset;

    for (const { line, row } of splitRows(text)) {
      if (row.length !== 2) {
        throw new InvalidFileError(
          "Invalid links file - files must have 2 columns",
          line
        );
      }
      builder.addLink(parseIdColumn(row[0], line), parseIdColumn(row[1], line));
    }

    this.graph = builder.build();
  }

  static fromString(text: string, options: LinksReaderOptions = {}): LinksReader {
    return new LinksReader(text, options);
  }

  static fromBuffer(
    buffer: Buffer | Uint8Array,
    options: LinksReaderOptions = {}
  ): LinksReader {
    return new LinksReader(decodeBuffer(buffer), options);
  }

  static async load(
    path: string,
    options: LinksReaderOptions = {}
  ): Promise<LinksReader> {
    const text = await readSource(path);
    return new LinksReader(text, {
      ...options,
      sourceName: options.sourceName ?? path,
    });
  }

  /**
   * The translation group a sentence belongs to.
   *
   * @throws InvalidIdError if the sentence is in no group
   */
  group(id: SentenceId): TranslationGroup {
    const group = this.graph.groupOf(id);
    if (!group) {
      throw new InvalidIdError(`Could not find sentence ID ${id} in any groups`, id);
    }
    return group;
  }

  /**
   * Every translation group.
   */
  groups(): TranslationGroup[] {
    return this.graph.groups();
  }

  get(id: SentenceId): TranslationGroup | undefined {
    return this.graph.groupOf(id);
  }

  has(id: SentenceId): boolean {
    return this.graph.has(id);
  }

  keys(): IterableIterator<SentenceId> {
    return this.graph.ids();
  }

  get size(): number {
    return this.graph.size;
  }

  [Symbol.iterator](): IterableIterator<SentenceId> {
    return this.graph.ids();
  }

  toString(): string {
    return `LinksReader(links='${this.source}')`;
  }
}
