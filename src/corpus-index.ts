/**
 * One read-only index over a Tatoeba download: sentences, translation
 * groups and Japanese word annotations.
 *
 * @example
 * ```ts
 * const corpus = await CorpusIndex.load(
 *   {
 *     sentences: "sentences.csv",
 *     links: "links.csv",
 *     annotations: "jpn_indices.csv",
 *   },
 *   { dictionary, logger: console }
 * );
 *
 * corpus.sentenceText(6381);
 * corpus.group(6381); // Set { 6381, 156245, 258289, 817971 }
 * corpus.annotatedWords(109744).map(String); // ["彼(かれ)[1]", "は", ...]
 * ```
 */

import { AnnotationReader } from "./annotation-reader.js";
import { MissingDataError } from "./errors.js";
import { LinksReader } from "./links-reader.js";
import { SentenceReader } from "./sentence-reader.js";
import type { TaggedWord } from "./tagged-word.js";
import type {
  CorpusLogger,
  Dictionary,
  GroupingStrategy,
  LanguageTag,
  LinkFilterMode,
  RowFilter,
  SentenceDetails,
  SentenceId,
  SentenceSplitter,
  TranslationGroup,
} from "./types.js";

export interface CorpusSources {
  sentences: string;
  links?: string;
  annotations?: string;
}

export interface CorpusReaders {
  sentences: SentenceReader;
  links?: LinksReader;
  annotations?: AnnotationReader;
}

export interface CorpusIndexOptions {
  /** Default ["jpn", "eng"]; null keeps all languages. */
  languages?: Iterable<LanguageTag> | null;
  includeSentenceRow?: RowFilter;
  linkSentenceIds?: Iterable<SentenceId> | null;
  linkFilterMode?: LinkFilterMode | string;
  groupingStrategy?: GroupingStrategy | string;
  annotationSentenceIds?: Iterable<SentenceId> | null;
  dictionary?: Dictionary;
  splitSentence?: SentenceSplitter;
  logger?: CorpusLogger;
}

export class CorpusIndex {
  private sentences: SentenceReader;
  private links: LinksReader | undefined;
  private annotations: AnnotationReader | undefined;

  private constructor(readers: CorpusReaders) {
    this.sentences = readers.sentences;
    this.links = readers.links;
    this.annotations = readers.annotations;
  }

  /**
   * Build from already-constructed readers.
   */
  static fromReaders(readers: CorpusReaders): CorpusIndex {
    return new CorpusIndex(readers);
  }

  /**
   * Build from source text held in memory.
   */
  static fromStrings(
    sources: CorpusSources,
    options: CorpusIndexOptions = {}
  ): CorpusIndex {
    const { logger } = options;

    const sentences = SentenceReader.fromString(sources.sentences, {
      languages: options.languages,
      includeRow: options.includeSentenceRow,
    });
    logger?.debug(
      `Loaded ${sentences.size} sentences in ${sentences.languageTags().length} languages`
    );

    let links: LinksReader | undefined;
    if (sources.links !== undefined) {
      links = LinksReader.fromString(sources.links, {
        sentenceIds: options.linkSentenceIds,
        filterMode: options.linkFilterMode,
        strategy: options.groupingStrategy,
      });
      logger?.debug(
        `Loaded ${links.groups().length} translation groups covering ${links.size} sentences`
      );
    }

    let annotations: AnnotationReader | undefined;
    if (sources.annotations !== undefined) {
      annotations = AnnotationReader.fromString(sources.annotations, {
        sentenceIds: options.annotationSentenceIds,
        dictionary: options.dictionary,
        splitSentence: options.splitSentence,
      });
      logger?.debug(`Loaded ${annotations.size} annotated sentences`);
    }

    return new CorpusIndex({ sentences, links, annotations });
  }

  /**
   * Read the source files (plain or `.gz`) and build the index.
   */
  static async load(
    paths: CorpusSources,
    options: CorpusIndexOptions = {}
  ): Promise<CorpusIndex> {
    const { logger } = options;

    const sentences = await SentenceReader.load(paths.sentences, {
      languages: options.languages,
      includeRow: options.includeSentenceRow,
    });
    logger?.debug(`Loaded ${sentences.size} sentences from ${paths.sentences}`);

    const links =
      paths.links === undefined
        ? undefined
        : await LinksReader.load(paths.links, {
            sentenceIds: options.linkSentenceIds,
            filterMode: options.linkFilterMode,
            strategy: options.groupingStrategy,
          });
    if (links) {
      logger?.debug(`Loaded ${links.groups().length} translation groups from ${links.source}`);
    }

    const annotations =
      paths.annotations === undefined
        ? undefined
        : await AnnotationReader.load(paths.annotations, {
            sentenceIds: options.annotationSentenceIds,
            dictionary: options.dictionary,
            splitSentence: options.splitSentence,
          });
    if (annotations) {
      logger?.debug(
        `Loaded ${annotations.size} annotated sentences from ${annotations.source}`
      );
    }

    return new CorpusIndex({ sentences, links, annotations });
  }

  /**
   * @throws InvalidIdError
   */
  sentenceText(id: SentenceId): string {
    return this.sentences.sentence(id);
  }

  /**
   * @throws InvalidIdError
   */
  language(id: SentenceId): LanguageTag {
    return this.sentences.language(id);
  }

  /**
   * @throws MissingDataError if the sentences had no detail columns
   * @throws InvalidIdError
   */
  details(id: SentenceId): SentenceDetails {
    return this.sentences.details(id);
  }

  /**
   * @throws MissingDataError if no links were loaded
   * @throws InvalidIdError if the sentence has no links
   */
  group(id: SentenceId): TranslationGroup {
    return this.requireLinks().group(id);
  }

  /**
   * @throws MissingDataError if no links were loaded
   */
  groups(): TranslationGroup[] {
    return this.requireLinks().groups();
  }

  /**
   * Other sentences of the same group that are also in the sentence set,
   * ascending. With the default language filter these are the Japanese
   * and English translations.
   *
   * @throws MissingDataError if no links were loaded
   * @throws InvalidIdError if the sentence has no links
   */
  translations(id: SentenceId): SentenceId[] {
    return [...this.group(id)]
      .filter((other) => other !== id && this.sentences.has(other))
      .sort((a, b) => a - b);
  }

  /**
   * @throws MissingDataError if no annotations were loaded
   * @throws InvalidIdError
   */
  annotatedWords(id: SentenceId): readonly TaggedWord[] {
    return this.requireAnnotations().words(id);
  }

  /**
   * The meaning (translation) id the annotation file pairs with a sentence.
   *
   * @throws MissingDataError if no annotations were loaded
   * @throws InvalidIdError
   */
  linkedMeaning(id: SentenceId): SentenceId {
    return this.requireAnnotations().link(id);
  }

  get sentenceCount(): number {
    return this.sentences.size;
  }

  /**
   * Sentences with word annotations, 0 when none were loaded.
   */
  get annotatedSentenceCount(): number {
    return this.annotations?.size ?? 0;
  }

  get hasLinks(): boolean {
    return this.links !== undefined;
  }

  get hasAnnotations(): boolean {
    return this.annotations !== undefined;
  }

  private requireLinks(): LinksReader {
    if (!this.links) {
      throw new MissingDataError("No links file was loaded.");
    }
    return this.links;
  }

  private requireAnnotations(): AnnotationReader {
    if (!this.annotations) {
      throw new MissingDataError("No jpn_indices file was loaded.");
    }
    return this.annotations;
  }
}
