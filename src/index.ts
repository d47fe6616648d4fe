export { CorpusIndex } from "./corpus-index.js";
export { corpusStats, stderrLogger, type CorpusStats } from "./corpus-stats.js";
export type {
  CorpusIndexOptions,
  CorpusReaders,
  CorpusSources,
} from "./corpus-index.js";
export {
  SentenceReader,
  DEFAULT_LANGUAGES,
  parseTimestamp,
  type SentenceReaderOptions,
} from "./sentence-reader.js";
export { LinksReader, type LinksReaderOptions } from "./links-reader.js";
export {
  AnnotationReader,
  type AnnotationReaderOptions,
} from "./annotation-reader.js";
export type { LinkGraph } from "./link-graph.js";
export { LinkGraphBuilder, type LinkGraphBuilderOptions } from "./link-graph.js";
export { TaggedWord, type TaggedWordFields } from "./tagged-word.js";
export {
  parseWord,
  parseSentence,
  splitOnSpace,
  type ParseSentenceOptions,
} from "./word-grammar.js";
export { ReadingResolver, dictionaryFromEntries } from "./reading-resolver.js";
export { parseLinkFilterMode, parseGroupingStrategy } from "./options.js";
export {
  CorpusError,
  InvalidFileError,
  InvalidIdError,
  MissingDataError,
  EntryGrammarError,
  InvalidArgumentError,
} from "./errors.js";
export type {
  SentenceId,
  LanguageTag,
  SentenceDetails,
  TranslationGroup,
  GroupingStrategy,
  LinkFilterMode,
  Dictionary,
  DictionaryEntry,
  Row,
  RowFilter,
  SentenceSplitter,
  ReadonlyLookup,
  CorpusLogger,
} from "./types.js";
