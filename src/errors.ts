import type { SentenceId } from "./types.js";

/**
 * Base class for everything this library throws on purpose.
 */
export class CorpusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusError";
  }
}

/**
 * A source row has the wrong shape: column count, non-integer id or
 * unparseable timestamp. Raised while building, so no reader exists.
 */
export class InvalidFileError extends CorpusError {
  constructor(
    message: string,
    public readonly line?: number,
    options?: { cause?: unknown }
  ) {
    super(line === undefined ? message : `${message} (line ${line})`, options);
    this.name = "InvalidFileError";
  }
}

/**
 * The id is well formed but not in the loaded data.
 */
export class InvalidIdError extends CorpusError {
  constructor(
    message: string,
    public readonly id: SentenceId
  ) {
    super(message);
    this.name = "InvalidIdError";
  }
}

/**
 * The requested data was never loaded (no detail columns, no links file).
 */
export class MissingDataError extends CorpusError {
  constructor(message: string) {
    super(message);
    this.name = "MissingDataError";
  }
}

/**
 * An annotated token does not follow the word grammar.
 */
export class EntryGrammarError extends CorpusError {
  constructor(
    public readonly token: string,
    public readonly sentence: string
  ) {
    super(`Could not interpret word ${token} in sentence:\n${sentence}`);
    this.name = "EntryGrammarError";
  }
}

/**
 * A configuration value is outside the accepted set.
 */
export class InvalidArgumentError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidArgumentError";
  }
}
