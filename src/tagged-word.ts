/**
 * A word from a Tanaka-corpus annotated sentence.
 *
 * Rendered form follows the `jpn_indices` notation:
 *   headword(reading)[sense]{display}~
 *
 * @example
 * ```ts
 * const word = new TaggedWord({ headword: "彼", reading: "かれ", sense: 1 });
 * word.toString(); // "彼(かれ)[1]"
 * ```
 */

export interface TaggedWordFields {
  headword: string;
  reading?: string;
  sense?: number;
  display?: string;
  example?: boolean;
}

export class TaggedWord {
  readonly headword: string;
  /** Phonetic reading (kana). */
  readonly reading: string | undefined;
  /** 1-based dictionary sense. */
  readonly sense: number | undefined;
  /** Inflected surface form when it differs from the headword. */
  readonly display: string | undefined;
  /** Marks the checked, good example sentence for this word. */
  readonly example: boolean;

  constructor(fields: TaggedWordFields) {
    this.headword = fields.headword;
    this.reading = fields.reading;
    this.sense = fields.sense;
    this.display = fields.display;
    this.example = fields.example ?? false;
  }

  /**
   * The form shown in the sentence: `display` if set, else the headword.
   */
  resolveDisplay(): string {
    return this.display ?? this.headword;
  }

  /**
   * Copy of this word with a different reading.
   */
  withReading(reading: string | undefined): TaggedWord {
    return new TaggedWord({
      headword: this.headword,
      reading,
      sense: this.sense,
      display: this.display,
      example: this.example,
    });
  }

  /**
   * Field-wise equality, except that an unset display compares as the
   * headword. `example` is part of the comparison even though it is
   * specific to one sentence.
   */
  equals(other: TaggedWord): boolean {
    return (
      this.headword === other.headword &&
      this.sense === other.sense &&
      this.example === other.example &&
      this.reading === other.reading &&
      this.resolveDisplay() === other.resolveDisplay()
    );
  }

  toString(): string {
    let base = this.headword;
    if (this.reading) base += `(${this.reading})`;
    if (this.sense) base += `[${this.sense}]`;
    if (this.display) base += `{${this.display}}`;
    if (this.example) base += "~";
    return base;
  }
}
