import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  InvalidFileError,
  InvalidIdError,
  MissingDataError,
  SentenceReader,
  parseTimestamp,
} from "../src/index.js";

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), "fixtures");
const sentencesPath = join(fixturesDir, "sentences.csv");
const detailedPath = join(fixturesDir, "sentences_detailed.csv");

describe("SentenceReader", () => {
  it("loads Japanese and English by default", async () => {
    const reader = await SentenceReader.load(sentencesPath);

    expect([...reader.keys()].sort((a, b) => a - b)).toEqual([1, 2, 4, 5]);
    expect(reader.size).toBe(4);
    expect([...reader]).toEqual([...reader.sentenceIds()]);
  });

  it("returns the source text", async () => {
    const reader = await SentenceReader.load(sentencesPath);

    expect(reader.sentence(1)).toBe("I like tea.");
    expect(reader.sentence(5)).toBe("彼は英語が苦手だ。");
    expect(reader.get(2)).toBe("私はお茶が好きです。");
    expect(reader.get(3)).toBeUndefined();
  });

  it("filters by language", () => {
    const reader = SentenceReader.fromBuffer(readFileSync(sentencesPath), {
      languages: ["fra", "deu"],
    });

    expect([...reader.keys()]).toEqual([3, 6]);
    expect(reader.sentence(3)).toBe("J'aime le thé.");
    expect(reader.languageTags()).toEqual(["fra", "deu"]);
  });

  it("keeps every language with a null filter", () => {
    const reader = SentenceReader.fromBuffer(readFileSync(sentencesPath), {
      languages: null,
    });

    expect(reader.size).toBe(6);
    expect(reader.languages).toBeNull();
  });

  it("applies a custom row filter before the language filter", () => {
    const wanted = new Set([1, 3, 5]);
    const reader = SentenceReader.fromBuffer(readFileSync(sentencesPath), {
      includeRow: (row) => wanted.has(Number(row[0])),
    });

    expect([...reader.keys()]).toEqual([1, 5]);
  });

  it("looks up languages", async () => {
    const reader = await SentenceReader.load(sentencesPath);

    expect(reader.language(2)).toBe("jpn");
    expect(reader.language(5)).toBe("jpn");
    expect(reader.language(1)).toBe("eng");
    expect(reader.language(4)).toBe("eng");
  });

  it("throws InvalidIdError for unknown ids", async () => {
    const reader = await SentenceReader.load(sentencesPath);

    expect(() => reader.sentence(24)).toThrow(InvalidIdError);
    expect(() => reader.language(193)).toThrow(InvalidIdError);
    // filtered out by language
    expect(() => reader.sentence(3)).toThrow("Could not find sentence with ID 3");
  });

  it("has no details for a plain sentences file", async () => {
    const reader = await SentenceReader.load(sentencesPath);

    expect(reader.hasDetails).toBe(false);
    expect(() => reader.details(1)).toThrow(MissingDataError);
    expect(() => reader.details(0)).toThrow(MissingDataError);
  });

  it("labels itself with the source path", async () => {
    const reader = await SentenceReader.load(sentencesPath);
    expect(String(reader)).toBe(`SentenceReader(sentences='${sentencesPath}')`);
    expect(String(SentenceReader.fromString(""))).toBe("SentenceReader(sentences='<string>')");
  });
});

describe("SentenceReader (detailed)", () => {
  it("parses usernames and timestamps", async () => {
    const reader = await SentenceReader.load(detailedPath, { languages: null });

    expect(reader.hasDetails).toBe(true);
    expect(reader.details(1)).toEqual({
      username: "alice",
      dateAdded: new Date(Date.UTC(2010, 5, 24, 14, 20, 10)),
      dateModified: new Date(Date.UTC(2010, 5, 24, 14, 20, 28)),
    });
    expect(reader.details(2)).toEqual({
      username: null,
      dateAdded: null,
      dateModified: null,
    });
    expect(reader.details(3)).toEqual({
      username: "bob",
      dateAdded: null,
      dateModified: new Date(Date.UTC(2011, 0, 2, 3, 4, 5)),
    });
  });

  it("keeps the sentence text from the first three columns", async () => {
    const reader = await SentenceReader.load(detailedPath);
    expect(reader.sentence(4)).toBe("He is bad at English.");
  });

  it("throws InvalidIdError for sentences without details", async () => {
    const reader = await SentenceReader.load(detailedPath);
    expect(() => reader.details(24)).toThrow(InvalidIdError);
    // French, filtered out
    expect(() => reader.details(3)).toThrow(InvalidIdError);
  });
});

describe("SentenceReader file validation", () => {
  it("rejects too few columns", () => {
    expect(() => SentenceReader.fromString("3444\teng\n3949\tjp\n")).toThrow(
      InvalidFileError
    );
  });

  it("rejects four or five columns", () => {
    expect(() =>
      SentenceReader.fromString("3444\teng\tThe boy ate a tiger\tMB")
    ).toThrow(InvalidFileError);
  });

  it("rejects seven columns", () => {
    expect(() =>
      SentenceReader.fromString("3444\teng\tThe boy ate a tiger\tMB\t\\N\t\\N\t\\N")
    ).toThrow(InvalidFileError);
  });

  it("rejects a later row with a different shape", () => {
    let error: unknown;
    try {
      SentenceReader.fromString("1\teng\tHello\n2\teng\n");
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(InvalidFileError);
    if (error instanceof InvalidFileError) {
      expect(error.line).toBe(2);
    }
  });

  it("rejects non-integer ids", () => {
    expect(() => SentenceReader.fromString("abc\teng\tHello\n")).toThrow(
      InvalidFileError
    );
  });

  it("accepts CRLF line endings", () => {
    const reader = SentenceReader.fromString("1\teng\tHello\r\n2\tjpn\tこんにちは\r\n");
    expect(reader.sentence(1)).toBe("Hello");
    expect(reader.sentence(2)).toBe("こんにちは");
  });

  it("treats an empty source as an empty sentence set", () => {
    const reader = SentenceReader.fromString("");
    expect(reader.size).toBe(0);
    expect(reader.hasDetails).toBe(false);
  });
});

describe("parseTimestamp", () => {
  it("returns null for \\N", () => {
    expect(parseTimestamp("\\N")).toBeNull();
  });

  it("parses as UTC", () => {
    expect(parseTimestamp("2009-12-31 23:59:59")?.toISOString()).toBe(
      "2009-12-31T23:59:59.000Z"
    );
  });

  it("rejects malformed and impossible dates", () => {
    expect(() => parseTimestamp("2010-06-24")).toThrow(InvalidFileError);
    expect(() => parseTimestamp("2010-02-30 00:00:00")).toThrow(InvalidFileError);
  });
});
