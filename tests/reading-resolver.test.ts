import { describe, it, expect } from "vitest";
import {
  ReadingResolver,
  TaggedWord,
  dictionaryFromEntries,
  parseSentence,
} from "../src/index.js";

const dictionary = dictionaryFromEntries({
  英語: ["えいご"],
  彼: ["かれ", "だれ"],
  苦手: ["にがて", "にがて"],
  は: ["は"],
  空: [],
});

describe("ReadingResolver", () => {
  const resolver = new ReadingResolver(dictionary);

  it("uses the only reading when there is no sense", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "英語" }));
    expect(word.reading).toBe("えいご");
  });

  it("picks the reading for an explicit sense", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "彼", sense: 2 }));
    expect(word.reading).toBe("だれ");
  });

  it("leaves an out-of-range sense unresolved when readings differ", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "彼", sense: 5 }));
    expect(word.reading).toBeUndefined();
  });

  it("falls back to a uniform reading when the sense is out of range", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "英語", sense: 3 }));
    expect(word.reading).toBe("えいご");
  });

  it("treats repeated identical readings as one", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "苦手" }));
    expect(word.reading).toBe("にがて");
  });

  it("does not guess between different readings", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "彼" }));
    expect(word.reading).toBeUndefined();
  });

  it("never sets a reading equal to the headword", () => {
    const word = resolver.resolveWord(new TaggedWord({ headword: "は" }));
    expect(word.reading).toBeUndefined();
  });

  it("keeps an existing reading", () => {
    const word = resolver.resolveWord(
      new TaggedWord({ headword: "彼", reading: "あれ", sense: 2 })
    );
    expect(word.reading).toBe("あれ");
  });

  it("ignores words missing from the dictionary or without readings", () => {
    expect(resolver.resolveWord(new TaggedWord({ headword: "猫" })).reading).toBeUndefined();
    expect(resolver.resolveWord(new TaggedWord({ headword: "空" })).reading).toBeUndefined();
  });

  it("returns the same instance when nothing changes", () => {
    const word = new TaggedWord({ headword: "猫" });
    expect(resolver.resolveWord(word)).toBe(word);
  });

  it("resolves a sentence without mutating the input", () => {
    const words = parseSentence("彼[2] は 英語 が");
    const resolved = resolver.resolve(words);

    expect(resolved.map(String)).toEqual(["彼(だれ)[2]", "は", "英語(えいご)", "が"]);
    expect(words.map(String)).toEqual(["彼[2]", "は", "英語", "が"]);
  });

  it("passes words through without a dictionary", () => {
    const bare = new ReadingResolver();
    const word = new TaggedWord({ headword: "英語" });

    expect(bare.enabled).toBe(false);
    expect(bare.resolveWord(word)).toBe(word);
  });
});

describe("dictionaryFromEntries", () => {
  it("accepts a Map", () => {
    const dict = dictionaryFromEntries(new Map([["猫", ["ねこ"]]]));
    expect(dict.lookup("猫")?.readings).toEqual(["ねこ"]);
    expect(dict.lookup("犬")).toBeUndefined();
  });
});
