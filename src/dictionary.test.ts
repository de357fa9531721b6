import { describe, it, expect } from "vitest";
import { createDictionary, parseDictionary } from "./dictionary";
import { ConfigurationError } from "./errors";

describe("createDictionary", () => {
  it("counts distinct words", () => {
    const dict = createDictionary([
      { word: "the", frequency: 5 },
      { word: "then", frequency: 2 },
      { word: "the", frequency: 1 },
    ]);
    expect(dict.wordCount).toBe(2);
    expect(dict.frequency("the")).toBe(6);
    expect(dict.frequency("then")).toBe(2);
    expect(dict.frequency("th")).toBe(0);
  });

  it("weights next characters by the words below them", () => {
    const dict = createDictionary([
      { word: "tea", frequency: 3 },
      { word: "ten", frequency: 2 },
      { word: "to", frequency: 4 },
    ]);
    expect(dict.nextCharacterWeights("t")).toEqual(new Map([["e", 5], ["o", 4]]));
    expect(dict.nextCharacterWeights("te")).toEqual(new Map([["a", 3], ["n", 2]]));
  });

  it("has no continuations for an unknown prefix or a finished word", () => {
    const dict = createDictionary([{ word: "to", frequency: 1 }]);
    expect(dict.nextCharacterWeights("x").size).toBe(0);
    expect(dict.nextCharacterWeights("to").size).toBe(0);
  });

  it("addWord defaults to frequency 1 and ignores the empty word", () => {
    const dict = createDictionary();
    dict.addWord("hi");
    dict.addWord("");
    expect(dict.wordCount).toBe(1);
    expect(dict.frequency("hi")).toBe(1);
  });

  it("rejects non-positive frequencies", () => {
    const dict = createDictionary();
    expect(() => dict.addWord("no", 0)).toThrow(ConfigurationError);
  });

  it("handles characters outside the basic plane", () => {
    const dict = createDictionary([{ word: "a\u{1F600}", frequency: 2 }]);
    expect(dict.nextCharacterWeights("a")).toEqual(new Map([["\u{1F600}", 2]]));
  });

  it("serialises to the text format", () => {
    const dict = createDictionary([
      { word: "ab", frequency: 2 },
      { word: "a", frequency: 1 },
    ]);
    expect(dict.toText()).toBe("a\t1\nab\t2\n");
    expect(createDictionary(parseDictionary(dict.toText())).entries()).toEqual(dict.entries());
  });
});

describe("parseDictionary", () => {
  it("skips comments and blank lines and defaults the frequency", () => {
    expect(parseDictionary("# words\n\nthe\t10\nof\n")).toEqual([
      { word: "the", frequency: 10 },
      { word: "of", frequency: 1 },
    ]);
  });

  it("reports the line of a bad frequency", () => {
    expect(() => parseDictionary("ok\t1\nbad\tlots\n")).toThrow(
      'dictionary line 2: bad frequency "lots"',
    );
  });
});
