import { describe, it, expect } from "vitest";
import { createAlphabet } from "./alphabet";
import { NORM } from "./coords";
import { createDictionary } from "./dictionary";
import { ConfigurationError } from "./errors";
import { createCombinedModel, currentWord, probabilities, quantise } from "./models";
import { createPpmModel } from "./ppm";
import { trainOnText } from "./training";

const total = (counts: number[]) => counts.reduce((a, b) => a + b, 0);

describe("quantise", () => {
  it("floors and hands leftovers to the largest remainders", () => {
    expect(quantise([0, 1, 1, 2], { norm: 8 })).toEqual([0, 2, 2, 4]);
  });

  it("breaks remainder ties toward the lower symbol", () => {
    expect(quantise([0, 1, 1, 1], { norm: 10 })).toEqual([0, 4, 3, 3]);
  });

  it("gives every symbol at least one unit", () => {
    expect(quantise([0, 0, 0, 1], { norm: 10 })).toEqual([0, 1, 1, 8]);
  });

  it("takes fixed shares first", () => {
    const fixed = new Map([[1, 0.5]]);
    expect(quantise([0, 1, 1, 1], { norm: 100, fixed })).toEqual([0, 50, 25, 25]);
  });

  it("sums exactly to NORM by default", () => {
    expect(total(quantise([0, 0.1, 0.2, 0.3, 0.15, 0.25]))).toBe(NORM);
  });

  it("treats non-finite weights as zero", () => {
    expect(quantise([0, Number.NaN, 1], { norm: 4 })).toEqual([0, 1, 3]);
  });

  it("rejects a norm smaller than the alphabet", () => {
    expect(() => quantise([0, 1, 1, 1], { norm: 2 })).toThrow(ConfigurationError);
  });
});

describe("currentWord", () => {
  it("returns the characters after the last separator", () => {
    expect(currentWord("hello wor")).toBe("wor");
    expect(currentWord("end.")).toBe("");
    expect(currentWord("one,two")).toBe("two");
    expect(currentWord("")).toBe("");
  });
});

describe("probabilities", () => {
  const letters = "abcdefghijklmnopqrstuvwxyz";
  const english = createAlphabet({
    name: "english",
    groups: [
      { name: "letters", characters: Array.from(letters, (text) => ({ text })) },
      { name: "space", characters: [{ text: " " }] },
    ],
  });

  it("favours h after t once 'the the the the' is learnt", () => {
    const ppm = createPpmModel({ order: 2, alphabetSize: english.size });
    trainOnText(ppm, "the the the the", english);
    const t = english.textToSymbols("t");
    const counts = probabilities(ppm, t);
    const h = english.textToSymbols("h")[0];
    expect(total(counts)).toBe(NORM);
    for (let s = 1; s <= english.size; s++) {
      if (s !== h) expect(counts[h]).toBeGreaterThan(counts[s]);
    }
  });

  it("is identical across runs", () => {
    const run = () => {
      const ppm = createPpmModel({ order: 3, alphabetSize: english.size });
      trainOnText(ppm, "a quick study of quiet quills", english);
      return probabilities(ppm, english.textToSymbols("qu"));
    };
    expect(run()).toEqual(run());
  });
});

describe("createCombinedModel", () => {
  const alphabet = createAlphabet({
    name: "abc",
    groups: [{ name: "all", characters: [{ text: "a" }, { text: "b" }, { text: "c" }, { text: " " }] }],
  });
  const dictionary = createDictionary([
    { word: "ab", frequency: 3 },
    { word: "ac", frequency: 1 },
  ]);

  it("blends dictionary continuations into the current word", () => {
    const ppm = createPpmModel({ order: 1, alphabetSize: 4 });
    const lm = createCombinedModel({ alphabet, ppm, dictionary, ppmWeight: 0.5 });
    const p = lm.predict([1]);
    expect(p[1]).toBeCloseTo(0.125, 12);
    expect(p[2]).toBeCloseTo(0.5, 12);
    expect(p[3]).toBeCloseTo(0.25, 12);
    expect(p[4]).toBeCloseTo(0.125, 12);
  });

  it("falls back to PPM between words", () => {
    const ppm = createPpmModel({ order: 1, alphabetSize: 4 });
    const lm = createCombinedModel({ alphabet, ppm, dictionary, ppmWeight: 0.5 });
    expect(Array.from(lm.predict([1, 4]))).toEqual(Array.from(ppm.predict([4])));
  });

  it("sends observations to the PPM part", () => {
    const ppm = createPpmModel({ order: 1, alphabetSize: 4 });
    const lm = createCombinedModel({ alphabet, ppm, dictionary });
    lm.observe([2, 3], 1);
    expect(ppm.counts([3]).get(1)).toBe(1);
    lm.forget([2, 3], 1);
    expect(ppm.counts([3]).size).toBe(0);
  });

  it("rejects a weight outside [0, 1]", () => {
    const ppm = createPpmModel({ order: 1, alphabetSize: 4 });
    expect(() => createCombinedModel({ alphabet, ppm, dictionary, ppmWeight: 2 })).toThrow(
      ConfigurationError,
    );
  });
});
