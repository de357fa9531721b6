import { describe, it, expect } from "vitest";
import { createAlphabet } from "./alphabet";
import { alphabetRules, createConversionManager, type ConversionRule } from "./conversion";

const rules: ConversionRule[] = [
  { input: "b", output: "1" },
  { input: "b", output: "2", context: "a" },
  { input: "ka", output: "K" },
  { input: "k", output: "k-" },
];

describe("createConversionManager", () => {
  it("does nothing without a conversion mode", () => {
    expect(createConversionManager("none", rules).convert("kab")).toBe("kab");
  });

  it("prefers the longer input", () => {
    const manager = createConversionManager("phonetic-map", rules);
    expect(manager.convert("kak")).toBe("Kk-");
  });

  it("copies characters no rule covers", () => {
    const manager = createConversionManager("phonetic-map", rules);
    expect(manager.convert("xby")).toBe("x1y");
  });

  it("lets the longest matching context win", () => {
    const manager = createConversionManager("context-sensitive-route", rules);
    expect(manager.convert("ab")).toBe("a2");
    expect(manager.convert("cb")).toBe("c1");
    expect(manager.ruleAt("ab", 1)).toEqual({ input: "b", output: "2", context: "a" });
  });

  it("ignores context rules unless routing is context sensitive", () => {
    const manager = createConversionManager("context-free-route", rules);
    expect(manager.rules).toHaveLength(3);
    expect(manager.convert("ab")).toBe("a1");
  });

  it("keeps the first of two equal rules", () => {
    const manager = createConversionManager("phonetic-map", [
      { input: "q", output: "first" },
      { input: "q", output: "second" },
    ]);
    expect(manager.convert("q")).toBe("first");
  });
});

describe("alphabetRules", () => {
  it("maps display to text for a phonetic map", () => {
    const alphabet = createAlphabet({
      name: "greek",
      conversion: "phonetic-map",
      groups: [{ name: "g", characters: [{ text: "α", display: "a" }, { text: "b" }] }],
    });
    expect(alphabetRules(alphabet)).toEqual([{ input: "a", output: "α" }]);
  });

  it("routes the symbols between the markers to the one after", () => {
    const alphabet = createAlphabet({
      name: "route",
      conversion: "context-free-route",
      groups: [
        {
          name: "g",
          characters: [{ text: "<" }, { text: "k" }, { text: "a" }, { text: ">" }, { text: "X" }, { text: "y" }],
        },
      ],
    });
    expect(alphabetRules(alphabet)).toEqual([{ input: "ka", output: "X" }]);
  });

  it("has none without a conversion mode", () => {
    const alphabet = createAlphabet({
      name: "plain",
      groups: [{ name: "g", characters: [{ text: "α", display: "a" }] }],
    });
    expect(alphabetRules(alphabet)).toEqual([]);
  });
});
