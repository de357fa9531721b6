import { describe, it, expect } from "vitest";
import {
  DEFAULT_SCHEME,
  colourPair,
  parseColourSchemes,
  parseHexColour,
  rgba,
  toCss,
} from "./colours";
import { ConfigurationError } from "./errors";

describe("parseHexColour", () => {
  it("reads RGB and RGBA", () => {
    expect(parseHexColour("#ff8000")).toEqual({ r: 255, g: 128, b: 0, a: 255 });
    expect(parseHexColour("#00000080")).toEqual({ r: 0, g: 0, b: 0, a: 128 });
  });

  it("rejects anything else", () => {
    expect(() => parseHexColour("red")).toThrow(ConfigurationError);
  });
});

describe("toCss", () => {
  it("writes alpha as a fraction", () => {
    expect(toCss(rgba(255, 0, 0))).toBe("rgba(255, 0, 0, 1)");
    expect(toCss(rgba(1, 2, 3, 128))).toBe("rgba(1, 2, 3, 0.502)");
  });
});

describe("colourPair", () => {
  it("wraps keys around the scheme", () => {
    const n = DEFAULT_SCHEME.pairs.length;
    expect(colourPair(DEFAULT_SCHEME, n + 1)).toBe(DEFAULT_SCHEME.pairs[1]);
    expect(colourPair(DEFAULT_SCHEME, -1)).toBe(DEFAULT_SCHEME.pairs[n - 1]);
  });
});

describe("parseColourSchemes", () => {
  it("parses schemes in order", () => {
    const [scheme] = parseColourSchemes({
      schemes: [
        { name: "mono", pairs: [{ foreground: "#000000", background: "#ffffff" }] },
      ],
    });
    expect(scheme.name).toBe("mono");
    expect(scheme.description).toBe("");
    expect(scheme.pairs[0].background).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });

  it("reports bad colours by path", () => {
    expect(() =>
      parseColourSchemes({
        schemes: [{ name: "x", pairs: [{ foreground: "black", background: "#fff" }] }],
      }),
    ).toThrow(/schemes\.0\.pairs\.0\.foreground/);
  });
});
