/**
 * Alphabets: the ordered symbols a session can write, and how text maps
 * onto them.
 *
 * Symbols are numbered from 1 in definition order.  Index 0 is the
 * pseudo-root and never names a real symbol.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { Orientation } from "./types";

export type ConversionMode =
  | "none"
  | "phonetic-map"
  | "context-free-route"
  | "context-sensitive-route";

export interface AlphabetSymbol {
  /** Output appended to the tape when committed. */
  readonly text: string;
  /** Glyph drawn in the node. */
  readonly display: string;
  /** Fixed share of the distribution in (0, 1], overriding the LM. */
  readonly fixedProbability?: number;
  /** Speed multiplier applied while this symbol is under the crosshair. */
  readonly speedFactor?: number;
  /** Colour-scheme index. */
  readonly colour: number;
  readonly group?: string;
}

// ---------------------------------------------------------------------------
// Definition schema
// ---------------------------------------------------------------------------

const characterSchema = z.object({
  text: z.string(),
  display: z.string().optional(),
  p: z.number().gt(0).max(1).optional(),
  speed: z.number().positive().optional(),
  colour: z.number().int().min(0).optional(),
});

const groupSchema = z.object({
  name: z.string(),
  colour: z.number().int().min(0).optional(),
  characters: z.array(characterSchema),
});

export const alphabetDefinitionSchema = z.object({
  name: z.string().min(1),
  orientation: z.enum(["LTR", "RTL", "TTB", "BTT"]).default("LTR"),
  encoding: z.string().optional(),
  contextEscape: z.string().min(1).default("§"),
  conversion: z
    .enum(["none", "phonetic-map", "context-free-route", "context-sensitive-route"])
    .default("none"),
  trainStart: z.string().min(1).default("<"),
  trainStop: z.string().min(1).default(">"),
  groups: z.array(groupSchema),
});

export type AlphabetDefinition = z.input<typeof alphabetDefinitionSchema>;

// ---------------------------------------------------------------------------
// Alphabet
// ---------------------------------------------------------------------------

export interface Alphabet {
  readonly name: string;
  readonly orientation: Orientation;
  readonly contextEscape: string;
  readonly conversion: ConversionMode;
  readonly trainStart: string;
  readonly trainStop: string;
  /** Number of symbols, not counting the pseudo-root. */
  readonly size: number;
  /** Index of the symbol whose text is a single space, if any. */
  readonly spaceSymbol: number | undefined;

  symbol(index: number): AlphabetSymbol;
  symbolForText(text: string): number | undefined;
  /** Greedy longest match; characters no symbol covers are skipped. */
  textToSymbols(text: string): number[];
  symbolsToText(symbols: readonly number[]): string;
  /** True if the symbol's output starts with whitespace. */
  isSpace(index: number): boolean;
}

/** Validate a JSON definition and build the alphabet. */
export function parseAlphabet(json: unknown): Alphabet {
  const result = alphabetDefinitionSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(
      "invalid alphabet definition",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return createAlphabet(result.data);
}

export function createAlphabet(input: AlphabetDefinition): Alphabet {
  const def = alphabetDefinitionSchema.parse(input);

  const symbols: AlphabetSymbol[] = [];
  for (const group of def.groups) {
    for (const ch of group.characters) {
      symbols.push({
        text: ch.text,
        display: ch.display ?? ch.text,
        fixedProbability: ch.p,
        speedFactor: ch.speed,
        colour: ch.colour ?? group.colour ?? symbols.length,
        group: group.name,
      });
    }
  }
  if (symbols.length === 0) {
    throw new ConfigurationError(`alphabet "${def.name}" has no symbols`);
  }

  const byText = new Map<string, number>();
  let longest = 0;
  symbols.forEach((s, i) => {
    if (s.text.length === 0) return;
    if (!byText.has(s.text)) byText.set(s.text, i + 1);
    longest = Math.max(longest, s.text.length);
  });

  const fixedTotal = symbols.reduce((sum, s) => sum + (s.fixedProbability ?? 0), 0);
  if (fixedTotal >= 1) {
    throw new ConfigurationError(
      `alphabet "${def.name}": fixed probabilities sum to ${fixedTotal}, leaving nothing for the rest`,
    );
  }

  function symbol(index: number): AlphabetSymbol {
    const s = symbols[index - 1];
    if (index < 1 || s === undefined) {
      throw new RangeError(`symbol ${index} outside 1..${symbols.length}`);
    }
    return s;
  }

  return {
    name: def.name,
    orientation: def.orientation,
    contextEscape: def.contextEscape,
    conversion: def.conversion,
    trainStart: def.trainStart,
    trainStop: def.trainStop,
    size: symbols.length,
    spaceSymbol: byText.get(" "),

    symbol,

    symbolForText(text) {
      return byText.get(text);
    },

    textToSymbols(text) {
      const out: number[] = [];
      let i = 0;
      while (i < text.length) {
        let matched = 0;
        for (let len = Math.min(longest, text.length - i); len > 0; len--) {
          const index = byText.get(text.slice(i, i + len));
          if (index !== undefined) {
            out.push(index);
            matched = len;
            break;
          }
        }
        if (matched > 0) {
          i += matched;
        } else {
          // Skip one whole code point.
          const cp = text.codePointAt(i) ?? 0;
          i += cp > 0xffff ? 2 : 1;
        }
      }
      return out;
    },

    symbolsToText(indices) {
      return indices.map((i) => symbol(i).text).join("");
    },

    isSpace(index) {
      return /^\s/.test(symbol(index).text);
    },
  };
}
