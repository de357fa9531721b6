/**
 * Colour schemes: indexed foreground/background pairs that nodes select
 * by their colour key.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { Colour } from "./types";

export interface ColourPair {
  readonly foreground: Colour;
  readonly background: Colour;
}

export interface ColourScheme {
  readonly name: string;
  readonly description: string;
  readonly pairs: readonly ColourPair[];
}

export function rgba(r: number, g: number, b: number, a = 255): Colour {
  return { r, g, b, a };
}

export const BLACK = rgba(0, 0, 0);
export const WHITE = rgba(255, 255, 255);
export const RED = rgba(255, 0, 0);

/** Parse `#RRGGBB` or `#RRGGBBAA`. */
export function parseHexColour(hex: string): Colour {
  const m = /^#([0-9a-f]{6})([0-9a-f]{2})?$/i.exec(hex.trim());
  if (!m) throw new ConfigurationError(`bad colour "${hex}"`);
  const n = parseInt(m[1], 16);
  const a = m[2] === undefined ? 255 : parseInt(m[2], 16);
  return rgba((n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff, a);
}

export function toCss({ r, g, b, a }: Colour): string {
  return `rgba(${r}, ${g}, ${b}, ${+(a / 255).toFixed(3)})`;
}

/** Pair for a colour key; keys wrap around the scheme. */
export function colourPair(scheme: ColourScheme, key: number): ColourPair {
  const n = scheme.pairs.length;
  return scheme.pairs[((Math.trunc(key) % n) + n) % n];
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

const hexColour = z.string().regex(/^#[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/);

const schemeSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  pairs: z
    .array(z.object({ foreground: hexColour, background: hexColour }))
    .min(1),
});

export const colourSchemeFileSchema = z.object({
  schemes: z.array(schemeSchema).min(1),
});

/** Validate a colour-scheme file and return its schemes in order. */
export function parseColourSchemes(json: unknown): ColourScheme[] {
  const result = colourSchemeFileSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(
      "invalid colour scheme file",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data.schemes.map((s) => ({
    name: s.name,
    description: s.description,
    pairs: s.pairs.map((p) => ({
      foreground: parseHexColour(p.foreground),
      background: parseHexColour(p.background),
    })),
  }));
}

const pair = (bg: string): ColourPair => ({
  foreground: BLACK,
  background: parseHexColour(bg),
});

/** Pastel palette used when the host supplies none. */
export const DEFAULT_SCHEME: ColourScheme = {
  name: "default",
  description: "Pastel greens and blues",
  pairs: [
    pair("#b4e1b4"),
    pair("#a0c8f0"),
    pair("#fac8a0"),
    pair("#e6afaf"),
    pair("#beaffa"),
    pair("#e1e1af"),
    pair("#c8f0f0"),
    pair("#f0d2e6"),
  ],
};
