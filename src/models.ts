/**
 * Language-model contract, integer quantisation, and the PPM +
 * dictionary blend.
 */

import type { Alphabet } from "./alphabet";
import type { Dictionary } from "./dictionary";
import { NORM } from "./coords";
import { ConfigurationError } from "./errors";

/**
 * Next-symbol predictor over symbols 1..alphabetSize.
 *
 * Implementations must be deterministic: the same sequence of
 * `observe`/`forget` calls yields the same distributions.  `forget`
 * exactly undoes an `observe` with the same arguments.
 */
export interface LanguageModel {
  readonly alphabetSize: number;
  readonly order: number;
  /** How many trailing symbols of context `predict` makes use of. */
  readonly contextLength: number;
  /** Probabilities indexed by symbol; index 0 is unused and zero. */
  predict(context: readonly number[]): Float64Array;
  observe(context: readonly number[], symbol: number): void;
  forget(context: readonly number[], symbol: number): void;
}

// ---------------------------------------------------------------------------
// Quantisation
// ---------------------------------------------------------------------------

export interface QuantiseOptions {
  /** Total number of units to hand out.  Default NORM. */
  norm?: number;
  /** Symbols whose share is fixed, as probabilities in (0, 1]. */
  fixed?: ReadonlyMap<number, number>;
}

/**
 * Turn weights (indexed by symbol, index 0 ignored) into integer counts
 * summing exactly to `norm`.  Every symbol gets at least one unit so it
 * stays reachable.  Fixed symbols take their share first; the rest is
 * split by floor rounding, with leftover units going to the largest
 * fractional parts (lower index first on ties).
 */
export function quantise(
  weights: ArrayLike<number>,
  options: QuantiseOptions = {},
): number[] {
  const norm = options.norm ?? NORM;
  const fixed = options.fixed ?? new Map<number, number>();
  const n = weights.length - 1;
  if (n < 1) throw new ConfigurationError("cannot quantise an empty distribution");
  if (norm < n) {
    throw new ConfigurationError(`norm ${norm} is too small for ${n} symbols`);
  }

  const counts = new Array<number>(n + 1).fill(0);
  let available = norm;

  for (const [symbol, p] of fixed) {
    if (symbol < 1 || symbol > n) continue;
    const c = Math.max(1, Math.round(p * norm));
    counts[symbol] = c;
    available -= c;
  }

  const free: number[] = [];
  let totalWeight = 0;
  for (let s = 1; s <= n; s++) {
    if (fixed.has(s)) continue;
    free.push(s);
    const w = weights[s];
    if (w > 0 && Number.isFinite(w)) totalWeight += w;
  }
  if (available < free.length) {
    throw new ConfigurationError(
      `fixed probabilities leave ${available} units for ${free.length} symbols`,
    );
  }
  if (free.length === 0) {
    // Only fixed symbols: give the leftover (positive or negative) to
    // the largest one so the total stays exact.
    let biggest = 1;
    for (let s = 2; s <= n; s++) if (counts[s] > counts[biggest]) biggest = s;
    counts[biggest] += available;
    return counts;
  }

  for (const s of free) counts[s] = 1;
  const spare = available - free.length;

  const share = (s: number): number => {
    const w = weights[s];
    const valid = w > 0 && Number.isFinite(w) ? w : 0;
    return totalWeight > 0 ? (valid / totalWeight) * spare : spare / free.length;
  };

  const remainders: { symbol: number; frac: number }[] = [];
  let handed = 0;
  for (const s of free) {
    const exact = share(s);
    const whole = Math.floor(exact);
    counts[s] += whole;
    handed += whole;
    remainders.push({ symbol: s, frac: exact - whole });
  }

  remainders.sort((a, b) => b.frac - a.frac || a.symbol - b.symbol);
  let leftover = spare - handed;
  for (let i = 0; leftover > 0; i = (i + 1) % remainders.length) {
    counts[remainders[i].symbol]++;
    leftover--;
  }
  return counts;
}

/**
 * Integer counts for the next symbol after `context`, summing exactly
 * to `options.norm` (default NORM).
 */
export function probabilities(
  model: LanguageModel,
  context: readonly number[],
  options: QuantiseOptions = {},
): number[] {
  const trimmed = context.slice(Math.max(0, context.length - model.contextLength));
  return quantise(model.predict(trimmed), options);
}

// ---------------------------------------------------------------------------
// PPM + dictionary blend
// ---------------------------------------------------------------------------

const WORD_SEPARATORS = new Set([" ", "\t", "\n", ".", ",", "!", "?"]);

/** Longest suffix of `text` containing no word separator. */
export function currentWord(text: string): string {
  const chars = Array.from(text);
  let start = chars.length;
  while (start > 0 && !WORD_SEPARATORS.has(chars[start - 1])) start--;
  return chars.slice(start).join("");
}

export interface CombinedModelOptions {
  alphabet: Alphabet;
  ppm: LanguageModel;
  dictionary: Dictionary;
  /** Weight of the PPM distribution, in [0, 1].  Default 0.7. */
  ppmWeight?: number;
  /** Context kept for finding the current word.  Default 24. */
  contextLength?: number;
}

/**
 * Blend PPM with a dictionary: while the current word is a non-empty
 * prefix of dictionary words, mix in the distribution of their next
 * characters.  Observations only reach the PPM part.
 */
export function createCombinedModel({
  alphabet,
  ppm,
  dictionary,
  ppmWeight = 0.7,
  contextLength = 24,
}: CombinedModelOptions): LanguageModel {
  if (!(ppmWeight >= 0 && ppmWeight <= 1)) {
    throw new ConfigurationError(`ppmWeight must be in [0, 1], got ${ppmWeight}`);
  }
  if (ppm.alphabetSize !== alphabet.size) {
    throw new ConfigurationError(
      `PPM covers ${ppm.alphabetSize} symbols but the alphabet has ${alphabet.size}`,
    );
  }

  const ppmContext = (context: readonly number[]) =>
    context.slice(Math.max(0, context.length - ppm.contextLength));

  return {
    alphabetSize: alphabet.size,
    order: ppm.order,
    contextLength: Math.max(contextLength, ppm.contextLength),

    predict(context) {
      const base = ppm.predict(ppmContext(context));
      const word = currentWord(alphabet.symbolsToText(context));
      if (word === "" || ppmWeight === 1) return base;

      const dict = new Float64Array(base.length);
      let total = 0;
      for (const [ch, weight] of dictionary.nextCharacterWeights(word)) {
        const symbol = alphabet.symbolForText(ch);
        if (symbol === undefined) continue;
        dict[symbol] += weight;
        total += weight;
      }
      if (total === 0) return base;

      const blended = new Float64Array(base.length);
      for (let s = 1; s < base.length; s++) {
        blended[s] = ppmWeight * base[s] + (1 - ppmWeight) * (dict[s] / total);
      }
      return blended;
    },

    observe(context, symbol) {
      ppm.observe(ppmContext(context), symbol);
    },

    forget(context, symbol) {
      ppm.forget(ppmContext(context), symbol);
    },
  };
}
