/**
 * Prediction by Partial Match, escape method C, with exclusion.
 *
 * A trie keyed by context (oldest symbol first) stores successor counts
 * for every context of length 0..order.  Prediction starts at the
 * longest context that has been seen and backs off: each order hands
 * out `count / (total + distinct)` to its successors and passes the
 * escape mass `distinct / (total + distinct)` down, skipping symbols
 * already predicted by a longer context.  Whatever escapes order 0 is
 * shared uniformly.
 */

import { createTrie } from "./trie";
import type { LanguageModel } from "./models";

interface Successors {
  readonly counts: Map<number, number>;
  total: number;
}

export interface PpmOptions {
  /** Maximum context length, 0..5. */
  order: number;
  /** Number of symbols; valid symbols are 1..alphabetSize. */
  alphabetSize: number;
}

export interface PpmModel extends LanguageModel {
  /** Successor counts recorded for exactly this context. */
  counts(context: readonly number[]): ReadonlyMap<number, number>;
  /** Number of trie nodes, for diagnostics. */
  size(): number;
}

export function createPpmModel({ order, alphabetSize }: PpmOptions): PpmModel {
  if (!Number.isInteger(order) || order < 0) {
    throw new Error(`PPM order must be a non-negative integer, got ${order}`);
  }
  const trie = createTrie<Successors>();

  function contextsOf(context: readonly number[]): number[][] {
    const n = Math.min(order, context.length);
    const result: number[][] = [];
    for (let k = 0; k <= n; k++) {
      result.push(context.slice(context.length - k));
    }
    return result;
  }

  function checkSymbol(symbol: number): void {
    if (!Number.isInteger(symbol) || symbol < 1 || symbol > alphabetSize) {
      throw new Error(`symbol ${symbol} outside 1..${alphabetSize}`);
    }
  }

  return {
    order,
    alphabetSize,
    contextLength: order,

    predict(context) {
      const probs = new Float64Array(alphabetSize + 1);
      const excluded = new Set<number>();
      let remaining = 1;

      const orders = contextsOf(context);
      for (let i = orders.length - 1; i >= 0; i--) {
        const successors = trie.find(orders[i])?.value;
        if (!successors || successors.total === 0) continue;

        let total = 0;
        let distinct = 0;
        for (const [symbol, count] of successors.counts) {
          if (excluded.has(symbol)) continue;
          total += count;
          distinct++;
        }
        if (total === 0) continue;

        const denom = total + distinct;
        for (const [symbol, count] of successors.counts) {
          if (excluded.has(symbol)) continue;
          probs[symbol] += (remaining * count) / denom;
          excluded.add(symbol);
        }
        remaining *= distinct / denom;
      }

      // Order −1: uniform over whatever is left.
      const unseen = alphabetSize - excluded.size;
      if (unseen > 0) {
        for (let s = 1; s <= alphabetSize; s++) {
          if (!excluded.has(s)) probs[s] += remaining / unseen;
        }
      } else {
        for (let s = 1; s <= alphabetSize; s++) {
          probs[s] += remaining / alphabetSize;
        }
      }
      return probs;
    },

    observe(context, symbol) {
      checkSymbol(symbol);
      for (const key of contextsOf(context)) {
        const successors = trie.getOrSet(key, () => ({
          counts: new Map(),
          total: 0,
        }));
        successors.counts.set(symbol, (successors.counts.get(symbol) ?? 0) + 1);
        successors.total++;
      }
    },

    forget(context, symbol) {
      checkSymbol(symbol);
      for (const key of contextsOf(context)) {
        const successors = trie.find(key)?.value;
        const count = successors?.counts.get(symbol);
        if (!successors || count === undefined) {
          throw new Error(
            `forget: symbol ${symbol} was never observed after [${key.join(",")}]`,
          );
        }
        if (count === 1) successors.counts.delete(symbol);
        else successors.counts.set(symbol, count - 1);
        successors.total--;
        trie.prune(key, (s) => s.total === 0);
      }
    },

    counts(context) {
      return trie.find(context)?.value?.counts ?? new Map<number, number>();
    },

    size() {
      return trie.size();
    },
  };
}
