/**
 * Word dictionary: a prefix trie over code points, where every node
 * knows the summed frequency of all words below it.
 */

import { createTrie, type TrieNode } from "./trie";
import { ConfigurationError } from "./errors";

interface WordStats {
  /** Frequency of the word ending exactly here (0 if none). */
  frequency: number;
  /** Summed frequency of every word with this prefix. */
  subtotal: number;
}

export interface DictionaryEntry {
  readonly word: string;
  readonly frequency: number;
}

export interface Dictionary {
  readonly wordCount: number;
  addWord(word: string, frequency?: number): void;
  frequency(word: string): number;
  /**
   * Summed frequency of the words continuing `prefix`, keyed by the
   * next character.  Empty if no word has that prefix.
   */
  nextCharacterWeights(prefix: string): Map<string, number>;
  entries(): DictionaryEntry[];
  /** Serialise in the `word<TAB>frequency` text format. */
  toText(): string;
}

function codePoints(text: string): number[] {
  return Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
}

export function createDictionary(
  entries: Iterable<DictionaryEntry> = [],
): Dictionary {
  const trie = createTrie<WordStats>();
  let wordCount = 0;

  const stats = (node: TrieNode<WordStats>): WordStats => {
    if (!node.value) node.value = { frequency: 0, subtotal: 0 };
    return node.value;
  };

  const dictionary: Dictionary = {
    get wordCount() {
      return wordCount;
    },

    addWord(word, frequency = 1) {
      if (word.length === 0) return;
      if (!(frequency > 0)) {
        throw new ConfigurationError(
          `word frequency must be positive, got ${frequency} for "${word}"`,
        );
      }
      const key = codePoints(word);
      let node = trie.root;
      stats(node).subtotal += frequency;
      for (const cp of key) {
        let child = node.children.get(cp);
        if (!child) {
          child = { children: new Map() };
          node.children.set(cp, child);
        }
        node = child;
        stats(node).subtotal += frequency;
      }
      const end = stats(node);
      if (end.frequency === 0) wordCount++;
      end.frequency += frequency;
    },

    frequency(word) {
      return trie.find(codePoints(word))?.value?.frequency ?? 0;
    },

    nextCharacterWeights(prefix) {
      const weights = new Map<string, number>();
      const node = trie.find(codePoints(prefix));
      if (!node) return weights;
      for (const [cp, child] of node.children) {
        const subtotal = child.value?.subtotal ?? 0;
        if (subtotal > 0) weights.set(String.fromCodePoint(cp), subtotal);
      }
      return weights;
    },

    entries() {
      const result: DictionaryEntry[] = [];
      (function walk(node: TrieNode<WordStats>, prefix: string): void {
        if (node.value && node.value.frequency > 0) {
          result.push({ word: prefix, frequency: node.value.frequency });
        }
        for (const [cp, child] of node.children) {
          walk(child, prefix + String.fromCodePoint(cp));
        }
      })(trie.root, "");
      return result;
    },

    toText() {
      return dictionary
        .entries()
        .map(({ word, frequency }) => `${word}\t${frequency}\n`)
        .join("");
    },
  };

  for (const { word, frequency } of entries) {
    dictionary.addWord(word, frequency);
  }
  return dictionary;
}

/**
 * Parse `word<TAB>frequency` lines.  Blank lines and lines starting
 * with `#` are skipped; a missing frequency counts as 1.
 */
export function parseDictionary(text: string): DictionaryEntry[] {
  const entries: DictionaryEntry[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;
    const [word, freq] = line.split("\t");
    let frequency = 1;
    if (freq !== undefined) {
      frequency = parseFloat(freq);
      if (!Number.isFinite(frequency) || frequency <= 0) {
        throw new ConfigurationError(
          `dictionary line ${i + 1}: bad frequency "${freq}"`,
        );
      }
    }
    entries.push({ word, frequency });
  }
  return entries;
}
