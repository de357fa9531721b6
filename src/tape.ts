/** Append-only buffer of committed symbols and their output. */

export interface TapeEntry {
  readonly symbol: number;
  readonly text: string;
  /** The language model learnt this entry when it was committed. */
  readonly observed?: boolean;
}

export interface Tape {
  /** Number of entries (committed symbols). */
  readonly size: number;
  /** Length of the text in code points. */
  readonly offset: number;
  append(entry: TapeEntry): void;
  pop(): TapeEntry | undefined;
  last(): TapeEntry | undefined;
  text(): string;
  symbols(): number[];
  /** The last `n` symbols. */
  tail(n: number): number[];
  replace(entries: readonly TapeEntry[]): void;
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function createTape(): Tape {
  let entries: TapeEntry[] = [];
  let offset = 0;

  return {
    get size() {
      return entries.length;
    },

    get offset() {
      return offset;
    },

    append(entry) {
      entries.push(entry);
      offset += codePointLength(entry.text);
    },

    pop() {
      const entry = entries.pop();
      if (entry) offset -= codePointLength(entry.text);
      return entry;
    },

    last() {
      return entries[entries.length - 1];
    },

    text() {
      return entries.map((e) => e.text).join("");
    },

    symbols() {
      return entries.map((e) => e.symbol);
    },

    tail(n) {
      return entries.slice(Math.max(0, entries.length - n)).map((e) => e.symbol);
    },

    replace(next) {
      entries = [...next];
      offset = entries.reduce((sum, e) => sum + codePointLength(e.text), 0);
    },
  };
}
