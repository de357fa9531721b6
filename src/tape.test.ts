import { describe, it, expect } from "vitest";
import { createTape } from "./tape";

describe("createTape", () => {
  it("starts empty", () => {
    const tape = createTape();
    expect(tape.size).toBe(0);
    expect(tape.offset).toBe(0);
    expect(tape.text()).toBe("");
    expect(tape.last()).toBeUndefined();
    expect(tape.pop()).toBeUndefined();
  });

  it("counts offset in code points", () => {
    const tape = createTape();
    tape.append({ symbol: 1, text: "a" });
    tape.append({ symbol: 2, text: "\u{1F600}" });
    tape.append({ symbol: 3, text: "ch" });
    expect(tape.size).toBe(3);
    expect(tape.offset).toBe(4);
    expect(tape.text()).toBe("a\u{1F600}ch");
  });

  it("pop removes the last entry", () => {
    const tape = createTape();
    tape.append({ symbol: 1, text: "a" });
    tape.append({ symbol: 2, text: "\u{1F600}" });
    expect(tape.pop()).toEqual({ symbol: 2, text: "\u{1F600}" });
    expect(tape.offset).toBe(1);
    expect(tape.last()).toEqual({ symbol: 1, text: "a" });
  });

  it("tail returns the last n symbols", () => {
    const tape = createTape();
    for (const symbol of [1, 2, 3, 4]) tape.append({ symbol, text: "x" });
    expect(tape.tail(2)).toEqual([3, 4]);
    expect(tape.tail(10)).toEqual([1, 2, 3, 4]);
    expect(tape.tail(0)).toEqual([]);
    expect(tape.symbols()).toEqual([1, 2, 3, 4]);
  });

  it("replace swaps the whole contents", () => {
    const tape = createTape();
    tape.append({ symbol: 1, text: "a" });
    tape.replace([
      { symbol: 5, text: "hi" },
      { symbol: 6, text: "!" },
    ]);
    expect(tape.text()).toBe("hi!");
    expect(tape.offset).toBe(3);
    expect(tape.symbols()).toEqual([5, 6]);
  });
});
