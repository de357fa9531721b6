import { describe, it, expect } from "vitest";
import { createFrameRate } from "./frame-rate";

describe("createFrameRate", () => {
  it("assumes 16 ms frames until measured", () => {
    const fr = createFrameRate(10);
    expect(fr.averageFrameTime).toBe(0.016);
    expect(fr.steps()).toBe(1);
    expect(createFrameRate(500).steps()).toBe(8);
  });

  it("smooths frame intervals with α = 0.1", () => {
    const fr = createFrameRate(100);
    fr.record(0);
    fr.record(26);
    expect(fr.averageFrameTime).toBeCloseTo(0.017, 12);
    expect(fr.steps()).toBe(2);
  });

  it("reset forgets the history", () => {
    const fr = createFrameRate(10);
    fr.record(0);
    fr.record(100);
    fr.reset(200);
    expect(fr.averageFrameTime).toBe(0.016);
    fr.record(216);
    expect(fr.averageFrameTime).toBeCloseTo(0.016, 12);
  });

  it("never goes below minSteps", () => {
    expect(createFrameRate(10, 3).steps()).toBe(3);
  });

  it("follows a changed bit rate", () => {
    const fr = createFrameRate(10);
    fr.bitRate = 1000;
    expect(fr.steps()).toBe(16);
  });
});
