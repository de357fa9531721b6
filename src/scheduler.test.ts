import { describe, it, expect } from "vitest";
import { oneStep, zoomSteps } from "./scheduler";
import { width } from "./coords";

const root = { min: 0n, max: 4096n };

describe("oneStep", () => {
  it("jumps straight to the target for a wide range", () => {
    expect(oneStep(root, 1024n, 3072n, 10, 0, false)).toEqual({ min: -2048n, max: 6144n });
  });

  it("exact dynamics take a geometric fraction", () => {
    // ratio 2 over 2 steps: (√2 − 1) / (2 − 1) of the way
    expect(oneStep(root, 1024n, 3072n, 2, 5000, true)).toEqual({ min: -848n, max: 4944n });
  });

  it("approximate dynamics use integer arithmetic", () => {
    // ⌊√2048⌋ = 45, 64·1 + 45 = 109, 2048·45/109 = 845.5…
    expect(oneStep(root, 1024n, 3072n, 2, 5000, false)).toEqual({ min: -845n, max: 4941n });
  });

  it("holds still when the target is the viewport", () => {
    expect(oneStep(root, 0n, 4096n, 4, 5000, true)).toEqual(root);
  });

  it("rejects an empty target range", () => {
    expect(() => oneStep(root, 10n, 10n, 1, 0, false)).toThrow(/empty target range/);
  });
});

describe("zoomSteps", () => {
  it("ends exactly at the target", () => {
    const steps = zoomSteps(root, 1024n, 3072n, 3);
    expect(steps).toHaveLength(3);
    expect(steps[2]).toEqual({ min: -2048n, max: 6144n });
  });

  it("grows the width along a logarithmic series", () => {
    const steps = zoomSteps(root, 1024n, 3072n, 3);
    expect(steps.map(width)).toEqual([5792n, 7298n, 8192n]);
  });

  it("a single step is the target", () => {
    expect(zoomSteps(root, 1024n, 3072n, 1)).toEqual([{ min: -2048n, max: 6144n }]);
  });
});
