import { describe, it, expect } from "vitest";
import { FILTER_KINDS, parseSettings } from "../settings";
import { createFilter } from "./index";
import { testContext } from "./test-context";

describe("createFilter", () => {
  it.each(FILTER_KINDS)("builds a paused %s filter", (kind) => {
    const filter = createFilter(kind, parseSettings());
    expect(filter.kind).toBe(kind);
    expect(filter.paused).toBe(true);
  });

  it("hands the random source to the demo filter", () => {
    const filter = createFilter("demo", parseSettings(), () => 1);
    if (filter.kind !== "demo") throw new Error("expected a demo filter");
    filter.resume(0);
    filter.process(testContext().ctx, 0);
    expect(filter.targetY).toBe(4096);
  });
});
