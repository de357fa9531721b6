import { describe, it, expect } from "vitest";
import { createPointerFilter } from "./pointer-filter";
import { testContext } from "./test-context";

describe("createPointerFilter", () => {
  it("does nothing while paused", () => {
    const { ctx, model, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    device.setPosition(200, 300);
    expect(filter.process(ctx, 0)).toBe(false);
    expect(model.scheduledSteps).toHaveLength(0);
  });

  it("steers toward the pointer", () => {
    const { ctx, model, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.resume(0);
    // 200 px left of centre is dasher (3413.3, 2048): the range
    // [-1365, 5461] is wide enough to be taken in one jump.
    device.setPosition(200, 300);
    expect(filter.process(ctx, 2000)).toBe(true);
    expect(model.scheduledSteps).toEqual([{ min: 955n, max: 3140n }]);
  });

  it("pauses when the pointer leaves the view", () => {
    const { ctx, model, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.resume(0);
    device.setPosition(200, 300);
    filter.process(ctx, 2000);

    device.setPosition(400, -10);
    expect(filter.process(ctx, 2016)).toBe(false);
    expect(filter.paused).toBe(true);
    expect(model.scheduledSteps).toHaveLength(0);

    // Coming back does not restart it.
    device.setPosition(200, 300);
    expect(filter.process(ctx, 2032)).toBe(false);
    expect(model.scheduledSteps).toHaveLength(0);
  });

  it("pauses without a pointer", () => {
    const { ctx, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.resume(0);
    device.clear();
    expect(filter.process(ctx, 16)).toBe(false);
    expect(filter.paused).toBe(true);
  });

  it("pauses past the left or right edge", () => {
    const { ctx, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.resume(0);
    device.setPosition(801, 300);
    expect(filter.process(ctx, 16)).toBe(false);
    expect(filter.paused).toBe(true);
  });

  it("toggles on start/stop", () => {
    const { ctx, model, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.keyDown("startStop", 0, ctx);
    expect(filter.paused).toBe(false);

    device.setPosition(200, 300);
    filter.process(ctx, 2000);
    filter.keyDown("startStop", 2000, ctx);
    expect(filter.paused).toBe(true);
    expect(model.scheduledSteps).toHaveLength(0);
  });

  it("draws a line to the pointer", () => {
    const { ctx, device, settings } = testContext();
    const filter = createPointerFilter(settings);
    filter.resume(0);
    device.setPosition(200, 300);
    filter.process(ctx, 2000);

    const lines: number[][] = [];
    filter.decorate?.(
      {
        width: 800,
        height: 600,
        drawRectangle: () => {},
        drawCircle: () => {},
        drawLine: (x1, y1, x2, y2) => lines.push([x1, y1, x2, y2]),
        makeLabel: (text, wrap) => ({ text, wrap }),
        textSize: () => ({ width: 0, height: 0 }),
        drawString: () => {},
        display: () => {},
      },
      ctx.view,
    );
    expect(lines).toHaveLength(1);
    expect(lines[0][0]).toBe(400);
    expect(lines[0][2]).toBeCloseTo(200, 9);
  });
});
