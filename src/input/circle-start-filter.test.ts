import { describe, it, expect } from "vitest";
import type { Screen } from "../types";
import { angleBetween, createCircleStartFilter } from "./circle-start-filter";
import { ACTIVE, INACTIVE } from "./markers";
import { testContext } from "./test-context";

// The start circle sits on the crosshair at (400, 300) with radius 50.
// Quarter turns round it, 40 px out.
const ROUND: [number, number][] = [
  [440, 300],
  [400, 340],
  [360, 300],
  [400, 260],
  [440, 300],
];

function circle(times: number[]) {
  const context = testContext();
  const filter = createCircleStartFilter(context.settings);
  times.forEach((t, i) => {
    const [x, y] = ROUND[i % ROUND.length];
    context.device.setPosition(x, y);
    filter.process(context.ctx, t);
  });
  return { ...context, filter };
}

describe("angleBetween", () => {
  it("takes the short way round", () => {
    expect(angleBetween(0, Math.PI / 2)).toBeCloseTo(Math.PI / 2, 12);
    expect(angleBetween(Math.PI, -Math.PI / 2)).toBeCloseTo(Math.PI / 2, 12);
    expect(angleBetween(Math.PI / 2, 0)).toBeCloseTo(-Math.PI / 2, 12);
  });
});

describe("createCircleStartFilter", () => {
  it("starts after a full turn round the circle", () => {
    const { filter } = circle([0, 100, 200]);
    expect(filter.paused).toBe(true);
    expect(filter.tracking).toBe(true);

    const { filter: started } = circle([0, 100, 200, 300, 400]);
    expect(started.paused).toBe(false);
    expect(started.tracking).toBe(false);
  });

  it("waits for the dwell time", () => {
    const { ctx, device, filter } = circle([0, 10, 20, 30, 40]);
    expect(filter.paused).toBe(true);
    device.setPosition(400, 340);
    filter.process(ctx, 250);
    expect(filter.paused).toBe(false);
  });

  it("starts over when the turn takes too long", () => {
    const { filter } = circle([0, 1000, 2100, 2200, 2300]);
    // Half a turn since the restart at 2100.
    expect(filter.paused).toBe(true);
  });

  it("starts over when the pointer leaves the circle", () => {
    const { ctx, device, filter } = circle([0, 100]);
    device.setPosition(600, 300);
    filter.process(ctx, 150);
    expect(filter.tracking).toBe(false);
    for (const [t, [x, y]] of [[200, ROUND[2]], [300, ROUND[3]], [400, ROUND[4]]] as const) {
      device.setPosition(x, y);
      filter.process(ctx, t);
    }
    expect(filter.paused).toBe(true);
  });

  it("steers toward the pointer and stops on coming back into the circle", () => {
    const { ctx, model, device, filter } = circle([]);
    filter.keyDown("startStop", 0, ctx);
    // Still inside from the start: keeps going.
    device.setPosition(420, 300);
    expect(filter.process(ctx, 2000)).toBe(true);

    device.setPosition(200, 300);
    expect(filter.process(ctx, 2016)).toBe(true);
    expect(model.scheduledSteps).toEqual([{ min: 955n, max: 3140n }]);

    device.setPosition(410, 300);
    expect(filter.process(ctx, 2032)).toBe(false);
    expect(filter.paused).toBe(true);
    expect(filter.tracking).toBe(true);
    expect(model.scheduledSteps).toHaveLength(0);
  });

  it("stops when the pointer goes", () => {
    const { ctx, device, filter } = circle([]);
    filter.resume(0);
    device.clear();
    expect(filter.process(ctx, 16)).toBe(false);
    expect(filter.paused).toBe(true);
  });

  it("draws the start circle", () => {
    const { ctx, filter } = circle([0]);
    const circles: unknown[][] = [];
    const screen: Screen = {
      width: 800,
      height: 600,
      drawRectangle: () => {},
      drawCircle: (...args) => circles.push(args),
      drawLine: () => {},
      makeLabel: (text, wrap) => ({ text, wrap }),
      textSize: () => ({ width: 0, height: 0 }),
      drawString: () => {},
      display: () => {},
    };
    filter.decorate?.(screen, ctx.view);
    filter.reset();
    filter.decorate?.(screen, ctx.view);
    expect(circles).toEqual([
      [400, 300, 50, undefined, ACTIVE, 2],
      [400, 300, 50, undefined, INACTIVE, 2],
    ]);
  });
});
