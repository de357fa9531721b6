import { describe, it, expect, vi } from "vitest";
import { createCanvasScreen, type Context2D } from "./canvas-screen";
import { rgba } from "./colours";

/** Records every call with the styles in effect at the time. */
function recordingContext() {
  const calls: string[] = [];
  const ctx: Context2D = {
    fillStyle: "",
    strokeStyle: "",
    lineWidth: 1,
    font: "",
    textBaseline: "alphabetic",
    fillRect: (x, y, w, h) => calls.push(`fillRect ${x} ${y} ${w} ${h} ${String(ctx.fillStyle)}`),
    strokeRect: (x, y, w, h) =>
      calls.push(`strokeRect ${x} ${y} ${w} ${h} ${String(ctx.strokeStyle)} ${ctx.lineWidth}`),
    beginPath: () => calls.push("beginPath"),
    closePath: () => calls.push("closePath"),
    moveTo: (x, y) => calls.push(`moveTo ${x} ${y}`),
    lineTo: (x, y) => calls.push(`lineTo ${x} ${y}`),
    arc: (x, y, r) => calls.push(`arc ${x} ${y} ${r}`),
    fill: () => calls.push(`fill ${String(ctx.fillStyle)}`),
    stroke: () => calls.push(`stroke ${String(ctx.strokeStyle)} ${ctx.lineWidth}`),
    fillText: (text, x, y) => calls.push(`fillText ${text} ${x} ${y} ${ctx.font}`),
    // Every character is 10 px wide.
    measureText: (text) => ({ width: text.length * 10 }),
  };
  return { ctx, calls };
}

const red = rgba(255, 0, 0);
const blue = rgba(0, 0, 255, 128);

describe("createCanvasScreen", () => {
  it("normalises rectangle corners", () => {
    const { ctx, calls } = recordingContext();
    const screen = createCanvasScreen(ctx, { width: 100, height: 50 });
    screen.drawRectangle(30, 40, 10, 20, red, blue, 2);
    expect(calls).toEqual([
      "fillRect 10 20 20 20 rgba(255, 0, 0, 1)",
      "strokeRect 10 20 20 20 rgba(0, 0, 255, 0.502) 2",
    ]);
  });

  it("skips an outline of zero width", () => {
    const { ctx, calls } = recordingContext();
    createCanvasScreen(ctx, { width: 100, height: 50 }).drawRectangle(0, 0, 1, 1, undefined, red, 0);
    expect(calls).toEqual([]);
  });

  it("draws lines and closed polygons as paths", () => {
    const { ctx, calls } = recordingContext();
    const screen = createCanvasScreen(ctx, { width: 100, height: 50 });
    screen.drawLine(0, 0, 5, 5, red, 3);
    screen.drawPolygon?.([{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 2, y: 3 }], red, undefined, 1);
    expect(calls).toEqual([
      "beginPath",
      "moveTo 0 0",
      "lineTo 5 5",
      "stroke rgba(255, 0, 0, 1) 3",
      "beginPath",
      "moveTo 0 0",
      "lineTo 4 0",
      "lineTo 2 3",
      "closePath",
      "fill rgba(255, 0, 0, 1)",
    ]);
  });

  it("wraps labels at spaces", () => {
    const { ctx, calls } = recordingContext();
    const screen = createCanvasScreen(ctx, { width: 100, height: 50 }, { fontFamily: "serif" });
    const label = screen.makeLabel("one two three", 75);
    expect(screen.textSize(label, 12)).toEqual({ width: 70, height: 24 });

    screen.drawString(label, 5, 6, 12, red);
    expect(ctx.textBaseline).toBe("top");
    expect(calls.filter((c) => c.startsWith("fillText"))).toEqual([
      "fillText one two 5 6 12px serif",
      "fillText three 5 18 12px serif",
    ]);
  });

  it("keeps an unwrapped label on one line", () => {
    const { ctx } = recordingContext();
    const screen = createCanvasScreen(ctx, { width: 100, height: 50 });
    expect(screen.textSize(screen.makeLabel("one two three", 0), 20)).toEqual({ width: 130, height: 20 });
    expect(ctx.font).toBe("20px monospace");
  });

  it("resizes and forwards display", () => {
    const { ctx } = recordingContext();
    const onDisplay = vi.fn();
    const screen = createCanvasScreen(ctx, { width: 100, height: 50 }, { onDisplay });
    screen.resize({ width: 300, height: 200 });
    expect([screen.width, screen.height]).toEqual([300, 200]);
    screen.display();
    expect(onDisplay).toHaveBeenCalledTimes(1);
  });
});
