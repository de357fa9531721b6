/**
 * `Screen` over a 2D drawing context.  Only the subset of
 * CanvasRenderingContext2D the renderer needs is required, so an
 * OffscreenCanvas context, node-canvas or a recording fake all fit.
 */

import { toCss } from "./colours";
import type { Colour, Label, Point, Screen, Size } from "./types";

export interface Context2D {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  font: string;
  textBaseline: string;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, r: number, start: number, end: number): void;
  fill(): void;
  stroke(): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { readonly width: number };
}

export interface CanvasScreenOptions {
  fontFamily?: string;
  /** Called from `display()`, e.g. to blit an offscreen buffer. */
  onDisplay?: () => void;
}

export interface CanvasScreen extends Screen {
  resize(size: Size): void;
}

function paint(
  ctx: Context2D,
  fill: Colour | undefined,
  outline: Colour | undefined,
  lineWidth: number,
): void {
  if (fill) {
    ctx.fillStyle = toCss(fill);
    ctx.fill();
  }
  if (outline && lineWidth > 0) {
    ctx.strokeStyle = toCss(outline);
    ctx.lineWidth = lineWidth;
    ctx.stroke();
  }
}

/** Break `text` into lines no wider than `wrap` pixels, at spaces. */
function wrapLines(ctx: Context2D, text: string, wrap: number): string[] {
  if (wrap <= 0) return [text];
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(" ")) {
    const next = line === "" ? word : `${line} ${word}`;
    if (line !== "" && ctx.measureText(next).width > wrap) {
      lines.push(line);
      line = word;
    } else {
      line = next;
    }
  }
  lines.push(line);
  return lines;
}

export function createCanvasScreen(
  ctx: Context2D,
  size: Size,
  options: CanvasScreenOptions = {},
): CanvasScreen {
  const fontFamily = options.fontFamily ?? "monospace";
  let width = size.width;
  let height = size.height;

  const setFont = (fontSize: number) => {
    ctx.font = `${fontSize}px ${fontFamily}`;
  };

  return {
    get width() {
      return width;
    },
    get height() {
      return height;
    },

    resize(next) {
      width = next.width;
      height = next.height;
    },

    drawRectangle(x1, y1, x2, y2, fill, outline, lineWidth) {
      const x = Math.min(x1, x2);
      const y = Math.min(y1, y2);
      const w = Math.abs(x2 - x1);
      const h = Math.abs(y2 - y1);
      if (fill) {
        ctx.fillStyle = toCss(fill);
        ctx.fillRect(x, y, w, h);
      }
      if (outline && lineWidth > 0) {
        ctx.strokeStyle = toCss(outline);
        ctx.lineWidth = lineWidth;
        ctx.strokeRect(x, y, w, h);
      }
    },

    drawCircle(cx, cy, r, fill, outline, lineWidth) {
      ctx.beginPath();
      ctx.arc(cx, cy, r, 0, 2 * Math.PI);
      paint(ctx, fill, outline, lineWidth);
    },

    drawLine(x1, y1, x2, y2, colour, lineWidth) {
      ctx.beginPath();
      ctx.moveTo(x1, y1);
      ctx.lineTo(x2, y2);
      ctx.strokeStyle = toCss(colour);
      ctx.lineWidth = lineWidth;
      ctx.stroke();
    },

    drawPolygon(points: readonly Point[], fill, outline, lineWidth) {
      if (points.length < 2) return;
      ctx.beginPath();
      ctx.moveTo(points[0].x, points[0].y);
      for (const p of points.slice(1)) ctx.lineTo(p.x, p.y);
      ctx.closePath();
      paint(ctx, fill, outline, lineWidth);
    },

    makeLabel(text, wrap): Label {
      return { text, wrap };
    },

    textSize(label, fontSize) {
      setFont(fontSize);
      const lines = wrapLines(ctx, label.text, label.wrap);
      const widest = Math.max(...lines.map((l) => ctx.measureText(l).width));
      return { width: widest, height: fontSize * lines.length };
    },

    drawString(label, x, y, fontSize, colour) {
      setFont(fontSize);
      ctx.fillStyle = toCss(colour);
      ctx.textBaseline = "top";
      wrapLines(ctx, label.text, label.wrap).forEach((line, i) => {
        ctx.fillText(line, x, y + i * fontSize);
      });
    },

    display() {
      options.onDisplay?.();
    },
  };
}
