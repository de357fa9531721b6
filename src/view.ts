/**
 * Mapping between screen pixels and dasher coordinates.
 *
 * The crosshair (ORIGIN_X, ORIGIN_Y) sits at the centre of the screen
 * and the dasher extent [0, MAX_Y] fills the screen across the writing
 * direction.  Dasher x grows away from the edge text comes in from: to
 * the left for LTR, to the right for RTL, upward for TTB and downward
 * for BTT.
 */

import { MAX_Y, ORIGIN_X, ORIGIN_Y } from "./coords";
import type { Orientation, Point } from "./types";

export interface DasherPoint {
  readonly x: number;
  readonly y: number;
}

export interface DasherRegion {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

export interface View {
  readonly orientation: Orientation;
  readonly width: number;
  readonly height: number;
  /** Screen pixels per dasher unit. */
  readonly scale: number;
  resize(width: number, height: number): void;
  screenToDasher(p: Point): DasherPoint;
  dasherToScreen(x: number, y: number): Point;
  /** The dasher rectangle currently on screen. */
  visibleRegion(): DasherRegion;
}

const vertical = (o: Orientation) => o === "TTB" || o === "BTT";

export function createView(
  width: number,
  height: number,
  orientation: Orientation = "LTR",
): View {
  let w = width;
  let h = height;
  const o = orientation;

  const scale = () => (vertical(o) ? w : h) / MAX_Y;

  function screenToDasher({ x, y }: Point): DasherPoint {
    const s = scale();
    switch (o) {
      case "LTR":
        return { x: ORIGIN_X + (w / 2 - x) / s, y: ORIGIN_Y + (y - h / 2) / s };
      case "RTL":
        return { x: ORIGIN_X + (x - w / 2) / s, y: ORIGIN_Y + (y - h / 2) / s };
      case "TTB":
        return { x: ORIGIN_X + (h / 2 - y) / s, y: ORIGIN_Y + (x - w / 2) / s };
      case "BTT":
        return { x: ORIGIN_X + (y - h / 2) / s, y: ORIGIN_Y + (x - w / 2) / s };
    }
  }

  function dasherToScreen(dx: number, dy: number): Point {
    const s = scale();
    const across = (dy - ORIGIN_Y) * s;
    const along = (ORIGIN_X - dx) * s;
    switch (o) {
      case "LTR":
        return { x: w / 2 + along, y: h / 2 + across };
      case "RTL":
        return { x: w / 2 - along, y: h / 2 + across };
      case "TTB":
        return { x: w / 2 + across, y: h / 2 + along };
      case "BTT":
        return { x: w / 2 + across, y: h / 2 - along };
    }
  }

  return {
    get orientation() {
      return o;
    },
    get width() {
      return w;
    },
    get height() {
      return h;
    },
    get scale() {
      return scale();
    },

    resize(nextWidth, nextHeight) {
      w = nextWidth;
      h = nextHeight;
    },

    screenToDasher,
    dasherToScreen,

    visibleRegion() {
      const a = screenToDasher({ x: 0, y: 0 });
      const b = screenToDasher({ x: w, y: h });
      return {
        minX: Math.min(a.x, b.x),
        maxX: Math.max(a.x, b.x),
        minY: Math.min(a.y, b.y),
        maxY: Math.max(a.y, b.y),
      };
    },
  };
}
