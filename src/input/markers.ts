import { rgba } from "../colours";
import { drawPolygon } from "../render";
import type { Colour, Screen } from "../types";
import type { View } from "../view";

export const ACTIVE = rgba(255, 0, 0, 160);
export const INACTIVE = rgba(0, 0, 0, 64);

/** A small triangle pointing at the dasher point (x, y). */
export function drawTarget(
  screen: Screen,
  view: View,
  x: number,
  y: number,
  colour: Colour,
): void {
  const tip = view.dasherToScreen(x, y);
  const r = 6;
  drawPolygon(
    screen,
    [
      { x: tip.x, y: tip.y },
      { x: tip.x - r, y: tip.y - r },
      { x: tip.x - r, y: tip.y + r },
    ],
    colour,
    colour,
    1,
  );
}
