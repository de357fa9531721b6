import { MAX_Y, ORIGIN_X, ORIGIN_Y } from "./coords";
import {
  colourPair,
  DEFAULT_SCHEME,
  RED,
  rgba,
  type ColourPair,
  type ColourScheme,
} from "./colours";
import { hasFlag, NodeFlags } from "./node";
import type { Scene, SceneNode } from "./scene";
import type { Colour, Label, Point, Screen } from "./types";
import type { View } from "./view";

export interface RenderOptions {
  scheme?: ColourScheme;
  background?: Colour;
  crosshair?: Colour;
  /** Pair used for control nodes. */
  control?: ColourPair;
}

export type Decoration = (screen: Screen, view: View) => void;

export interface Renderer {
  readonly screen: Screen;
  /** Number of cached labels. */
  readonly labelCount: number;
  render(scene: Scene, view: View, decorate?: Decoration): void;
  /** Release every cached label. */
  dispose(): void;
}

const BORDER = rgba(0, 0, 0, 25);
const LABEL_PAD = 4;

/**
 * Draw a closed polygon, as line segments if the screen cannot fill
 * polygons.  Without `drawPolygon` only the outline is drawn.
 */
export function drawPolygon(
  screen: Screen,
  points: readonly Point[],
  fill: Colour | undefined,
  outline: Colour | undefined,
  lineWidth: number,
): void {
  if (screen.drawPolygon) {
    screen.drawPolygon(points, fill, outline, lineWidth);
    return;
  }
  const colour = outline ?? fill;
  if (!colour || points.length < 2) return;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    screen.drawLine(a.x, a.y, b.x, b.y, colour, lineWidth);
  }
}

export function createRenderer(screen: Screen, options: RenderOptions = {}): Renderer {
  const scheme = options.scheme ?? DEFAULT_SCHEME;
  const background = options.background ?? rgba(232, 232, 232);
  const crosshair = options.crosshair ?? RED;
  const control = options.control ?? {
    foreground: rgba(255, 255, 255),
    background: rgba(179, 84, 46),
  };
  const labels = new Map<string, Label>();

  function labelFor(text: string): Label {
    let label = labels.get(text);
    if (!label) {
      label = screen.makeLabel(text, 0);
      labels.set(text, label);
    }
    return label;
  }

  /** Render nodes as right-aligned squares, parent first then children on top. */
  function renderNode(node: SceneNode, view: View, labelMaxX: number): void {
    const s = view.scale;
    const region = view.visibleRegion();
    const h = node.y1 - node.y0;
    const side = h * s;
    const depthX = Math.min(h, region.maxX);
    const pair = hasFlag(node.node, NodeFlags.CONTROL)
      ? control
      : colourPair(scheme, node.node.colour);

    const a = view.dasherToScreen(depthX, node.y0);
    const b = view.dasherToScreen(0, node.y1);
    screen.drawRectangle(
      Math.min(a.x, b.x),
      Math.min(a.y, b.y),
      Math.max(a.x, b.x),
      Math.max(a.y, b.y),
      pair.background,
      undefined,
      0,
    );

    // Subtle border at the top
    const top = view.dasherToScreen(0, node.y0);
    screen.drawLine(a.x, a.y, top.x, top.y, BORDER, 1);

    // Label pushed past the parent's label
    let childLabelMaxX = labelMaxX;
    if (side >= 10 && node.node.label !== "") {
      const fontSize = Math.min(Math.max(side * 0.7, 10), 28);
      const label = labelFor(node.node.label);
      const size = screen.textSize(label, fontSize);
      const vertical = view.orientation === "TTB" || view.orientation === "BTT";
      const along = vertical ? size.height : size.width;
      const across = vertical ? size.width : size.height;

      const labelX = Math.min(depthX - LABEL_PAD / s, labelMaxX);
      const half = (across / 2 + LABEL_PAD) / s;
      // Clamp to screen, then clamp to node (node bounds always win)
      const onScreen = Math.max(
        region.minY + half,
        Math.min(region.maxY - half, (node.y0 + node.y1) / 2),
      );
      const labelY = Math.max(node.y0 + half, Math.min(node.y1 - half, onScreen));

      const anchor = view.dasherToScreen(labelX, labelY);
      let x = anchor.x;
      let y = anchor.y;
      switch (view.orientation) {
        case "LTR":
          y -= size.height / 2;
          break;
        case "RTL":
          x -= size.width;
          y -= size.height / 2;
          break;
        case "TTB":
          x -= size.width / 2;
          break;
        case "BTT":
          x -= size.width / 2;
          y -= size.height;
          break;
      }
      screen.drawString(label, x, y, fontSize, pair.foreground);
      childLabelMaxX = labelX - (along + 1) / s;
    }

    for (const child of node.children) renderNode(child, view, childLabelMaxX);
  }

  function renderCrosshair(view: View): void {
    const top = view.dasherToScreen(ORIGIN_X, 0);
    const bottom = view.dasherToScreen(ORIGIN_X, MAX_Y);
    screen.drawLine(top.x, top.y, bottom.x, bottom.y, crosshair, 1);
    const arm = MAX_Y / 16;
    const left = view.dasherToScreen(ORIGIN_X + arm, ORIGIN_Y);
    const right = view.dasherToScreen(ORIGIN_X - arm, ORIGIN_Y);
    screen.drawLine(left.x, left.y, right.x, right.y, crosshair, 1);
  }

  return {
    screen,

    get labelCount() {
      return labels.size;
    },

    render(scene, view, decorate) {
      screen.drawRectangle(0, 0, screen.width, screen.height, background, undefined, 0);
      const region = view.visibleRegion();
      renderNode(scene.root, view, region.maxX - LABEL_PAD / view.scale);
      renderCrosshair(view);
      decorate?.(screen, view);
      screen.display();
    },

    dispose() {
      if (screen.destroyLabel) {
        for (const label of labels.values()) screen.destroyLabel(label);
      }
      labels.clear();
    },
  };
}
