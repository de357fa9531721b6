/**
 * Scene builder.
 *
 * Walks the root's subtree inside the visible region and produces a
 * tree of visible squares for rendering.  Nodes tall enough to show are
 * expanded on the way down; nodes that are off screen or below the
 * display threshold have their children collapsed so the tree stays
 * bounded by what is visible.
 */

import { childInterval, type Interval } from "./coords";
import type { DasherModel } from "./model";
import { deleteChildren, hasFlag, NodeFlags, type DasherNode } from "./node";
import type { View } from "./view";

export interface SceneNode {
  readonly node: DasherNode;
  /** Dasher y extent. */
  readonly y0: number;
  readonly y1: number;
  readonly depth: number;
  readonly children: SceneNode[];
}

export interface Scene {
  readonly root: SceneNode;
  readonly nodeCount: number;
  /** Nodes expanded while building this scene. */
  readonly expanded: number;
  /** Nodes whose children were collapsed. */
  readonly collapsed: number;
}

export interface BuildSceneOptions {
  /** Minimum on-screen height, in pixels, for a node to be expanded. Default 2. */
  minNodeHeight?: number;
  /** Maximum depth below the root. Default 64. */
  maxDepth?: number;
}

export function buildScene(
  model: DasherModel,
  view: View,
  options?: BuildSceneOptions,
): Scene {
  const minNodeHeight = options?.minNodeHeight ?? 2;
  const maxDepth = options?.maxDepth ?? 64;
  const region = view.visibleRegion();
  const scale = view.scale;

  let nodeCount = 0;
  let expanded = 0;
  let collapsed = 0;

  const visible = ({ min, max }: Interval) =>
    Number(max) > region.minY && Number(min) < region.maxY;

  function collapse(node: DasherNode): void {
    if (node.children.length === 0) return;
    deleteChildren(node);
    collapsed++;
  }

  function visit(node: DasherNode, interval: Interval, depth: number): SceneNode {
    nodeCount++;
    const y0 = Number(interval.min);
    const y1 = Number(interval.max);
    const children: SceneNode[] = [];

    if (depth < maxDepth && (y1 - y0) * scale >= minNodeHeight) {
      if (!hasFlag(node, NodeFlags.FULLY_EXPANDED)) {
        model.expand(node);
        expanded++;
      }
      for (const child of node.children) {
        const ci = childInterval(interval, child.lower, child.upper);
        if (visible(ci)) {
          children.push(visit(child, ci, depth + 1));
        } else {
          collapse(child);
        }
      }
    } else if (depth > 0) {
      collapse(node);
    }

    return { node, y0, y1, depth, children };
  }

  const root = visit(model.root, model.rootInterval, 0);
  return { root, nodeCount, expanded, collapsed };
}
