/**
 * Nodes of the prediction tree.
 *
 * A parent owns its `children`; `parent` is a plain back-reference that
 * is cleared whenever a node is detached, so no subtree is reachable
 * from two owners.
 */

export const NodeFlags = {
  /** Output has been written to the tape. */
  SEEN: 1 << 0,
  /** A descendant has become root. */
  COMMITTED: 1 << 1,
  /** `children` was populated from the language model. */
  FULLY_EXPANDED: 1 << 2,
  WORD_BOUNDARY: 1 << 3,
  CONTROL: 1 << 4,
  GAME_PATH: 1 << 5,
  CONVERTED: 1 << 6,
} as const;

export type ControlKind = "backspace" | "space" | "accept" | "pause";

export interface DasherNode {
  /** Extent within the parent, in [0, NORM]. */
  readonly lower: number;
  readonly upper: number;
  /** Alphabet index; 0 for the pseudo-root and for control nodes. */
  readonly symbol: number;
  readonly label: string;
  /** Appended to the tape when the node is output. */
  readonly text: string;
  /** Tape length, in code points, once this node has been output. */
  readonly offset: number;
  readonly colour: number;
  readonly speed: number;
  readonly control?: ControlKind;
  flags: number;
  parent: DasherNode | undefined;
  children: DasherNode[];
}

export interface NodeInit {
  lower: number;
  upper: number;
  symbol: number;
  label: string;
  text: string;
  offset: number;
  colour?: number;
  speed?: number;
  control?: ControlKind;
  flags?: number;
}

export function createNode(init: NodeInit, parent?: DasherNode): DasherNode {
  if (!(init.lower < init.upper)) {
    throw new RangeError(`empty node extent [${init.lower}, ${init.upper})`);
  }
  const node: DasherNode = {
    lower: init.lower,
    upper: init.upper,
    symbol: init.symbol,
    label: init.label,
    text: init.text,
    offset: init.offset,
    colour: init.colour ?? 0,
    speed: init.speed ?? 1,
    flags: init.flags ?? 0,
    parent,
    children: [],
  };
  return init.control ? { ...node, control: init.control } : node;
}

export function hasFlag(node: DasherNode, flag: number): boolean {
  return (node.flags & flag) !== 0;
}

export function setFlag(node: DasherNode, flag: number, on = true): void {
  node.flags = on ? node.flags | flag : node.flags & ~flag;
}

export function range(node: DasherNode): number {
  return node.upper - node.lower;
}

/** Drop every child and mark the node unexpanded. */
export function deleteChildren(node: DasherNode): void {
  for (const child of node.children) child.parent = undefined;
  node.children = [];
  setFlag(node, NodeFlags.FULLY_EXPANDED, false);
}

/** Collapse every child of `node` except `keep`. */
export function deleteNephews(node: DasherNode, keep: DasherNode): void {
  for (const child of node.children) {
    if (child !== keep) deleteChildren(child);
  }
}

/**
 * Detach `node` from everything: its one retained `child` loses its
 * parent and all other children are dropped.
 */
export function orphanChild(node: DasherNode, child: DasherNode): void {
  for (const c of node.children) {
    if (c !== child) deleteChildren(c);
    c.parent = undefined;
  }
  node.children = [];
  setFlag(node, NodeFlags.FULLY_EXPANDED, false);
}

/** Range of the widest child, or 0 for a leaf. */
export function mostProbableChild(node: DasherNode): number {
  let best = 0;
  for (const child of node.children) best = Math.max(best, range(child));
  return best;
}
