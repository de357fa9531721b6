/**
 * The zooming model: a tree of nodes, the absolute interval of its
 * current root, and a queue of scheduled root intervals.
 *
 * Each frame adopts at most one scheduled interval.  Around it the root
 * moves through the tree: when the child under the crosshair covers the
 * whole viewport it is promoted to root and its text is committed to the
 * tape; when the root no longer covers the viewport its parent takes
 * over.  A popped root keeps its output while the crosshair stays inside
 * it, and its text is withdrawn once the crosshair leaves.  The tape
 * therefore holds the output of the root chain followed by the seen
 * nodes below the root, and the language model has learnt exactly the
 * symbols committed this way on top of its training.
 */

import type { Alphabet } from "./alphabet";
import {
  BIG_MAX_Y,
  BIG_ORIGIN_Y,
  MAX_Y,
  NORM,
  childInterval,
  containsCrosshair,
  coversViewport,
  parentInterval,
  parentWouldOverflow,
  width,
  withinBounds,
  type Interval,
} from "./coords";
import { ConfigurationError } from "./errors";
import { consoleLogger, type Logger } from "./logger";
import { probabilities, type LanguageModel } from "./models";
import {
  NodeFlags,
  createNode,
  deleteChildren,
  deleteNephews,
  hasFlag,
  mostProbableChild,
  orphanChild,
  setFlag,
  type ControlKind,
  type DasherNode,
} from "./node";
import { oneStep, zoomSteps } from "./scheduler";
import { createTape, type Tape, type TapeEntry } from "./tape";

/** Committed ancestors kept for re-entry. */
export const MAX_OLD_ROOTS = 10;

const CONTROL_LABELS: Record<ControlKind, string> = {
  backspace: "\u232b",
  space: "\u2423",
  accept: "\u2713",
  pause: "\u23f8",
};

export type StepResult = "idle" | "moved" | "promoted" | "popped" | "refused";

export type RefusalReason = "overflow" | "crosshair" | "too-narrow" | "pop-overflow";

export interface Refusal {
  readonly reason: RefusalReason;
  readonly step: Interval;
}

export interface ModelListeners {
  onOutput?(entry: TapeEntry, node: DasherNode): void;
  onDelete?(entry: TapeEntry): void;
  onRefused?(refusal: Refusal): void;
  onControl?(kind: ControlKind, node: DasherNode): void;
}

export interface ModelOptions {
  alphabet: Alphabet;
  languageModel: LanguageModel;
  /** Control children added under every node. */
  controls?: readonly ControlKind[];
  /** Share of NORM reserved for the control children together. */
  controlShare?: number;
  /** Hold old roots until they have been converted. */
  requireConversion?: boolean;
  logger?: Logger;
  listeners?: ModelListeners;
}

export interface DasherModel {
  readonly alphabet: Alphabet;
  readonly languageModel: LanguageModel;
  readonly root: DasherNode;
  readonly rootInterval: Interval;
  readonly oldRoots: readonly DasherNode[];
  readonly scheduledSteps: readonly Interval[];
  /** Sum of ln(new width / old width) over adopted steps. */
  readonly totalNats: number;
  readonly tape: Tape;

  offset(): number;
  outputText(): string;

  expand(node: DasherNode): void;
  /** Symbols preceding `node`'s children, trimmed to the LM's context. */
  contextFor(node: DasherNode): number[];
  /** Absolute interval of a node in the root's subtree. */
  absoluteInterval(node: DasherNode): Interval | undefined;
  /** Child of the root containing the crosshair. */
  crosshairChild(): DasherNode | undefined;
  /** Deepest expanded node containing the crosshair. */
  nodeUnderCrosshair(): DasherNode;

  scheduleOneStep(
    y1: bigint,
    y2: bigint,
    nSteps: number,
    xLimit: number,
    exact: boolean,
  ): void;
  scheduleZoom(y1: bigint, y2: bigint, nSteps: number): void;
  clearScheduledSteps(): void;
  nextScheduledStep(): StepResult;

  makeRoot(child: DasherNode): void;
  reparentRoot(): boolean;

  /** Withdraw the last committed symbol.  No-op on an empty tape. */
  backspace(): boolean;
  /** Replace the tape (if `text` is given) and grow a fresh root. */
  rebuild(text?: string): void;
  /** Game mode: flag the path spelling `text`; undefined turns it off. */
  setGameTarget(text: string | undefined): void;
  /** Description of a broken frame invariant, or undefined. */
  checkInvariants(): string | undefined;
}

export function createDasherModel(options: ModelOptions): DasherModel {
  const { alphabet, languageModel: lm } = options;
  const logger = options.logger ?? consoleLogger;
  const listeners = options.listeners ?? {};
  const requireConversion = options.requireConversion ?? false;

  if (lm.alphabetSize !== alphabet.size) {
    throw new ConfigurationError(
      `language model covers ${lm.alphabetSize} symbols, alphabet has ${alphabet.size}`,
    );
  }

  // --- Controls ---
  const controls = (options.controls ?? []).filter((kind) => {
    if (kind === "space" && alphabet.spaceSymbol === undefined) {
      logger.warn(`alphabet "${alphabet.name}" has no space; dropping the space control`);
      return false;
    }
    return true;
  });
  const controlUnits: number[] = [];
  if (controls.length > 0) {
    const share = options.controlShare ?? 0.05;
    const reserved = Math.max(controls.length, Math.round(share * NORM));
    const each = Math.floor(reserved / controls.length);
    controls.forEach((_, i) =>
      controlUnits.push(i === 0 ? reserved - each * (controls.length - 1) : each),
    );
  }
  const reservedUnits = controlUnits.reduce((a, b) => a + b, 0);

  const fixed = new Map<number, number>();
  for (let s = 1; s <= alphabet.size; s++) {
    const p = alphabet.symbol(s).fixedProbability;
    if (p !== undefined) fixed.set(s, p);
  }

  // Expansion splits these units between the symbols; it must not fail
  // on a node later.
  const symbolUnits = NORM - reservedUnits;
  let fixedUnits = 0;
  for (const p of fixed.values()) fixedUnits += Math.max(1, Math.round(p * symbolUnits));
  const freeSymbols = alphabet.size - fixed.size;
  if (symbolUnits < alphabet.size || (freeSymbols > 0 && symbolUnits - fixedUnits < freeSymbols)) {
    throw new ConfigurationError(
      `alphabet "${alphabet.name}" does not fit beside the controls`,
      [
        `controls take ${reservedUnits} of ${NORM} units`,
        `fixed probabilities take ${fixedUnits} of the remaining ${symbolUnits}`,
        `${freeSymbols} symbols need at least one unit each`,
      ],
    );
  }

  // --- State ---
  const tape = createTape();
  let gameTarget: number[] | undefined;
  let frame: Interval = { min: 0n, max: BIG_MAX_Y };
  let queue: Interval[] = [];
  let oldRoots: DasherNode[] = [];
  let totalNats = 0;
  let root: DasherNode = freshRoot();

  // -------------------------------------------------------------------------
  // Context
  // -------------------------------------------------------------------------

  /** Full symbol history up to and including `node`. */
  function historyFor(node: DasherNode): number[] {
    const path: number[] = [];
    let n: DasherNode | undefined = node;
    while (n && !hasFlag(n, NodeFlags.SEEN)) {
      if (n.symbol > 0) path.push(n.symbol);
      n = n.parent;
    }
    const committed = n ? symbolsUpTo(n.offset) : [];
    return committed.concat(path.reverse());
  }

  /** Tape symbols whose text ends at or before code-point `offset`. */
  function symbolsUpTo(offset: number): number[] {
    if (offset >= tape.offset) return tape.symbols();
    const out: number[] = [];
    let at = 0;
    for (const symbol of tape.symbols()) {
      at += Array.from(alphabet.symbol(symbol).text).length;
      if (at > offset) break;
      out.push(symbol);
    }
    return out;
  }

  function contextFor(node: DasherNode): number[] {
    const history = historyFor(node);
    return history.slice(Math.max(0, history.length - lm.contextLength));
  }

  // -------------------------------------------------------------------------
  // Expansion
  // -------------------------------------------------------------------------

  function onGamePath(parent: DasherNode, symbol: number): boolean {
    if (!gameTarget || !hasFlag(parent, NodeFlags.GAME_PATH)) return false;
    return gameTarget[historyFor(parent).length] === symbol;
  }

  function expand(node: DasherNode): void {
    if (hasFlag(node, NodeFlags.FULLY_EXPANDED)) return;
    deleteChildren(node);

    // Control leaves other than space end the branch.
    if (node.control && node.control !== "space") {
      setFlag(node, NodeFlags.FULLY_EXPANDED);
      return;
    }

    const counts = probabilities(lm, contextFor(node), {
      norm: symbolUnits,
      fixed,
    });

    let lower = 0;
    for (let s = 1; s <= alphabet.size; s++) {
      const count = counts[s];
      if (count <= 0) continue;
      const sym = alphabet.symbol(s);
      let flags = alphabet.isSpace(s) ? NodeFlags.WORD_BOUNDARY : 0;
      if (onGamePath(node, s)) flags |= NodeFlags.GAME_PATH;
      node.children.push(
        createNode(
          {
            lower,
            upper: lower + count,
            symbol: s,
            label: sym.display,
            text: sym.text,
            offset: node.offset + Array.from(sym.text).length,
            colour: sym.colour,
            speed: sym.speedFactor ?? 1,
            flags,
          },
          node,
        ),
      );
      lower += count;
    }

    controls.forEach((kind, i) => {
      const isSpace = kind === "space";
      const symbol = isSpace ? (alphabet.spaceSymbol ?? 0) : 0;
      const text = isSpace ? alphabet.symbol(symbol).text : "";
      let flags = NodeFlags.CONTROL;
      if (isSpace) flags |= NodeFlags.WORD_BOUNDARY;
      if (isSpace && onGamePath(node, symbol)) flags |= NodeFlags.GAME_PATH;
      node.children.push(
        createNode(
          {
            lower,
            upper: lower + controlUnits[i],
            symbol,
            label: CONTROL_LABELS[kind],
            text,
            offset: node.offset + Array.from(text).length,
            control: kind,
            flags,
          },
          node,
        ),
      );
      lower += controlUnits[i];
    });

    setFlag(node, NodeFlags.FULLY_EXPANDED);
  }

  // -------------------------------------------------------------------------
  // Output
  // -------------------------------------------------------------------------

  function commit(node: DasherNode): void {
    if (node.symbol <= 0 || node.text === "") return;
    const entry: TapeEntry = { symbol: node.symbol, text: node.text, observed: true };
    const context = tape.tail(lm.contextLength);
    tape.append(entry);
    lm.observe(context, entry.symbol);
    listeners.onOutput?.(entry, node);
  }

  function withdraw(): TapeEntry | undefined {
    const entry = tape.pop();
    if (!entry) return undefined;
    // Text set by the host was never learnt.
    if (entry.observed) lm.forget(tape.tail(lm.contextLength), entry.symbol);
    listeners.onDelete?.(entry);
    return entry;
  }

  /** Seen nodes below the root, outermost first. */
  function outputChain(): DasherNode[] {
    const chain: DasherNode[] = [];
    let n = root;
    for (;;) {
      const next = n.children.find((c) => hasFlag(c, NodeFlags.SEEN));
      if (!next) return chain;
      chain.push(next);
      n = next;
    }
  }

  function unsee(node: DasherNode): void {
    if (hasFlag(node, NodeFlags.SEEN) && node.symbol > 0 && node.text !== "") withdraw();
    setFlag(node, NodeFlags.SEEN | NodeFlags.COMMITTED, false);
  }

  /** Withdraw the seen nodes below the root that the crosshair has left. */
  function retractOutput(): void {
    const chain = outputChain();
    let interval = frame;
    let kept = 0;
    for (const n of chain) {
      interval = childInterval(interval, n.lower, n.upper);
      if (!containsCrosshair(interval)) break;
      kept++;
    }
    for (let i = chain.length - 1; i >= kept; i--) unsee(chain[i]);
  }

  function markConverted(): void {
    for (const n of oldRoots) setFlag(n, NodeFlags.CONVERTED);
    setFlag(root, NodeFlags.CONVERTED);
  }

  /** Output `node` and any unseen ancestors, oldest first. */
  function outputTo(node: DasherNode): void {
    const chain: DasherNode[] = [];
    for (let n: DasherNode | undefined = node; n && !hasFlag(n, NodeFlags.SEEN); n = n.parent) {
      chain.push(n);
    }
    for (const n of chain.reverse()) {
      commit(n);
      setFlag(n, NodeFlags.SEEN);
      if (requireConversion && hasFlag(n, NodeFlags.WORD_BOUNDARY)) markConverted();
      if (n.control && n.control !== "space") runControl(n.control, n);
    }
  }

  function runControl(kind: ControlKind, node: DasherNode): void {
    if (kind === "backspace") withdraw();
    rebuild();
    listeners.onControl?.(kind, node);
  }

  // -------------------------------------------------------------------------
  // Root placement
  // -------------------------------------------------------------------------

  function centred(w: number): Interval {
    const half = BigInt(Math.trunc(w / 2));
    return { min: BIG_ORIGIN_Y - half, max: BIG_ORIGIN_Y + half };
  }

  function freshRoot(): DasherNode {
    const last = tape.last();
    let flags = NodeFlags.SEEN;
    if (gameTargetMatchesTape()) flags |= NodeFlags.GAME_PATH;
    return createNode({
      lower: 0,
      upper: NORM,
      symbol: last?.symbol ?? 0,
      label: last ? alphabet.symbol(last.symbol).display : "",
      text: "",
      offset: tape.offset,
      flags,
    });
  }

  function gameTargetMatchesTape(): boolean {
    const target = gameTarget;
    if (!target) return false;
    return tape.symbols().every((s, i) => target[i] === s);
  }

  /**
   * Size a new root from its most probable child: the root is narrower
   * than the viewport, the more so the flatter the distribution.
   */
  function placeFresh(node: DasherNode): void {
    expand(node);
    const fraction = 1 - (1 - mostProbableChild(node) / NORM) / 2;
    frame = centred(MAX_Y / (2 * fraction));
  }

  /**
   * Centre a root that has a parent so that it covers the viewport while
   * none of its children does; otherwise the next frame would pop or
   * promote straight away.
   */
  function placeCovering(node: DasherNode): void {
    expand(node);
    const mp = mostProbableChild(node);
    const limit = mp > 0 ? (MAX_Y * NORM) / mp : 2 * MAX_Y;
    const w = mp >= NORM ? MAX_Y : (MAX_Y + Math.min(limit, 2 * MAX_Y)) / 2;
    frame = centred(w);
  }

  // -------------------------------------------------------------------------
  // Promotion and popping
  // -------------------------------------------------------------------------

  function refuse(reason: RefusalReason, step: Interval): void {
    logger.warn(`step refused (${reason}): [${step.min}, ${step.max}]`);
    listeners.onRefused?.({ reason, step });
  }

  function makeRoot(child: DasherNode): void {
    if (child.parent !== root) {
      throw new Error("makeRoot: node is not a child of the root");
    }
    // Output left under a sibling goes before the child's own.
    const chain = outputChain();
    if (chain.length > 0 && chain[0] !== child) {
      for (let i = chain.length - 1; i >= 0; i--) unsee(chain[i]);
    }
    deleteNephews(root, child);
    setFlag(root, NodeFlags.COMMITTED);
    oldRoots.push(root);

    while (
      oldRoots.length > MAX_OLD_ROOTS &&
      (!requireConversion || hasFlag(oldRoots[0], NodeFlags.CONVERTED))
    ) {
      const oldest = oldRoots[0];
      oldRoots = oldRoots.slice(1);
      orphanChild(oldest, oldRoots[0] ?? child);
    }

    frame = childInterval(frame, child.lower, child.upper);
    queue = queue.map((s) => childInterval(s, child.lower, child.upper));
    root = child;
    expand(child);
    logger.debug(`promoted "${child.label}" to root`);
    outputTo(child);
  }

  /**
   * Make the root's parent the root, remapping the frame, the queue and
   * `extra` through the inverse child transform.  The old root stays seen
   * unless `withdrawRoot` is set.  Returns the remapped `extra`, or
   * undefined if there is no parent or the move would pass the
   * coordinate bounds.
   */
  function popTo(extra: Interval, withdrawRoot: boolean): Interval | undefined {
    const parent = root.parent;
    if (!parent) return undefined;
    const { lower, upper } = root;
    if (parentWouldOverflow(frame, lower, upper)) {
      // The parent link stays in place; only the move is refused.
      refuse("pop-overflow", extra);
      return undefined;
    }

    if (withdrawRoot) unsee(root);

    frame = parentInterval(frame, lower, upper);
    queue = queue.map((s) => parentInterval(s, lower, upper));
    const remapped = parentInterval(extra, lower, upper);

    const i = oldRoots.lastIndexOf(parent);
    if (i >= 0) oldRoots = oldRoots.slice(0, i).concat(oldRoots.slice(i + 1));
    setFlag(parent, NodeFlags.COMMITTED, false);
    root = parent;
    expand(parent);
    logger.debug(`popped root to "${parent.label}"`);
    return remapped;
  }

  function crosshairChild(): DasherNode | undefined {
    return root.children.find((c) =>
      containsCrosshair(childInterval(frame, c.lower, c.upper)),
    );
  }

  function rebuild(text?: string): void {
    if (text !== undefined) {
      tape.replace(
        alphabet.textToSymbols(text).map((symbol) => ({
          symbol,
          text: alphabet.symbol(symbol).text,
        })),
      );
    }
    queue = [];
    oldRoots = [];
    root = freshRoot();
    placeFresh(root);
  }

  // -------------------------------------------------------------------------
  // Public
  // -------------------------------------------------------------------------

  placeFresh(root);

  return {
    alphabet,
    languageModel: lm,

    get root() {
      return root;
    },
    get rootInterval() {
      return frame;
    },
    get oldRoots() {
      return oldRoots;
    },
    get scheduledSteps() {
      return queue;
    },
    get totalNats() {
      return totalNats;
    },
    tape,

    offset() {
      return tape.offset;
    },

    outputText() {
      return tape.text();
    },

    expand,
    contextFor,

    absoluteInterval(node) {
      const path: DasherNode[] = [];
      let n: DasherNode | undefined = node;
      while (n && n !== root) {
        path.push(n);
        n = n.parent;
      }
      if (!n) return undefined;
      let interval = frame;
      for (let i = path.length - 1; i >= 0; i--) {
        interval = childInterval(interval, path[i].lower, path[i].upper);
      }
      return interval;
    },

    crosshairChild,

    nodeUnderCrosshair() {
      let node = root;
      let interval = frame;
      for (;;) {
        const next = node.children.find((c) =>
          containsCrosshair(childInterval(interval, c.lower, c.upper)),
        );
        if (!next) return node;
        interval = childInterval(interval, next.lower, next.upper);
        node = next;
      }
    },

    scheduleOneStep(y1, y2, nSteps, xLimit, exact) {
      queue = [oneStep(frame, y1, y2, nSteps, xLimit, exact)];
    },

    scheduleZoom(y1, y2, nSteps) {
      queue = zoomSteps(frame, y1, y2, nSteps);
    },

    clearScheduledSteps() {
      queue = [];
    },

    nextScheduledStep() {
      const step = queue.shift();
      if (!step) return "idle";

      if (!withinBounds(step)) {
        queue = [];
        refuse("overflow", step);
        return "refused";
      }

      const before = frame;
      let target = step;
      let result: StepResult = "moved";

      if (!coversViewport(target) && root.parent) {
        const popped = popTo(target, false);
        if (popped) {
          target = popped;
          result = "popped";
        }
      }

      if (!containsCrosshair(target)) {
        refuse("crosshair", target);
        return "refused";
      }
      if (width(target) < BIG_MAX_Y / 4n) {
        refuse("too-narrow", target);
        return "refused";
      }

      totalNats += Math.log(Number(width(step)) / Number(width(before)));
      frame = target;
      retractOutput();

      if (result === "moved") {
        const child = crosshairChild();
        if (
          child &&
          coversViewport(childInterval(frame, child.lower, child.upper)) &&
          (!hasFlag(root, NodeFlags.GAME_PATH) || hasFlag(child, NodeFlags.GAME_PATH))
        ) {
          makeRoot(child);
          result = "promoted";
        }
      }
      return result;
    },

    makeRoot,

    reparentRoot() {
      return popTo(frame, false) !== undefined;
    },

    backspace() {
      const last = tape.last();
      if (!last) return false;
      queue = [];
      // Bring the newest output node back to the root first.
      for (const node of outputChain()) makeRoot(node);
      const isLast =
        root.parent !== undefined &&
        hasFlag(root, NodeFlags.SEEN) &&
        root.symbol === last.symbol &&
        root.text !== "";
      if (isLast && popTo(frame, true) !== undefined) {
        placeCovering(root);
        return true;
      }
      withdraw();
      rebuild();
      return true;
    },

    rebuild,

    setGameTarget(text) {
      gameTarget = text === undefined ? undefined : alphabet.textToSymbols(text);
      rebuild();
    },

    checkInvariants() {
      if (!withinBounds(frame)) {
        return `root [${frame.min}, ${frame.max}] outside the coordinate bounds`;
      }
      if (!containsCrosshair(frame)) {
        return `crosshair outside root [${frame.min}, ${frame.max}]`;
      }
      return undefined;
    },
  };
}
