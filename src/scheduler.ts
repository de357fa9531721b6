/**
 * Step computation for the goto queue.
 *
 * Both functions take the current root interval and a target range
 * (y1, y2): the dasher interval that should end up filling the viewport.
 * They return root intervals to be adopted one per frame.
 */

import {
  BIG_MAX_Y,
  MAX_Y,
  truncToBig,
  type Interval,
} from "./coords";

/** Root interval after the affine map that sends (y1, y2) to (0, MAX_Y). */
function fullTarget(root: Interval, y1: bigint, y2: bigint): Interval {
  const range = y2 - y1;
  return {
    min: (BIG_MAX_Y * (root.min - y1)) / range,
    max: (BIG_MAX_Y * (root.max - y1)) / range,
  };
}

/**
 * One step of motion toward (y1, y2), to be spread over `nSteps`
 * frames.  A target range of at least `2·xLimit` (pointer far from the
 * crosshair line) is taken in a single jump; narrower ranges are capped
 * with either exact geometric or approximate dynamics.
 */
export function oneStep(
  root: Interval,
  y1: bigint,
  y2: bigint,
  nSteps: number,
  xLimit: number,
  exact: boolean,
): Interval {
  if (y2 <= y1) throw new Error(`empty target range [${y1}, ${y2}]`);
  const n = Math.max(1, Math.round(nSteps));
  const target = fullTarget(root, y1, y2);
  let m1 = target.min - root.min;
  let m2 = target.max - root.max;
  const range = y2 - y1;

  if (range < 2n * BigInt(xLimit)) {
    if (exact) {
      let frac: number;
      if (range === BIG_MAX_Y) {
        frac = 1 / n;
      } else {
        const ratio = MAX_Y / Number(range);
        // Expansion factor for one step, as a fraction of the way
        // along the linear interpolation.
        frac = (Math.pow(ratio, 1 / n) - 1) / (ratio - 1);
      }
      m1 = truncToBig(Number(m1) * frac);
      m2 = truncToBig(Number(m2) * frac);
    } else {
      const apSq = BigInt(Math.floor(Math.sqrt(Number(range))));
      const denom = 64n * BigInt(n - 1) + apSq;
      m1 = (m1 * apSq) / denom;
      m2 = (m2 * apSq) / denom;
    }
  }

  return { min: root.min + m1, max: root.max + m2 };
}

/**
 * A logarithmic series of intermediate intervals ending exactly at the
 * full target, so that long zooms appear to move at a perceptually
 * uniform rate.
 */
export function zoomSteps(
  root: Interval,
  y1: bigint,
  y2: bigint,
  nSteps: number,
): Interval[] {
  if (y2 <= y1) throw new Error(`empty target range [${y1}, ${y2}]`);
  const target = fullTarget(root, y1, y2);
  let n = Math.max(1, Math.round(nSteps));
  const max = (n * (n + 1)) / 2;
  const oh = Number(root.max - root.min);
  const nh = Number(target.max - target.min);
  const logHeightMul = nh === oh ? 0 : Math.log(nh / oh);
  const d1 = Number(target.min - root.min);
  const d2 = Number(target.max - root.max);

  const steps: Interval[] = [];
  let s = n;
  while (n > 1) {
    let frac: number;
    if (nh === oh) {
      frac = s / max;
    } else {
      const h = oh * Math.exp((logHeightMul * s) / max);
      frac = (h - oh) / (nh - oh);
    }
    steps.push({
      min: root.min + truncToBig(frac * d1),
      max: root.max + truncToBig(frac * d2),
    });
    s += n - 1;
    n--;
  }
  steps.push(target);
  return steps;
}
