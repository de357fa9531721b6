/**
 * Integer coordinate frame.
 *
 * Probabilities are integers out of NORM.  The current root's absolute
 * interval [min, max] is stored as a pair of BigInts in dasher units,
 * where the viewport spans [0, MAX_Y] and the crosshair sits at
 * ORIGIN_Y.  Division truncates toward zero, as 64-bit integer
 * arithmetic would, and the root is kept inside
 * [ROOT_MIN_MIN, ROOT_MAX_MAX] so that `width · NORM` always fits in a
 * signed 64-bit word.
 */

export const NORM = 1 << 16;
export const MAX_Y = 4096;
export const ORIGIN_X = 2048;
export const ORIGIN_Y = 2048;

const BIG_NORM = BigInt(NORM);
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

export const ROOT_MIN_MIN = I64_MIN / BIG_NORM / 2n;
export const ROOT_MAX_MAX = I64_MAX / BIG_NORM / 2n;

export const BIG_MAX_Y = BigInt(MAX_Y);
export const BIG_ORIGIN_Y = BigInt(ORIGIN_Y);

/** Absolute interval of a node in dasher coordinates. */
export interface Interval {
  readonly min: bigint;
  readonly max: bigint;
}

export function width({ min, max }: Interval): bigint {
  return max - min;
}

/**
 * Absolute interval of a child occupying [lower, upper) of its parent.
 * `min` is computed first and `max` independently from the same
 * parent origin, so min ≤ max however small the child.
 */
export function childInterval(
  parent: Interval,
  lower: number,
  upper: number,
): Interval {
  const range = parent.max - parent.min;
  return {
    min: parent.min + (range * BigInt(lower)) / BIG_NORM,
    max: parent.min + (range * BigInt(upper)) / BIG_NORM,
  };
}

/**
 * Inverse of `childInterval`: the absolute interval of the parent of a
 * child currently at `child`, where the child occupies [lower, upper).
 */
export function parentInterval(
  child: Interval,
  lower: number,
  upper: number,
): Interval {
  const w = child.max - child.min;
  const range = BigInt(upper - lower);
  return {
    min: child.min - (BigInt(lower) * w) / range,
    max: child.max + ((BIG_NORM - BigInt(upper)) * w) / range,
  };
}

/**
 * True if popping to the parent would carry the root past the safe
 * bounds.  Compared by cross-multiplication so nothing is rounded.
 */
export function parentWouldOverflow(
  child: Interval,
  lower: number,
  upper: number,
): boolean {
  const w = child.max - child.min;
  const range = BigInt(upper - lower);
  // (NORM − upper) / range > (ROOT_MAX_MAX − max) / w
  const above = (BIG_NORM - BigInt(upper)) * w > (ROOT_MAX_MAX - child.max) * range;
  // lower / range > (min − ROOT_MIN_MIN) / w
  const below = BigInt(lower) * w > (child.min - ROOT_MIN_MIN) * range;
  return above || below;
}

export function withinBounds({ min, max }: Interval): boolean {
  return min >= ROOT_MIN_MIN && max <= ROOT_MAX_MAX;
}

/** Crosshair strictly inside: min ≤ ORIGIN_Y < max. */
export function containsCrosshair({ min, max }: Interval): boolean {
  return min <= BIG_ORIGIN_Y && BIG_ORIGIN_Y < max;
}

/** True if the interval covers the whole viewport [0, MAX_Y]. */
export function coversViewport({ min, max }: Interval): boolean {
  return min <= 0n && max >= BIG_MAX_Y;
}

/** Round a float dasher coordinate to the integer grid. */
export function toBig(value: number): bigint {
  return BigInt(Math.round(value));
}

/** Truncate toward zero, like a float-to-int cast. */
export function truncToBig(value: number): bigint {
  return BigInt(Math.trunc(value));
}
