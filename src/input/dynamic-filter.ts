/**
 * Shared core of the continuous filters: pause state, slow start and
 * the conversion of a dasher target point into a scheduled step.
 */

import { toBig } from "../coords";
import type { FilterContext } from "./filter";

/** Largest x a filter will ask for; keeps y ± x well inside the bounds. */
export const MAX_TARGET_X = Math.floor(2 ** 29 / 100);

/** Slow start begins at this fraction of full speed. */
const SLOW_START_FLOOR = 0.1;

export interface DynamicOptions {
  slowStart: boolean;
  slowStartTime: number;
  xLimitSpeed: number;
  exactDynamics: boolean;
  turboMultiplier: number;
}

export interface DynamicCore {
  readonly paused: boolean;
  pause(): void;
  resume(t: number): void;
  /** Combined speed factor for this frame. */
  speedMultiplier(ctx: FilterContext, t: number, turbo: boolean): number;
  /** Schedule one step toward the dasher point (x, y). */
  apply(ctx: FilterContext, t: number, x: number, y: number, turbo: boolean): void;
}

export function slowStartFactor(elapsed: number, slowStartTime: number): number {
  if (slowStartTime <= 0 || elapsed >= slowStartTime) return 1;
  return SLOW_START_FLOOR + (1 - SLOW_START_FLOOR) * Math.max(0, elapsed) / slowStartTime;
}

export function createDynamicCore(options: DynamicOptions): DynamicCore {
  let paused = true;
  let startTime = 0;

  const core: DynamicCore = {
    get paused() {
      return paused;
    },

    pause() {
      paused = true;
    },

    resume(t) {
      paused = false;
      startTime = t;
    },

    speedMultiplier(ctx, t, turbo) {
      let mul = ctx.model.nodeUnderCrosshair().speed;
      if (options.slowStart) mul *= slowStartFactor(t - startTime, options.slowStartTime);
      if (turbo) mul *= options.turboMultiplier;
      return mul;
    },

    apply(ctx, t, x, y, turbo) {
      const mul = core.speedMultiplier(ctx, t, turbo);
      const steps = Math.max(1, Math.round(ctx.frameRate.steps() / mul));
      const cx = Math.min(MAX_TARGET_X, Math.max(1, x));
      ctx.model.scheduleOneStep(
        toBig(y - cx),
        toBig(y + cx),
        steps,
        options.xLimitSpeed,
        options.exactDynamics,
      );
    },
  };
  return core;
}
