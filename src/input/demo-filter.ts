/**
 * Self-driving demo: picks a new vertical target every `demoInterval`
 * milliseconds and steers toward it.
 */

import { ORIGIN_Y } from "../coords";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { DemoFilter } from "./filter";
import { ACTIVE, drawTarget } from "./markers";

export interface DemoOptions extends DynamicOptions {
  buttonOffset: number;
  buttonTargetX: number;
  demoInterval: number;
  /** Random targets if true, otherwise alternate above and below. */
  demoRandom: boolean;
  random?: () => number;
}

export function createDemoFilter(options: DemoOptions): DemoFilter {
  const core = createDynamicCore(options);
  const random = options.random ?? Math.random;
  let targetY: number | undefined;
  let nextChange: number | undefined;
  let sign = 1;

  function pick(): number {
    if (options.demoRandom) {
      return ORIGIN_Y + (random() * 2 - 1) * options.buttonOffset;
    }
    sign = -sign;
    return ORIGIN_Y + sign * options.buttonOffset;
  }

  return {
    kind: "demo",

    get paused() {
      return core.paused;
    },

    get targetY() {
      return targetY;
    },

    process(ctx, t) {
      if (core.paused) return false;
      if (targetY === undefined || nextChange === undefined || t >= nextChange) {
        targetY = pick();
        nextChange = t + options.demoInterval;
      }
      core.apply(ctx, t, options.buttonTargetX, targetY, false);
      return true;
    },

    keyDown() {},

    keyUp() {},

    pause() {
      core.pause();
    },

    resume(t) {
      core.resume(t);
    },

    reset() {
      targetY = undefined;
      nextChange = undefined;
      sign = 1;
    },

    decorate(screen, view) {
      if (targetY !== undefined) {
        drawTarget(screen, view, options.buttonTargetX, targetY, ACTIVE);
      }
    },
  };
}
