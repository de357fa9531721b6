/**
 * One-button mode driven by press counts.  Presses less than
 * `multiPressTime` apart form one gesture, acted on once the button has
 * been up for that long:
 *
 * - one press swaps the top and bottom targets and goes forward;
 * - two presses back straight out until the next single press;
 * - three or more pause.
 *
 * Holding the button for `longPressTime` heads straight along the
 * crosshair line until it is released.
 */

import { ORIGIN_X, ORIGIN_Y } from "../coords";
import type { VirtualKey } from "../types";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { FilterContext, MultiPressFilter } from "./filter";
import { ACTIVE, INACTIVE, drawTarget } from "./markers";

export interface MultiPressOptions extends DynamicOptions {
  buttonOffset: number;
  buttonTargetX: number;
  multiPressTime: number;
  longPressTime: number;
}

const BUTTONS: readonly VirtualKey[] = ["primary", "button1", "space"];

/** Backing out aims at a range twice the height of the view. */
const REVERSE_X = 2 * ORIGIN_X;

export function createMultiPressFilter(options: MultiPressOptions): MultiPressFilter {
  const core = createDynamicCore(options);
  let target: "top" | "bottom" = "top";
  let reversed = false;
  let presses = 0;
  let lastPress = 0;
  let pressStart: number | undefined;
  let longPress = false;

  const targetY = (which: "top" | "bottom") =>
    ORIGIN_Y + (which === "top" ? -options.buttonOffset : options.buttonOffset);

  function gesture(count: number, ctx: FilterContext) {
    if (count === 1) {
      target = target === "top" ? "bottom" : "top";
      reversed = false;
    } else if (count === 2) {
      reversed = true;
    } else {
      core.pause();
      ctx.model.clearScheduledSteps();
    }
  }

  return {
    kind: "multi-press",

    get paused() {
      return core.paused;
    },

    get target() {
      return target;
    },

    get reversed() {
      return reversed;
    },

    process(ctx, t) {
      if (core.paused) return false;
      if (pressStart !== undefined && !longPress && t - pressStart >= options.longPressTime) {
        longPress = true;
        presses = 0;
      }
      if (presses > 0 && pressStart === undefined && t - lastPress >= options.multiPressTime) {
        const count = presses;
        presses = 0;
        gesture(count, ctx);
        if (core.paused) return false;
      }
      const x = reversed ? REVERSE_X : options.buttonTargetX;
      const y = longPress || reversed ? ORIGIN_Y : targetY(target);
      core.apply(ctx, t, x, y, false);
      return true;
    },

    keyDown(key, t) {
      if (!BUTTONS.includes(key) || pressStart !== undefined) return;
      // A press while paused only starts the motion.
      if (core.paused) {
        core.resume(t);
        presses = 0;
        return;
      }
      presses = presses > 0 && t - lastPress < options.multiPressTime ? presses + 1 : 1;
      lastPress = t;
      pressStart = t;
    },

    keyUp(key) {
      if (!BUTTONS.includes(key)) return;
      pressStart = undefined;
      longPress = false;
    },

    pause() {
      core.pause();
      pressStart = undefined;
      longPress = false;
    },

    resume(t) {
      core.resume(t);
    },

    reset() {
      target = "top";
      reversed = false;
      presses = 0;
      pressStart = undefined;
      longPress = false;
    },

    decorate(screen, view) {
      for (const which of ["top", "bottom"] as const) {
        drawTarget(screen, view, options.buttonTargetX, targetY(which),
          which === target && !reversed ? ACTIVE : INACTIVE);
      }
    },
  };
}
