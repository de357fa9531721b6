/**
 * One-button dynamic mode.  The view drifts toward one of two targets
 * above and below the crosshair; each click swaps them.  A quick second
 * click undoes the swap and deletes the last symbol, as does holding
 * the button down.
 */

import { ORIGIN_Y } from "../coords";
import type { VirtualKey } from "../types";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { OneButtonFilter } from "./filter";
import { ACTIVE, INACTIVE, drawTarget } from "./markers";

export interface OneButtonOptions extends DynamicOptions {
  buttonOffset: number;
  buttonTargetX: number;
  minClickInterval: number;
  doubleClickTime: number;
  longPressTime: number;
}

const BUTTONS: readonly VirtualKey[] = ["primary", "button1", "space"];

export function createOneButtonFilter(options: OneButtonOptions): OneButtonFilter {
  const core = createDynamicCore(options);
  let target: "top" | "bottom" = "top";
  let lastPress: number | undefined;
  let pressStart: number | undefined;
  let longPressDone = false;

  const toggle = () => {
    target = target === "top" ? "bottom" : "top";
  };
  const targetY = (which: "top" | "bottom") =>
    ORIGIN_Y + (which === "top" ? -options.buttonOffset : options.buttonOffset);

  return {
    kind: "one-button",

    get paused() {
      return core.paused;
    },

    get target() {
      return target;
    },

    process(ctx, t) {
      if (core.paused) return false;
      if (
        pressStart !== undefined &&
        !longPressDone &&
        t - pressStart >= options.longPressTime
      ) {
        longPressDone = true;
        ctx.model.backspace();
      }
      core.apply(ctx, t, options.buttonTargetX, targetY(target), false);
      return true;
    },

    keyDown(key, t, ctx) {
      if (!BUTTONS.includes(key)) return;
      // A press while paused only starts the motion.
      if (core.paused) {
        core.resume(t);
        lastPress = undefined;
        return;
      }
      if (lastPress !== undefined && t - lastPress < options.minClickInterval) return;

      pressStart = t;
      if (lastPress !== undefined && t - lastPress < options.doubleClickTime) {
        toggle();
        ctx.model.backspace();
        lastPress = undefined;
        // This press already deleted; holding it must not delete again.
        longPressDone = true;
        return;
      }
      toggle();
      lastPress = t;
      longPressDone = false;
    },

    keyUp(key) {
      if (BUTTONS.includes(key)) pressStart = undefined;
    },

    pause() {
      core.pause();
      pressStart = undefined;
    },

    resume(t) {
      core.resume(t);
    },

    reset() {
      target = "top";
      lastPress = undefined;
      pressStart = undefined;
      longPressDone = false;
    },

    decorate(screen, view) {
      for (const which of ["top", "bottom"] as const) {
        drawTarget(
          screen,
          view,
          options.buttonTargetX,
          targetY(which),
          which === target ? ACTIVE : INACTIVE,
        );
      }
    },
  };
}
