/**
 * Two-button dynamic mode: hold one button to steer toward the top
 * target, the other toward the bottom.  With neither held the view
 * stops.
 */

import { ORIGIN_Y } from "../coords";
import type { VirtualKey } from "../types";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { FilterContext, TwoButtonFilter } from "./filter";
import { ACTIVE, INACTIVE, drawTarget } from "./markers";

export interface TwoButtonOptions extends DynamicOptions {
  buttonOffset: number;
  buttonTargetX: number;
}

const UP: readonly VirtualKey[] = ["button1", "up"];
const DOWN: readonly VirtualKey[] = ["button2", "down"];

export function createTwoButtonFilter(options: TwoButtonOptions): TwoButtonFilter {
  const core = createDynamicCore(options);
  const held = new Set<VirtualKey>();
  let direction: -1 | 0 | 1 = 0;

  const pressed = (keys: readonly VirtualKey[], ctx: FilterContext) =>
    keys.some((k) => held.has(k) || (ctx.input?.isButtonPressed?.(k) ?? false));

  return {
    kind: "two-button",

    get paused() {
      return core.paused;
    },

    process(ctx, t) {
      if (core.paused) return false;
      const up = pressed(UP, ctx);
      const down = pressed(DOWN, ctx);
      direction = up === down ? 0 : up ? -1 : 1;
      if (direction === 0) {
        ctx.model.clearScheduledSteps();
        return false;
      }
      core.apply(ctx, t, options.buttonTargetX, ORIGIN_Y + direction * options.buttonOffset, false);
      return true;
    },

    keyDown(key) {
      held.add(key);
    },

    keyUp(key) {
      held.delete(key);
    },

    pause() {
      core.pause();
    },

    resume(t) {
      core.resume(t);
    },

    reset() {
      held.clear();
      direction = 0;
    },

    decorate(screen, view) {
      drawTarget(screen, view, options.buttonTargetX, ORIGIN_Y - options.buttonOffset,
        direction < 0 ? ACTIVE : INACTIVE);
      drawTarget(screen, view, options.buttonTargetX, ORIGIN_Y + options.buttonOffset,
        direction > 0 ? ACTIVE : INACTIVE);
    },
  };
}
