/**
 * Default filter: steer toward the pointer.  The further the pointer is
 * from the crosshair line, the faster the view moves; left of it zooms
 * in, right of it backs out.
 */

import { ORIGIN_X, ORIGIN_Y } from "../coords";
import { rgba } from "../colours";
import type { VirtualKey } from "../types";
import type { DasherPoint } from "../view";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { PointerFilter } from "./filter";

const TURBO_KEYS: readonly VirtualKey[] = ["secondary", "tertiary", "button1"];
const LINE = rgba(0, 0, 0, 128);

export function createPointerFilter(options: DynamicOptions): PointerFilter {
  const core = createDynamicCore(options);
  const held = new Set<VirtualKey>();
  let last: DasherPoint | undefined;

  return {
    kind: "pointer",

    get paused() {
      return core.paused;
    },

    process(ctx, t) {
      if (core.paused) return false;
      const p = ctx.input?.pollCoordinates();
      const d = p ? ctx.view.screenToDasher(p) : undefined;
      last = d;
      // No pointer, or outside the view: stop until started again.
      const region = ctx.view.visibleRegion();
      if (!d || d.x < region.minX || d.x > region.maxX || d.y < region.minY || d.y > region.maxY) {
        core.pause();
        ctx.model.clearScheduledSteps();
        return false;
      }
      const turbo = TURBO_KEYS.some(
        (k) => held.has(k) || (ctx.input?.isButtonPressed?.(k) ?? false),
      );
      core.apply(ctx, t, d.x, d.y, turbo);
      return true;
    },

    keyDown(key, t, ctx) {
      held.add(key);
      if (key !== "startStop") return;
      if (core.paused) {
        core.resume(t);
      } else {
        core.pause();
        ctx.model.clearScheduledSteps();
      }
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
      last = undefined;
    },

    decorate(screen, view) {
      if (core.paused || !last) return;
      const from = view.dasherToScreen(ORIGIN_X, ORIGIN_Y);
      const to = view.dasherToScreen(last.x, last.y);
      screen.drawLine(from.x, from.y, to.x, to.y, LINE, 1);
    },
  };
}
