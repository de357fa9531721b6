/**
 * Click mode: each primary click zooms to the clicked point over a
 * fixed number of frames.
 */

import { toBig } from "../coords";
import { MAX_TARGET_X } from "./dynamic-filter";
import type { ClickFilter } from "./filter";

export interface ClickOptions {
  zoomSteps: number;
}

export function createClickFilter(options: ClickOptions): ClickFilter {
  let paused = true;

  return {
    kind: "click",

    get paused() {
      return paused;
    },

    process(ctx) {
      if (paused) return false;
      return ctx.model.scheduledSteps.length > 0;
    },

    keyDown(key, _t, ctx) {
      if (paused || key !== "primary") return;
      const p = ctx.input?.pollCoordinates();
      if (!p) return;
      const d = ctx.view.screenToDasher(p);
      const x = Math.min(MAX_TARGET_X, Math.max(1, d.x));
      ctx.model.scheduleZoom(toBig(d.y - x), toBig(d.y + x), options.zoomSteps);
    },

    keyUp() {},

    pause() {
      paused = true;
    },

    resume() {
      paused = false;
    },

    reset() {},
  };
}
