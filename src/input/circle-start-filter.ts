/**
 * Pointer steering started by circling the crosshair.
 *
 * While paused, moving the pointer round the start circle for
 * `circleAngle` degrees, taking between `circleDwellTime` and
 * `circleMaxTime` ms, starts the motion.  Once running, the pointer has
 * to leave the circle; coming back into it stops again.
 */

import { ORIGIN_X, ORIGIN_Y } from "../coords";
import type { Point } from "../types";
import type { View } from "../view";
import { createDynamicCore, type DynamicOptions } from "./dynamic-filter";
import type { CircleStartFilter, FilterContext } from "./filter";
import { ACTIVE, INACTIVE } from "./markers";

export interface CircleStartOptions extends DynamicOptions {
  /** Screen pixels. */
  circleRadius: number;
  /** Degrees of turning needed to start. */
  circleAngle: number;
  circleDwellTime: number;
  circleMaxTime: number;
}

interface Tracking {
  start: number;
  angle: number;
  turned: number;
}

/** Signed difference b - a folded into (-π, π]. */
export function angleBetween(a: number, b: number): number {
  let d = (b - a) % (2 * Math.PI);
  if (d < 0) d += 2 * Math.PI;
  return d > Math.PI ? d - 2 * Math.PI : d;
}

export function createCircleStartFilter(options: CircleStartOptions): CircleStartFilter {
  const core = createDynamicCore(options);
  const needed = (options.circleAngle * Math.PI) / 180;
  let tracking: Tracking | undefined;
  // Set once the pointer has been outside the circle since starting.
  let armed = false;

  const centre = (view: View) => view.dasherToScreen(ORIGIN_X, ORIGIN_Y);
  const angleOf = (p: Point, c: Point) => Math.atan2(p.y - c.y, p.x - c.x);

  function stop(ctx: FilterContext) {
    core.pause();
    ctx.model.clearScheduledSteps();
  }

  function track(p: Point, c: Point, t: number) {
    const angle = angleOf(p, c);
    if (!tracking || t - tracking.start > options.circleMaxTime) {
      tracking = { start: t, angle, turned: 0 };
      return false;
    }
    tracking.turned += Math.abs(angleBetween(tracking.angle, angle));
    tracking.angle = angle;
    return tracking.turned >= needed && t - tracking.start >= options.circleDwellTime;
  }

  return {
    kind: "circle-start",

    get paused() {
      return core.paused;
    },

    get tracking() {
      return tracking !== undefined;
    },

    process(ctx, t) {
      const p = ctx.input?.pollCoordinates();
      const c = centre(ctx.view);
      const inside = p !== undefined && Math.hypot(p.x - c.x, p.y - c.y) <= options.circleRadius;

      if (core.paused) {
        const was = tracking !== undefined;
        if (!p || !inside) {
          tracking = undefined;
        } else if (track(p, c, t)) {
          tracking = undefined;
          armed = false;
          core.resume(t);
        }
        // Redraw when the circle changes colour.
        return was !== (tracking !== undefined);
      }

      if (!p) {
        stop(ctx);
        return false;
      }
      const d = ctx.view.screenToDasher(p);
      const region = ctx.view.visibleRegion();
      if (d.x < region.minX || d.x > region.maxX || d.y < region.minY || d.y > region.maxY) {
        stop(ctx);
        return false;
      }
      if (inside && armed) {
        stop(ctx);
        tracking = { start: t, angle: angleOf(p, c), turned: 0 };
        return false;
      }
      if (!inside) armed = true;
      core.apply(ctx, t, d.x, d.y, false);
      return true;
    },

    keyDown(key, t, ctx) {
      if (key !== "startStop") return;
      if (core.paused) {
        tracking = undefined;
        armed = false;
        core.resume(t);
      } else {
        stop(ctx);
      }
    },

    keyUp() {},

    pause() {
      core.pause();
    },

    resume(t) {
      armed = false;
      core.resume(t);
    },

    reset() {
      tracking = undefined;
      armed = false;
    },

    decorate(screen, view) {
      const c = centre(view);
      screen.drawCircle(c.x, c.y, options.circleRadius, undefined,
        tracking ? ACTIVE : INACTIVE, 2);
    },
  };
}
