/**
 * Frame-interval smoothing.  Keeps an exponentially weighted average of
 * the time between frames and turns the target bit rate into the number
 * of frames a scheduled step is spread over.
 */

const ALPHA = 0.1;
/** Assume 60 fps until measured. */
const DEFAULT_FRAME_TIME = 0.016;

export interface FrameRate {
  /** Smoothed frame interval, in seconds. */
  readonly averageFrameTime: number;
  bitRate: number;
  /** Forget history; `t` (ms) becomes the previous frame time. */
  reset(t: number): void;
  /** A frame at `t` ms. */
  record(t: number): void;
  steps(): number;
}

export function createFrameRate(bitRate = 10, minSteps = 1): FrameRate {
  let last: number | undefined;
  let average = DEFAULT_FRAME_TIME;

  return {
    get averageFrameTime() {
      return average;
    },

    bitRate,

    reset(t) {
      last = t;
      average = DEFAULT_FRAME_TIME;
    },

    record(t) {
      if (last !== undefined) {
        const dt = Math.max(0, t - last) / 1000;
        average = (1 - ALPHA) * average + ALPHA * dt;
      }
      last = t;
    },

    steps() {
      return Math.max(minSteps, Math.round(this.bitRate * average));
    },
  };
}
