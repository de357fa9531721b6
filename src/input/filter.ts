/**
 * Input filters turn device state into scheduled steps, once per frame.
 *
 * The set of filters is closed, so `InputFilter` is a tagged union over
 * `kind`; each member shares the `FilterBase` contract.
 */

import type { FrameRate } from "../frame-rate";
import type { Logger } from "../logger";
import type { DasherModel } from "../model";
import type { InputDevice, Screen, VirtualKey } from "../types";
import type { View } from "../view";

export interface FilterContext {
  readonly model: DasherModel;
  readonly view: View;
  readonly input: InputDevice | undefined;
  readonly frameRate: FrameRate;
  readonly logger: Logger;
}

export interface FilterBase {
  readonly paused: boolean;
  /** Called every frame, paused or not; true if the frame changed. */
  process(ctx: FilterContext, t: number): boolean;
  keyDown(key: VirtualKey, t: number, ctx: FilterContext): void;
  keyUp(key: VirtualKey, t: number, ctx: FilterContext): void;
  pause(): void;
  resume(t: number): void;
  reset(): void;
  /** Draw on top of the rendered frame. */
  decorate?(screen: Screen, view: View): void;
}

export interface PointerFilter extends FilterBase {
  readonly kind: "pointer";
}

export interface OneButtonFilter extends FilterBase {
  readonly kind: "one-button";
  /** Which of the two targets is active. */
  readonly target: "top" | "bottom";
}

export interface TwoButtonFilter extends FilterBase {
  readonly kind: "two-button";
}

export interface DemoFilter extends FilterBase {
  readonly kind: "demo";
  /** Current dasher y target, once chosen. */
  readonly targetY: number | undefined;
}

export interface ClickFilter extends FilterBase {
  readonly kind: "click";
}

export interface CircleStartFilter extends FilterBase {
  readonly kind: "circle-start";
  /** The pointer is being circled around the start circle. */
  readonly tracking: boolean;
}

export interface MultiPressFilter extends FilterBase {
  readonly kind: "multi-press";
  readonly target: "top" | "bottom";
  /** Backing out after a double press. */
  readonly reversed: boolean;
}

export type InputFilter =
  | PointerFilter
  | OneButtonFilter
  | TwoButtonFilter
  | DemoFilter
  | ClickFilter
  | CircleStartFilter
  | MultiPressFilter;

export type FilterKind = InputFilter["kind"];
