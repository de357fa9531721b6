import type { Settings } from "../settings";
import { createCircleStartFilter } from "./circle-start-filter";
import { createClickFilter } from "./click-filter";
import { createDemoFilter } from "./demo-filter";
import type { FilterKind, InputFilter } from "./filter";
import { createMultiPressFilter } from "./multi-press-filter";
import { createOneButtonFilter } from "./one-button-filter";
import { createPointerFilter } from "./pointer-filter";
import { createTwoButtonFilter } from "./two-button-filter";

export type * from "./filter";
export { angleBetween, createCircleStartFilter } from "./circle-start-filter";
export { createClickFilter } from "./click-filter";
export { createDemoFilter } from "./demo-filter";
export { createDynamicCore, slowStartFactor, MAX_TARGET_X } from "./dynamic-filter";
export { createMultiPressFilter } from "./multi-press-filter";
export { createOneButtonFilter } from "./one-button-filter";
export { createPointerDevice, type PointerDevice } from "./pointer-device";
export { createPointerFilter } from "./pointer-filter";
export { createTwoButtonFilter } from "./two-button-filter";

/** Build the filter of `kind` from session settings. */
export function createFilter(
  kind: FilterKind,
  settings: Settings,
  random?: () => number,
): InputFilter {
  switch (kind) {
    case "pointer":
      return createPointerFilter(settings);
    case "one-button":
      return createOneButtonFilter(settings);
    case "two-button":
      return createTwoButtonFilter(settings);
    case "demo":
      return createDemoFilter({ ...settings, random });
    case "click":
      return createClickFilter(settings);
    case "circle-start":
      return createCircleStartFilter(settings);
    case "multi-press":
      return createMultiPressFilter(settings);
  }
}
