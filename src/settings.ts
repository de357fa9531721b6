/**
 * Session settings: one zod schema with defaults, readable from an
 * object or from URL parameters.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

export const FILTER_KINDS = ["pointer", "one-button", "two-button", "demo", "click", "circle-start", "multi-press"] as const;
export const CONTROL_KINDS = ["backspace", "space", "accept", "pause"] as const;

export const settingsSchema = z.object({
  // Language model
  lmOrder: z.number().int().min(0).max(5).default(3),
  ppmWeight: z.number().min(0).max(1).default(0.7),
  contextLength: z.number().int().min(1).default(24),

  // Motion
  bitRate: z.number().positive().default(10),
  minSteps: z.number().int().min(1).default(1),
  slowStart: z.boolean().default(true),
  slowStartTime: z.number().min(0).default(1000),
  exactDynamics: z.boolean().default(false),
  xLimitSpeed: z.number().min(0).default(100),
  turboMultiplier: z.number().min(1).default(2),

  // Input
  filter: z.enum(FILTER_KINDS).default("pointer"),
  buttonOffset: z.number().positive().default(2048),
  buttonTargetX: z.number().positive().default(100),
  minClickInterval: z.number().min(0).default(50),
  doubleClickTime: z.number().min(0).default(250),
  longPressTime: z.number().positive().default(750),
  demoInterval: z.number().positive().default(5000),
  demoRandom: z.boolean().default(true),
  zoomSteps: z.number().int().min(1).default(16),
  multiPressTime: z.number().positive().default(500),
  circleRadius: z.number().positive().default(50),
  circleAngle: z.number().positive().default(270),
  circleDwellTime: z.number().min(0).default(200),
  circleMaxTime: z.number().positive().default(2000),

  // Tree
  controls: z.array(z.enum(CONTROL_KINDS)).default([]),
  controlShare: z.number().gt(0).lt(1).default(0.05),

  // Display
  minNodeHeight: z.number().positive().default(2),
  maxDepth: z.number().int().min(1).default(64),

  debug: z.boolean().default(false),
});

export type Settings = z.output<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

/** Validate `input` and fill in defaults. */
export function parseSettings(input: unknown = {}): Settings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "invalid settings",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}

const BOOLEANS: Record<string, boolean> = { true: true, "1": true, false: false, "0": false };

/**
 * Read settings from URL parameters, e.g. a page's `location.hash`:
 * `#bitRate=8&filter=one-button&controls=backspace,space`.  Unknown
 * keys are ignored; values are converted by the type of their default.
 */
export function settingsFromParams(params: URLSearchParams): Settings {
  const defaults = parseSettings({});
  const raw: Record<string, unknown> = {};
  for (const [key, value] of params) {
    if (!Object.hasOwn(defaults, key)) continue;
    const current: unknown = Reflect.get(defaults, key);
    if (typeof current === "number") {
      raw[key] = parseFloat(value);
    } else if (typeof current === "boolean") {
      raw[key] = Object.hasOwn(BOOLEANS, value) ? BOOLEANS[value] : value;
    } else if (Array.isArray(current)) {
      raw[key] = value === "" ? [] : value.split(",").map((v) => v.trim());
    } else {
      raw[key] = value;
    }
  }
  return parseSettings(raw);
}
