/**
 * Shared contracts between the core and its host: colours, the screen
 * the renderer draws onto, and the input devices filters read from.
 */

/** 8-bit RGBA colour. */
export interface Colour {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Writing direction of an alphabet, and therefore of the view. */
export type Orientation = "LTR" | "RTL" | "TTB" | "BTT";

// ---------------------------------------------------------------------------
// Screen
// ---------------------------------------------------------------------------

/** Opaque handle for a piece of text the screen has prepared. */
export interface Label {
  readonly text: string;
  /** Wrap width in pixels; 0 means no wrapping. */
  readonly wrap: number;
}

/**
 * Drawing surface supplied by the host.  Coordinates are screen pixels
 * with the origin at the top-left.
 *
 * `drawPolygon` and `destroyLabel` are optional; the renderer falls
 * back to line segments and simply drops labels respectively.
 */
export interface Screen {
  readonly width: number;
  readonly height: number;

  drawRectangle(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    fill: Colour | undefined,
    outline: Colour | undefined,
    lineWidth: number,
  ): void;
  drawCircle(
    cx: number,
    cy: number,
    r: number,
    fill: Colour | undefined,
    outline: Colour | undefined,
    lineWidth: number,
  ): void;
  drawLine(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    colour: Colour,
    lineWidth: number,
  ): void;
  drawPolygon?(
    points: readonly Point[],
    fill: Colour | undefined,
    outline: Colour | undefined,
    lineWidth: number,
  ): void;

  makeLabel(text: string, wrap: number): Label;
  destroyLabel?(label: Label): void;
  textSize(label: Label, fontSize: number): Size;
  drawString(
    label: Label,
    x: number,
    y: number,
    fontSize: number,
    colour: Colour,
  ): void;

  /** Present the frame. */
  display(): void;
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export type VirtualKey =
  | "primary"
  | "secondary"
  | "tertiary"
  | "startStop"
  | "button1"
  | "button2"
  | "button3"
  | "button4"
  | "button5"
  | "left"
  | "right"
  | "up"
  | "down"
  | "backspace"
  | "tab"
  | "return"
  | "escape"
  | "space";

/** A pointer or button device polled once per frame. */
export interface InputDevice {
  /** Pointer position in screen pixels, or undefined if there is none. */
  pollCoordinates(): Point | undefined;
  isButtonPressed?(key: VirtualKey): boolean;
}
