import type { InputDevice, Point, VirtualKey } from "../types";

/**
 * Input device fed by host events: the last pointer position and the
 * set of buttons held.
 */
export interface PointerDevice extends InputDevice {
  setPosition(x: number, y: number): void;
  /** The pointer left the surface. */
  clear(): void;
  press(key: VirtualKey): void;
  release(key: VirtualKey): void;
}

export function createPointerDevice(): PointerDevice {
  let position: Point | undefined;
  const held = new Set<VirtualKey>();

  return {
    pollCoordinates() {
      return position;
    },

    isButtonPressed(key) {
      return held.has(key);
    },

    setPosition(x, y) {
      position = { x, y };
    },

    clear() {
      position = undefined;
    },

    press(key) {
      held.add(key);
    },

    release(key) {
      held.delete(key);
    },
  };
}
