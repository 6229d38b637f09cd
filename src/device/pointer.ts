import { isPointerButton } from "./keys";

import type { PointerControl } from "./keys";
import type { PointerSnapshot, Vector2 } from "./types";

/**
 * Pointer controls. Buttons have held state; the wheel controls are pure
 * edges derived from the direction the cumulative wheel value moved.
 */

export function isPointerControlActive(
  snapshot: PointerSnapshot,
  control: PointerControl,
): boolean {
  if (isPointerButton(control)) return snapshot.buttons[control];
  // ScrollUp / ScrollDown never read as held
  return false;
}

export function isPointerRisingEdge(
  previous: PointerSnapshot,
  current: PointerSnapshot,
  control: PointerControl,
): boolean {
  switch (control) {
    case "ScrollUp":
      return current.wheel > previous.wheel;
    case "ScrollDown":
      return current.wheel < previous.wheel;
    default:
      return current.buttons[control] && !previous.buttons[control];
  }
}

export function pointerDelta(
  previous: PointerSnapshot,
  current: PointerSnapshot,
): Vector2 {
  return {
    x: current.position.x - previous.position.x,
    y: current.position.y - previous.position.y,
  };
}

export function scrollDelta(
  previous: PointerSnapshot,
  current: PointerSnapshot,
): number {
  return current.wheel - previous.wheel;
}
