import { isGamepadDirection, isGamepadTrigger } from "./keys";

import type { GamepadControl, GamepadDirection, GamepadTrigger } from "./keys";
import type { GamepadSnapshot, Vector2 } from "./types";

/**
 * Value at which an analog axis reads as a pressed button. Instantaneous
 * comparison, no hysteresis: a value hovering at the threshold can report
 * a fresh trigger edge on consecutive frames.
 */
export const ANALOG_THRESHOLD = 0.5;

function isPastThreshold(value: number): boolean {
  return value >= ANALOG_THRESHOLD;
}

/** Signed stick axis for a direction; negative directions are sign-inverted. */
function stickAxis(stick: Vector2, direction: GamepadDirection): number {
  switch (direction) {
    case "Up":
      return stick.y;
    case "Down":
      return -stick.y;
    case "Left":
      return -stick.x;
    case "Right":
      return stick.x;
  }
}

function triggerValue(
  snapshot: GamepadSnapshot,
  trigger: GamepadTrigger,
): number {
  return trigger === "LeftTrigger"
    ? snapshot.triggers.left
    : snapshot.triggers.right;
}

function isDpadActive(
  snapshot: GamepadSnapshot,
  direction: GamepadDirection,
): boolean {
  return snapshot.connected && snapshot.dpad[direction];
}

function isStickActive(
  snapshot: GamepadSnapshot,
  direction: GamepadDirection,
): boolean {
  return (
    snapshot.connected &&
    isPastThreshold(stickAxis(snapshot.sticks.left, direction))
  );
}

/**
 * Single-source reading of a control. Virtual directions are the OR of the
 * D-pad and the left stick. A disconnected pad reads as fully released.
 */
export function isGamepadControlActive(
  snapshot: GamepadSnapshot,
  control: GamepadControl,
): boolean {
  if (!snapshot.connected) return false;
  if (isGamepadDirection(control)) {
    return isDpadActive(snapshot, control) || isStickActive(snapshot, control);
  }
  if (isGamepadTrigger(control)) {
    return isPastThreshold(triggerValue(snapshot, control));
  }
  return snapshot.buttons[control];
}

/**
 * Rising edge between two frames. Directions OR the D-pad edge with the
 * stick edge, each diffed on its own source.
 */
export function isGamepadRisingEdge(
  previous: GamepadSnapshot,
  current: GamepadSnapshot,
  control: GamepadControl,
): boolean {
  if (!current.connected) return false;
  if (isGamepadDirection(control)) {
    const dpadEdge =
      isDpadActive(current, control) && !isDpadActive(previous, control);
    if (dpadEdge) return true;
    return (
      isStickActive(current, control) && !isStickActive(previous, control)
    );
  }
  return (
    isGamepadControlActive(current, control) &&
    !isGamepadControlActive(previous, control)
  );
}
