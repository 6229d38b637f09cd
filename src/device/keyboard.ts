import type { KeyCode } from "./keys";
import type { KeyboardSnapshot } from "./types";

export function isKeyDown(snapshot: KeyboardSnapshot, key: KeyCode): boolean {
  return snapshot.pressed.has(key);
}

/** Rising edge only: down now, up in the previous frame. */
export function isKeyRisingEdge(
  previous: KeyboardSnapshot,
  current: KeyboardSnapshot,
  key: KeyCode,
): boolean {
  return current.pressed.has(key) && !previous.pressed.has(key);
}
