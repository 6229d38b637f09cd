import type {
  GamepadButton,
  GamepadDirection,
  KeyCode,
  PointerButton,
} from "./keys";
import type { GamepadSlot } from "../types/brands";

/**
 * Immutable per-frame captures of one device's raw state. The host produces
 * these through a DevicePoller; the input layer only ever reads them.
 */

export type Vector2 = Readonly<{ x: number; y: number }>;

export type KeyboardSnapshot = Readonly<{
  pressed: ReadonlySet<KeyCode>;
}>;

export type PointerSnapshot = Readonly<{
  buttons: Readonly<Record<PointerButton, boolean>>;
  position: Vector2;
  /** Cumulative scroll wheel value; only its change between frames matters. */
  wheel: number;
}>;

export type GamepadSnapshot = Readonly<{
  connected: boolean;
  buttons: Readonly<Record<GamepadButton, boolean>>;
  dpad: Readonly<Record<GamepadDirection, boolean>>;
  /** Axes in -1..1, +y is up. */
  sticks: Readonly<{ left: Vector2; right: Vector2 }>;
  /** Analog values in 0..1. */
  triggers: Readonly<{ left: number; right: number }>;
}>;

export type FrameSlot = "current" | "previous";

/** Read-only view over the two retained frames of every device. */
export type DeviceState = {
  keyboard: (slot: FrameSlot) => KeyboardSnapshot;
  pointer: (slot: FrameSlot) => PointerSnapshot;
  gamepad: (slot: FrameSlot) => GamepadSnapshot;
};

/**
 * Host platform boundary. Each call is synchronous and non-blocking and is
 * made exactly once per device per update.
 */
export type DevicePoller = {
  pollKeyboard: () => KeyboardSnapshot;
  pollPointer: () => PointerSnapshot;
  pollGamepad: (slot: GamepadSlot) => GamepadSnapshot;
};
