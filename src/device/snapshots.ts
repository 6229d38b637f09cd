import type {
  GamepadButton,
  GamepadDirection,
  KeyCode,
  PointerButton,
} from "./keys";
import type {
  GamepadSnapshot,
  KeyboardSnapshot,
  PointerSnapshot,
  Vector2,
} from "./types";

type DeepPartialGamepad = Partial<{
  connected: boolean;
  buttons: Partial<Record<GamepadButton, boolean>>;
  dpad: Partial<Record<GamepadDirection, boolean>>;
  sticks: Partial<{ left: Partial<Vector2>; right: Partial<Vector2> }>;
  triggers: Partial<{ left: number; right: number }>;
}>;

type PartialPointer = Partial<{
  buttons: Partial<Record<PointerButton, boolean>>;
  position: Partial<Vector2>;
  wheel: number;
}>;

function vec(v?: Partial<Vector2>): Vector2 {
  return Object.freeze({ x: v?.x ?? 0, y: v?.y ?? 0 });
}

export function createKeyboardSnapshot(
  pressed: Iterable<KeyCode> = [],
): KeyboardSnapshot {
  return Object.freeze({ pressed: new Set(pressed) });
}

export function createPointerSnapshot(
  init: PartialPointer = {},
): PointerSnapshot {
  return Object.freeze({
    buttons: Object.freeze({
      Left: init.buttons?.Left ?? false,
      Middle: init.buttons?.Middle ?? false,
      Right: init.buttons?.Right ?? false,
    }),
    position: vec(init.position),
    wheel: init.wheel ?? 0,
  });
}

/** Builds a gamepad snapshot; unspecified fields read as released/centered. */
export function createGamepadSnapshot(
  init: DeepPartialGamepad = {},
): GamepadSnapshot {
  return Object.freeze({
    buttons: Object.freeze({
      A: init.buttons?.A ?? false,
      B: init.buttons?.B ?? false,
      Back: init.buttons?.Back ?? false,
      LeftShoulder: init.buttons?.LeftShoulder ?? false,
      RightShoulder: init.buttons?.RightShoulder ?? false,
      Start: init.buttons?.Start ?? false,
      X: init.buttons?.X ?? false,
      Y: init.buttons?.Y ?? false,
    }),
    connected: init.connected ?? true,
    dpad: Object.freeze({
      Down: init.dpad?.Down ?? false,
      Left: init.dpad?.Left ?? false,
      Right: init.dpad?.Right ?? false,
      Up: init.dpad?.Up ?? false,
    }),
    sticks: Object.freeze({
      left: vec(init.sticks?.left),
      right: vec(init.sticks?.right),
    }),
    triggers: Object.freeze({
      left: init.triggers?.left ?? 0,
      right: init.triggers?.right ?? 0,
    }),
  });
}

export const EMPTY_KEYBOARD: KeyboardSnapshot = createKeyboardSnapshot();
export const EMPTY_POINTER: PointerSnapshot = createPointerSnapshot();
export const DISCONNECTED_GAMEPAD: GamepadSnapshot = createGamepadSnapshot({
  connected: false,
});
