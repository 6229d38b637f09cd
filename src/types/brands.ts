// Branded primitive types for type safety and domain modeling

// Frame counter - number of completed InputManager updates
declare const FrameBrand: unique symbol;
export type Frame = number & { readonly [FrameBrand]: true };

// Gamepad slot - which of the host's four pad slots is sampled
declare const GamepadSlotBrand: unique symbol;
export type GamepadSlot = (0 | 1 | 2 | 3) & {
  readonly [GamepadSlotBrand]: true;
};

export const MAX_GAMEPAD_SLOTS = 4;

// Frame constructors and guards
export function createFrame(value: number): Frame {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("Frame must be a non-negative integer");
  }
  return value as Frame;
}

export function isFrame(n: unknown): n is Frame {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

export function assertFrame(n: unknown): asserts n is Frame {
  if (!isFrame(n)) throw new Error("Not a valid Frame");
}

export function nextFrame(f: Frame): Frame {
  return (f + 1) as Frame;
}

// GamepadSlot constructors and guards
export function createGamepadSlot(value: number): GamepadSlot {
  if (!Number.isInteger(value) || value < 0 || value >= MAX_GAMEPAD_SLOTS) {
    throw new Error("GamepadSlot must be an integer from 0 to 3");
  }
  return value as GamepadSlot;
}

export function isGamepadSlot(n: unknown): n is GamepadSlot {
  return (
    typeof n === "number" &&
    Number.isInteger(n) &&
    n >= 0 &&
    n < MAX_GAMEPAD_SLOTS
  );
}

export function assertGamepadSlot(n: unknown): asserts n is GamepadSlot {
  if (!isGamepadSlot(n)) throw new Error("Not a valid GamepadSlot");
}

// Conversion helpers for interop at boundaries
export const frameAsNumber = (f: Frame): number => f as number;
export const gamepadSlotAsNumber = (s: GamepadSlot): number => s as number;
