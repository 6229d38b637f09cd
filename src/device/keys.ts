export type Device = "keyboard" | "pointer" | "gamepad";

// Physical input codes (what user actually presses)
// Keyboard keys use the host's key identifier space: KeyboardEvent.code values
// such as "KeyA", "Escape", "ShiftLeft".
export type KeyCode = string;

export type PointerButton = "Left" | "Right" | "Middle";

// Wheel controls have no held state, only edges between frames
export type PointerWheel = "ScrollUp" | "ScrollDown";

export type PointerControl = PointerButton | PointerWheel;

export type GamepadButton =
  | "Start"
  | "Back"
  | "A"
  | "B"
  | "X"
  | "Y"
  | "LeftShoulder"
  | "RightShoulder";

export type GamepadDirection = "Up" | "Down" | "Left" | "Right";

export type GamepadTrigger = "LeftTrigger" | "RightTrigger";

// Up/Down/Left/Right are virtual: D-pad OR left stick past the threshold
export type GamepadControl = GamepadButton | GamepadDirection | GamepadTrigger;

export type KeyboardControl = Readonly<{ device: "keyboard"; key: KeyCode }>;
export type PointerInput = Readonly<{
  device: "pointer";
  control: PointerControl;
}>;
export type GamepadInput = Readonly<{
  device: "gamepad";
  control: GamepadControl;
}>;

export type PhysicalControl = KeyboardControl | PointerInput | GamepadInput;

export const ALL_POINTER_BUTTONS: ReadonlyArray<PointerButton> = [
  "Left",
  "Right",
  "Middle",
] as const;

export const ALL_POINTER_CONTROLS: ReadonlyArray<PointerControl> = [
  ...ALL_POINTER_BUTTONS,
  "ScrollUp",
  "ScrollDown",
];

export const ALL_GAMEPAD_BUTTONS: ReadonlyArray<GamepadButton> = [
  "Start",
  "Back",
  "A",
  "B",
  "X",
  "Y",
  "LeftShoulder",
  "RightShoulder",
] as const;

export const ALL_GAMEPAD_DIRECTIONS: ReadonlyArray<GamepadDirection> = [
  "Up",
  "Down",
  "Left",
  "Right",
] as const;

export const ALL_GAMEPAD_CONTROLS: ReadonlyArray<GamepadControl> = [
  "Start",
  "Back",
  "A",
  "B",
  "X",
  "Y",
  "Up",
  "Down",
  "Left",
  "Right",
  "LeftShoulder",
  "RightShoulder",
  "LeftTrigger",
  "RightTrigger",
] as const;

export function isPointerControl(u: unknown): u is PointerControl {
  return typeof u === "string" && ALL_POINTER_CONTROLS.some((c) => c === u);
}

export function isGamepadControl(u: unknown): u is GamepadControl {
  return typeof u === "string" && ALL_GAMEPAD_CONTROLS.some((c) => c === u);
}

export function isPointerButton(c: PointerControl): c is PointerButton {
  return c === "Left" || c === "Right" || c === "Middle";
}

export function isGamepadDirection(c: GamepadControl): c is GamepadDirection {
  return c === "Up" || c === "Down" || c === "Left" || c === "Right";
}

export function isGamepadTrigger(c: GamepadControl): c is GamepadTrigger {
  return c === "LeftTrigger" || c === "RightTrigger";
}

// Constructors for the tagged variants
export const key = (code: KeyCode): KeyboardControl => ({
  device: "keyboard",
  key: code,
});

export const pointer = (control: PointerControl): PointerInput => ({
  control,
  device: "pointer",
});

export const pad = (control: GamepadControl): GamepadInput => ({
  control,
  device: "gamepad",
});
