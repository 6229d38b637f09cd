import { createGamepadSlot } from "../types/brands";
import {
  createGamepadSnapshot,
  createKeyboardSnapshot,
  createPointerSnapshot,
  DISCONNECTED_GAMEPAD,
} from "./snapshots";

import type { KeyCode, PointerButton } from "./keys";
import type {
  DevicePoller,
  GamepadSnapshot,
  KeyboardSnapshot,
  PointerSnapshot,
} from "./types";
import type { GamepadSlot } from "../types/brands";

// Shape of a W3C Gamepad with the "standard" mapping
type StandardButton = {
  readonly pressed: boolean;
  readonly value: number;
};

export type StandardGamepadLike = {
  readonly connected: boolean;
  readonly buttons: ReadonlyArray<StandardButton>;
  readonly axes: ReadonlyArray<number>;
};

// Standard mapping button indices
const BUTTON = {
  A: 0,
  B: 1,
  Back: 8,
  DpadDown: 13,
  DpadLeft: 14,
  DpadRight: 15,
  DpadUp: 12,
  LeftShoulder: 4,
  LeftTrigger: 6,
  RightShoulder: 5,
  RightTrigger: 7,
  Start: 9,
  X: 2,
  Y: 3,
} as const;

/** Type guard for the standard gamepad structure */
export function isStandardGamepadLike(u: unknown): u is StandardGamepadLike {
  if (typeof u !== "object" || u === null) return false;
  const obj = u as Record<string, unknown>;
  return (
    typeof obj["connected"] === "boolean" &&
    Array.isArray(obj["buttons"]) &&
    Array.isArray(obj["axes"])
  );
}

function buttonPressed(pad: StandardGamepadLike, index: number): boolean {
  return pad.buttons[index]?.pressed ?? false;
}

function buttonValue(pad: StandardGamepadLike, index: number): number {
  return pad.buttons[index]?.value ?? 0;
}

function axis(pad: StandardGamepadLike, index: number): number {
  const v = pad.axes[index];
  return v !== undefined && Number.isFinite(v) ? v : 0;
}

// Avoids -0 for a centered axis
function flipped(v: number): number {
  return v === 0 ? 0 : -v;
}

/**
 * Convert a standard-mapping gamepad into a snapshot. Standard axes report
 * +y as down; snapshots use +y up, so both stick y axes are negated.
 */
export function gamepadSnapshotFromStandard(
  pad: StandardGamepadLike | null | undefined,
): GamepadSnapshot {
  if (!pad?.connected) return DISCONNECTED_GAMEPAD;

  return createGamepadSnapshot({
    buttons: {
      A: buttonPressed(pad, BUTTON.A),
      B: buttonPressed(pad, BUTTON.B),
      Back: buttonPressed(pad, BUTTON.Back),
      LeftShoulder: buttonPressed(pad, BUTTON.LeftShoulder),
      RightShoulder: buttonPressed(pad, BUTTON.RightShoulder),
      Start: buttonPressed(pad, BUTTON.Start),
      X: buttonPressed(pad, BUTTON.X),
      Y: buttonPressed(pad, BUTTON.Y),
    },
    connected: true,
    dpad: {
      Down: buttonPressed(pad, BUTTON.DpadDown),
      Left: buttonPressed(pad, BUTTON.DpadLeft),
      Right: buttonPressed(pad, BUTTON.DpadRight),
      Up: buttonPressed(pad, BUTTON.DpadUp),
    },
    sticks: {
      left: { x: axis(pad, 0), y: flipped(axis(pad, 1)) },
      right: { x: axis(pad, 2), y: flipped(axis(pad, 3)) },
    },
    triggers: {
      left: buttonValue(pad, BUTTON.LeftTrigger),
      right: buttonValue(pad, BUTTON.RightTrigger),
    },
  });
}

/**
 * Event-fed poller. Hosts (or tests) push raw device events as they arrive;
 * each poll returns a frozen capture of the state accumulated so far.
 */
export class DeviceRecorder implements DevicePoller {
  private readonly keys = new Set<KeyCode>();
  private readonly buttons: Record<PointerButton, boolean> = {
    Left: false,
    Middle: false,
    Right: false,
  };
  private x = 0;
  private y = 0;
  private wheelValue = 0;
  private readonly pads = new Map<GamepadSlot, GamepadSnapshot>();

  keyDown(code: KeyCode): void {
    this.keys.add(code);
  }

  keyUp(code: KeyCode): void {
    this.keys.delete(code);
  }

  pointerMove(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  pointerDown(button: PointerButton): void {
    this.buttons[button] = true;
  }

  pointerUp(button: PointerButton): void {
    this.buttons[button] = false;
  }

  /** Accumulates into the cumulative wheel value; positive scrolls up. */
  wheel(delta: number): void {
    this.wheelValue += delta;
  }

  setGamepad(slot: number, snapshot: GamepadSnapshot): void {
    this.pads.set(createGamepadSlot(slot), snapshot);
  }

  disconnectGamepad(slot: number): void {
    this.pads.delete(createGamepadSlot(slot));
  }

  /** Release every held key and button; wheel and position are kept. */
  releaseAll(): void {
    this.keys.clear();
    this.buttons.Left = false;
    this.buttons.Middle = false;
    this.buttons.Right = false;
  }

  pollKeyboard(): KeyboardSnapshot {
    return createKeyboardSnapshot(this.keys);
  }

  pollPointer(): PointerSnapshot {
    return createPointerSnapshot({
      buttons: this.buttons,
      position: { x: this.x, y: this.y },
      wheel: this.wheelValue,
    });
  }

  pollGamepad(slot: GamepadSlot): GamepadSnapshot {
    return this.pads.get(slot) ?? DISCONNECTED_GAMEPAD;
  }
}
