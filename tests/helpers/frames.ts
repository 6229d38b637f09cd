/**
 * Scripted device poller for tests: each update() samples whatever frame was
 * set last, so a test can describe input frame by frame.
 */

import {
  DISCONNECTED_GAMEPAD,
  EMPTY_KEYBOARD,
  EMPTY_POINTER,
} from "../../src/device/snapshots";

import type {
  DevicePoller,
  GamepadSnapshot,
  KeyboardSnapshot,
  PointerSnapshot,
} from "../../src/device/types";
import type { GamepadSlot } from "../../src/types/brands";

export type FrameInput = Partial<{
  keyboard: KeyboardSnapshot;
  pointer: PointerSnapshot;
  gamepad: GamepadSnapshot;
}>;

export class ScriptedPoller implements DevicePoller {
  private frame: FrameInput = {};
  readonly polledSlots: Array<GamepadSlot> = [];

  set(frame: FrameInput): void {
    this.frame = frame;
  }

  pollKeyboard(): KeyboardSnapshot {
    return this.frame.keyboard ?? EMPTY_KEYBOARD;
  }

  pollPointer(): PointerSnapshot {
    return this.frame.pointer ?? EMPTY_POINTER;
  }

  pollGamepad(slot: GamepadSlot): GamepadSnapshot {
    this.polledSlots.push(slot);
    return this.frame.gamepad ?? DISCONNECTED_GAMEPAD;
  }
}

/** Feed one frame and advance the target by one update. */
export function advance(
  target: { update: () => void },
  poller: ScriptedPoller,
  frame: FrameInput,
): void {
  poller.set(frame);
  target.update();
}
