import {
  DISCONNECTED_GAMEPAD,
  EMPTY_KEYBOARD,
  EMPTY_POINTER,
} from "./snapshots";

import type {
  DevicePoller,
  DeviceState,
  FrameSlot,
  GamepadSnapshot,
  KeyboardSnapshot,
  PointerSnapshot,
} from "./types";
import type { GamepadSlot } from "../types/brands";

type SlotIndex = 0 | 1;
type Slots<T> = [T, T];

/**
 * Holds the current and previous snapshot of every device class.
 *
 * Each device keeps two named slots; `update()` polls into the stale slot and
 * flips the shared index, so nothing is copied and no history beyond one
 * frame is retained. Calling `update()` twice within one logical frame drops
 * that frame's transitions.
 */
export class DeviceStateBuffer implements DeviceState {
  private readonly keyboardSlots: Slots<KeyboardSnapshot> = [
    EMPTY_KEYBOARD,
    EMPTY_KEYBOARD,
  ];
  private readonly pointerSlots: Slots<PointerSnapshot> = [
    EMPTY_POINTER,
    EMPTY_POINTER,
  ];
  private readonly gamepadSlots: Slots<GamepadSnapshot> = [
    DISCONNECTED_GAMEPAD,
    DISCONNECTED_GAMEPAD,
  ];
  private currentIndex: SlotIndex = 0;

  constructor(
    private readonly poller: DevicePoller,
    private readonly gamepadSlot: GamepadSlot,
  ) {}

  /** A poll that throws leaves both slots of every device untouched. */
  update(): void {
    const keyboard = this.poller.pollKeyboard();
    const pointer = this.poller.pollPointer();
    const gamepad = this.poller.pollGamepad(this.gamepadSlot);

    const next: SlotIndex = this.currentIndex === 0 ? 1 : 0;
    this.keyboardSlots[next] = keyboard;
    this.pointerSlots[next] = pointer;
    this.gamepadSlots[next] = gamepad;
    this.currentIndex = next;
  }

  keyboard = (slot: FrameSlot): KeyboardSnapshot =>
    this.keyboardSlots[this.indexOf(slot)];

  pointer = (slot: FrameSlot): PointerSnapshot =>
    this.pointerSlots[this.indexOf(slot)];

  gamepad = (slot: FrameSlot): GamepadSnapshot =>
    this.gamepadSlots[this.indexOf(slot)];

  private indexOf(slot: FrameSlot): SlotIndex {
    if (slot === "current") return this.currentIndex;
    return this.currentIndex === 0 ? 1 : 0;
  }
}
