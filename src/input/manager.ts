import { LifecycleService } from "./machines/lifecycle";
import {
  boundControls,
  buildDefaultBindings,
  getMap,
} from "../actions/action-map";
import { ACTION_COUNT, actionAt, getActionName } from "../actions/registry";
import { loadInputConfig } from "../app/config";
import {
  describeControl,
  isControlPressed,
  isControlTriggered,
} from "../device/controls";
import { isGamepadControlActive, isGamepadRisingEdge } from "../device/gamepad";
import { isKeyDown, isKeyRisingEdge } from "../device/keyboard";
import {
  isPointerControlActive,
  isPointerRisingEdge,
  pointerDelta,
  scrollDelta,
} from "../device/pointer";
import { DeviceStateBuffer } from "../device/state-buffer";
import { createFrame, nextFrame } from "../types/brands";
import { createDebugLogger } from "../utils/debug";

import type { ActionMap, ActionMapTable } from "../actions/action-map";
import type { LogicalAction } from "../actions/registry";
import type { InputConfig } from "../app/config";
import type { GamepadControl, KeyCode, PointerControl } from "../device/keys";
import type { DevicePoller, DeviceState, Vector2 } from "../device/types";
import type { Frame, GamepadSlot } from "../types/brands";
import type { DebugLogger } from "../utils/debug";

export type InputManagerOptions = Readonly<{
  poller: DevicePoller;
  /** Overrides `config.gamepadSlot`. */
  gamepadSlot?: GamepadSlot;
  /** Injected binding table; defaults are built on initialize() otherwise. */
  bindings?: ActionMapTable;
  /** Defaults to `loadInputConfig()` over `process.env`. */
  config?: InputConfig;
}>;

/**
 * Frame-sampled input façade.
 *
 * Lifecycle: `initialize()` once, `update()` once per frame, then any number
 * of side-effect-free queries until the next update. Each instance owns its
 * snapshots and binding table, so several can coexist (split-screen, tests).
 */
export class InputManager {
  private readonly lifecycle = new LifecycleService();
  private readonly buffer: DeviceStateBuffer;
  private readonly view: DeviceState;
  private readonly injectedBindings: ActionMapTable | undefined;
  private table: ActionMapTable | undefined = undefined;
  private readonly debug: DebugLogger;
  private frame: Frame = createFrame(0);

  constructor(options: InputManagerOptions) {
    const config = options.config ?? loadInputConfig();
    const slot = options.gamepadSlot ?? config.gamepadSlot;
    this.buffer = new DeviceStateBuffer(options.poller, slot);
    this.view = Object.freeze({
      gamepad: this.buffer.gamepad,
      keyboard: this.buffer.keyboard,
      pointer: this.buffer.pointer,
    });
    this.injectedBindings = options.bindings;
    this.debug = createDebugLogger(config.debugTopics);
  }

  initialize(): void {
    const table = this.injectedBindings ?? buildDefaultBindings();
    this.table = table;
    this.lifecycle.initialize();
    this.debug.log("lifecycle", "initialized", {
      actions: ACTION_COUNT,
      injected: this.injectedBindings !== undefined,
    });
    if (this.debug.enabled("bindings")) {
      this.debug.table(
        "bindings",
        "action bindings",
        table.controls.map((controls, i) => ({
          action: getActionName(actionAt(i)),
          controls: controls.map(describeControl).join(" "),
        })),
      );
    }
  }

  /** Rotate previous ← current and poll every device once. */
  update(): void {
    this.lifecycle.assertReady("update");
    const wasConnected = this.buffer.gamepad("current").connected;
    this.buffer.update();
    this.frame = nextFrame(this.frame);

    const connected = this.buffer.gamepad("current").connected;
    if (connected !== wasConnected) {
      this.debug.log("gamepad", connected ? "connected" : "disconnected", {
        frame: this.frame,
      });
    }
  }

  isActionPressed(action: LogicalAction): boolean {
    const controls = boundControls(
      this.requireTable("isActionPressed"),
      action,
    );
    for (const control of controls) {
      if (isControlPressed(control, this.buffer)) return true;
    }
    return false;
  }

  isActionTriggered(action: LogicalAction): boolean {
    const controls = boundControls(
      this.requireTable("isActionTriggered"),
      action,
    );
    for (const control of controls) {
      if (isControlTriggered(control, this.buffer)) return true;
    }
    return false;
  }

  getActionName(action: LogicalAction): string {
    return getActionName(action);
  }

  getActionMap(action: LogicalAction): ActionMap {
    return getMap(this.requireTable("getActionMap"), action);
  }

  getBindings(): ActionMapTable {
    return this.requireTable("getBindings");
  }

  /** Completed updates since construction. */
  getFrame(): Frame {
    return this.frame;
  }

  /** Read-only current/previous snapshots for raw-control features. */
  get state(): DeviceState {
    return this.view;
  }

  // Raw keyboard

  isKeyPressed(key: KeyCode): boolean {
    this.lifecycle.assertReady("isKeyPressed");
    return isKeyDown(this.buffer.keyboard("current"), key);
  }

  isKeyTriggered(key: KeyCode): boolean {
    this.lifecycle.assertReady("isKeyTriggered");
    return isKeyRisingEdge(
      this.buffer.keyboard("previous"),
      this.buffer.keyboard("current"),
      key,
    );
  }

  // Raw pointer

  isPointerControlPressed(control: PointerControl): boolean {
    this.lifecycle.assertReady("isPointerControlPressed");
    return isPointerControlActive(this.buffer.pointer("current"), control);
  }

  isPointerControlTriggered(control: PointerControl): boolean {
    this.lifecycle.assertReady("isPointerControlTriggered");
    return isPointerRisingEdge(
      this.buffer.pointer("previous"),
      this.buffer.pointer("current"),
      control,
    );
  }

  isMouseScrollUpTriggered(): boolean {
    return this.isPointerControlTriggered("ScrollUp");
  }

  isMouseScrollDownTriggered(): boolean {
    return this.isPointerControlTriggered("ScrollDown");
  }

  /** Pointer movement since the previous frame (free camera pan). */
  getPointerDelta(): Vector2 {
    this.lifecycle.assertReady("getPointerDelta");
    return pointerDelta(
      this.buffer.pointer("previous"),
      this.buffer.pointer("current"),
    );
  }

  getScrollDelta(): number {
    this.lifecycle.assertReady("getScrollDelta");
    return scrollDelta(
      this.buffer.pointer("previous"),
      this.buffer.pointer("current"),
    );
  }

  // Raw gamepad

  isGamepadControlPressed(control: GamepadControl): boolean {
    this.lifecycle.assertReady("isGamepadControlPressed");
    return isGamepadControlActive(this.buffer.gamepad("current"), control);
  }

  isGamepadControlTriggered(control: GamepadControl): boolean {
    this.lifecycle.assertReady("isGamepadControlTriggered");
    return isGamepadRisingEdge(
      this.buffer.gamepad("previous"),
      this.buffer.gamepad("current"),
      control,
    );
  }

  private requireTable(operation: string): ActionMapTable {
    this.lifecycle.assertReady(operation);
    if (this.table === undefined) {
      throw new Error(`InputManager.${operation} called before initialize()`);
    }
    return this.table;
  }
}
