import { isGamepadControlActive, isGamepadRisingEdge } from "./gamepad";
import { isKeyDown, isKeyRisingEdge } from "./keyboard";
import { isPointerControlActive, isPointerRisingEdge } from "./pointer";

import type { PhysicalControl } from "./keys";
import type { DeviceState } from "./types";

/** Exhaustiveness helper for the PhysicalControl variants. */
function assertNever(x: never): never {
  throw new Error(`Unknown physical control: ${JSON.stringify(x)}`);
}

/** Control reads active in the current frame. */
export function isControlPressed(
  control: PhysicalControl,
  state: DeviceState,
): boolean {
  switch (control.device) {
    case "keyboard":
      return isKeyDown(state.keyboard("current"), control.key);
    case "pointer":
      return isPointerControlActive(state.pointer("current"), control.control);
    case "gamepad":
      return isGamepadControlActive(state.gamepad("current"), control.control);
    default:
      return assertNever(control);
  }
}

/** Control went from inactive to active between previous and current frame. */
export function isControlTriggered(
  control: PhysicalControl,
  state: DeviceState,
): boolean {
  switch (control.device) {
    case "keyboard":
      return isKeyRisingEdge(
        state.keyboard("previous"),
        state.keyboard("current"),
        control.key,
      );
    case "pointer":
      return isPointerRisingEdge(
        state.pointer("previous"),
        state.pointer("current"),
        control.control,
      );
    case "gamepad":
      return isGamepadRisingEdge(
        state.gamepad("previous"),
        state.gamepad("current"),
        control.control,
      );
    default:
      return assertNever(control);
  }
}

/** Stable string form, e.g. "keyboard:KeyA" or "gamepad:LeftTrigger". */
export function describeControl(control: PhysicalControl): string {
  return control.device === "keyboard"
    ? `keyboard:${control.key}`
    : `${control.device}:${control.control}`;
}
