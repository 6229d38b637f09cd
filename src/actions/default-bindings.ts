import type { ActionBindings } from "./action-map";

// Host key codes (KeyboardEvent.code) and device controls per logical action
export const DEFAULT_BINDINGS: ActionBindings = {
  ActionAt: { gamepad: ["X"], pointer: ["Middle"] },
  Advance: { keyboard: ["Quote", "Tab"] },
  Chat: { keyboard: ["Enter"] },
  ExitGame: { gamepad: ["Back"], keyboard: ["Escape"] },
  MoveTo: { gamepad: ["B"], pointer: ["Right"] },
  Retreat: { keyboard: ["ShiftLeft", "ShiftRight"] },

  // Two hands on home row: left-hand and right-hand squad keys
  Select1: { keyboard: ["KeyA", "KeyJ"] },
  Select2: { keyboard: ["KeyS", "KeyK"] },
  Select3: { keyboard: ["KeyD", "KeyL"] },
  Select4: { keyboard: ["KeyF", "Semicolon"] },

  SelectAtCursor: { gamepad: ["A"], pointer: ["Left"] },
  StatusItemNext: { gamepad: ["RightShoulder"], keyboard: ["Space"] },
  StatusItemPrev: {
    gamepad: ["LeftShoulder"],
    keyboard: ["AltLeft", "AltRight"],
  },

  // Camera
  ViewDown: { gamepad: ["Down"], keyboard: ["ArrowDown", "PageDown"] },
  ViewLeft: { gamepad: ["Left"], keyboard: ["ArrowLeft"] },
  ViewRight: { gamepad: ["Right"], keyboard: ["ArrowRight"] },
  ViewUp: { gamepad: ["Up"], keyboard: ["ArrowUp"] },
  ZoomIn: { gamepad: ["RightTrigger"], pointer: ["ScrollUp"] },
  ZoomOut: {
    gamepad: ["LeftTrigger"],
    keyboard: ["PageUp"],
    pointer: ["ScrollDown"],
  },
};
