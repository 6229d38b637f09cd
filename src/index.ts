// Public surface of the input action layer

export { InputManager, type InputManagerOptions } from "./input/manager";
export {
  LifecycleService,
  type LifecycleState,
} from "./input/machines/lifecycle";

export {
  ACTION_COUNT,
  ALL_LOGICAL_ACTIONS,
  actionAt,
  actionIndex,
  getActionName,
  isLogicalAction,
  type LogicalAction,
} from "./actions/registry";
export {
  boundControls,
  buildDefaultBindings,
  createActionMapTable,
  getMap,
  type ActionBindings,
  type ActionMap,
  type ActionMapTable,
} from "./actions/action-map";
export { DEFAULT_BINDINGS } from "./actions/default-bindings";

export {
  DeviceRecorder,
  gamepadSnapshotFromStandard,
  isStandardGamepadLike,
  type StandardGamepadLike,
} from "./device/adapter";
export {
  describeControl,
  isControlPressed,
  isControlTriggered,
} from "./device/controls";
export { ANALOG_THRESHOLD } from "./device/gamepad";
export * from "./device/keys";
export {
  createGamepadSnapshot,
  createKeyboardSnapshot,
  createPointerSnapshot,
  DISCONNECTED_GAMEPAD,
  EMPTY_KEYBOARD,
  EMPTY_POINTER,
} from "./device/snapshots";
export { DeviceStateBuffer } from "./device/state-buffer";
export type * from "./device/types";

export {
  DEFAULT_INPUT_CONFIG,
  GAMEPAD_SLOT_ENV_KEY,
  loadInputConfig,
  type InputConfig,
} from "./app/config";
export {
  assertFrame,
  assertGamepadSlot,
  createFrame,
  createGamepadSlot,
  frameAsNumber,
  gamepadSlotAsNumber,
  isFrame,
  isGamepadSlot,
  MAX_GAMEPAD_SLOTS,
  nextFrame,
  type Frame,
  type GamepadSlot,
} from "./types/brands";
export {
  createDebugLogger,
  DEBUG_ENV_KEY,
  debugLog,
  debugTable,
  isDebugEnabled,
  type DebugLogger,
} from "./utils/debug";
