import { DEFAULT_BINDINGS } from "./default-bindings";
import {
  ACTION_COUNT,
  ALL_LOGICAL_ACTIONS,
  actionIndex,
  isLogicalAction,
} from "./registry";
import {
  isGamepadControl,
  isPointerControl,
  key,
  pad,
  pointer,
} from "../device/keys";

import type { LogicalAction } from "./registry";
import type {
  GamepadControl,
  KeyCode,
  PhysicalControl,
  PointerControl,
} from "../device/keys";

/** Physical controls bound to one logical action; any list may be empty. */
export type ActionMap = Readonly<{
  keyboard: ReadonlyArray<KeyCode>;
  pointer: ReadonlyArray<PointerControl>;
  gamepad: ReadonlyArray<GamepadControl>;
}>;

/** Binding source: actions left out get an empty map. */
export type ActionBindings = Readonly<
  Partial<Record<LogicalAction, Partial<ActionMap>>>
>;

/**
 * Read-only binding table indexed by action enumeration order. `controls`
 * holds each map flattened in evaluation order (keyboard, pointer, gamepad)
 * so queries never allocate.
 */
export type ActionMapTable = Readonly<{
  maps: ReadonlyArray<ActionMap>;
  controls: ReadonlyArray<ReadonlyArray<PhysicalControl>>;
}>;

function readList(
  action: LogicalAction,
  device: keyof ActionMap,
  value: unknown,
): ReadonlyArray<unknown> {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Bindings for ${action}.${device} must be an array`);
  }
  const items: ReadonlyArray<unknown> = value;
  return items;
}

function readKeys(action: LogicalAction, value: unknown): Array<KeyCode> {
  const out = new Set<KeyCode>();
  for (const item of readList(action, "keyboard", value)) {
    if (typeof item !== "string" || item.length === 0) {
      throw new Error(`Invalid key code for ${action}: ${String(item)}`);
    }
    out.add(item);
  }
  return [...out];
}

function readPointer(
  action: LogicalAction,
  value: unknown,
): Array<PointerControl> {
  const out = new Set<PointerControl>();
  for (const item of readList(action, "pointer", value)) {
    if (!isPointerControl(item)) {
      throw new Error(`Invalid pointer control for ${action}: ${String(item)}`);
    }
    out.add(item);
  }
  return [...out];
}

function readGamepad(
  action: LogicalAction,
  value: unknown,
): Array<GamepadControl> {
  const out = new Set<GamepadControl>();
  for (const item of readList(action, "gamepad", value)) {
    if (!isGamepadControl(item)) {
      throw new Error(`Invalid gamepad control for ${action}: ${String(item)}`);
    }
    out.add(item);
  }
  return [...out];
}

function flatten(map: ActionMap): ReadonlyArray<PhysicalControl> {
  return Object.freeze([
    ...map.keyboard.map(key),
    ...map.pointer.map(pointer),
    ...map.gamepad.map(pad),
  ]);
}

/**
 * Builds a table from a binding record. Every action in the enumeration
 * receives a map; unknown actions or controls throw.
 */
export function createActionMapTable(bindings: ActionBindings): ActionMapTable {
  for (const name of Object.keys(bindings)) {
    if (!isLogicalAction(name)) {
      throw new Error(`Unknown action: ${name}`);
    }
  }

  const maps = ALL_LOGICAL_ACTIONS.map((action): ActionMap => {
    const entry: Partial<ActionMap> = bindings[action] ?? {};
    return Object.freeze({
      gamepad: Object.freeze(readGamepad(action, entry.gamepad)),
      keyboard: Object.freeze(readKeys(action, entry.keyboard)),
      pointer: Object.freeze(readPointer(action, entry.pointer)),
    });
  });

  return Object.freeze({
    controls: Object.freeze(maps.map(flatten)),
    maps: Object.freeze(maps),
  });
}

/** Fixed default bindings; pure, deterministic, no I/O. */
export function buildDefaultBindings(): ActionMapTable {
  return createActionMapTable(DEFAULT_BINDINGS);
}

function entryAt<T>(rows: ReadonlyArray<T>, action: LogicalAction): T {
  const row = rows[actionIndex(action)];
  if (row === undefined || rows.length !== ACTION_COUNT) {
    throw new Error(`Unknown action: ${String(action)}`);
  }
  return row;
}

export function getMap(
  table: ActionMapTable,
  action: LogicalAction,
): ActionMap {
  return entryAt(table.maps, action);
}

export function boundControls(
  table: ActionMapTable,
  action: LogicalAction,
): ReadonlyArray<PhysicalControl> {
  return entryAt(table.controls, action);
}
