// Input configuration: resolved once from the host environment
// Concerned only with environment shape and conversion to InputConfig

import { createGamepadSlot, isGamepadSlot } from "../types/brands";
import { DEBUG_ENV_KEY, parseDebugTopics } from "../utils/debug";

import type { GamepadSlot } from "../types/brands";

export const GAMEPAD_SLOT_ENV_KEY = "INPUT_GAMEPAD_SLOT";

export type InputConfig = Readonly<{
  gamepadSlot: GamepadSlot;
  debugTopics: ReadonlyArray<string>;
}>;

export const DEFAULT_INPUT_CONFIG: InputConfig = {
  debugTopics: [],
  gamepadSlot: createGamepadSlot(0),
};

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function coerceGamepadSlot(u: unknown): GamepadSlot | undefined {
  if (!isString(u) || u.trim().length === 0) return undefined;
  const n = Number(u);
  return isGamepadSlot(n) ? n : undefined;
}

export function loadInputConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): InputConfig {
  return {
    debugTopics: parseDebugTopics(env[DEBUG_ENV_KEY]),
    gamepadSlot:
      coerceGamepadSlot(env[GAMEPAD_SLOT_ENV_KEY]) ??
      DEFAULT_INPUT_CONFIG.gamepadSlot,
  };
}
