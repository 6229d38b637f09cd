import { describe, it, expect } from "@jest/globals";

import {
  DEFAULT_INPUT_CONFIG,
  GAMEPAD_SLOT_ENV_KEY,
  loadInputConfig,
} from "../../src/app/config";
import { gamepadSlotAsNumber } from "../../src/types/brands";
import { DEBUG_ENV_KEY } from "../../src/utils/debug";

describe("loadInputConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadInputConfig({})).toEqual(DEFAULT_INPUT_CONFIG);
    expect(gamepadSlotAsNumber(DEFAULT_INPUT_CONFIG.gamepadSlot)).toBe(0);
  });

  it("reads the gamepad slot", () => {
    const config = loadInputConfig({ [GAMEPAD_SLOT_ENV_KEY]: "3" });
    expect(gamepadSlotAsNumber(config.gamepadSlot)).toBe(3);
  });

  it.each(["4", "-1", "1.5", "two", "", "  "])(
    "falls back to slot 0 for %p",
    (raw) => {
      const config = loadInputConfig({ [GAMEPAD_SLOT_ENV_KEY]: raw });
      expect(gamepadSlotAsNumber(config.gamepadSlot)).toBe(0);
    },
  );

  it("reports debug topics", () => {
    const config = loadInputConfig({ [DEBUG_ENV_KEY]: "gamepad,lifecycle" });
    expect(config.debugTopics).toEqual(["gamepad", "lifecycle"]);
  });
});
