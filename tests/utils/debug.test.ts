import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  jest,
} from "@jest/globals";

import {
  createDebugLogger,
  debugLog,
  debugTable,
  DEBUG_ENV_KEY,
  isDebugEnabled,
  parseDebugTopics,
} from "../../src/utils/debug";

describe("parseDebugTopics", () => {
  it("switch values enable every topic", () => {
    expect(parseDebugTopics("1")).toEqual(["*"]);
    expect(parseDebugTopics(" TRUE ")).toEqual(["*"]);
    expect(parseDebugTopics("on")).toEqual(["*"]);
  });

  it("splits, trims and lowercases topic lists", () => {
    expect(parseDebugTopics("Bindings, gamepad,,")).toEqual([
      "bindings",
      "gamepad",
    ]);
  });

  it("unset or blank means off", () => {
    expect(parseDebugTopics(undefined)).toEqual([]);
    expect(parseDebugTopics("  ")).toEqual([]);
  });
});

describe("isDebugEnabled", () => {
  it("reads topics from the given environment", () => {
    const env = { [DEBUG_ENV_KEY]: "gamepad" };
    expect(isDebugEnabled("gamepad", env)).toBe(true);
    expect(isDebugEnabled("bindings", env)).toBe(false);
    expect(isDebugEnabled(undefined, env)).toBe(true);
    expect(isDebugEnabled("gamepad", {})).toBe(false);
  });

  it("wildcard enables any topic", () => {
    expect(isDebugEnabled("anything", { [DEBUG_ENV_KEY]: "on" })).toBe(true);
  });
});

describe("debug output", () => {
  let warn: jest.SpiedFunction<typeof console.warn>;
  const originalEnv = process.env[DEBUG_ENV_KEY];

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => {
      // silence debug output
    });
  });

  afterEach(() => {
    warn.mockRestore();
    if (originalEnv === undefined) {
      delete process.env[DEBUG_ENV_KEY];
    } else {
      process.env[DEBUG_ENV_KEY] = originalEnv;
    }
  });

  it("bound logger prefixes messages with the topic", () => {
    const logger = createDebugLogger(["lifecycle"]);
    logger.log("lifecycle", "initialized");
    logger.log("lifecycle", "with data", { n: 1 });
    logger.log("gamepad", "ignored");
    expect(warn.mock.calls).toEqual([
      ["[DBG:lifecycle] initialized"],
      ["[DBG:lifecycle] with data", { n: 1 }],
    ]);
  });

  it("bound logger tables go through the same gate", () => {
    const logger = createDebugLogger([]);
    logger.table("bindings", "rows", [1, 2]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("env-backed helpers follow INPUT_DEBUG", () => {
    process.env[DEBUG_ENV_KEY] = "bindings";
    debugLog("bindings", "rebuilt");
    debugTable("bindings", "table", [{ a: 1 }]);
    debugLog("gamepad", "ignored");
    expect(warn.mock.calls).toEqual([
      ["[DBG:bindings] rebuilt"],
      ["[DBG:bindings] table", [{ a: 1 }]],
    ]);
  });
});
