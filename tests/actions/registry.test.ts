import { describe, it, expect } from "@jest/globals";

import {
  ACTION_COUNT,
  ALL_LOGICAL_ACTIONS,
  actionAt,
  actionIndex,
  getActionName,
  isLogicalAction,
  type LogicalAction,
} from "../../src/actions/registry";

describe("logical action registry", () => {
  it("enumerates the actions in a fixed order", () => {
    expect(ACTION_COUNT).toBe(19);
    expect(ALL_LOGICAL_ACTIONS[0]).toBe("ExitGame");
    expect(ALL_LOGICAL_ACTIONS[ACTION_COUNT - 1]).toBe("ZoomIn");
    expect(actionIndex("Select1")).toBe(1);
    expect(actionIndex("ZoomOut")).toBe(17);
  });

  it("actionAt is the inverse of actionIndex", () => {
    ALL_LOGICAL_ACTIONS.forEach((action, i) => {
      expect(actionIndex(action)).toBe(i);
      expect(actionAt(i)).toBe(action);
    });
  });

  it("actionAt rejects out-of-range indices", () => {
    expect(() => actionAt(19)).toThrow("Invalid action index: 19");
    expect(() => actionAt(-1)).toThrow("Invalid action index: -1");
    expect(() => actionAt(1.5)).toThrow("Invalid action index: 1.5");
  });

  it.each<[LogicalAction, string]>([
    ["ExitGame", "Exit Game"],
    ["Select3", "Select Squad 3"],
    ["MoveTo", "Move To Cursor"],
    ["StatusItemPrev", "Previous Status Item"],
    ["ViewDown", "Move View Down"],
    ["ZoomIn", "Zoom In"],
  ])("%s is displayed as %s", (action, name) => {
    expect(getActionName(action)).toBe(name);
  });

  it("every action has a distinct non-empty name", () => {
    const names = ALL_LOGICAL_ACTIONS.map(getActionName);
    expect(new Set(names).size).toBe(ACTION_COUNT);
    expect(names.every((n) => n.length > 0)).toBe(true);
  });

  it("rejects values outside the enumeration", () => {
    const bogus: unknown = "Jump";
    expect(isLogicalAction(bogus)).toBe(false);
    expect(isLogicalAction("Chat")).toBe(true);
    // Simulates an untyped caller passing a foreign value
    const forged = JSON.parse('"Jump"') as LogicalAction;
    expect(() => getActionName(forged)).toThrow("Invalid action index: Jump");
    expect(() => actionIndex(forged)).toThrow("Unknown action: Jump");
  });
});
