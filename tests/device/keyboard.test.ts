import { describe, it, expect } from "@jest/globals";

import { isKeyDown, isKeyRisingEdge } from "../../src/device/keyboard";
import { createKeyboardSnapshot } from "../../src/device/snapshots";

const up = createKeyboardSnapshot();
const down = createKeyboardSnapshot(["KeyA"]);

describe("keyboard predicates", () => {
  it("up → down: pressed and triggered", () => {
    expect(isKeyDown(down, "KeyA")).toBe(true);
    expect(isKeyRisingEdge(up, down, "KeyA")).toBe(true);
  });

  it("down → down: pressed, not triggered", () => {
    expect(isKeyDown(down, "KeyA")).toBe(true);
    expect(isKeyRisingEdge(down, down, "KeyA")).toBe(false);
  });

  it("up → up: neither pressed nor triggered", () => {
    expect(isKeyDown(up, "KeyA")).toBe(false);
    expect(isKeyRisingEdge(up, up, "KeyA")).toBe(false);
  });

  it("down → up: falling edge is not reported", () => {
    expect(isKeyDown(up, "KeyA")).toBe(false);
    expect(isKeyRisingEdge(down, up, "KeyA")).toBe(false);
  });

  it("only the queried key matters", () => {
    const other = createKeyboardSnapshot(["KeyB"]);
    expect(isKeyRisingEdge(up, other, "KeyA")).toBe(false);
    expect(isKeyRisingEdge(up, other, "KeyB")).toBe(true);
  });
});
