import { describe, it, expect } from "@jest/globals";

import {
  isPointerControlActive,
  isPointerRisingEdge,
  pointerDelta,
  scrollDelta,
} from "../../src/device/pointer";
import { createPointerSnapshot } from "../../src/device/snapshots";

describe("pointer buttons", () => {
  const released = createPointerSnapshot();
  const leftDown = createPointerSnapshot({ buttons: { Left: true } });

  it("detects rising edge for a button", () => {
    expect(isPointerControlActive(leftDown, "Left")).toBe(true);
    expect(isPointerRisingEdge(released, leftDown, "Left")).toBe(true);
  });

  it("held button is pressed but not triggered", () => {
    expect(isPointerRisingEdge(leftDown, leftDown, "Left")).toBe(false);
  });

  it("buttons are independent", () => {
    expect(isPointerControlActive(leftDown, "Right")).toBe(false);
    expect(isPointerRisingEdge(released, leftDown, "Middle")).toBe(false);
  });
});

describe("pointer wheel", () => {
  const at100 = createPointerSnapshot({ wheel: 100 });
  const at80 = createPointerSnapshot({ wheel: 80 });

  it("wheel 100 → 80 triggers ScrollDown only", () => {
    expect(isPointerRisingEdge(at100, at80, "ScrollDown")).toBe(true);
    expect(isPointerRisingEdge(at100, at80, "ScrollUp")).toBe(false);
  });

  it("wheel 80 → 100 triggers ScrollUp only", () => {
    expect(isPointerRisingEdge(at80, at100, "ScrollUp")).toBe(true);
    expect(isPointerRisingEdge(at80, at100, "ScrollDown")).toBe(false);
  });

  it("unchanged wheel triggers nothing", () => {
    expect(isPointerRisingEdge(at80, at80, "ScrollUp")).toBe(false);
    expect(isPointerRisingEdge(at80, at80, "ScrollDown")).toBe(false);
  });

  it("wheel controls never read as pressed", () => {
    expect(isPointerControlActive(at100, "ScrollUp")).toBe(false);
    expect(isPointerControlActive(at100, "ScrollDown")).toBe(false);
  });

  it("reports scroll delta", () => {
    expect(scrollDelta(at100, at80)).toBe(-20);
  });
});

describe("pointerDelta", () => {
  it("is current minus previous position", () => {
    const a = createPointerSnapshot({ position: { x: 10, y: 20 } });
    const b = createPointerSnapshot({ position: { x: 7, y: 25 } });
    expect(pointerDelta(a, b)).toEqual({ x: -3, y: 5 });
  });
});
