import { describe, expect, it } from "vitest";

import { canvasContentBounds, clientToCell } from "../src/lib/life/input/canvasCoords";
import { commandForKey, describeKeyBindings } from "../src/lib/life/input/keyBindings";

const press = (code: string, modifiers: Partial<Record<"ctrlKey" | "metaKey" | "altKey" | "shiftKey", boolean>> = {}) => ({
  code,
  ctrlKey: false,
  metaKey: false,
  altKey: false,
  shiftKey: false,
  ...modifiers,
});

describe("commandForKey", () => {
  it("maps the bound keys", () => {
    expect(commandForKey(press("Space"))).toBe("togglePause");
    expect(commandForKey(press("KeyC"))).toBe("clear");
    expect(commandForKey(press("KeyS"))).toBe("step");
  });

  it("ignores unbound keys and chords", () => {
    expect(commandForKey(press("KeyX"))).toBeNull();
    expect(commandForKey(press("KeyS", { ctrlKey: true }))).toBeNull();
    expect(commandForKey(press("KeyC", { metaKey: true }))).toBeNull();
  });
});

describe("describeKeyBindings", () => {
  it("lists each binding as key and action", () => {
    expect(describeKeyBindings()).toEqual([
      "Space: Pause or resume",
      "KeyC: Clear the board",
      "KeyS: Advance one generation while paused",
    ]);
  });
});

describe("clientToCell", () => {
  const bounds = { left: 10, top: 20, width: 100, height: 50 };
  const gridSize = { width: 10, height: 5 };

  it("maps points inside the canvas to cells", () => {
    expect(clientToCell(10, 20, bounds, gridSize)).toEqual({ col: 0, row: 0 });
    expect(clientToCell(60, 45, bounds, gridSize)).toEqual({ col: 5, row: 2 });
    expect(clientToCell(109.9, 69.9, bounds, gridSize)).toEqual({ col: 9, row: 4 });
  });

  it("returns null outside the canvas", () => {
    expect(clientToCell(110, 20, bounds, gridSize)).toBeNull();
    expect(clientToCell(5, 30, bounds, gridSize)).toBeNull();
    expect(clientToCell(50, 70, bounds, gridSize)).toBeNull();
  });

  it("returns null for a collapsed canvas", () => {
    expect(clientToCell(10, 20, { ...bounds, width: 0 }, gridSize)).toBeNull();
  });
});

describe("canvasContentBounds", () => {
  // A 576x384 drawing surface inside a 2px border
  const borderedCanvas = {
    clientLeft: 2,
    clientTop: 2,
    clientWidth: 576,
    clientHeight: 384,
    getBoundingClientRect: () => ({
      x: 0,
      y: 0,
      left: 0,
      top: 0,
      right: 580,
      bottom: 388,
      width: 580,
      height: 388,
      toJSON: () => ({}),
    }),
  };
  const gridSize = { width: 48, height: 32 };

  it("excludes the border from the bounds", () => {
    expect(canvasContentBounds(borderedCanvas)).toEqual({
      left: 2,
      top: 2,
      width: 576,
      height: 384,
    });
  });

  it("maps clicks to the cell drawn under the pointer", () => {
    const bounds = canvasContentBounds(borderedCanvas);

    // Content pixel (553, 100) lies in the 12px cell at column 46, row 8
    expect(clientToCell(555, 102, bounds, gridSize)).toEqual({ col: 46, row: 8 });
    expect(clientToCell(2, 2, bounds, gridSize)).toEqual({ col: 0, row: 0 });
    expect(clientToCell(577.9, 385.9, bounds, gridSize)).toEqual({ col: 47, row: 31 });
  });

  it("ignores clicks on the border", () => {
    const bounds = canvasContentBounds(borderedCanvas);

    expect(clientToCell(1, 100, bounds, gridSize)).toBeNull();
    expect(clientToCell(579, 100, bounds, gridSize)).toBeNull();
  });
});
