import { describe, expect, it } from "vitest";

import { Grid } from "../src/lib/life/core/Grid";
import { CELL_THEMES, drawBoard, isCellThemeName } from "../src/lib/life/renderers/canvasRenderer";
import { formatStatus, renderBoardText } from "../src/lib/life/renderers/textRenderer";

describe("renderBoardText", () => {
  it("renders one line per row", () => {
    const grid = Grid.fromCells(3, 2, [
      { col: 0, row: 0 },
      { col: 2, row: 1 },
    ]);

    expect(renderBoardText(grid)).toBe("#..\n..#");
  });

  it("accepts custom glyphs", () => {
    const grid = Grid.fromCells(2, 1, [{ col: 1, row: 0 }]);

    expect(renderBoardText(grid, { alive: "o", dead: " " })).toBe(" o");
  });
});

describe("formatStatus", () => {
  it("reports the pending run state with the counters", () => {
    const grid = Grid.fromCells(3, 3, [
      { col: 0, row: 0 },
      { col: 1, row: 1 },
    ]);

    expect(
      formatStatus({ grid, iterations: 3, runState: "running", pendingRunState: "paused" })
    ).toBe("Paused · Iteration 3 · Alive 2");
  });
});

type Painter = Parameters<typeof drawBoard>[0];

function recordingContext() {
  const calls: Array<[string, number, number, number, number]> = [];
  const ctx: Painter = {
    fillStyle: "",
    fillRect(x: number, y: number, w: number, h: number) {
      calls.push([String(ctx.fillStyle), x, y, w, h]);
    },
  };
  return { ctx, calls };
}

describe("drawBoard", () => {
  it("fills the background then each cell with a one pixel gap", () => {
    const { ctx, calls } = recordingContext();
    const grid = Grid.fromCells(2, 1, [{ col: 0, row: 0 }]);
    const theme = CELL_THEMES.ocean;

    drawBoard(ctx, grid, { width: 20, height: 10 }, theme);

    expect(calls).toEqual([
      [theme.gridLine, 0, 0, 20, 10],
      [theme.alive, 0, 0, 9, 9],
      [theme.dead, 10, 0, 9, 9],
    ]);
  });

  it("drops the gap when cells are tiny", () => {
    const { ctx, calls } = recordingContext();

    drawBoard(ctx, new Grid(4, 4), { width: 8, height: 8 });

    expect(calls[1]).toEqual([CELL_THEMES.classic.dead, 0, 0, 2, 2]);
  });
});

describe("isCellThemeName", () => {
  it("recognises the shipped themes only", () => {
    expect(isCellThemeName("ember")).toBe(true);
    expect(isCellThemeName("neon")).toBe(false);
    expect(isCellThemeName("toString")).toBe(false);
  });
});
