import { describe, expect, it } from "vitest";

import { Grid } from "../src/lib/life/core/Grid";
import { countNeighbors } from "../src/lib/life/core/neighborCounter";
import type { CellCoord } from "../src/lib/life/types";

const VERTICAL_BLINKER = [
  { col: 1, row: 0 },
  { col: 1, row: 1 },
  { col: 1, row: 2 },
];

describe("countNeighbors", () => {
  it("counts only the three in-bounds neighbors of a corner", () => {
    const cells: CellCoord[] = [];
    for (let row = 0; row < 3; row++) {
      for (let col = 0; col < 3; col++) {
        if (col !== 0 || row !== 0) cells.push({ col, row });
      }
    }
    const counts = countNeighbors(Grid.fromCells(3, 3, cells));

    expect(counts.get(0, 0)).toBe(3);
    expect(counts.get(1, 1)).toBe(7);
    expect(counts.get(2, 2)).toBe(3);
  });

  it("does not wrap around the edges", () => {
    const counts = countNeighbors(Grid.fromCells(3, 3, [{ col: 2, row: 1 }]));

    expect(counts.get(0, 1)).toBe(0);
    expect(counts.get(1, 1)).toBe(1);
    expect(counts.get(2, 1)).toBe(0);
  });

  it("counts around a vertical blinker", () => {
    const counts = countNeighbors(Grid.fromCells(5, 5, VERTICAL_BLINKER));

    expect(counts.get(0, 1)).toBe(3);
    expect(counts.get(2, 1)).toBe(3);
    expect(counts.get(1, 1)).toBe(2);
    expect(counts.get(1, 0)).toBe(1);
    expect(counts.get(1, 3)).toBe(1);
    expect(counts.get(4, 4)).toBe(0);
  });

  it("matches the grid dimensions", () => {
    const counts = countNeighbors(new Grid(7, 2));

    expect(counts.width).toBe(7);
    expect(counts.height).toBe(2);
  });

  it("leaves the grid untouched", () => {
    const grid = Grid.fromCells(5, 5, VERTICAL_BLINKER);
    countNeighbors(grid);

    expect(grid.aliveCells()).toEqual(VERTICAL_BLINKER);
  });
});
