import { LifeConfigError } from "../errors";
import type { CellCoord } from "../types";
import { Array2D } from "../utils/Array2D";

export type SeedPattern =
  | { kind: "checkerboard" }
  | { kind: "empty" }
  | { kind: "blinker" }
  | { kind: "glider" }
  | { kind: "random"; seed: number; density: number }
  | { kind: "cells"; cells: readonly CellCoord[] };

export type SeedPatternKind = SeedPattern["kind"];

// Shapes are listed relative to their top-left corner
const SHAPES: Record<"blinker" | "glider", readonly CellCoord[]> = {
  blinker: [
    { col: 0, row: 0 },
    { col: 0, row: 1 },
    { col: 0, row: 2 },
  ],
  glider: [
    { col: 1, row: 0 },
    { col: 2, row: 1 },
    { col: 0, row: 2 },
    { col: 1, row: 2 },
    { col: 2, row: 2 },
  ],
};

/**
 * Linear congruential generator so random boards are reproducible
 */
export function seededRandom(seed: number): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) & 0xffffffff;
    return (s >>> 0) / 0xffffffff;
  };
}

function placeCells(
  cells: Array2D<boolean>,
  coords: readonly CellCoord[],
  offset: CellCoord
): void {
  for (const { col, row } of coords) {
    const target = { col: col + offset.col, row: row + offset.row };
    if (!cells.inBounds(target.col, target.row)) {
      throw new LifeConfigError(
        `Seed cell (${target.col}, ${target.row}) does not fit a ${cells.width}x${cells.height} board`,
        { ...target, width: cells.width, height: cells.height }
      );
    }
    cells.set(target.col, target.row, true);
  }
}

function centredOffset(
  shape: readonly CellCoord[],
  width: number,
  height: number
): CellCoord {
  const shapeWidth = Math.max(...shape.map((c) => c.col)) + 1;
  const shapeHeight = Math.max(...shape.map((c) => c.row)) + 1;
  return {
    col: Math.floor((width - shapeWidth) / 2),
    row: Math.floor((height - shapeHeight) / 2),
  };
}

/**
 * Build the initial liveness array for a board
 */
export function seedCells(
  pattern: SeedPattern,
  width: number,
  height: number
): Array2D<boolean> {
  const cells = new Array2D(width, height, false);

  switch (pattern.kind) {
    case "empty":
      break;
    case "checkerboard":
      cells.forEach((_, col, row) => {
        if ((col + row) % 2 === 0) cells.set(col, row, true);
      });
      break;
    case "blinker":
    case "glider": {
      const shape = SHAPES[pattern.kind];
      placeCells(cells, shape, centredOffset(shape, width, height));
      break;
    }
    case "random": {
      if (!(pattern.density > 0 && pattern.density <= 1)) {
        throw new LifeConfigError("Random seed density must be in (0, 1]", {
          density: pattern.density,
        });
      }
      const random = seededRandom(pattern.seed);
      cells.forEach((_, col, row) => {
        if (random() < pattern.density) cells.set(col, row, true);
      });
      break;
    }
    case "cells":
      placeCells(cells, pattern.cells, { col: 0, row: 0 });
      break;
  }

  return cells;
}
