import type { ReadonlyGrid } from "../types";
import { Array2D } from "../utils/Array2D";

export type NeighborCounts = Array2D<number>;

const MOORE_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
];

/**
 * Count live Moore neighbors for every cell.
 * Edges do not wrap: neighbors outside the board count as dead.
 */
export function countNeighbors(grid: ReadonlyGrid): NeighborCounts {
  const counts = new Array2D(grid.width, grid.height, 0);

  grid.forEachCell((_, col, row) => {
    let count = 0;
    for (const [dx, dy] of MOORE_OFFSETS) {
      const neighborCol = col + dx;
      const neighborRow = row + dy;
      if (
        neighborCol >= 0 &&
        neighborCol < grid.width &&
        neighborRow >= 0 &&
        neighborRow < grid.height &&
        grid.isAlive(neighborCol, neighborRow)
      ) {
        count++;
      }
    }
    counts.set(col, row, count);
  });

  return counts;
}
