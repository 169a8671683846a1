import type { ReadonlyGrid } from "../types";
import { Array2D } from "../utils/Array2D";
import type { GameMetadata } from "./GameMetadata";
import type { Grid } from "./Grid";
import { countNeighbors, type NeighborCounts } from "./neighborCounter";
import type { SignalBus } from "./SignalBus";

export interface TransitionContext {
  grid: Grid;
  metadata: GameMetadata;
  signals: SignalBus;
}

/**
 * B3/S23: a live cell survives with 2 or 3 neighbors, a dead cell is born with 3
 */
export function nextCellState(alive: boolean, liveNeighbors: number): boolean {
  if (alive) {
    return liveNeighbors === 2 || liveNeighbors === 3;
  }
  return liveNeighbors === 3;
}

/**
 * Compute the next generation from the previous generation's counts
 */
export function computeNextGeneration(
  grid: ReadonlyGrid,
  counts: NeighborCounts
): Array2D<boolean> {
  return counts.map((liveNeighbors, col, row) =>
    nextCellState(grid.isAlive(col, row), liveNeighbors)
  );
}

/**
 * Advance one generation if an advance was requested.
 *
 * Neighbor counts are built in full from the current board before any cell
 * is written. Returns false and leaves everything untouched when no advance
 * was pending.
 */
export function advanceGeneration({
  grid,
  metadata,
  signals,
}: TransitionContext): boolean {
  if (!signals.drain("boardNeedsAdvance")) {
    return false;
  }

  const counts = countNeighbors(grid);
  grid.replaceCells(computeNextGeneration(grid, counts));
  metadata.increment();
  signals.raiseRedraw();
  return true;
}
