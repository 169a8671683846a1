import { LifeEngineError } from "../errors";
import type { CellCoord, ReadonlyGrid } from "../types";
import { Array2D } from "../utils/Array2D";
import { seedCells, type SeedPattern } from "./patterns";

/**
 * Board state: cell liveness plus a cached alive count.
 *
 * Every mutator keeps `aliveCount` equal to the number of live cells, so
 * reads never rescan the board. Renderers only see the `ReadonlyGrid` side;
 * writes go through the mutation surface and the transition engine.
 */
export class Grid implements ReadonlyGrid {
  private cells: Array2D<boolean>;
  private alive: number;

  constructor(width: number, height: number, seed: SeedPattern = { kind: "empty" }) {
    this.cells = seedCells(seed, width, height);
    this.alive = Grid.countAlive(this.cells);
  }

  static fromCells(width: number, height: number, cells: readonly CellCoord[]): Grid {
    return new Grid(width, height, { kind: "cells", cells });
  }

  get width(): number {
    return this.cells.width;
  }

  get height(): number {
    return this.cells.height;
  }

  get aliveCount(): number {
    return this.alive;
  }

  inBounds(col: number, row: number): boolean {
    return this.cells.inBounds(col, row);
  }

  isAlive(col: number, row: number): boolean {
    return this.cells.get(col, row);
  }

  /**
   * Flip a cell and return its new state
   */
  toggle(col: number, row: number): boolean {
    const next = !this.cells.get(col, row);
    this.cells.set(col, row, next);
    this.alive += next ? 1 : -1;
    return next;
  }

  clear(): void {
    this.cells.fill(false);
    this.alive = 0;
  }

  /**
   * Overwrite every cell with the next generation
   */
  replaceCells(next: Array2D<boolean>): void {
    if (next.width !== this.width || next.height !== this.height) {
      throw new LifeEngineError(
        `Generation is ${next.width}x${next.height} but the grid is ${this.width}x${this.height}`,
        "ENGINE_STATE"
      );
    }
    this.cells = next.clone();
    this.alive = Grid.countAlive(this.cells);
  }

  forEachCell(callback: (alive: boolean, col: number, row: number) => void): void {
    this.cells.forEach((alive, col, row) => callback(alive, col, row));
  }

  aliveCells(): CellCoord[] {
    const result: CellCoord[] = [];
    this.cells.forEach((alive, col, row) => {
      if (alive) result.push({ col, row });
    });
    return result;
  }

  /**
   * Copy of the current liveness values
   */
  snapshot(): Array2D<boolean> {
    return this.cells.clone();
  }

  private static countAlive(cells: Array2D<boolean>): number {
    let count = 0;
    cells.forEach((alive) => {
      if (alive) count++;
    });
    return count;
  }
}
