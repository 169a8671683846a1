import type { SeedPattern } from "../core/patterns";

export interface CellCoord {
  col: number;
  row: number;
}

export type RunState = "running" | "paused";

/**
 * Dirty flags raised by producers and drained by exactly one consumer per cycle
 */
export type LifeSignal =
  | "boardNeedsAdvance"
  | "boardNeedsRedraw"
  | "statusNeedsRedraw";

/** Signals that a render collaborator may consume */
export type RenderSignal = Exclude<LifeSignal, "boardNeedsAdvance">;

export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  readonly aliveCount: number;
  inBounds(col: number, row: number): boolean;
  isAlive(col: number, row: number): boolean;
  forEachCell(callback: (alive: boolean, col: number, row: number) => void): void;
  aliveCells(): CellCoord[];
}

/**
 * Read-only state handed to render consumers
 */
export interface LifeView {
  grid: ReadonlyGrid;
  iterations: number;
  runState: RunState;
  pendingRunState: RunState;
}

export type RenderConsumer = (view: LifeView) => void;

export type LifeInputEvent =
  | { type: "toggleCell"; col: number; row: number }
  | { type: "togglePause" }
  | { type: "clear" }
  | { type: "step" };

export type LifeCommand = Exclude<LifeInputEvent, { type: "toggleCell" }>["type"];

export interface LifeConfig {
  width: number;
  height: number;
  tickIntervalMs: number;
  seed: SeedPattern;
}

export type LifeLogger = Pick<Console, "info" | "warn" | "error">;
