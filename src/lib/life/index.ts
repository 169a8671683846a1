// Core
export { LifeEngine, animationFrameScheduler } from "./core/LifeEngine";
export type { FrameScheduler, LifeEngineOptions } from "./core/LifeEngine";
export { Grid } from "./core/Grid";
export { GameMetadata } from "./core/GameMetadata";
export { RunStateMachine } from "./core/RunStateMachine";
export { SignalBus } from "./core/SignalBus";
export { TickScheduler } from "./core/TickScheduler";
export { MutationSurface } from "./core/MutationSurface";
export { countNeighbors, type NeighborCounts } from "./core/neighborCounter";
export {
  advanceGeneration,
  computeNextGeneration,
  nextCellState,
} from "./core/transitionEngine";
export {
  seedCells,
  seededRandom,
  type SeedPattern,
  type SeedPatternKind,
} from "./core/patterns";

// Renderers
export { renderBoardText, formatStatus, runStateLabel } from "./renderers/textRenderer";
export {
  drawBoard,
  CELL_THEMES,
  isCellThemeName,
  type CellTheme,
  type CellThemeName,
} from "./renderers/canvasRenderer";

// Input
export { commandForKey, describeKeyBindings, KEY_BINDINGS, type KeyPress } from "./input/keyBindings";
export { canvasContentBounds, clientToCell, type CanvasBounds } from "./input/canvasCoords";

// Configuration and Errors
export {
  DEFAULT_LIFE_CONFIG,
  SPEED_PRESETS,
  MIN_TICK_INTERVAL_MS,
  MAX_TICK_INTERVAL_MS,
  resolveLifeConfig,
  validateTickInterval,
} from "./config";
export {
  LifeError,
  GridBoundsError,
  LifeConfigError,
  LifeEngineError,
  ConsumerRegistrationError,
} from "./errors";

// Types
export type * from "./types";
