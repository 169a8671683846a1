import { LifeConfigError } from "../errors";
import type { LifeConfig } from "../types";

export const MIN_TICK_INTERVAL_MS = 16;
export const MAX_TICK_INTERVAL_MS = 2000;

/**
 * Default board configuration
 */
export const DEFAULT_LIFE_CONFIG: LifeConfig = {
  width: 48,
  height: 32,
  tickIntervalMs: 200,
  seed: { kind: "checkerboard" },
};

export const SPEED_PRESETS = [
  { name: "Slow", tickIntervalMs: 500 },
  { name: "Normal", tickIntervalMs: 200 },
  { name: "Fast", tickIntervalMs: 100 },
] as const;

export function validateTickInterval(intervalMs: number): number {
  if (
    !Number.isFinite(intervalMs) ||
    intervalMs < MIN_TICK_INTERVAL_MS ||
    intervalMs > MAX_TICK_INTERVAL_MS
  ) {
    throw new LifeConfigError(
      `Tick interval must be between ${MIN_TICK_INTERVAL_MS}ms and ${MAX_TICK_INTERVAL_MS}ms`,
      { tickIntervalMs: intervalMs }
    );
  }
  return intervalMs;
}

function validateDimension(name: "width" | "height", value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new LifeConfigError(`Grid ${name} must be a positive integer`, {
      [name]: value,
    });
  }
  return value;
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveLifeConfig(overrides: Partial<LifeConfig> = {}): LifeConfig {
  const config = { ...DEFAULT_LIFE_CONFIG, ...overrides };

  return {
    width: validateDimension("width", config.width),
    height: validateDimension("height", config.height),
    tickIntervalMs: validateTickInterval(config.tickIntervalMs),
    seed: config.seed,
  };
}
