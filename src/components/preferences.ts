import {
  DEFAULT_LIFE_CONFIG,
  isCellThemeName,
  SPEED_PRESETS,
  type CellThemeName,
} from "@/lib/life";

export const PREFERENCES_KEY = "life-lab:preferences";

/**
 * Viewer settings kept between visits. Board contents are never stored.
 */
export interface LifePreferences {
  tickIntervalMs: number;
  theme: CellThemeName;
}

export const DEFAULT_PREFERENCES: LifePreferences = {
  tickIntervalMs: DEFAULT_LIFE_CONFIG.tickIntervalMs,
  theme: "classic",
};

// Stored speeds must be one of the picker's presets
function isPresetInterval(value: unknown): boolean {
  return SPEED_PRESETS.some((preset) => preset.tickIntervalMs === value);
}

export function isLifePreferences(value: unknown): value is LifePreferences {
  if (typeof value !== "object" || value === null) return false;
  const theme: unknown = Reflect.get(value, "theme");
  return (
    isPresetInterval(Reflect.get(value, "tickIntervalMs")) &&
    typeof theme === "string" &&
    isCellThemeName(theme)
  );
}
