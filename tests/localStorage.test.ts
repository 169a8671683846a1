// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  DEFAULT_PREFERENCES,
  isLifePreferences,
  PREFERENCES_KEY,
} from "../src/components/preferences";
import { LocalStorageUtils } from "../src/utils/localStorage.utils";

describe("LocalStorageUtils", () => {
  afterEach(() => {
    localStorage.clear();
    vi.restoreAllMocks();
  });

  it("round-trips validated preferences", () => {
    LocalStorageUtils.save(PREFERENCES_KEY, { tickIntervalMs: 100, theme: "ember" });

    expect(
LocalStorageUtils.load(PREFERENCES_KEY, DEFAULT_PREFERENCES, isLifePreferences)
    ).toEqual({ tickIntervalMs: 100, theme: "ember" });
  });

  it("falls back to the default for a missing key", () => {
    expect(LocalStorageUtils.load("missing", 7, (v): v is number => typeof v === "number")).toBe(7);
  });

  it("falls back to the default and warns on invalid data", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    localStorage.setItem(PREFERENCES_KEY, JSON.stringify({ tickIntervalMs: 1, theme: "ocean" }));

    const loaded = LocalStorageUtils.load(PREFERENCES_KEY, DEFAULT_PREFERENCES, isLifePreferences);

    expect(loaded).toEqual({ tickIntervalMs: 200, theme: "classic" });
    expect(warn).toHaveBeenCalledWith(`Ignoring invalid stored value for key "${PREFERENCES_KEY}"`);
  });

  it("falls back to the default for a speed the picker does not offer", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    localStorage.setItem(PREFERENCES_KEY, JSON.stringify({ tickIntervalMs: 300, theme: "ember" }));

    expect(
      LocalStorageUtils.load(PREFERENCES_KEY, DEFAULT_PREFERENCES, isLifePreferences)
    ).toEqual({ tickIntervalMs: 200, theme: "classic" });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to the default on unparsable JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    localStorage.setItem(PREFERENCES_KEY, "{not json");

    expect(
      LocalStorageUtils.load(PREFERENCES_KEY, DEFAULT_PREFERENCES, isLifePreferences)
    ).toEqual({ tickIntervalMs: 200, theme: "classic" });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
