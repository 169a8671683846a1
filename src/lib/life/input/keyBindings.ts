import type { LifeCommand } from "../types";

export const KEY_BINDINGS: Record<string, LifeCommand> = {
  Space: "togglePause",
  KeyC: "clear",
  KeyS: "step",
};

const COMMAND_LABELS: Record<LifeCommand, string> = {
  togglePause: "Pause or resume",
  clear: "Clear the board",
  step: "Advance one generation while paused",
};

export interface KeyPress {
  code: string;
  ctrlKey: boolean;
  metaKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
}

/**
 * Map a key press to a simulation command. Chords are left to the browser.
 */
export function commandForKey(press: KeyPress): LifeCommand | null {
  if (press.ctrlKey || press.metaKey || press.altKey || press.shiftKey) {
    return null;
  }
  return KEY_BINDINGS[press.code] ?? null;
}

/**
 * One "Key: action" line per binding, for help text
 */
export function describeKeyBindings(): string[] {
  return Object.entries(KEY_BINDINGS).map(
    ([code, command]) => `${code}: ${COMMAND_LABELS[command]}`
  );
}
