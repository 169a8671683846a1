import type { LifeSignal } from "../types";

/**
 * Presence flags for pending work. Raising twice before a drain is the same
 * as raising once; draining always clears the flag.
 */
export class SignalBus {
  private flags: Record<LifeSignal, boolean> = {
    boardNeedsAdvance: false,
    boardNeedsRedraw: false,
    statusNeedsRedraw: false,
  };

  raise(signal: LifeSignal): void {
    this.flags[signal] = true;
  }

  isRaised(signal: LifeSignal): boolean {
    return this.flags[signal];
  }

  /**
   * Clear the flag and report whether it was raised
   */
  drain(signal: LifeSignal): boolean {
    const raised = this.flags[signal];
    this.flags[signal] = false;
    return raised;
  }

  raiseRedraw(): void {
    this.raise("boardNeedsRedraw");
    this.raise("statusNeedsRedraw");
  }
}
