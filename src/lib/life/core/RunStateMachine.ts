import type { RunState } from "../types";

/**
 * Running/Paused with a deferred transition.
 *
 * `toggle()` only changes the pending slot. The pending value becomes the
 * effective one when `applyPending()` runs at the start of the next cycle.
 */
export class RunStateMachine {
  private currentState: RunState;
  private pendingState: RunState;

  constructor(initial: RunState = "running") {
    this.currentState = initial;
    this.pendingState = initial;
  }

  /** State used for gating during the current cycle */
  get current(): RunState {
    return this.currentState;
  }

  /** State that will hold once the next cycle starts */
  get pending(): RunState {
    return this.pendingState;
  }

  get isRunning(): boolean {
    return this.currentState === "running";
  }

  toggle(): RunState {
    this.pendingState = this.pendingState === "running" ? "paused" : "running";
    return this.pendingState;
  }

  /**
   * Make the pending state effective. Returns true when the state changed.
   */
  applyPending(): boolean {
    const changed = this.currentState !== this.pendingState;
    this.currentState = this.pendingState;
    return changed;
  }
}
