import { validateTickInterval } from "../config";
import type { LifeLogger } from "../types";
import type { RunStateMachine } from "./RunStateMachine";
import type { SignalBus } from "./SignalBus";

export interface TickSchedulerDeps {
  runState: RunStateMachine;
  signals: SignalBus;
  logger: LifeLogger;
}

/**
 * Decides when a generation advance is requested: on a fixed cadence while
 * running, or once per step request while paused.
 */
export class TickScheduler {
  private intervalMs: number;
  private lastAdvanceTime: number | null = null;
  private readonly deps: TickSchedulerDeps;

  constructor(intervalMs: number, deps: TickSchedulerDeps) {
    this.intervalMs = validateTickInterval(intervalMs);
    this.deps = deps;
  }

  get tickIntervalMs(): number {
    return this.intervalMs;
  }

  setTickInterval(intervalMs: number): void {
    this.intervalMs = validateTickInterval(intervalMs);
  }

  /**
   * Cadence check for one cycle. Returns true when an advance was raised.
   */
  tick(now: number): boolean {
    if (!this.deps.runState.isRunning) {
      this.lastAdvanceTime = null;
      return false;
    }

    // First running cycle after start or resume sets the baseline
    if (this.lastAdvanceTime === null) {
      this.lastAdvanceTime = now;
      return false;
    }

    if (now - this.lastAdvanceTime < this.intervalMs) {
      return false;
    }

    this.lastAdvanceTime = now;
    this.deps.signals.raise("boardNeedsAdvance");
    return true;
  }

  /**
   * Request exactly one advance while paused
   */
  requestStep(): boolean {
    if (this.deps.runState.isRunning) {
      this.deps.logger.warn(
        "Step ignored: the simulation is running and advances on its own cadence"
      );
      return false;
    }

    this.deps.signals.raise("boardNeedsAdvance");
    return true;
  }
}
