import type { PerformanceTracker } from "@/lib/performance";
import { resolveLifeConfig } from "../config";
import { ConsumerRegistrationError, LifeEngineError } from "../errors";
import type {
  LifeConfig,
  LifeInputEvent,
  LifeLogger,
  LifeView,
  RenderConsumer,
  RenderSignal,
} from "../types";
import { GameMetadata } from "./GameMetadata";
import { Grid } from "./Grid";
import { InputQueue } from "./InputQueue";
import { MutationSurface } from "./MutationSurface";
import { RunStateMachine } from "./RunStateMachine";
import { SignalBus } from "./SignalBus";
import { TickScheduler } from "./TickScheduler";
import { advanceGeneration } from "./transitionEngine";

export interface FrameScheduler {
  request(callback: (time: number) => void): number;
  cancel(id: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (id) => cancelAnimationFrame(id),
};

export interface LifeEngineOptions {
  logger?: LifeLogger;
  frameScheduler?: FrameScheduler;
  performance?: PerformanceTracker;
}

/**
 * Owns the simulation state and runs it one frame at a time.
 *
 * Each `runCycle` executes the same linear schedule: apply the pending run
 * state, drain input, check the cadence, advance a generation, then hand the
 * redraw signals to their consumers. Producers always finish before the
 * consumer of their signal runs, so a change made early in a frame is drawn
 * in that same frame.
 */
export class LifeEngine {
  readonly config: LifeConfig;
  readonly grid: Grid;
  readonly metadata = new GameMetadata();
  readonly runState = new RunStateMachine("running");
  readonly signals = new SignalBus();
  readonly scheduler: TickScheduler;
  readonly mutations: MutationSurface;

  private readonly input = new InputQueue<LifeInputEvent>();
  private readonly consumers: Partial<Record<RenderSignal, RenderConsumer>> = {};
  private readonly logger: LifeLogger;
  private readonly frames: FrameScheduler;
  private readonly performance?: PerformanceTracker;

  private animationId: number | null = null;
  private looping = false;
  private destroyed = false;

  constructor(config: Partial<LifeConfig> = {}, options: LifeEngineOptions = {}) {
    this.config = resolveLifeConfig(config);
    this.logger = options.logger ?? console;
    this.frames = options.frameScheduler ?? animationFrameScheduler;
    this.performance = options.performance;

    this.grid = new Grid(this.config.width, this.config.height, this.config.seed);
    this.mutations = new MutationSurface(this.grid, this.signals);
    this.scheduler = new TickScheduler(this.config.tickIntervalMs, {
      runState: this.runState,
      signals: this.signals,
      logger: this.logger,
    });

    // The first frame paints the seed
    this.signals.raiseRedraw();
  }

  get view(): LifeView {
    return {
      grid: this.grid,
      iterations: this.metadata.iterations,
      runState: this.runState.current,
      pendingRunState: this.runState.pending,
    };
  }

  enqueue(event: LifeInputEvent): void {
    this.assertUsable("enqueue input on");
    this.input.enqueue(event);
  }

  /**
   * Register the single consumer of a redraw signal. Returns an unregister function.
   */
  registerConsumer(signal: RenderSignal, consumer: RenderConsumer): () => void {
    if (signal !== "boardNeedsRedraw" && signal !== "statusNeedsRedraw") {
      throw new ConsumerRegistrationError(
        `Signal "${String(signal)}" is consumed by the engine itself`,
        "SIGNAL_NOT_CONSUMABLE",
        { signal }
      );
    }

    if (this.consumers[signal]) {
      throw new ConsumerRegistrationError(
        `Signal "${signal}" already has a consumer`,
        "CONSUMER_ALREADY_REGISTERED",
        { signal }
      );
    }

    this.consumers[signal] = consumer;
    // A late consumer still needs an initial paint
    this.signals.raise(signal);

    return () => {
      if (this.consumers[signal] === consumer) {
        delete this.consumers[signal];
      }
    };
  }

  setTickInterval(intervalMs: number): void {
    this.scheduler.setTickInterval(intervalMs);
  }

  /**
   * Ask for a repaint without touching the board, e.g. after a theme change
   */
  requestRedraw(): void {
    this.signals.raise("boardNeedsRedraw");
  }

  /**
   * Run one frame of the schedule
   */
  runCycle(now: number): void {
    this.assertUsable("run a cycle on");
    this.performance?.recordFrame(now);

    if (this.runState.applyPending()) {
      this.logger.info(`Simulation ${this.runState.current}`);
    }

    let event = this.input.next();
    while (event) {
      this.handleInput(event);
      // One generation per step; later input waits for the next cycle
      if (event.type === "step" && this.signals.isRaised("boardNeedsAdvance")) {
        break;
      }
      event = this.input.next();
    }

    this.scheduler.tick(now);

    this.performance?.startTimer("transition");
    const advanced = advanceGeneration({
      grid: this.grid,
      metadata: this.metadata,
      signals: this.signals,
    });
    if (advanced) {
      this.performance?.endTimer("transition");
    }

    this.performance?.startTimer("redraw");
    const redrawn = this.dispatch("boardNeedsRedraw");
    if (redrawn) {
      this.performance?.endTimer("redraw");
    }

    this.dispatch("statusNeedsRedraw");
  }

  start(): void {
    this.assertUsable("start");

    if (this.looping) {
      return;
    }

    this.looping = true;
    this.animationId = this.frames.request(this.animate);
  }

  stop(): void {
    this.looping = false;
    if (this.animationId !== null) {
      this.frames.cancel(this.animationId);
      this.animationId = null;
    }
  }

  isLooping(): boolean {
    return this.looping && !this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }

    this.stop();
    this.destroyed = true;
    this.input.clear();
    this.consumers.boardNeedsRedraw = undefined;
    this.consumers.statusNeedsRedraw = undefined;
  }

  private animate = (time: number): void => {
    if (!this.looping || this.destroyed) {
      return;
    }

    try {
      this.runCycle(time);
    } catch (err) {
      this.logger.error("Error during simulation cycle:", err);
      this.stop();
      return;
    }

    if (this.looping && !this.destroyed) {
      this.animationId = this.frames.request(this.animate);
    }
  };

  private handleInput(event: LifeInputEvent): void {
    switch (event.type) {
      case "toggleCell":
        this.mutations.toggle(event.col, event.row);
        break;
      case "clear":
        this.mutations.clear();
        break;
      case "togglePause":
        this.runState.toggle();
        this.signals.raise("statusNeedsRedraw");
        break;
      case "step":
        this.scheduler.requestStep();
        break;
    }
  }

  /**
   * Drain a redraw signal and call its consumer if it was raised
   */
  private dispatch(signal: RenderSignal): boolean {
    if (!this.signals.drain(signal)) {
      return false;
    }

    const consumer = this.consumers[signal];
    if (!consumer) {
      return false;
    }

    consumer(this.view);
    return true;
  }

  private assertUsable(action: string): void {
    if (this.destroyed) {
      throw new LifeEngineError(
        `Cannot ${action} a destroyed engine. Create a new instance.`,
        "ENGINE_DESTROYED"
      );
    }
  }
}
