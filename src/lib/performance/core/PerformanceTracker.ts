import { RollingAverage } from "./RollingAverage";

export interface PerformanceMetrics {
  fps: number;
  transition: number;
  redraw: number;
}

export type TimedSection = keyof Omit<PerformanceMetrics, "fps">;

export class PerformanceTracker {
  private fpsAverage = new RollingAverage();
  private transitionAverage = new RollingAverage();
  private redrawAverage = new RollingAverage();

  private timers = new Map<TimedSection, number>();
  private lastFrameTime: number | null = null;

  constructor(private readonly now: () => number = () => performance.now()) {}

  startTimer(name: TimedSection): void {
    this.timers.set(name, this.now());
  }

  /**
   * Stop a timer, record the sample, and return the elapsed milliseconds
   */
  endTimer(name: TimedSection): number {
    const startTime = this.timers.get(name);
    if (startTime === undefined) return 0;

    const elapsed = this.now() - startTime;
    this.timers.delete(name);

    if (name === "transition") {
      this.transitionAverage.addSample(elapsed);
    } else {
      this.redrawAverage.addSample(elapsed);
    }
    return elapsed;
  }

  recordFrame(time: number = this.now()): void {
    if (this.lastFrameTime !== null) {
      const deltaTime = (time - this.lastFrameTime) / 1000;
      if (deltaTime > 0) {
        this.fpsAverage.addSample(1 / deltaTime);
      }
    }
    this.lastFrameTime = time;
  }

  getMetrics(): PerformanceMetrics {
    return {
      fps: this.fpsAverage.get(),
      transition: this.transitionAverage.get(),
      redraw: this.redrawAverage.get(),
    };
  }

  clear(): void {
    this.fpsAverage.clear();
    this.transitionAverage.clear();
    this.redrawAverage.clear();
    this.timers.clear();
    this.lastFrameTime = null;
  }
}
