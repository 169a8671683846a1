import type { Grid } from "./Grid";
import type { SignalBus } from "./SignalBus";

/**
 * The edits user input may make to the board. Each one flags a redraw.
 */
export class MutationSurface {
  constructor(
    private readonly grid: Grid,
    private readonly signals: SignalBus
  ) {}

  toggle(col: number, row: number): boolean {
    const alive = this.grid.toggle(col, row);
    this.signals.raiseRedraw();
    return alive;
  }

  /**
   * Kill every cell. The iteration counter is left alone.
   */
  clear(): void {
    this.grid.clear();
    this.signals.raiseRedraw();
  }
}
