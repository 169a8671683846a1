/**
 * Simulation clock, separate from the board contents
 */
export class GameMetadata {
  private count = 0;

  get iterations(): number {
    return this.count;
  }

  increment(): void {
    this.count++;
  }

  reset(): void {
    this.count = 0;
  }
}
