/**
 * Mean of the last `maxSamples` values, kept with a running sum
 */
export class RollingAverage {
  private samples: number[] = [];
  private sum = 0;

  constructor(private readonly maxSamples = 60) {}

  addSample(value: number): void {
    if (value < 0 || !Number.isFinite(value)) return;

    this.samples.push(value);
    this.sum += value;
    if (this.samples.length > this.maxSamples) {
      this.sum -= this.samples.shift() ?? 0;
    }
  }

  get(): number {
    return this.samples.length === 0 ? 0 : this.sum / this.samples.length;
  }

  clear(): void {
    this.samples = [];
    this.sum = 0;
  }
}
