import { GridBoundsError, LifeConfigError } from "../errors";

/**
 * Fixed-size 2D array stored row-major in a flat array
 */
export class Array2D<T> {
  private data: T[];
  public readonly width: number;
  public readonly height: number;

  constructor(width: number, height: number, initialValue: T) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new LifeConfigError(
        `Dimensions must be positive integers, got ${width}x${height}`,
        { width, height }
      );
    }

    this.width = width;
    this.height = height;
    this.data = new Array<T>(width * height).fill(initialValue);
  }

  /**
   * Create Array2D from a flat row-major array
   */
  static fromArray<T>(data: readonly T[], width: number, height: number): Array2D<T> {
    if (data.length !== width * height) {
      throw new LifeConfigError(
        `Data length ${data.length} does not match dimensions ${width}x${height}`,
        { length: data.length, width, height }
      );
    }

    const array2D = new Array2D<T>(width, height, data[0]);
    array2D.data = [...data];
    return array2D;
  }

  inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  get(x: number, y: number): T {
    return this.data[this.indexOf(x, y)];
  }

  set(x: number, y: number, value: T): void {
    this.data[this.indexOf(x, y)] = value;
  }

  /**
   * Iterate over all values with their coordinates, row by row
   */
  forEach(
    callback: (value: T, x: number, y: number, index: number) => void
  ): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const index = y * this.width + x;
        callback(this.data[index], x, y, index);
      }
    }
  }

  map<U>(
    callback: (value: T, x: number, y: number, index: number) => U
  ): Array2D<U> {
    const mapped: U[] = [];
    this.forEach((value, x, y, index) => {
      mapped.push(callback(value, x, y, index));
    });
    return Array2D.fromArray(mapped, this.width, this.height);
  }

  fill(value: T): void {
    this.data.fill(value);
  }

  clone(): Array2D<T> {
    return Array2D.fromArray(this.data, this.width, this.height);
  }

  toArray(): T[] {
    return [...this.data];
  }

  private indexOf(x: number, y: number): number {
    if (!this.inBounds(x, y)) {
      throw new GridBoundsError(x, y, this.width, this.height);
    }
    return y * this.width + x;
  }
}
