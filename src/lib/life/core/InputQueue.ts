/**
 * Buffers decoded input events until the engine takes them at the start of a cycle
 */
export class InputQueue<T> {
  private pendingEvents: T[] = [];

  enqueue(event: T): void {
    this.pendingEvents.push(event);
  }

  /**
   * Take the oldest buffered event, leaving the rest queued
   */
  next(): T | undefined {
    return this.pendingEvents.shift();
  }

  clear(): void {
    this.pendingEvents = [];
  }
}
