/**
 * Bounded FIFO between one producer and one consumer.
 *
 * A full channel makes `push` wait for space up to a timeout and then report
 * 'would-block' instead of throwing, so the producer can check for a stop
 * request and retry. `pop` waits until an item arrives.
 */

export type PushResult = 'accepted' | 'would-block';

export class BoundedChannel<T> {
  private items: T[] = [];
  private poppers: ((item: T) => void)[] = [];
  private spaceWaiters = new Set<() => void>();

  constructor(readonly capacity: number = 100) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Enqueue without waiting. Returns false when the channel is full.
   */
  tryPush(item: T): boolean {
    const popper = this.poppers.shift();
    if (popper) {
      popper(item);
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Enqueue, waiting at most `timeoutMs` for space.
   */
  async push(item: T, timeoutMs: number): Promise<PushResult> {
    if (this.tryPush(item)) return 'accepted';
    await this.waitForSpace(timeoutMs);
    return this.tryPush(item) ? 'accepted' : 'would-block';
  }

  /**
   * Dequeue the oldest item, waiting if the channel is empty.
   */
  pop(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      this.signalSpace();
      return Promise.resolve(item);
    }
    return new Promise<T>((resolve) => {
      this.poppers.push(resolve);
    });
  }

  /**
   * Drop every queued item and wake any waiting pusher.
   * Waiting poppers stay registered and receive the next pushed item.
   */
  clear(): void {
    this.items = [];
    for (const waiter of Array.from(this.spaceWaiters)) waiter();
  }

  private signalSpace(): void {
    const [first] = this.spaceWaiters;
    if (first) first();
  }

  private waitForSpace(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.spaceWaiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.spaceWaiters.add(done);
    });
  }
}
