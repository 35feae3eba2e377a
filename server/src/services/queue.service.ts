import { QueueClosedError } from "../utils/errors";

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded FIFO shared by any number of producers and consumers.
 *
 * `enqueue` never blocks and never drops. `dequeue` resolves immediately
 * when an item is waiting, otherwise it parks the caller until the next
 * `enqueue`. Parked consumers are served in the order they arrived, and an
 * item is handed to exactly one of them.
 *
 * After `close()` no more items are accepted; consumers still drain what
 * is left and then receive a `QueueClosedError`.
 */
export class AsyncQueue<T extends object> {
  private items: T[] = [];
  private head = 0;
  private waiters: Waiter<T>[] = [];
  private closed = false;

  get size(): number {
    return this.items.length - this.head;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }

    this.items.push(item);
  }

  dequeue(): Promise<T> {
    const item = this.take();
    if (item !== undefined) {
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // Items are only buffered while nobody waits, so parked consumers
    // here have nothing left to drain.
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new QueueClosedError());
    }
  }

  private take(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head > 1024 && this.head * 2 > this.items.length) {
      // Compact once the consumed prefix dominates the backing array.
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }
}
