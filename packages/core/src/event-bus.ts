import { BusClosedError } from "./errors";

interface Waiter<T> {
  resolve: (event: T) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded multi-producer, single-consumer FIFO.
 *
 * `publish` never blocks: a waiting consumer is handed the event directly,
 * otherwise it is queued. `consume` resolves with exactly one event.
 * Order is kept per publisher; nothing is promised across publishers.
 */
export class EventBus<T> {
  private queue: T[] = [];
  private waiting: Array<Waiter<T>> = [];
  private failure: Error | null = null;
  private closed = false;

  publish(event: T): void {
    if (this.closed) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(event);
    } else {
      this.queue.push(event);
    }
  }

  consume(): Promise<T> {
    const event = this.queue.shift();
    if (event !== undefined) {
      return Promise.resolve(event);
    }
    if (this.failure) {
      const error = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.closed) {
      return Promise.reject(new BusClosedError());
    }
    return new Promise<T>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  /** Reject the next `consume` that finds the queue empty. */
  fail(error: Error): void {
    if (this.closed) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.reject(error);
    } else if (!this.failure) {
      this.failure = error;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiting) {
      waiter.reject(new BusClosedError());
    }
    this.waiting = [];
  }

  /** Events published but not yet consumed */
  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
