import { AbortError } from "./errors";

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Bounded FIFO queue connecting the reader task to the dispatch task.
 * `put` waits while the queue is full and `take` waits while it is empty;
 * both give up with an AbortError when their signal fires.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private takers: Waiter<T>[] = [];
  private putters: { item: T; waiter: Waiter<void> }[] = [];

  constructor(readonly capacity: number = 100) {
    if (capacity < 1) {
      throw new RangeError("queue capacity must be at least 1");
    }
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Add an item, waiting for room if the queue is full
   */
  put(item: T, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new AbortError());
    }

    const taker = this.takers.shift();
    if (taker) {
      this.release(taker);
      taker.resolve(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter<void> = { resolve, reject, signal };
      const entry = { item, waiter };
      this.attach(waiter, () => {
        this.putters = this.putters.filter((p) => p !== entry);
      });
      this.putters.push(entry);
    });
  }

  /**
   * Remove the oldest item, waiting for one if the queue is empty
   */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new AbortError());
    }

    const item = this.items.shift();
    if (item !== undefined) {
      this.admitPutter();
      return Promise.resolve(item);
    }

    // Queue is empty, but a putter may be parked when capacity is tiny
    const parked = this.putters.shift();
    if (parked) {
      this.release(parked.waiter);
      parked.waiter.resolve();
      return Promise.resolve(parked.item);
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, reject, signal };
      this.attach(waiter, () => {
        this.takers = this.takers.filter((t) => t !== waiter);
      });
      this.takers.push(waiter);
    });
  }

  /** Drop every queued item. Parked producers are admitted into the freed room. */
  clear(): void {
    this.items = [];

    let admitted = true;
    while (admitted && this.items.length < this.capacity) {
      admitted = this.admitPutter();
    }
  }

  private admitPutter(): boolean {
    const next = this.putters.shift();
    if (!next) return false;

    this.items.push(next.item);
    this.release(next.waiter);
    next.waiter.resolve();
    return true;
  }

  private attach<V>(waiter: Waiter<V>, remove: () => void): void {
    if (!waiter.signal) return;

    waiter.onAbort = () => {
      remove();
      waiter.reject(new AbortError());
    };
    waiter.signal.addEventListener("abort", waiter.onAbort, { once: true });
  }

  private release<V>(waiter: Waiter<V>): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}
