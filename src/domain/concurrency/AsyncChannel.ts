import { createAbortError } from "../speech/errors";

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  detach: () => void;
}

/**
 * Single-producer/single-consumer queue between callback-style producers
 * (socket listeners, SDK event handlers) and an async consumer.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve({ value, done: false });
      return true;
    }
    this.buffer.push(value);
    return true;
  }

  /** Buffered values are still delivered after close; waiters are released. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.resolve({ value: undefined, done: true });
    }
  }

  clear(): number {
    const dropped = this.buffer.length;
    this.buffer = [];
    return dropped;
  }

  next(signal?: AbortSignal): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (signal?.aborted) {
      return Promise.reject(createAbortError());
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(createAbortError());
      };
      const waiter: Waiter<T> = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
