/**
 * Utility primitives.
 */

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * FIFO execution context: tasks run one at a time, in submission order.
 *
 * A task that awaits keeps the queue until it settles, so a check made at the
 * start of a task still holds at its end unless the task itself changed it.
 * Tasks must not `await` another `run()` on the same queue.
 */
export class SerialQueue {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Number of tasks submitted and not yet settled.
   */
  get pending(): number {
    return this._pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this._pending++;
    const result = this._tail.then(task).finally(() => {
      this._pending--;
    });
    // A failed task must not stall the ones queued after it.
    this._tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Unbounded single-consumer channel exposed as an async iterable.
 *
 * Values pushed before the consumer asks for them are buffered. After
 * `close()` the consumer drains the buffer and then sees the end of the stream.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private _buffer: { value: T }[] = [];
  private _waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this._buffer.length;
  }

  /**
   * Queue a value. Returns false once the channel is closed.
   */
  push(value: T): boolean {
    if (this._closed) return false;
    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter({ value, done: false });
    } else {
      this._buffer.push({ value });
    }
    return true;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this._next(),
      return: () => {
        this._buffer = [];
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private _next(): Promise<IteratorResult<T, undefined>> {
    const item = this._buffer.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this._closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this._waiter) {
      return Promise.reject(new Error('EventChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this._waiter = resolve;
    });
  }
}
