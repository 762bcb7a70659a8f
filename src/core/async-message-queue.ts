/**
 * AsyncMessageQueue<T>: single-consumer async iterable queue.
 *
 * Usage:
 *   const queue = new AsyncMessageQueue<Uint8Array>();
 *   queue.enqueue(chunk);   // producer side
 *   queue.finish();         // end of stream
 *   queue.fail(err);        // or: end with an error
 *   for await (const chunk of queue) { ... }  // consumer side
 *
 * Items queued before finish() are still delivered; an error set by fail()
 * is thrown once the queued items are drained.
 */

export class AsyncMessageQueue<T> {
  private readonly queue: T[] = [];
  private waiter: {
    resolve: (value: IteratorResult<T, undefined>) => void;
    reject: (reason: unknown) => void;
  } | null = null;
  private done = false;
  private error: unknown = undefined;
  private failed = false;

  /** Push an item into the queue, waking a pending consumer if one is waiting. Ignored once ended. */
  enqueue(item: T): void {
    if (this.done) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
  }

  /** Signal that no more items will be produced. */
  finish(): void {
    if (this.done) return;
    this.done = true;

    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve({ value: undefined, done: true });
    }
  }

  /** End the queue with an error for the consumer. */
  fail(error: unknown): void {
    if (this.done) return;
    this.done = true;
    this.failed = true;
    this.error = error;

    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.reject(error);
    }
  }

  /** Drop queued items and end the queue. */
  clear(): void {
    this.queue.length = 0;
    this.finish();
  }

  /** Whether the queue has been ended. */
  get isFinished(): boolean {
    return this.done;
  }

  get length(): number {
    return this.queue.length;
  }

  /** AsyncIterable interface: use with `for await`. */
  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        if (this.queue.length > 0) {
          const [item] = this.queue.splice(0, 1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.failed) {
          const error = this.error;
          this.failed = false;
          return Promise.reject(error);
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
          this.waiter = { resolve, reject };
        });
      },
    };
  }
}
