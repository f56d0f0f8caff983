/**
 * Unbounded single-consumer channel between a push-based producer (socket
 * callbacks, timers) and an `for await` consumer. Iteration ends when the
 * consumer's signal aborts or the channel closes, and throws once the
 * producer fails it.
 */
export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;
  private failure: unknown = null;

  push(item: T): void {
    if (this.closed) {
      return;
    }
    this.buffer.push(item);
    this.wake();
  }

  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = error ?? new Error("channel failed");
    this.closed = true;
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get size(): number {
    return this.buffer.length;
  }

  async *iterate(signal: AbortSignal): AsyncGenerator<T> {
    const onAbort = (): void => this.wake();
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      while (!signal.aborted) {
        const next = this.buffer.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (this.closed) {
          if (this.failure !== null) {
            throw this.failure;
          }
          return;
        }
        await new Promise<void>((resolve) => {
          this.waiter = resolve;
        });
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
