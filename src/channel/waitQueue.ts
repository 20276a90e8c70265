/**
 * Unbounded FIFO with a single waiting consumer. A push wakes the consumer
 * immediately; otherwise the wait ends at its timeout or on abort.
 */
export class WaitQueue<T> {
  private readonly items: T[] = [];
  private waiter: (() => void) | null = null;

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    this.items.push(item);
    this.wake();
  }

  public shift(): T | undefined {
    return this.items.shift();
  }

  public clear(): void {
    this.items.length = 0;
  }

  /** Ends a pending wait early without adding an item. */
  public wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  public wait(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || signal?.aborted) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        if (this.waiter === done) this.waiter = null;
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      signal?.addEventListener("abort", done, { once: true });
      this.waiter = done;
    });
  }
}
