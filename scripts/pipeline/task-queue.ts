/**
 * Unbounded FIFO shared by one producer (the crawler) and N consumers.
 * `take` resolves undefined once the queue is closed and drained.
 */
export class TaskQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the queue no longer accepts work. */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Stop accepting work; pending items are still handed out. */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  /** Close and discard whatever has not been dequeued yet. */
  abandon(): T[] {
    this.close();
    return this.items.splice(0);
  }
}
