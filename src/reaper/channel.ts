/**
 * Unbounded FIFO channel between the dispatcher and its workers.
 * Purpose: hand host identifiers across async workers with blocking receives.
 * Assumptions: a single process; "blocking" means awaiting a pending promise.
 * Usage: send() items, close() when done, and loop on `await receive()` until undefined.
 */

// =============================================================================
// TYPES
// =============================================================================

type PendingReceiver<T> = (value: T | undefined) => void;

// =============================================================================
// CHANNEL
// =============================================================================

export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: PendingReceiver<T>[] = [];
  private closed = false;

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return;
    }

    this.buffer.push(value);
  }

  // Resolves undefined once the channel is closed and drained.
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}
