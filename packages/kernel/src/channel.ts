/**
 * Channel
 *
 * Bounded async FIFO connecting one or more producers to a single consumer.
 * `send()` waits while the channel is full; `next()` waits while it is empty.
 * Once closed, pending and future sends reject with `ChannelClosedError`,
 * and the consumer drains what was already queued before seeing `done`.
 *
 * @example
 * ```typescript
 * const mailbox = new Channel<Request>(1024);
 *
 * // Producer
 * await mailbox.send(request);
 *
 * // Consumer
 * for await (const request of mailbox) {
 *   handle(request);
 * }
 * ```
 *
 * @module @stitchview/kernel/channel
 */

import { ChannelClosedError } from "@stitchview/shared";

// ============================================================================
// Types
// ============================================================================

interface Receiver<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export interface ChannelOptions {
  /** Label used in error messages */
  name?: string;
}

// ============================================================================
// Channel
// ============================================================================

export class Channel<T> implements AsyncIterableIterator<T> {
  private readonly queue: T[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private readonly blockedSends: PendingSend<T>[] = [];
  private closed = false;

  constructor(
    readonly capacity = 1024,
    private readonly options: ChannelOptions = {},
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Enqueue a value, waiting for room when the channel is full.
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError(this.options.name));
    }
    if (this.trySend(value)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.blockedSends.push({ value, resolve, reject });
    });
  }

  /**
   * Enqueue a value without waiting. Returns false when full or closed.
   */
  trySend(value: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ done: false, value });
      return true;
    }
    if (this.queue.length >= this.capacity) return false;
    this.queue.push(value);
    return true;
  }

  /**
   * Take the next value, waiting while empty. Resolves `done` once the
   * channel is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      return Promise.resolve({ done: false, value: this.dequeue() });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.receivers.push({ resolve });
    });
  }

  /**
   * Take a value if one is queued.
   */
  tryReceive(): { value: T } | undefined {
    if (this.queue.length === 0) return undefined;
    return { value: this.dequeue() };
  }

  /**
   * Close the channel. Queued values remain readable; blocked senders are
   * rejected and waiting receivers complete.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const pending of this.blockedSends.splice(0)) {
      pending.reject(new ChannelClosedError(this.options.name));
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ done: true, value: undefined });
    }
  }

  /**
   * Drop everything still queued and return it.
   */
  drain(): T[] {
    const drained = this.queue.splice(0);
    while (this.admitBlockedSend()) {
      drained.push(...this.queue.splice(0));
    }
    return drained;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private dequeue(): T {
    const [value] = this.queue.splice(0, 1);
    this.admitBlockedSend();
    return value;
  }

  private admitBlockedSend(): boolean {
    const pending = this.blockedSends.shift();
    if (!pending) return false;
    this.queue.push(pending.value);
    pending.resolve();
    return true;
  }
}
