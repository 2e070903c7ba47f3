/**
 * Publish/subscribe bus
 *
 * Topics carry raw bytes; subscribers decode what they receive. Each
 * subscription is its own buffered queue, so a slow subscriber never
 * holds up delivery to the others. The bus is always passed in
 * explicitly; nothing here is global.
 *
 * @module @stitchview/server/pubsub
 */

import { Channel, Logger } from "@stitchview/kernel";

export interface Subscription extends AsyncIterable<Uint8Array> {
  readonly topic: string;
  /** Next payload, or `done` once the subscription is closed */
  next(): Promise<IteratorResult<Uint8Array, undefined>>;
  close(): void;
}

export interface PubSub {
  publish(topic: string, payload: Uint8Array): Promise<void>;
  subscribe(topic: string): Promise<Subscription>;
}

export interface InProcessPubSubOptions {
  /** Queue length per subscription (default: 1024) */
  capacity?: number;
}

// ============================================================================
// In-process implementation
// ============================================================================

class QueueSubscription implements Subscription {
  private readonly queue: Channel<Uint8Array>;

  constructor(
    readonly topic: string,
    capacity: number,
    private readonly onClose: (subscription: QueueSubscription) => void,
  ) {
    this.queue = new Channel(capacity, { name: topic });
  }

  /**
   * Queue a payload, dropping the oldest one when full. Returns false if a
   * payload was dropped.
   */
  deliver(payload: Uint8Array): boolean {
    if (this.queue.trySend(payload)) return true;
    this.queue.tryReceive();
    this.queue.trySend(payload);
    return false;
  }

  next(): Promise<IteratorResult<Uint8Array, undefined>> {
    return this.queue.next();
  }

  close(): void {
    if (this.queue.isClosed) return;
    this.queue.close();
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for (;;) {
        const result = await this.queue.next();
        if (result.done) return;
        yield result.value;
      }
    } finally {
      this.close();
    }
  }
}

export class InProcessPubSub implements PubSub {
  private readonly log = Logger.for("PubSub");
  private readonly topics = new Map<string, Set<QueueSubscription>>();
  private readonly capacity: number;

  constructor(options: InProcessPubSubOptions = {}) {
    this.capacity = options.capacity ?? 1024;
  }

  async publish(topic: string, payload: Uint8Array): Promise<void> {
    const subscribers = this.topics.get(topic);
    if (!subscribers) return;

    for (const subscription of subscribers) {
      if (!subscription.deliver(payload)) {
        this.log.warn({ topic, capacity: this.capacity }, "subscriber lagging, dropped oldest message");
      }
    }
  }

  async subscribe(topic: string): Promise<Subscription> {
    const subscription = new QueueSubscription(topic, this.capacity, (closed) => {
      const subscribers = this.topics.get(topic);
      subscribers?.delete(closed);
      if (subscribers?.size === 0) {
        this.topics.delete(topic);
      }
    });

    let subscribers = this.topics.get(topic);
    if (!subscribers) {
      subscribers = new Set();
      this.topics.set(topic, subscribers);
    }
    subscribers.add(subscription);
    return subscription;
  }

  /** Number of open subscriptions on a topic */
  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }
}
