/**
 * Life-cycle engine
 *
 * Drives one embedded view through `initial → running → terminated` and
 * fans its output out to every observer over the bus.
 *
 * - **initial**: waits for the first `mounted` signal. If none arrives
 *   within `mountTimeoutMs` the view terminates without publishing.
 * - **running**: one inbox merges mounted signals, update messages (from
 *   the update topic, ad-hoc topics, `context.send` and spawned tasks) and
 *   disconnects. Each event is handled to completion before the next, so
 *   patches are published in the order the actor produced them.
 * - **terminated**: subscriptions and the actor are closed.
 *
 * Every initial render and rendered message carries a version from one
 * counter. A socket that receives initial render `v` discards rendered
 * messages with a version `<= v`.
 *
 * @module @stitchview/server/lifecycle
 */

import type { z } from "zod";
import {
  DecodeError,
  isChannelClosedError,
  isSerializationError,
  toEventData,
  type EventData,
  type SerializedTree,
  type TreePatch,
  type Command,
} from "@stitchview/shared";
import { Channel, Logger, raceTimeout } from "@stitchview/kernel";
import {
  ViewActor,
  type Component,
  type SubscriptionEntry,
  type UpdateResponse,
} from "@stitchview/core";
import type { PubSub, Subscription } from "./pubsub.js";
import {
  Topics,
  decodeDisconnected,
  decodeMounted,
  decodeUpdate,
  encodePayload,
  type MountedPayload,
} from "./topics.js";

export type LifecycleState = "initial" | "running" | "terminated";

type EngineEvent<M> =
  | { type: "mounted"; payload: MountedPayload }
  | { type: "update"; message: M; event?: EventData }
  | { type: "disconnected" };

export interface LifecycleEngineOptions<M> {
  componentId: string;
  component: Component<M>;
  pubsub: PubSub;
  /** Validates messages arriving over the bus */
  messages: z.ZodType<M, z.ZodTypeDef, unknown>;
  /** Ad-hoc topics the component registered */
  subscriptions?: readonly SubscriptionEntry<M>[];
  /** Time to wait for the first observer (default: 30000) */
  mountTimeoutMs?: number;
  /** Actor mailbox and engine inbox capacity (default: 1024) */
  mailboxCapacity?: number;
}

export class LifecycleEngine<M> {
  private readonly log = Logger.for("LifecycleEngine");
  private readonly actor: ViewActor<M>;
  private readonly inbox: Channel<EngineEvent<M>>;
  private readonly subscriptions: Subscription[] = [];
  private readonly pumps: Promise<void>[] = [];
  private currentState: LifecycleState = "initial";
  private observers = 0;
  private attaches = 0;
  private version = 0;
  private started: Promise<void> | undefined;
  private stopping = false;
  private resolveDone: () => void = () => {};

  readonly componentId: string;

  /** Resolves once the engine reaches `terminated` */
  readonly done: Promise<void>;

  constructor(private readonly options: LifecycleEngineOptions<M>) {
    this.componentId = options.componentId;
    const capacity = options.mailboxCapacity ?? 1024;
    this.inbox = new Channel(capacity, { name: `engine:${options.componentId}` });
    this.actor = new ViewActor(options.component, {
      name: `view:${options.componentId}`,
      capacity,
      onSpawned: (message) => this.enqueueUpdate(message),
    });
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get observerCount(): number {
    return this.observers;
  }

  /**
   * Subscribe to the mount and disconnect topics and start the engine.
   * Resolves once those subscriptions exist.
   */
  start(): Promise<void> {
    this.started ??= this.subscribeLifecycle().then(() => {
      void this.run();
    });
    return this.started;
  }

  /** Full HTML of the current tree, for the first page load */
  renderToString(): Promise<string> {
    return this.actor.renderToString();
  }

  /**
   * Shut the engine down regardless of observers.
   */
  terminate(): Promise<void> {
    this.inbox.close();
    if (!this.started) {
      void this.shutdown();
    }
    return this.done;
  }

  // ==========================================================================
  // Run loop
  // ==========================================================================

  private async run(): Promise<void> {
    try {
      const first = await this.waitForFirstMount();
      if (!first) {
        this.log.debug({ componentId: this.componentId }, "no observer mounted, terminating");
        return;
      }

      await this.subscribeUpdates();
      this.transition("running");
      await this.handleMounted(first);

      while (this.currentState === "running") {
        const next = await this.inbox.next();
        if (next.done) break;
        await this.handle(next.value);
      }
    } catch (error) {
      if (isChannelClosedError(error)) {
        this.log.debug({ componentId: this.componentId }, "view closed");
      } else {
        this.log.error({ componentId: this.componentId, err: error }, "view terminated after error");
      }
    } finally {
      await this.shutdown();
    }
  }

  private async waitForFirstMount(): Promise<MountedPayload | undefined> {
    const timeoutMs = this.options.mountTimeoutMs ?? 30_000;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return undefined;

      const result = await raceTimeout(this.inbox.next(), remaining);
      if (result.timedOut) return undefined;
      const next = result.value;
      if (next.done) return undefined;

      const event = next.value;
      if (event.type === "mounted") return event.payload;
      this.log.debug({ componentId: this.componentId, event: event.type }, "ignored before mount");
    }
  }

  private async handle(event: EngineEvent<M>): Promise<void> {
    switch (event.type) {
      case "mounted":
        await this.handleMounted(event.payload);
        return;

      case "update":
        await this.handleUpdate(event.message, event.event);
        return;

      case "disconnected":
        this.observers = Math.max(0, this.observers - 1);
        this.log.debug(
          { componentId: this.componentId, observers: this.observers },
          "observer disconnected",
        );
        if (this.observers === 0) {
          this.transition("terminated");
        }
        return;
    }
  }

  private async handleMounted(payload: MountedPayload): Promise<void> {
    this.observers++;
    this.attaches++;

    const context = {
      componentId: this.componentId,
      url: payload.url,
      headers: payload.headers,
      attach: this.attaches,
      send: (message: M) => this.enqueueUpdate(message),
    };

    try {
      const patch = await this.actor.mount(context);
      if (patch) {
        await this.publishRendered(patch, undefined);
      }
    } catch (error) {
      if (!isSerializationError(error)) throw error;
      this.log.error({ componentId: this.componentId, err: error }, "mount render not serializable");
    }

    let tree: SerializedTree;
    try {
      tree = await this.actor.render();
    } catch (error) {
      // The socket times out waiting and publishes its disconnect.
      if (!isSerializationError(error)) throw error;
      this.log.error({ componentId: this.componentId, err: error }, "initial render not serializable");
      return;
    }

    await this.options.pubsub.publish(
      Topics.initialRender(this.componentId),
      encodePayload({ version: this.nextVersion(), tree }),
    );
    this.log.debug(
      { componentId: this.componentId, observers: this.observers },
      "observer mounted",
    );
  }

  private async handleUpdate(message: M, event: EventData | undefined): Promise<void> {
    let response: UpdateResponse;
    try {
      response = await this.actor.update(message, event);
    } catch (error) {
      // Only a component failure or a closed actor ends the view.
      if (isSerializationError(error)) {
        this.log.error({ componentId: this.componentId, err: error }, "render not serializable");
        return;
      }
      throw error;
    }

    switch (response.type) {
      case "empty":
        return;
      case "diff":
        await this.publishRendered(response.patch, undefined);
        return;
      case "commands":
        await this.publishRendered(undefined, response.commands);
        return;
      case "diff_and_commands":
        await this.publishRendered(response.patch, response.commands);
        return;
    }
  }

  private publishRendered(patch: TreePatch | undefined, commands: Command[] | undefined): Promise<void> {
    return this.options.pubsub.publish(
      Topics.rendered(this.componentId),
      encodePayload({ version: this.nextVersion(), patch, commands }),
    );
  }

  private nextVersion(): number {
    this.version += 1;
    return this.version;
  }

  private transition(next: LifecycleState): void {
    this.log.debug({ componentId: this.componentId, from: this.currentState, to: next }, "transition");
    this.currentState = next;
  }

  // ==========================================================================
  // Subscriptions
  // ==========================================================================

  private async subscribeLifecycle(): Promise<void> {
    const { pubsub } = this.options;
    const id = this.componentId;

    this.pump(await pubsub.subscribe(Topics.mounted(id)), (payload) => ({
      type: "mounted",
      payload: decodeMounted(payload),
    }));
    this.pump(await pubsub.subscribe(Topics.socketDisconnected(id)), (payload) => {
      decodeDisconnected(payload);
      return { type: "disconnected" };
    });
  }

  private async subscribeUpdates(): Promise<void> {
    const { pubsub } = this.options;

    this.pump(await pubsub.subscribe(Topics.update(this.componentId)), (payload) => {
      const decoded = decodeUpdate(payload);
      return {
        type: "update",
        message: this.decodeMessage(decoded.message),
        event: decoded.event ? toEventData(decoded.event) : undefined,
      };
    });

    for (const entry of this.options.subscriptions ?? []) {
      this.pump(await pubsub.subscribe(entry.topic), (payload) => ({
        type: "update",
        message: entry.receive(payload),
      }));
    }
  }

  /**
   * Forward decoded payloads from a subscription into the inbox. Payloads
   * that fail to decode are logged and dropped.
   */
  private pump(subscription: Subscription, toEvent: (payload: Uint8Array) => EngineEvent<M>): void {
    this.subscriptions.push(subscription);

    const task = async (): Promise<void> => {
      for await (const payload of subscription) {
        let event: EngineEvent<M>;
        try {
          event = toEvent(payload);
        } catch (error) {
          this.log.warn(
            { componentId: this.componentId, topic: subscription.topic, err: error },
            "dropping undecodable payload",
          );
          continue;
        }
        if (!(await this.enqueue(event))) break;
      }
    };
    this.pumps.push(task());
  }

  private decodeMessage(value: unknown): M {
    const result = this.options.messages.safeParse(value);
    if (!result.success) {
      throw new DecodeError("Message does not match the view's schema", {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  private enqueue(event: EngineEvent<M>): Promise<boolean> {
    return this.inbox.send(event).then(
      () => true,
      () => false,
    );
  }

  private enqueueUpdate(message: M): void {
    void this.enqueue({ type: "update", message });
  }

  private async shutdown(): Promise<void> {
    if (this.stopping) return this.done;
    this.stopping = true;
    if (this.currentState !== "terminated") {
      this.transition("terminated");
    }
    this.inbox.close();
    for (const subscription of this.subscriptions) {
      subscription.close();
    }
    this.actor.close();
    await Promise.all(this.pumps);
    await this.actor.done;
    this.resolveDone();
  }
}
