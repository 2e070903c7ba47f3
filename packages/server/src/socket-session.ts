/**
 * Socket Session
 *
 * One per connected client. Frames are handled strictly in arrival order:
 *
 * - `mount`: subscribe to the view's `rendered` and `initial-render`
 *   topics, announce the observer on `mounted`, wait for the initial
 *   render, send it, then forward every newer render.
 * - events: republish the decoded message and payload on the view's
 *   `update` topic.
 * - `health`: answered on the socket at once; the bus is not involved.
 *
 * When the session ends, `socket-disconnected` is published for every view
 * this socket mounted, so each engine's observer count stays accurate.
 *
 * @module @stitchview/server/socket-session
 */

import {
  decodeClientMessage,
  ErrorCodes,
  type ClientMessage,
} from "@stitchview/shared";
import { Channel, Logger, raceTimeout } from "@stitchview/kernel";
import { OutgoingBuffer } from "./outgoing-buffer.js";
import type { PubSub, Subscription } from "./pubsub.js";
import {
  Topics,
  decodeInitialRender,
  decodeRendered,
  encodePayload,
  type InitialRenderPayload,
  type RenderedPayload,
} from "./topics.js";
import type { ConnectionHandler, ConnectionRequest, SocketConnection } from "./transport.js";

export interface SocketSessionOptions {
  pubsub: PubSub;
  request?: ConnectionRequest;
  /** How long to wait for a view's initial render after mounting (default: 30000) */
  mountTimeoutMs?: number;
  /**
   * Outgoing messages held under write pressure (default: 1000). Past
   * that the socket is closed and the session ends.
   */
  maxBuffer?: number;
  /** Frames queued before the session falls behind (default: 1024) */
  capacity?: number;
}

export class SocketSession implements ConnectionHandler {
  private readonly log = Logger.for("SocketSession");
  private readonly frames: Channel<string>;
  private readonly outgoing: OutgoingBuffer;
  private readonly mounted = new Map<string, Subscription>();
  private readonly forwarders: Promise<void>[] = [];
  private readonly request: ConnectionRequest;

  /** Resolves after disconnects have been published */
  readonly done: Promise<void>;

  constructor(
    private readonly connection: SocketConnection,
    private readonly options: SocketSessionOptions,
  ) {
    this.request = options.request ?? { headers: {} };
    this.frames = new Channel(options.capacity ?? 1024, { name: `socket:${connection.id}` });
    this.outgoing = new OutgoingBuffer(connection, {
      maxBuffer: options.maxBuffer,
      onOverflow: () => this.frames.close(),
    });
    this.done = this.run();
  }

  receive(raw: string): void {
    if (!this.frames.trySend(raw)) {
      this.log.warn({ socket: this.connection.id }, "frame dropped, session closed or full");
    }
  }

  close(): Promise<void> {
    this.frames.close();
    return this.done;
  }

  /** Component ids this socket has mounted */
  get mountedIds(): string[] {
    return [...this.mounted.keys()];
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private async run(): Promise<void> {
    this.log.debug({ socket: this.connection.id }, "socket connected");
    try {
      for (;;) {
        const next = await this.frames.next();
        if (next.done) break;
        await this.handleFrame(next.value);
      }
    } finally {
      await this.disconnectAll();
      this.log.debug({ socket: this.connection.id }, "socket disconnected");
    }
  }

  private async handleFrame(raw: string): Promise<void> {
    let message: ClientMessage;
    try {
      message = decodeClientMessage(raw);
    } catch (error) {
      this.log.warn({ socket: this.connection.id, err: error }, "dropping undecodable frame");
      return;
    }

    if (message.type === "health") {
      this.outgoing.push({ kind: "health" });
      return;
    }

    const { componentId } = message;
    try {
      if (message.type === "mount") {
        await this.mount(componentId);
      } else {
        await this.forwardEvent(message);
      }
    } catch (error) {
      this.log.error(
        { socket: this.connection.id, componentId, err: error },
        "frame handling failed",
      );
    }
  }

  private async mount(componentId: string): Promise<void> {
    if (this.mounted.has(componentId)) {
      this.log.debug({ componentId }, "already mounted on this socket");
      return;
    }

    const { pubsub } = this.options;
    const rendered = await pubsub.subscribe(Topics.rendered(componentId));
    const initial = await pubsub.subscribe(Topics.initialRender(componentId));

    let payload: InitialRenderPayload | undefined;
    try {
      await pubsub.publish(
        Topics.mounted(componentId),
        encodePayload({ url: this.request.url, headers: this.request.headers }),
      );
      payload = await this.awaitInitialRender(componentId, initial);
    } finally {
      initial.close();
    }

    if (!payload) {
      rendered.close();
      await pubsub.publish(Topics.socketDisconnected(componentId), encodePayload({}));
      return;
    }

    this.mounted.set(componentId, rendered);
    this.outgoing.push({ componentId, kind: "initial_render", payload: payload.tree });
    this.forwarders.push(this.forwardRenders(componentId, rendered, payload.version));
  }

  private async awaitInitialRender(
    componentId: string,
    initial: Subscription,
  ): Promise<InitialRenderPayload | undefined> {
    const result = await raceTimeout(initial.next(), this.options.mountTimeoutMs ?? 30_000);
    if (result.timedOut || result.value.done) {
      this.log.warn(
        { componentId, code: ErrorCodes.UNKNOWN_COMPONENT },
        "no initial render for mounted view",
      );
      return undefined;
    }

    try {
      return decodeInitialRender(result.value.value);
    } catch (error) {
      this.log.warn({ componentId, err: error }, "undecodable initial render");
      return undefined;
    }
  }

  /**
   * Relay rendered messages newer than the initial render to the client.
   */
  private async forwardRenders(
    componentId: string,
    rendered: Subscription,
    initialVersion: number,
  ): Promise<void> {
    for await (const bytes of rendered) {
      let payload: RenderedPayload;
      try {
        payload = decodeRendered(bytes);
      } catch (error) {
        this.log.warn({ componentId, err: error }, "dropping undecodable render");
        continue;
      }
      if (payload.version <= initialVersion) continue;

      if (payload.patch) {
        this.outgoing.push({ componentId, kind: "rendered", payload: payload.patch });
      }
      if (payload.commands && payload.commands.length > 0) {
        this.outgoing.push({ componentId, kind: "commands", payload: payload.commands });
      }
    }
  }

  private async forwardEvent(message: Extract<ClientMessage, { type: "event" }>): Promise<void> {
    if (!this.mounted.has(message.componentId)) {
      this.log.warn(
        { socket: this.connection.id, componentId: message.componentId, topic: message.topic },
        "event for a view this socket has not mounted",
      );
      return;
    }

    await this.options.pubsub.publish(
      Topics.update(message.componentId),
      encodePayload({ message: message.message, event: message.payload }),
    );
  }

  private async disconnectAll(): Promise<void> {
    const ids = [...this.mounted.keys()];
    for (const subscription of this.mounted.values()) {
      subscription.close();
    }
    this.mounted.clear();

    for (const componentId of ids) {
      await this.options.pubsub.publish(Topics.socketDisconnected(componentId), encodePayload({}));
    }
    await Promise.all(this.forwarders);
    this.outgoing.clear();
  }
}
