/**
 * ViewClient
 *
 * Headless client runtime: keeps the serialized state of every mounted
 * view, folds incoming patches into it, and encodes outgoing mounts and
 * events. A browser runtime would morph the DOM from {@link ViewClient.html};
 * tests and server-side consumers read it directly.
 *
 * @example
 * ```typescript
 * const client = new ViewClient({ send: (envelope) => socket.send(JSON.stringify(envelope)) });
 * socket.on("message", (data) => client.receive(String(data)));
 *
 * client.mountAll(pageHtml);
 * client.event(id, "click", { type: "inc" });
 * ```
 *
 * @module @stitchview/client/view-client
 */

import {
  ErrorCodes,
  ViewError,
  decodeServerMessage,
  encodeClientEvent,
  encodeHealth,
  encodeMount,
  type ClientEnvelope,
  type Command,
  type EventPayload,
  type EventTopic,
  type SerializedTree,
  type ServerMessage,
} from "@stitchview/shared";
import { applyPatch, renderState } from "./patch.js";

export interface ViewClientOptions {
  /** Deliver one envelope to the server */
  send(envelope: ClientEnvelope): void;
  /** Run a command once its delay has passed */
  onCommand?(componentId: string, command: Command): void;
  /** Called after a view's state changed */
  onChange?(componentId: string): void;
  /** Called when the server answers a health check */
  onHealth?(): void;
}

const VIEW_ID = /data-stitchview-id="([^"]+)"/g;

/**
 * Ids of every embedded view container in a page, in document order.
 */
export function findViewIds(page: string): string[] {
  return Array.from(page.matchAll(VIEW_ID), (match) => match[1]);
}

export class ViewClient {
  private readonly states = new Map<string, SerializedTree>();
  private readonly received = new Map<string, Command[]>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private lastHealth: number | undefined;

  constructor(private readonly options: ViewClientOptions) {}

  mount(componentId: string): void {
    this.options.send(encodeMount(componentId));
  }

  /** Mount every view embedded in `page` */
  mountAll(page: string): string[] {
    const ids = findViewIds(page);
    for (const id of ids) {
      this.mount(id);
    }
    return ids;
  }

  event(componentId: string, topic: EventTopic, message: unknown, payload?: EventPayload): void {
    this.options.send(encodeClientEvent(componentId, topic, message, payload));
  }

  /**
   * Ask the server for a health reply. A caller that sees no reply in
   * time can treat the connection as dead and reconnect.
   */
  health(): void {
    this.options.send(encodeHealth());
  }

  /**
   * Apply one message from the server.
   *
   * @throws DecodeError when a raw frame is not a server message
   * @throws ViewError (`UNKNOWN_COMPONENT`) for a patch before its initial render
   */
  receive(raw: string | ServerMessage): ServerMessage {
    const message = typeof raw === "string" ? decodeServerMessage(raw) : raw;
    if (message.kind === "health") {
      this.lastHealth = Date.now();
      this.options.onHealth?.();
      return message;
    }
    const { componentId } = message;

    switch (message.kind) {
      case "initial_render":
        this.states.set(componentId, message.payload);
        this.options.onChange?.(componentId);
        break;

      case "rendered": {
        const state = this.states.get(componentId);
        if (!state) {
          throw new ViewError(
            `Patch for view ${componentId} before its initial render`,
            ErrorCodes.UNKNOWN_COMPONENT,
            { componentId },
          );
        }
        this.states.set(componentId, applyPatch(state, message.payload));
        this.options.onChange?.(componentId);
        break;
      }

      case "commands":
        for (const command of message.payload) {
          this.schedule(componentId, command);
        }
        break;
    }
    return message;
  }

  html(componentId: string): string | undefined {
    const state = this.states.get(componentId);
    return state ? renderState(state) : undefined;
  }

  state(componentId: string): SerializedTree | undefined {
    return this.states.get(componentId);
  }

  /** Commands received for a view, in arrival order */
  commands(componentId: string): readonly Command[] {
    return this.received.get(componentId) ?? [];
  }

  /** When the last health reply arrived, in epoch milliseconds */
  get lastHealthAt(): number | undefined {
    return this.lastHealth;
  }

  get viewIds(): string[] {
    return [...this.states.keys()];
  }

  /** Cancel delayed commands that have not run yet */
  dispose(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private schedule(componentId: string, command: Command): void {
    let list = this.received.get(componentId);
    if (!list) {
      list = [];
      this.received.set(componentId, list);
    }
    list.push(command);

    const run = (): void => this.options.onCommand?.(componentId, command);
    if (!command.delay_ms) {
      run();
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      run();
    }, command.delay_ms);
    this.timers.add(timer);
  }
}
