/**
 * Shared fixtures for the server suites: a counter view and an in-memory
 * socket connection.
 */

import { z } from "zod";
import { addClass, type ServerMessage } from "@stitchview/shared";
import {
  html,
  msg,
  updated,
  type Component,
  type Tree,
  type Updated,
  type ViewDefinition,
} from "@stitchview/core";
import type { Subscription } from "../pubsub.js";
import type { SocketConnection } from "../transport.js";

export type CounterMsg = { type: "inc" } | { type: "flash" } | { type: "explode" };

export const counterMessages = z.discriminatedUnion("type", [
  z.object({ type: z.literal("inc") }),
  z.object({ type: z.literal("flash") }),
  z.object({ type: z.literal("explode") }),
]);

export class Counter implements Component<CounterMsg> {
  constructor(readonly count = 0) {}

  update(message: CounterMsg): Updated<CounterMsg> {
    switch (message.type) {
      case "inc":
        return updated(new Counter(this.count + 1));
      case "flash":
        return updated(this, [addClass("#count", "flash")]);
      case "explode":
        throw new Error("boom");
    }
  }

  render(): Tree<CounterMsg> {
    return html`<p id="count">${this.count}</p><button data-click="${msg<CounterMsg>({ type: "inc" })}">+</button>`;
  }
}

export const counter: ViewDefinition<CounterMsg, number> = {
  name: "counter",
  messages: counterMessages,
  create: (start) => new Counter(start),
};

/** Serialized form of `new Counter(count).render()` */
export function counterTree(count: number) {
  return {
    f: ['<p id="count">', '</p><button data-click="', '">+</button>'],
    d: { "0": String(count), "1": "%7B%22type%22%3A%22inc%22%7D" },
  };
}

export class FakeConnection implements SocketConnection {
  readonly sent: ServerMessage[] = [];
  connected = true;
  pressured = false;
  closeCode: number | undefined;
  closeReason: string | undefined;

  constructor(readonly id = "socket-1") {}

  send(message: ServerMessage): void {
    this.sent.push(message);
  }

  close(code?: number, reason?: string): void {
    this.connected = false;
    this.closeCode = code;
    this.closeReason = reason;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  isPressured(): boolean {
    return this.pressured;
  }
}

export async function nextDecoded<T>(
  subscription: Subscription,
  decode: (payload: Uint8Array) => T,
): Promise<T> {
  const result = await subscription.next();
  if (result.done) {
    throw new Error(`${subscription.topic} closed`);
  }
  return decode(result.value);
}
