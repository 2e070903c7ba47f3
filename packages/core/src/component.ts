/**
 * Component contract
 *
 * A live component renders a tree, reacts to messages, and optionally
 * hooks attach events and bus topics. A {@link ViewDefinition} bundles the
 * factory with the schema incoming messages are validated against.
 *
 * @example
 * ```typescript
 * type Msg = { type: "inc" } | { type: "dec" };
 *
 * class Counter implements Component<Msg> {
 *   constructor(readonly count = 0) {}
 *
 *   update(message: Msg) {
 *     return updated(new Counter(this.count + (message.type === "inc" ? 1 : -1)));
 *   }
 *
 *   render() {
 *     return html<Msg>`<button data-click="${msg({ type: "inc" })}">${this.count}</button>`;
 *   }
 * }
 *
 * export const counter: ViewDefinition<Msg> = {
 *   name: "counter",
 *   messages: z.discriminatedUnion("type", [
 *     z.object({ type: z.literal("inc") }),
 *     z.object({ type: z.literal("dec") }),
 *   ]),
 *   create: () => new Counter(),
 * };
 * ```
 *
 * @module @stitchview/core/component
 */

import type { z } from "zod";
import type { EventData } from "@stitchview/shared";
import type { Tree } from "./tree/index.js";
import type { Subscriptions } from "./subscriptions.js";
import type { Updated } from "./updated.js";

export interface MountContext<M> {
  componentId: string;
  /** URL of the page the observer attached from */
  url?: string;
  headers: Readonly<Record<string, string>>;
  /** 1 for the first observer, incremented on every attach */
  attach: number;
  /** Feed a message into this instance's own update path */
  send(message: M): void;
}

export interface Component<M> {
  mount?(context: MountContext<M>): void | Promise<void>;
  update(message: M, event?: EventData): Updated<M> | Promise<Updated<M>>;
  render(): Tree<M>;
  /** Register ad-hoc bus topics; called once before the first mount */
  subscriptions?(subs: Subscriptions<M>): void;
}

export interface ViewDefinition<M, P = void> {
  name: string;
  /** Validates messages arriving from clients and the bus */
  messages: z.ZodType<M, z.ZodTypeDef, unknown>;
  create(props: P): Component<M>;
}
