/**
 * renderView
 *
 * Drives a component through a {@link ViewActor} without a socket or bus.
 * Messages passed to `context.send` and spawned tasks are applied to the
 * same actor; `settled()` waits for those already queued.
 *
 * @module @stitchview/core/testing
 */

import type { Command, EventData } from "@stitchview/shared";
import type { Component, MountContext } from "../component.js";
import { ViewActor, type UpdateResponse } from "../view-actor.js";

export interface RenderViewResult<M> {
  actor: ViewActor<M>;
  mount(context?: Partial<Omit<MountContext<M>, "send">>): Promise<void>;
  render(): Promise<string>;
  /** Apply one message; resolves to the new HTML and the commands it produced */
  send(message: M, event?: EventData): Promise<[string, Command[]]>;
  /** Wait for the fed-back messages queued so far to be applied */
  settled(): Promise<void>;
  close(): Promise<void>;
}

export function renderView<M>(component: Component<M>): RenderViewResult<M> {
  const inFlight = new Set<Promise<UpdateResponse>>();
  let attach = 0;

  const feed = (message: M): void => {
    const pending = actor.update(message);
    inFlight.add(pending);
    const forget = (): void => {
      inFlight.delete(pending);
    };
    void pending.then(forget, forget);
  };

  const actor: ViewActor<M> = new ViewActor(component, { name: "test-view", onSpawned: feed });

  return {
    actor,

    async mount(context = {}) {
      attach += 1;
      await actor.mount({
        componentId: "test-view",
        headers: {},
        attach,
        ...context,
        send: feed,
      });
    },

    render() {
      return actor.renderToString();
    },

    async send(message, event) {
      const response = await actor.update(message, event);
      const commands =
        response.type === "commands" || response.type === "diff_and_commands"
          ? response.commands
          : [];
      return [await actor.renderToString(), commands];
    },

    async settled() {
      while (inFlight.size > 0) {
        await Promise.allSettled([...inFlight]);
      }
    },

    async close() {
      actor.close();
      await actor.done;
    },
  };
}
