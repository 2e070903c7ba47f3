/**
 * LifecycleEngine Tests
 *
 * Drives an engine over the in-process bus by playing the socket side by
 * hand: publish `mounted`, `update` and `socket-disconnected`, read
 * `initial-render` and `rendered`.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import {
  SubscriptionSet,
  html,
  jsonDecoder,
  msg,
  updated,
  type Component,
  type Tree,
  type Updated,
} from "@stitchview/core";
import { waitFor } from "@stitchview/kernel";
import { LifecycleEngine } from "../lifecycle.js";
import { InProcessPubSub } from "../pubsub.js";
import { Topics, decodeInitialRender, decodeRendered, encodePayload } from "../topics.js";
import { Counter, counterMessages, counterTree, nextDecoded, type CounterMsg } from "./fixtures.js";

const ID = "view-1";

const unserializable: CounterMsg = Object.assign(
  { type: "inc" as const },
  {
    toJSON(): never {
      throw new Error("no wire form");
    },
  },
);

/** Renders a message token with no JSON form after "flash". */
class Poisoned implements Component<CounterMsg> {
  constructor(readonly poisoned = false) {}

  update(message: CounterMsg): Updated<CounterMsg> {
    return updated(new Poisoned(this.poisoned || message.type === "flash"));
  }

  render(): Tree<CounterMsg> {
    const token: CounterMsg = this.poisoned ? unserializable : { type: "inc" };
    return html<CounterMsg>`<p>${this.poisoned ? "bad" : "ok"}</p><button data-click="${msg(token)}">+</button>`;
  }
}

describe("LifecycleEngine", () => {
  let pubsub: InProcessPubSub;
  let engine: LifecycleEngine<CounterMsg>;

  function createEngine(
    component: Component<CounterMsg> = new Counter(),
    subscriptions = new SubscriptionSet<CounterMsg>(),
  ): LifecycleEngine<CounterMsg> {
    return new LifecycleEngine({
      componentId: ID,
      component,
      pubsub,
      messages: counterMessages,
      subscriptions: subscriptions.entries,
      mountTimeoutMs: 200,
    });
  }

  async function mount(): Promise<{ version: number }> {
    const initial = await pubsub.subscribe(Topics.initialRender(ID));
    await pubsub.publish(Topics.mounted(ID), encodePayload({ headers: {} }));
    const payload = await nextDecoded(initial, decodeInitialRender);
    initial.close();
    return payload;
  }

  beforeEach(() => {
    pubsub = new InProcessPubSub();
  });

  afterEach(async () => {
    await engine.terminate();
  });

  describe("initial state", () => {
    it("terminates when nobody mounts in time", async () => {
      engine = new LifecycleEngine({
        componentId: ID,
        component: new Counter(),
        pubsub,
        messages: counterMessages,
        mountTimeoutMs: 20,
      });
      await engine.start();
      await engine.done;

      expect(engine.state).toBe("terminated");
      expect(pubsub.subscriberCount(Topics.mounted(ID))).toBe(0);
    });

    it("ignores updates published before the first mount", async () => {
      engine = createEngine();
      await engine.start();
      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "inc" } }));

      const initial = await pubsub.subscribe(Topics.initialRender(ID));
      await pubsub.publish(Topics.mounted(ID), encodePayload({}));
      const payload = await nextDecoded(initial, decodeInitialRender);

      expect(payload).toEqual({ version: 1, tree: counterTree(0) });
      expect(engine.state).toBe("running");
    });

    it("renders to a string before any observer", async () => {
      engine = createEngine(new Counter(5));
      expect(await engine.renderToString()).toBe(
        '<p id="count">5</p><button data-click="%7B%22type%22%3A%22inc%22%7D">+</button>',
      );
    });
  });

  describe("running", () => {
    it("publishes the initial render for a mount", async () => {
      engine = createEngine();
      await engine.start();

      expect(await mount()).toEqual({ version: 1, tree: counterTree(0) });
      expect(engine.observerCount).toBe(1);
    });

    it("publishes a diff after an update", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      const rendered = await pubsub.subscribe(Topics.rendered(ID));
      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "inc" } }));

      expect(await nextDecoded(rendered, decodeRendered)).toEqual({
        version: 2,
        patch: { d: { "0": "1" } },
      });
    });

    it("publishes commands without a patch when nothing changed", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      const rendered = await pubsub.subscribe(Topics.rendered(ID));
      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "flash" } }));

      expect(await nextDecoded(rendered, decodeRendered)).toEqual({
        version: 2,
        commands: [{ kind: "add_class", selector: "#count", value: "flash" }],
      });
    });

    it("drops messages that do not match the view's schema", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      const rendered = await pubsub.subscribe(Topics.rendered(ID));
      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "nope" } }));
      await pubsub.publish(Topics.update(ID), new TextEncoder().encode("not json"));
      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "inc" } }));

      expect(await nextDecoded(rendered, decodeRendered)).toEqual({
        version: 2,
        patch: { d: { "0": "1" } },
      });
      expect(engine.state).toBe("running");
    });

    it("applies updates in the order they were published", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      const rendered = await pubsub.subscribe(Topics.rendered(ID));
      for (let i = 0; i < 3; i++) {
        await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "inc" } }));
      }

      const patches = [
        await nextDecoded(rendered, decodeRendered),
        await nextDecoded(rendered, decodeRendered),
        await nextDecoded(rendered, decodeRendered),
      ];
      expect(patches).toEqual([
        { version: 2, patch: { d: { "0": "1" } } },
        { version: 3, patch: { d: { "0": "2" } } },
        { version: 4, patch: { d: { "0": "3" } } },
      ]);
    });

    it("turns ad-hoc topic payloads into messages", async () => {
      const subscriptions = new SubscriptionSet<CounterMsg>();
      subscriptions.on("clock/tick", jsonDecoder(z.object({ n: z.number() })), () => ({
        type: "inc",
      }));
      engine = createEngine(new Counter(), subscriptions);
      await engine.start();
      await mount();

      const rendered = await pubsub.subscribe(Topics.rendered(ID));
      await pubsub.publish("clock/tick", encodePayload({ n: 1 }));

      expect(await nextDecoded(rendered, decodeRendered)).toEqual({
        version: 2,
        patch: { d: { "0": "1" } },
      });
    });

    it("gives each new observer a fresh initial render with a later version", async () => {
      engine = createEngine();
      await engine.start();

      expect((await mount()).version).toBe(1);
      expect((await mount()).version).toBe(2);
      expect(engine.observerCount).toBe(2);
    });
  });

  describe("serialization failures", () => {
    it("keeps running and serves later observers the last sent tree", async () => {
      engine = createEngine(new Poisoned());
      await engine.start();
      await mount();

      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "flash" } }));

      expect(await mount()).toEqual({
        version: 2,
        tree: {
          f: ["<p>", '</p><button data-click="', '">+</button>'],
          d: { "0": "ok", "1": "%7B%22type%22%3A%22inc%22%7D" },
        },
      });
      expect(engine.state).toBe("running");
      expect(engine.observerCount).toBe(2);
    });
  });

  describe("termination", () => {
    it("stays up until the last observer disconnects", async () => {
      engine = createEngine();
      await engine.start();
      await mount();
      await mount();

      await pubsub.publish(Topics.socketDisconnected(ID), encodePayload({}));
      await waitFor(() => engine.observerCount === 1);
      expect(engine.state).toBe("running");

      await pubsub.publish(Topics.socketDisconnected(ID), encodePayload({}));
      await engine.done;
      expect(engine.state).toBe("terminated");
      expect(pubsub.subscriberCount(Topics.update(ID))).toBe(0);
    });

    it("terminates when the component fails", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      await pubsub.publish(Topics.update(ID), encodePayload({ message: { type: "explode" } }));
      await engine.done;

      expect(engine.state).toBe("terminated");
    });

    it("terminate() ends a running view", async () => {
      engine = createEngine();
      await engine.start();
      await mount();

      await engine.terminate();

      expect(engine.state).toBe("terminated");
      expect(pubsub.subscriberCount(Topics.mounted(ID))).toBe(0);
    });
  });
});
