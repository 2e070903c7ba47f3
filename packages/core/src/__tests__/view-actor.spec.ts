/**
 * ViewActor Tests
 *
 * Mailbox-serialized mount/update/render, response shapes, failure
 * semantics, ordering under concurrent callers, and spawned tasks.
 */

import { describe, it, expect, vi } from "vitest";
import {
  ChannelClosedError,
  ComponentError,
  SerializationError,
  setTitle,
} from "@stitchview/shared";
import { sleep, waitFor } from "@stitchview/kernel";
import type { Component, MountContext } from "../component.js";
import { html, msg, type Tree } from "../tree/index.js";
import { updated, type Updated } from "../updated.js";
import { ViewActor } from "../view-actor.js";

// ============================================================================
// Fixtures
// ============================================================================

type CounterMsg = "inc" | "noop" | "title" | "inc_and_title" | "skip" | "fetch" | "fail";

class Counter implements Component<CounterMsg> {
  constructor(readonly count = 0) {}

  update(message: CounterMsg): Updated<CounterMsg> {
    switch (message) {
      case "inc":
        return updated(new Counter(this.count + 1));
      case "noop":
        return updated(this);
      case "title":
        return updated(this, [setTitle(`Count ${this.count}`)]);
      case "inc_and_title":
        return updated(new Counter(this.count + 1), [setTitle("bumped")]);
      case "skip":
        return updated(new Counter(this.count + 100)).skip();
      case "fetch":
        return updated(this).spawn(Promise.resolve<CounterMsg>("inc"));
      case "fail":
        throw new Error("boom");
    }
  }

  render(): Tree<CounterMsg> {
    return html`<p>${this.count}</p>`;
  }
}

function mountContext(overrides: Partial<MountContext<string>> = {}): MountContext<string> {
  return { componentId: "c1", headers: {}, attach: 1, send: () => {}, ...overrides };
}

// ============================================================================
// Render
// ============================================================================

describe("ViewActor", () => {
  describe("render", () => {
    it("renders the component on construction", async () => {
      const actor = new ViewActor(new Counter(5));

      expect(await actor.renderToString()).toBe("<p>5</p>");
      expect(await actor.render()).toEqual({ f: ["<p>", "</p>"], d: { "0": "5" } });
    });
  });

  // ==========================================================================
  // Update responses
  // ==========================================================================

  describe("update", () => {
    it("returns a diff and stores the new tree", async () => {
      const actor = new ViewActor(new Counter());

      expect(await actor.update("inc")).toEqual({ type: "diff", patch: { d: { "0": "1" } } });
      expect(await actor.renderToString()).toBe("<p>1</p>");
    });

    it("returns empty when nothing changed", async () => {
      const actor = new ViewActor(new Counter());
      expect(await actor.update("noop")).toEqual({ type: "empty" });
    });

    it("returns commands without a diff", async () => {
      const actor = new ViewActor(new Counter(3));
      expect(await actor.update("title")).toEqual({
        type: "commands",
        commands: [{ kind: "set_title", value: "Count 3" }],
      });
    });

    it("returns a diff together with commands", async () => {
      const actor = new ViewActor(new Counter());
      expect(await actor.update("inc_and_title")).toEqual({
        type: "diff_and_commands",
        patch: { d: { "0": "1" } },
        commands: [{ kind: "set_title", value: "bumped" }],
      });
    });

    it("keeps the previous tree when rendering is skipped", async () => {
      const actor = new ViewActor(new Counter());

      expect(await actor.update("skip")).toEqual({ type: "empty" });
      expect(await actor.renderToString()).toBe("<p>0</p>");
      expect(await actor.update("inc")).toEqual({ type: "diff", patch: { d: { "0": "101" } } });
    });
  });

  // ==========================================================================
  // Ordering
  // ==========================================================================

  describe("ordering", () => {
    it("applies concurrent updates in mailbox order", async () => {
      const actor = new ViewActor(new Counter());
      const responses = await Promise.all(Array.from({ length: 20 }, () => actor.update("inc")));

      expect(responses.map((response) => (response.type === "diff" ? response.patch : null))).toEqual(
        Array.from({ length: 20 }, (_, i) => ({ d: { "0": String(i + 1) } })),
      );
    });

    it("never runs two async updates at once", async () => {
      let running = 0;
      let maxRunning = 0;

      class Slow implements Component<number> {
        constructor(readonly total = 0) {}

        async update(n: number): Promise<Updated<number>> {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await sleep(2);
          running--;
          return updated(new Slow(this.total + n));
        }

        render(): Tree<number> {
          return html`${this.total}`;
        }
      }

      const actor = new ViewActor(new Slow());
      await Promise.all([actor.update(1), actor.update(2), actor.update(3)]);

      expect(maxRunning).toBe(1);
      expect(await actor.renderToString()).toBe("6");
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe("failures", () => {
    it("rejects the caller with ComponentError and stops", async () => {
      const actor = new ViewActor(new Counter());

      const failure = await actor.update("fail").catch((error: unknown) => error);
      expect(failure).toBeInstanceOf(ComponentError);
      expect(failure instanceof ComponentError && failure.hook).toBe("update");
      expect(failure instanceof Error && failure.message).toBe("Component update failed: boom");

      await actor.done;
      await expect(actor.update("inc")).rejects.toBeInstanceOf(ChannelClosedError);
    });

    it("rejects requests queued behind a failure with ChannelClosedError", async () => {
      const actor = new ViewActor(new Counter());
      const [failed, queued] = await Promise.allSettled([actor.update("fail"), actor.update("inc")]);

      expect(failed).toMatchObject({ status: "rejected" });
      expect(failed.status === "rejected" && failed.reason).toBeInstanceOf(ComponentError);
      expect(queued.status === "rejected" && queued.reason).toBeInstanceOf(ChannelClosedError);
    });

    it("keeps the last sent tree when a diff cannot serialize", async () => {
      type TagMsg = "bad" | "good" | bigint;

      class Tagged implements Component<TagMsg> {
        constructor(
          readonly text: string,
          readonly token: TagMsg,
        ) {}

        update(message: TagMsg): Updated<TagMsg> {
          return message === "bad"
            ? updated(new Tagged("b", 1n))
            : updated(new Tagged(this.text, "good"));
        }

        render(): Tree<TagMsg> {
          return html<TagMsg>`<p>${this.text}</p><button data-click="${msg<TagMsg>(this.token)}"></button>`;
        }
      }

      const actor = new ViewActor<TagMsg>(new Tagged("a", "good"));

      await expect(actor.update("bad")).rejects.toBeInstanceOf(SerializationError);
      expect(await actor.render()).toEqual({
        f: ["<p>", '</p><button data-click="', '"></button>'],
        d: { "0": "a", "1": "%22good%22" },
      });

      expect(await actor.update("good")).toEqual({ type: "diff", patch: { d: { "0": "b" } } });
      expect(actor.isClosed).toBe(false);
    });

    it("rejects everything after close", async () => {
      const actor = new ViewActor(new Counter(), { name: "view:c9" });
      actor.close();
      await actor.done;

      await expect(actor.renderToString()).rejects.toThrow("Channel closed: view:c9");
      expect(actor.isClosed).toBe(true);
    });
  });

  // ==========================================================================
  // Mount
  // ==========================================================================

  describe("mount", () => {
    class Loader implements Component<string> {
      status = "loading";

      constructor(private readonly fail = false) {}

      async mount(context: MountContext<string>): Promise<void> {
        if (this.fail) throw new Error("no session");
        this.status = `ready for ${context.url ?? "?"}`;
      }

      update(): Updated<string> {
        return updated(this);
      }

      render(): Tree<string> {
        return html`<main>${this.status}</main>`;
      }
    }

    it("re-renders after mounting and returns the diff", async () => {
      const actor = new ViewActor(new Loader());
      const patch = await actor.mount(mountContext({ url: "/home" }));

      expect(patch).toEqual({ d: { "0": "ready for /home" } });
      expect(await actor.renderToString()).toBe("<main>ready for /home</main>");
    });

    it("reports a render that throws after mounting as a mount failure", async () => {
      class Fragile implements Component<string> {
        mounted = false;

        mount(): void {
          this.mounted = true;
        }

        update(): Updated<string> {
          return updated(this);
        }

        render(): Tree<string> {
          if (this.mounted) throw new Error("no layout");
          return html`<main></main>`;
        }
      }

      const actor = new ViewActor(new Fragile());

      await expect(actor.mount(mountContext())).rejects.toMatchObject({
        hook: "mount",
        message: "Component mount failed: no layout",
      });
      await actor.done;
      expect(actor.isClosed).toBe(true);
    });

    it("stops when mount fails", async () => {
      const actor = new ViewActor(new Loader(true));

      await expect(actor.mount(mountContext())).rejects.toMatchObject({
        hook: "mount",
        code: "COMPONENT_ERROR",
      });
      await actor.done;
      expect(actor.isClosed).toBe(true);
    });
  });

  // ==========================================================================
  // Spawned tasks
  // ==========================================================================

  describe("spawn", () => {
    it("hands spawned messages to onSpawned", async () => {
      const onSpawned = vi.fn();
      const actor = new ViewActor(new Counter(), { onSpawned });

      expect(await actor.update("fetch")).toEqual({ type: "empty" });
      await waitFor(() => onSpawned.mock.calls.length > 0);
      expect(onSpawned).toHaveBeenCalledWith("inc");
    });

    it("applies spawned messages to itself without a handler", async () => {
      const actor = new ViewActor(new Counter());
      await actor.update("fetch");

      await waitFor(async () => (await actor.renderToString()) === "<p>1</p>");
    });
  });
});
