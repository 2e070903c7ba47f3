/**
 * View Actor
 *
 * Owns one component instance and its last rendered tree. Every operation
 * goes through a bounded mailbox and is handled strictly one at a time, in
 * arrival order, by a single consumer loop.
 *
 * A failing `mount` or `update` rejects that caller with `ComponentError`
 * and stops the actor. Requests still queued, and any sent afterwards,
 * reject with `ChannelClosedError`.
 *
 * @module @stitchview/core/view-actor
 */

import {
  ChannelClosedError,
  ComponentError,
  type Command,
  type EventData,
  type SerializedTree,
  type TreePatch,
} from "@stitchview/shared";
import { Channel, createDeferred, Logger, type Deferred } from "@stitchview/kernel";
import type { Component, MountContext } from "./component.js";
import { diffTrees, renderTree, serializeTree, type Tree } from "./tree/index.js";
import type { Updated } from "./updated.js";

// ============================================================================
// Types
// ============================================================================

export type UpdateResponse =
  | { type: "empty" }
  | { type: "diff"; patch: TreePatch }
  | { type: "commands"; commands: Command[] }
  | { type: "diff_and_commands"; patch: TreePatch; commands: Command[] };

type ViewRequest<M> =
  | { type: "mount"; context: MountContext<M>; reply: Deferred<TreePatch | undefined> }
  | { type: "render"; reply: Deferred<SerializedTree> }
  | { type: "render_to_string"; reply: Deferred<string> }
  | { type: "update"; message: M; event?: EventData; reply: Deferred<UpdateResponse> };

export interface ViewActorOptions<M> {
  /** Identifies the actor in logs and channel errors */
  name?: string;
  /** Mailbox capacity (default: 1024) */
  capacity?: number;
  /**
   * Receives the messages spawned tasks resolve to. Without it, the actor
   * applies them to itself.
   */
  onSpawned?: (message: M) => void;
}

// ============================================================================
// ViewActor
// ============================================================================

export class ViewActor<M> {
  private readonly log = Logger.for("ViewActor");
  private readonly mailbox: Channel<ViewRequest<M>>;
  private readonly name: string;
  private component: Component<M>;
  private tree: Tree<M>;

  /** Resolves when the consumer loop has exited */
  readonly done: Promise<void>;

  constructor(
    component: Component<M>,
    private readonly options: ViewActorOptions<M> = {},
  ) {
    this.name = options.name ?? "view";
    this.component = component;
    this.tree = component.render();
    this.mailbox = new Channel(options.capacity ?? 1024, { name: this.name });
    this.done = this.run();
  }

  /**
   * Run the mount hook, then re-render. Resolves to the diff against the
   * tree before mounting.
   */
  mount(context: MountContext<M>): Promise<TreePatch | undefined> {
    return this.request<TreePatch | undefined>((reply) => ({ type: "mount", context, reply }));
  }

  render(): Promise<SerializedTree> {
    return this.request<SerializedTree>((reply) => ({ type: "render", reply }));
  }

  renderToString(): Promise<string> {
    return this.request<string>((reply) => ({ type: "render_to_string", reply }));
  }

  update(message: M, event?: EventData): Promise<UpdateResponse> {
    return this.request<UpdateResponse>((reply) => ({ type: "update", message, event, reply }));
  }

  /**
   * Stop accepting requests. Requests already queued are still served.
   */
  close(): void {
    this.mailbox.close();
  }

  get isClosed(): boolean {
    return this.mailbox.isClosed;
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private async request<T>(build: (reply: Deferred<T>) => ViewRequest<M>): Promise<T> {
    const reply = createDeferred<T>();
    await this.mailbox.send(build(reply));
    return reply.promise;
  }

  private async run(): Promise<void> {
    for (;;) {
      const next = await this.mailbox.next();
      if (next.done) break;
      const keepRunning = await this.handle(next.value);
      if (!keepRunning) break;
    }

    this.mailbox.close();
    for (const request of this.mailbox.drain()) {
      request.reply.reject(new ChannelClosedError(this.name));
    }
    this.log.debug({ view: this.name }, "actor stopped");
  }

  private async handle(request: ViewRequest<M>): Promise<boolean> {
    switch (request.type) {
      case "mount":
        return this.handleMount(request.context, request.reply);

      case "render":
        this.settle(request.reply, () => serializeTree(this.tree));
        return true;

      case "render_to_string":
        this.settle(request.reply, () => renderTree(this.tree));
        return true;

      case "update":
        return this.handleUpdate(request.message, request.event, request.reply);
    }
  }

  private async handleMount(
    context: MountContext<M>,
    reply: Deferred<TreePatch | undefined>,
  ): Promise<boolean> {
    try {
      await this.component.mount?.(context);
    } catch (error) {
      this.log.error({ view: this.name, err: error }, "mount failed");
      reply.reject(new ComponentError("mount", error, { view: this.name }));
      return false;
    }

    return this.rerender("mount", reply, (patch) => patch);
  }

  private async handleUpdate(
    message: M,
    event: EventData | undefined,
    reply: Deferred<UpdateResponse>,
  ): Promise<boolean> {
    let result: Updated<M>;
    try {
      result = await this.component.update(message, event);
    } catch (error) {
      this.log.error({ view: this.name, err: error }, "update failed");
      reply.reject(new ComponentError("update", error, { view: this.name }));
      return false;
    }

    this.component = result.component;
    for (const task of result.tasks) {
      this.track(task);
    }

    const commands = [...result.commands];
    if (result.skipRender) {
      reply.resolve(commands.length > 0 ? { type: "commands", commands } : { type: "empty" });
      return true;
    }

    return this.rerender("update", reply, (patch) => toResponse(patch, commands));
  }

  /**
   * Render the current component, diff against the stored tree, and replace
   * it. A render that throws is treated like a failed hook. A diff that
   * cannot serialize only fails this request, and the stored tree stays the
   * one clients last received.
   */
  private rerender<T>(
    hook: ComponentError["hook"],
    reply: Deferred<T>,
    respond: (patch: TreePatch | undefined) => T,
  ): boolean {
    let next: Tree<M>;
    try {
      next = this.component.render();
    } catch (error) {
      this.log.error({ view: this.name, hook, err: error }, "render failed");
      reply.reject(new ComponentError(hook, error, { view: this.name }));
      return false;
    }

    let patch: TreePatch | undefined;
    try {
      patch = diffTrees(this.tree, next);
    } catch (error) {
      this.log.warn({ view: this.name, hook, err: error }, "render not serializable");
      reply.reject(error);
      return true;
    }

    this.tree = next;
    reply.resolve(respond(patch));
    return true;
  }

  private settle<T>(reply: Deferred<T>, compute: () => T): void {
    try {
      reply.resolve(compute());
    } catch (error) {
      reply.reject(error);
    }
  }

  private track(task: Promise<M | undefined>): void {
    void task.then(
      (message) => {
        if (message === undefined) return;
        if (this.options.onSpawned) {
          this.options.onSpawned(message);
          return;
        }
        void this.update(message).catch((error: unknown) => {
          this.log.warn({ view: this.name, err: error }, "spawned message not applied");
        });
      },
      (error: unknown) => {
        this.log.error({ view: this.name, err: error }, "spawned task failed");
      },
    );
  }
}

function toResponse(patch: TreePatch | undefined, commands: Command[]): UpdateResponse {
  if (patch && commands.length > 0) return { type: "diff_and_commands", patch, commands };
  if (patch) return { type: "diff", patch };
  if (commands.length > 0) return { type: "commands", commands };
  return { type: "empty" };
}
