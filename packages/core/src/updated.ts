/**
 * Updated
 *
 * What a component's `update` hands back: the component to keep, the
 * commands to run on the client, whether to skip re-rendering, and any
 * background tasks whose result is fed back in as the next message.
 *
 * @module @stitchview/core/updated
 */

import type { Command } from "@stitchview/shared";
import type { Component } from "./component.js";

/**
 * Background work started by an update. Resolving to `undefined` sends
 * nothing back.
 */
export type SpawnedTask<M> = Promise<M | undefined>;

export class Updated<M> {
  readonly commands: Command[] = [];
  readonly tasks: SpawnedTask<M>[] = [];
  skipRender = false;

  constructor(readonly component: Component<M>) {}

  withCommand(command: Command): this {
    this.commands.push(command);
    return this;
  }

  withCommands(commands: Iterable<Command>): this {
    this.commands.push(...commands);
    return this;
  }

  /** Keep the previous tree; no render, no diff. */
  skip(): this {
    this.skipRender = true;
    return this;
  }

  spawn(task: SpawnedTask<M> | (() => SpawnedTask<M>)): this {
    this.tasks.push(typeof task === "function" ? task() : task);
    return this;
  }
}

export function updated<M>(component: Component<M>, commands: Iterable<Command> = []): Updated<M> {
  return new Updated(component).withCommands(commands);
}
