/**
 * Client commands
 *
 * Side effects a component asks the client to perform alongside (or
 * instead of) a DOM patch. Commands are plain data and travel in the
 * `commands` envelope in the order the component produced them.
 *
 * @example
 * ```typescript
 * return updated(next, [
 *   addClass("#toast", "visible"),
 *   withDelay(removeClass("#toast", "visible"), 2000),
 * ]);
 * ```
 *
 * @module @stitchview/shared/commands
 */

import { z } from "zod";

export const CommandKinds = [
  "navigate_to",
  "add_class",
  "remove_class",
  "toggle_class",
  "clear_value",
  "set_title",
  "history_push_state",
] as const;

export type CommandKind = (typeof CommandKinds)[number];

export interface Command {
  kind: CommandKind;
  /** CSS selector the command targets */
  selector?: string;
  /** URI, class name or title, depending on kind */
  value?: string;
  /** Delay before the client runs the command */
  delay_ms?: number;
}

export const commandSchema = z.object({
  kind: z.enum(CommandKinds),
  selector: z.string().optional(),
  value: z.string().optional(),
  delay_ms: z.number().int().nonnegative().optional(),
});

// ============================================================================
// Constructors
// ============================================================================

export function navigateTo(uri: string): Command {
  return { kind: "navigate_to", value: uri };
}

export function addClass(selector: string, className: string): Command {
  return { kind: "add_class", selector, value: className };
}

export function removeClass(selector: string, className: string): Command {
  return { kind: "remove_class", selector, value: className };
}

export function toggleClass(selector: string, className: string): Command {
  return { kind: "toggle_class", selector, value: className };
}

/** Reset the value of a form field. */
export function clearValue(selector: string): Command {
  return { kind: "clear_value", selector };
}

export function setTitle(title: string): Command {
  return { kind: "set_title", value: title };
}

export function historyPushState(uri: string): Command {
  return { kind: "history_push_state", value: uri };
}

/**
 * Return a copy of the command that runs after `ms` milliseconds.
 */
export function withDelay(command: Command, ms: number): Command {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Command delay must be a non-negative number, got ${ms}`);
  }
  return { ...command, delay_ms: Math.round(ms) };
}
