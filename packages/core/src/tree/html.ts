/**
 * html template front end
 *
 * A tagged template produces a {@link Tree} directly: the template's
 * strings array is the call site's interned `fixed` sequence, and each
 * interpolation becomes one dynamic slot.
 *
 * - primitives render as escaped text (`null`, `undefined` and `false` as "")
 * - `msg(value)` embeds a message token, e.g. for `data-click`
 * - `each(items, fn)` repeats a template as a loop
 * - a nested `html` result becomes a nested tree
 * - `raw(markup)` skips escaping
 *
 * @example
 * ```typescript
 * const view = html<Msg>`
 *   <button data-click="${msg({ type: "inc" })}">+</button>
 *   <ul>${each(todos, (todo) => html<Msg>`<li>${todo.title}</li>`)}</ul>
 * `;
 * ```
 *
 * @module @stitchview/core/tree
 */

import {
  isTree,
  loopOf,
  message,
  nested,
  text,
  type DynamicFragment,
  type Tree,
} from "./fragment.js";

/**
 * A prepared dynamic value (message token, loop or raw text).
 */
export class Slot<M> {
  constructor(readonly fragment: DynamicFragment<M>) {}
}

export type Primitive = string | number | bigint | boolean | null | undefined;

export type Interpolation<M> = Primitive | Tree<M> | Slot<M>;

export function html<M = never>(
  strings: TemplateStringsArray,
  ...values: Interpolation<M>[]
): Tree<M> {
  return { fixed: strings, dynamic: values.map((value) => toFragment(value)) };
}

export function msg<M>(value: M): Slot<M> {
  return new Slot(message(value));
}

export function each<T, M>(items: Iterable<T>, fn: (item: T, index: number) => Tree<M>): Slot<M> {
  return new Slot(loopOf(Array.from(items, fn)));
}

export function raw(markup: string): Slot<never> {
  return new Slot(text(markup));
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

function toFragment<M>(value: Interpolation<M>): DynamicFragment<M> {
  if (value instanceof Slot) return value.fragment;
  if (isTree(value)) return nested(value);
  if (value === null || value === undefined || value === false) return text("");
  return text(escapeHtml(String(value)));
}
