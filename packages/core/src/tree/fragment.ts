/**
 * Fragment Tree
 *
 * A rendered view is literal `fixed` text interleaved with dynamic slots.
 * Re-rendering the same template yields the same `fixed` sequence and the
 * same slot layout; only slot values change. Trees are never mutated after
 * construction.
 *
 * @module @stitchview/core/tree
 */

export type DynamicFragment<M> =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "message"; readonly value: M }
  | { readonly kind: "nested"; readonly tree: Tree<M> }
  | LoopFragment<M>;

/**
 * A template body repeated over a collection. Every entry shares `fixed`;
 * each entry holds that iteration's slot values.
 */
export interface LoopFragment<M> {
  readonly kind: "loop";
  readonly fixed: readonly string[];
  readonly entries: ReadonlyArray<readonly DynamicFragment<M>[]>;
}

export interface Tree<M> {
  /** Literal segments; one more than the number of dynamic slots */
  readonly fixed: readonly string[];
  readonly dynamic: readonly DynamicFragment<M>[];
}

export type FragmentKind = DynamicFragment<unknown>["kind"];

// ============================================================================
// Constructors
// ============================================================================

export function tree<M>(fixed: readonly string[], dynamic: readonly DynamicFragment<M>[]): Tree<M> {
  return { fixed, dynamic };
}

export function text(value: string): DynamicFragment<never> {
  return { kind: "text", value };
}

export function message<M>(value: M): DynamicFragment<M> {
  return { kind: "message", value };
}

export function nested<M>(child: Tree<M>): DynamicFragment<M> {
  return { kind: "nested", tree: child };
}

export function loop<M>(
  fixed: readonly string[],
  entries: ReadonlyArray<readonly DynamicFragment<M>[]>,
): LoopFragment<M> {
  return { kind: "loop", fixed, entries };
}

/**
 * Build a loop from per-entry trees. Entries that share one template keep
 * it as the loop template; otherwise every entry becomes a nested tree in a
 * single-slot template.
 */
export function loopOf<M>(entries: readonly Tree<M>[]): LoopFragment<M> {
  const first = entries[0];
  if (first === undefined) {
    return loop([], []);
  }
  if (entries.every((entry) => fixedEqual(entry.fixed, first.fixed))) {
    return loop(
      first.fixed,
      entries.map((entry) => entry.dynamic),
    );
  }
  return loop(
    ["", ""],
    entries.map((entry) => [nested(entry)]),
  );
}

export function isTree(value: unknown): value is Tree<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "fixed" in value &&
    "dynamic" in value &&
    Array.isArray(value.fixed) &&
    Array.isArray(value.dynamic)
  );
}

export function fixedEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  return a.every((segment, index) => segment === b[index]);
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Rewrite every message token in a tree, e.g. to embed a child view whose
 * messages are wrapped into the parent's message type.
 */
export function mapMessages<A, B>(source: Tree<A>, fn: (message: A) => B): Tree<B> {
  return tree(
    source.fixed,
    source.dynamic.map((fragment) => mapFragment(fragment, fn)),
  );
}

function mapFragment<A, B>(fragment: DynamicFragment<A>, fn: (message: A) => B): DynamicFragment<B> {
  switch (fragment.kind) {
    case "text":
      return fragment;
    case "message":
      return message(fn(fragment.value));
    case "nested":
      return nested(mapMessages(fragment.tree, fn));
    case "loop":
      return loop(
        fragment.fixed,
        fragment.entries.map((entry) => entry.map((slot) => mapFragment(slot, fn))),
      );
  }
}
