/**
 * Differ
 *
 * Positional diff between two trees rendered from the same template.
 * Returns `undefined` when nothing changed.
 *
 * - a changed `fixed` sequence is sent whole
 * - slots are compared index by index; `null` marks a slot that no longer exists
 * - a slot whose fragment kind changed, or that is new, is sent in full
 * - messages compare by value, not by their serialized token
 * - loop entries align by position; a changed loop template resends every entry
 *
 * @module @stitchview/core/tree
 */

import { isDeepStrictEqual } from "node:util";
import {
  encodeMessageToken,
  type LoopPatch,
  type PatchValue,
  type TreePatch,
} from "@stitchview/shared";
import { fixedEqual, type DynamicFragment, type LoopFragment, type Tree } from "./fragment.js";
import { serializeFragment, serializeLoop, serializeSlots, serializeTree } from "./serialize.js";

export function diffTrees<M>(previous: Tree<M>, next: Tree<M>): TreePatch | undefined {
  const patch: TreePatch = {};
  if (!fixedEqual(previous.fixed, next.fixed)) {
    patch.f = [...next.fixed];
  }
  const d = diffSlots(previous.dynamic, next.dynamic);
  if (d !== undefined) {
    patch.d = d;
  }
  return patch.f !== undefined || patch.d !== undefined ? patch : undefined;
}

export function diffFragments<M>(
  previous: DynamicFragment<M>,
  next: DynamicFragment<M>,
): PatchValue | undefined {
  switch (next.kind) {
    case "text":
      return previous.kind === "text" && previous.value === next.value ? undefined : next.value;
    case "message":
      return previous.kind === "message" && isDeepStrictEqual(previous.value, next.value)
        ? undefined
        : encodeMessageToken(next.value);
    case "nested":
      return previous.kind === "nested"
        ? diffTrees(previous.tree, next.tree)
        : serializeTree(next.tree);
    case "loop":
      return previous.kind === "loop" ? diffLoops(previous, next) : serializeLoop(next);
  }
}

function diffLoops<M>(previous: LoopFragment<M>, next: LoopFragment<M>): LoopPatch | undefined {
  const b: LoopPatch["b"] = {};

  if (!fixedEqual(previous.fixed, next.fixed)) {
    next.entries.forEach((entry, index) => {
      b[index] = serializeSlots(entry);
    });
    for (let index = next.entries.length; index < previous.entries.length; index++) {
      b[index] = null;
    }
    return { f: [...next.fixed], b };
  }

  const length = Math.max(previous.entries.length, next.entries.length);
  for (let index = 0; index < length; index++) {
    if (index >= next.entries.length) {
      b[index] = null;
    } else if (index >= previous.entries.length) {
      b[index] = serializeSlots(next.entries[index]);
    } else {
      const entryPatch = diffSlots(previous.entries[index], next.entries[index]);
      if (entryPatch !== undefined) {
        b[index] = entryPatch;
      }
    }
  }
  return Object.keys(b).length > 0 ? { b } : undefined;
}

function diffSlots<M>(
  previous: readonly DynamicFragment<M>[],
  next: readonly DynamicFragment<M>[],
): Record<string, PatchValue> | undefined {
  const d: Record<string, PatchValue> = {};
  let changed = false;
  const length = Math.max(previous.length, next.length);

  for (let index = 0; index < length; index++) {
    const before = previous[index];
    const after = next[index];

    if (after === undefined) {
      d[index] = null;
      changed = true;
    } else if (before === undefined) {
      d[index] = serializeFragment(after);
      changed = true;
    } else {
      const value = diffFragments(before, after);
      if (value !== undefined) {
        d[index] = value;
        changed = true;
      }
    }
  }
  return changed ? d : undefined;
}
