/**
 * Tree serialization
 *
 * Wire form of a tree: `{ f: fixed, d: { index: value } }`. Text is a
 * string, a message is its percent-encoded JSON token, a loop is
 * `{ f: fixed, b: { entry: { index: value } } }`.
 *
 * @module @stitchview/core/tree
 */

import {
  encodeMessageToken,
  type SerializedLoop,
  type SerializedTree,
  type SerializedValue,
} from "@stitchview/shared";
import type { DynamicFragment, LoopFragment, Tree } from "./fragment.js";

/**
 * @throws SerializationError when a message token has no JSON form
 */
export function serializeTree<M>(source: Tree<M>): SerializedTree {
  return { f: [...source.fixed], d: serializeSlots(source.dynamic) };
}

export function serializeFragment<M>(fragment: DynamicFragment<M>): SerializedValue {
  switch (fragment.kind) {
    case "text":
      return fragment.value;
    case "message":
      return encodeMessageToken(fragment.value);
    case "nested":
      return serializeTree(fragment.tree);
    case "loop":
      return serializeLoop(fragment);
  }
}

export function serializeLoop<M>(fragment: LoopFragment<M>): SerializedLoop {
  const b: SerializedLoop["b"] = {};
  fragment.entries.forEach((entry, index) => {
    b[index] = serializeSlots(entry);
  });
  return { f: [...fragment.fixed], b };
}

export function serializeSlots<M>(
  slots: readonly DynamicFragment<M>[],
): Record<string, SerializedValue> {
  const d: Record<string, SerializedValue> = {};
  slots.forEach((slot, index) => {
    d[index] = serializeFragment(slot);
  });
  return d;
}
