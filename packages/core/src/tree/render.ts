/**
 * Renderer
 *
 * Flattens a tree into HTML by interleaving fixed segments with rendered
 * slots. Pure; the only failure is a message token without a JSON form.
 *
 * @module @stitchview/core/tree
 */

import { encodeMessageToken } from "@stitchview/shared";
import type { DynamicFragment, Tree } from "./fragment.js";

export function renderTree<M>(source: Tree<M>): string {
  return renderSlots(source.fixed, source.dynamic);
}

function renderSlots<M>(fixed: readonly string[], slots: readonly DynamicFragment<M>[]): string {
  let out = "";
  fixed.forEach((segment, index) => {
    out += segment;
    const slot = slots[index];
    if (slot !== undefined) {
      out += renderFragment(slot);
    }
  });
  return out;
}

function renderFragment<M>(fragment: DynamicFragment<M>): string {
  switch (fragment.kind) {
    case "text":
      return fragment.value;
    case "message":
      return encodeMessageToken(fragment.value);
    case "nested":
      return renderTree(fragment.tree);
    case "loop":
      return fragment.entries.map((entry) => renderSlots(fragment.fixed, entry)).join("");
  }
}
