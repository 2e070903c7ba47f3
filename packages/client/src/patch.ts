/**
 * Patch application
 *
 * Client-side counterpart of the differ: folds a {@link TreePatch} into a
 * serialized tree and flattens serialized state back into HTML.
 *
 * A slot whose current value has the same kind as the patch is patched in
 * place; otherwise the patch is a full value and replaces it. `null`
 * removes a slot or loop entry.
 *
 * @module @stitchview/client/patch
 */

import {
  isLoopPatch,
  isSerializedLoop,
  type LoopPatch,
  type PatchValue,
  type SerializedLoop,
  type SerializedTree,
  type SerializedValue,
  type TreePatch,
} from "@stitchview/shared";

export function applyPatch(state: SerializedTree, patch: TreePatch): SerializedTree {
  return applyTreePatch(state, patch);
}

/**
 * Apply one slot patch. Returns `undefined` when the slot was removed.
 */
export function applyValue(
  current: SerializedValue | undefined,
  patch: PatchValue,
): SerializedValue | undefined {
  if (patch === null) return undefined;
  if (typeof patch === "string") return patch;

  if (isLoopPatch(patch)) {
    return applyLoopPatch(current !== undefined && isSerializedLoop(current) ? current : undefined, patch);
  }
  return applyTreePatch(current !== undefined && isTree(current) ? current : undefined, patch);
}

function applyTreePatch(current: SerializedTree | undefined, patch: TreePatch): SerializedTree {
  return {
    f: patch.f ?? current?.f ?? [],
    d: applySlots(current?.d ?? {}, patch.d ?? {}),
  };
}

function applyLoopPatch(current: SerializedLoop | undefined, patch: LoopPatch): SerializedLoop {
  // A new template resends every surviving entry in full.
  const base = patch.f === undefined ? current : undefined;
  const b: SerializedLoop["b"] = { ...base?.b };

  for (const [index, entry] of Object.entries(patch.b)) {
    if (entry === null) {
      delete b[index];
    } else {
      b[index] = applySlots(base?.b[index] ?? {}, entry);
    }
  }
  return { f: patch.f ?? current?.f ?? [], b };
}

function applySlots(
  current: Record<string, SerializedValue>,
  patch: Record<string, PatchValue>,
): Record<string, SerializedValue> {
  const next = { ...current };
  for (const [index, value] of Object.entries(patch)) {
    const applied = applyValue(current[index], value);
    if (applied === undefined) {
      delete next[index];
    } else {
      next[index] = applied;
    }
  }
  return next;
}

// ============================================================================
// Rendering
// ============================================================================

export function renderState(state: SerializedTree): string {
  return interleave(state.f, state.d);
}

function renderValue(value: SerializedValue): string {
  if (typeof value === "string") return value;
  if (isSerializedLoop(value)) {
    return Object.values(value.b)
      .map((entry) => interleave(value.f, entry))
      .join("");
  }
  return renderState(value);
}

function interleave(fixed: readonly string[], slots: Record<string, SerializedValue>): string {
  let out = "";
  fixed.forEach((segment, index) => {
    out += segment;
    const slot = slots[index];
    if (slot !== undefined) {
      out += renderValue(slot);
    }
  });
  return out;
}

function isTree(value: SerializedValue): value is SerializedTree {
  return typeof value === "object" && !isSerializedLoop(value);
}
