export * from "./fragment.js";
export { TreeBuilder } from "./builder.js";
export { html, msg, each, raw, escapeHtml, Slot, type Interpolation, type Primitive } from "./html.js";
export { serializeTree, serializeFragment, serializeLoop, serializeSlots } from "./serialize.js";
export { renderTree } from "./render.js";
export { diffTrees, diffFragments } from "./diff.js";
