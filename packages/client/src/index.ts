/**
 * # StitchView Client
 *
 * Client-side half of the protocol: applies patches to serialized view
 * state, reconstructs HTML, and encodes mounts and events.
 *
 * @module @stitchview/client
 */

export { applyPatch, applyValue, renderState } from "./patch.js";
export { ViewClient, findViewIds, type ViewClientOptions } from "./view-client.js";
