/**
 * # StitchView Core
 *
 * Fragment trees and the machinery around one component instance:
 *
 * - **Tree** - fixed text interleaved with dynamic slots, built by `html` or `TreeBuilder`
 * - **Renderer / Differ** - full HTML for first load, positional patches afterwards
 * - **Component** - the contract user views implement
 * - **ViewActor** - serializes mount, update and render through a mailbox
 *
 * @module @stitchview/core
 */

export * from "./tree/index.js";
export type { Component, MountContext, ViewDefinition } from "./component.js";
export { Updated, updated, type SpawnedTask } from "./updated.js";
export {
  SubscriptionSet,
  jsonDecoder,
  encodeJson,
  type Decoder,
  type Subscriptions,
  type SubscriptionEntry,
} from "./subscriptions.js";
export { ViewActor, type UpdateResponse, type ViewActorOptions } from "./view-actor.js";
