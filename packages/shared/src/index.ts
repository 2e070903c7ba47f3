/**
 * # StitchView Shared
 *
 * Types and codecs shared by the server and client packages: the error
 * taxonomy, the wire protocol, client commands and event payloads.
 *
 * @module @stitchview/shared
 */

export * from "./errors.js";
export * from "./commands.js";
export * from "./event-data.js";
export * from "./protocol.js";
