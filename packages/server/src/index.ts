/**
 * # StitchView Server
 *
 * Runs embedded views and connects them to browsers:
 *
 * - **PubSub** - byte topics with a per-subscriber queue
 * - **LifecycleEngine** - one per embedded view; fans renders out to every observer
 * - **SocketSession** - one per connected socket; mounts views and forwards events
 * - **WSTransport** - WebSocket plumbing on top of `ws`
 * - **ViewServer** - embeds views and accepts connections
 *
 * @example
 * ```typescript
 * import { ViewServer } from "@stitchview/server";
 *
 * const server = new ViewServer();
 * await server.listen();
 * const { html } = await server.embed(counter, undefined);
 * ```
 *
 * @module @stitchview/server
 */

export { loadConfig, serverConfigSchema, type ServerConfig, type ServerConfigInput } from "./config.js";
export {
  InProcessPubSub,
  type InProcessPubSubOptions,
  type PubSub,
  type Subscription,
} from "./pubsub.js";
export {
  Topics,
  decodeDisconnected,
  decodeInitialRender,
  decodeMounted,
  decodeRendered,
  decodeUpdate,
  encodePayload,
  type InitialRenderPayload,
  type MountedPayload,
  type RenderedPayload,
  type UpdatePayload,
} from "./topics.js";
export { LifecycleEngine, type LifecycleEngineOptions, type LifecycleState } from "./lifecycle.js";
export {
  OutgoingBuffer,
  OVERFLOW_CLOSE_CODE,
  type OutgoingBufferOptions,
} from "./outgoing-buffer.js";
export { SocketSession, type SocketSessionOptions } from "./socket-session.js";
export type {
  ConnectionHandler,
  ConnectionListener,
  ConnectionRequest,
  SocketConnection,
  Transport,
} from "./transport.js";
export { WSConnection, WSTransport, type WSTransportConfig, type WebSocketLike } from "./ws-transport.js";
export { ViewServer, wrapView, type EmbeddedView, type ViewServerOptions } from "./view-server.js";
