/**
 * Transport interface
 *
 * Separates socket plumbing (WebSocket today) from the session logic that
 * speaks the view protocol.
 *
 * @module @stitchview/server/transport
 */

import type { ServerMessage } from "@stitchview/shared";

// ============================================================================
// Connections
// ============================================================================

/**
 * A connected client from the transport's perspective.
 */
export interface SocketConnection {
  readonly id: string;

  /** Send one message; dropped when the socket is no longer open */
  send(message: ServerMessage): void;

  close(code?: number, reason?: string): void;

  readonly isConnected: boolean;

  /** True while the socket's write buffer is above its high-water mark */
  isPressured?(): boolean;
}

/**
 * What the upgrade request told us about the observer.
 */
export interface ConnectionRequest {
  url?: string;
  headers: Record<string, string>;
}

/**
 * Receives the frames of one connection.
 */
export interface ConnectionHandler {
  receive(raw: string): void;
  /** Called once the socket has closed */
  close(): Promise<void>;
}

export type ConnectionListener = (
  connection: SocketConnection,
  request: ConnectionRequest,
) => ConnectionHandler;

// ============================================================================
// Transport
// ============================================================================

export interface Transport {
  start(): Promise<void>;
  stop(): Promise<void>;
  readonly connectionCount: number;
}
