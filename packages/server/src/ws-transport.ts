/**
 * WebSocket Transport
 *
 * Implements the Transport interface over `ws`. Each accepted socket gets a
 * {@link WSConnection} and a handler from the connection listener; text
 * frames go to the handler in order.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, Server } from "node:http";
import { WebSocketServer, type RawData } from "ws";
import type { ServerMessage } from "@stitchview/shared";
import { Logger } from "@stitchview/kernel";
import type {
  ConnectionHandler,
  ConnectionListener,
  ConnectionRequest,
  SocketConnection,
  Transport,
} from "./transport.js";

const OPEN = 1;
const HIGH_WATER_MARK = 64 * 1024;

/**
 * The part of a `ws` socket the transport relies on.
 */
export interface WebSocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface WSTransportConfig {
  port?: number;
  host?: string;
  /** Only upgrades on this path are accepted */
  path?: string;
  /** Share an existing HTTP server instead of listening on `port` */
  server?: Server;
}

// ============================================================================
// WebSocket Connection
// ============================================================================

export class WSConnection implements SocketConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocketLike,
  ) {}

  send(message: ServerMessage): void {
    if (this.socket.readyState === OPEN) {
      this.socket.send(JSON.stringify(message));
    }
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  get isConnected(): boolean {
    return this.socket.readyState === OPEN;
  }

  isPressured(): boolean {
    return this.socket.bufferedAmount > HIGH_WATER_MARK;
  }
}

// ============================================================================
// WebSocket Transport
// ============================================================================

export class WSTransport implements Transport {
  private readonly log = Logger.for("WSTransport");
  private wss: WebSocketServer | null = null;
  private readonly connections = new Map<string, WSConnection>();

  constructor(
    private readonly config: WSTransportConfig,
    private readonly listener: ConnectionListener,
  ) {}

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const { server, port, host, path } = this.config;
      const wss = server
        ? new WebSocketServer({ server, path })
        : new WebSocketServer({ port, host, path });
      this.wss = wss;

      wss.on("connection", (socket, request) => {
        this.handleSocket(socket, toConnectionRequest(request));
      });
      wss.on("error", (error) => {
        this.log.error({ err: error }, "websocket server error");
        reject(error);
      });

      if (server) {
        resolve();
      } else {
        wss.on("listening", () => {
          this.log.info({ port, host, path }, "listening");
          resolve();
        });
      }
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const wss = this.wss;
      if (!wss) {
        resolve();
        return;
      }

      for (const connection of this.connections.values()) {
        connection.close(1001, "Server shutting down");
      }
      this.connections.clear();

      wss.close(() => {
        this.wss = null;
        resolve();
      });
    });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Bound port once listening (useful with `port: 0`) */
  get port(): number | undefined {
    const address = this.wss?.address();
    return typeof address === "object" && address !== null ? address.port : undefined;
  }

  /**
   * Wire one accepted socket to a handler from the listener.
   */
  handleSocket(socket: WebSocketLike, request: ConnectionRequest): ConnectionHandler {
    const connection = new WSConnection(randomUUID(), socket);
    this.connections.set(connection.id, connection);
    const handler = this.listener(connection, request);

    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        this.log.warn({ socket: connection.id }, "ignoring binary frame");
        return;
      }
      handler.receive(rawToString(data));
    });

    socket.on("close", () => {
      this.connections.delete(connection.id);
      handler.close().catch((error: unknown) => {
        this.log.error({ socket: connection.id, err: error }, "session close failed");
      });
    });

    socket.on("error", (error) => {
      this.log.warn({ socket: connection.id, err: error }, "socket error");
    });

    return handler;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function toConnectionRequest(request: IncomingMessage): ConnectionRequest {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (value === undefined) continue;
    headers[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return { url: request.url, headers };
}
