/**
 * View Server
 *
 * Ties the pieces together: embedding a view starts a life-cycle engine
 * on the bus and returns the HTML to put in the page; each socket
 * connection gets a session that mounts views and forwards events.
 *
 * @example
 * ```typescript
 * const server = new ViewServer({ config: { port: 4400 } });
 * await server.listen();
 *
 * app.get("/", async (_req, res) => {
 *   const view = await server.embed(counter, { start: 0 });
 *   res.send(page(view.html));
 * });
 * ```
 *
 * @module @stitchview/server/view-server
 */

import { randomUUID } from "node:crypto";
import { Logger } from "@stitchview/kernel";
import { SubscriptionSet, type ViewDefinition } from "@stitchview/core";
import { loadConfig, type ServerConfig, type ServerConfigInput } from "./config.js";
import { LifecycleEngine, type LifecycleState } from "./lifecycle.js";
import { InProcessPubSub, type PubSub } from "./pubsub.js";
import { SocketSession } from "./socket-session.js";
import type { ConnectionRequest, SocketConnection } from "./transport.js";
import { WSTransport, type WSTransportConfig } from "./ws-transport.js";

export interface ViewServerOptions {
  /** Bus shared with other processes; defaults to an in-process bus */
  pubsub?: PubSub;
  config?: ServerConfigInput;
  env?: NodeJS.ProcessEnv;
}

export interface EmbeddedView {
  componentId: string;
  /** Rendered view wrapped in its `data-stitchview-id` container */
  html: string;
}

interface RunningView {
  readonly state: LifecycleState;
  readonly done: Promise<void>;
  terminate(): Promise<void>;
}

export class ViewServer {
  private readonly log = Logger.for("ViewServer");
  private readonly views = new Map<string, RunningView>();
  private readonly sessions = new Set<SocketSession>();
  private transport: WSTransport | undefined;

  readonly config: ServerConfig;
  readonly pubsub: PubSub;

  constructor(options: ViewServerOptions = {}) {
    this.config = loadConfig(options.config, options.env);
    Logger.configure({ level: this.config.logLevel });
    this.pubsub =
      options.pubsub ?? new InProcessPubSub({ capacity: this.config.subscriptionCapacity });
  }

  /**
   * Create a component instance, start its engine and render it for the
   * first page load. The view waits `mountTimeoutMs` for a socket to mount
   * it before giving up.
   */
  async embed<M, P>(definition: ViewDefinition<M, P>, props: P): Promise<EmbeddedView> {
    const componentId = randomUUID();
    const component = definition.create(props);

    const subscriptions = new SubscriptionSet<M>();
    component.subscriptions?.(subscriptions);

    const engine = new LifecycleEngine<M>({
      componentId,
      component,
      pubsub: this.pubsub,
      messages: definition.messages,
      subscriptions: subscriptions.entries,
      mountTimeoutMs: this.config.mountTimeoutMs,
      mailboxCapacity: this.config.mailboxCapacity,
    });

    const body = await engine.renderToString();
    await engine.start();
    this.views.set(componentId, engine);
    void engine.done.then(() => {
      this.views.delete(componentId);
      this.log.debug({ componentId, view: definition.name }, "view ended");
    });

    this.log.debug({ componentId, view: definition.name }, "view embedded");
    return { componentId, html: wrapView(componentId, body) };
  }

  /**
   * Open a session for a connected socket. The caller feeds it frames
   * and closes it when the socket goes away.
   */
  connect(connection: SocketConnection, request?: ConnectionRequest): SocketSession {
    const session = new SocketSession(connection, {
      pubsub: this.pubsub,
      request,
      mountTimeoutMs: this.config.mountTimeoutMs,
      maxBuffer: this.config.socketMaxBuffer,
    });
    this.sessions.add(session);
    void session.done.then(() => {
      this.sessions.delete(session);
    });
    return session;
  }

  /**
   * Accept WebSocket connections on the configured host, port and path,
   * or on an existing HTTP server.
   */
  async listen(options: Pick<WSTransportConfig, "server"> = {}): Promise<WSTransport> {
    if (this.transport) return this.transport;

    const { host, port, path } = this.config;
    const transport = new WSTransport({ host, port, path, ...options }, (connection, request) =>
      this.connect(connection, request),
    );
    await transport.start();
    this.transport = transport;
    return transport;
  }

  /** Number of views whose engine has not terminated */
  get viewCount(): number {
    return this.views.size;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Stop accepting connections, then end every session and view.
   */
  async close(): Promise<void> {
    await this.transport?.stop();
    this.transport = undefined;

    await Promise.all([...this.sessions].map((session) => session.close()));
    await Promise.all([...this.views.values()].map((view) => view.terminate()));
  }
}

export function wrapView(componentId: string, body: string): string {
  return `<div data-stitchview-id="${componentId}">${body}</div>`;
}
