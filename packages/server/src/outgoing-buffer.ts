/**
 * Outgoing Buffer
 *
 * Holds server messages for one socket while it reports write pressure.
 * Every patch applies on top of the tree the client already has, so no
 * queued message may be skipped. When more than `maxBuffer` wait, the
 * buffer gives up on the socket: it closes it with 4008 and reports the
 * messages it never sent. The client has to mount its views again.
 *
 * @module @stitchview/server/outgoing-buffer
 */

import { Logger } from "@stitchview/kernel";
import type { ServerMessage } from "@stitchview/shared";
import type { SocketConnection } from "./transport.js";

export const OVERFLOW_CLOSE_CODE = 4008;

export interface OutgoingBufferOptions {
  /** Messages held under write pressure before giving up (default: 1000) */
  maxBuffer?: number;
  /** Called once, after the socket has been closed for overflow */
  onOverflow?: (unsent: ServerMessage[]) => void;
}

export class OutgoingBuffer {
  private readonly log = Logger.for("OutgoingBuffer");
  private readonly queue: ServerMessage[] = [];
  private overflowed = false;

  constructor(
    private readonly connection: SocketConnection,
    private readonly options: OutgoingBufferOptions = {},
  ) {}

  /**
   * Send or queue a message. Returns false when the socket is gone or the
   * buffer has given up on it.
   */
  push(message: ServerMessage): boolean {
    if (this.overflowed || !this.connection.isConnected) return false;

    this.flush();
    if (this.queue.length === 0 && !this.connection.isPressured?.()) {
      this.connection.send(message);
      return true;
    }

    this.queue.push(message);
    if (this.queue.length > (this.options.maxBuffer ?? 1000)) {
      this.giveUp();
      return false;
    }
    return true;
  }

  /**
   * Send queued messages, oldest first, until the socket reports pressure.
   */
  flush(): void {
    while (this.queue.length > 0 && this.connection.isConnected && !this.connection.isPressured?.()) {
      const next = this.queue.shift();
      if (next === undefined) return;
      this.connection.send(next);
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get hasOverflowed(): boolean {
    return this.overflowed;
  }

  clear(): void {
    this.queue.length = 0;
  }

  private giveUp(): void {
    this.overflowed = true;
    const unsent = this.queue.splice(0);
    const views = [
      ...new Set(unsent.flatMap((message) => ("componentId" in message ? [message.componentId] : []))),
    ];

    this.log.warn(
      { socket: this.connection.id, unsent: unsent.length, views },
      "outgoing buffer overflow, closing socket",
    );
    this.connection.close(OVERFLOW_CLOSE_CODE, "Outgoing buffer overflow");
    this.options.onOverflow?.(unsent);
  }
}
