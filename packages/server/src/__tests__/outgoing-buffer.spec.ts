/**
 * OutgoingBuffer Tests
 *
 * Messages go straight out until the socket reports pressure, queue in
 * order while it does, and close the socket once too many wait.
 */

import { describe, it, expect, vi } from "vitest";
import type { ServerMessage } from "@stitchview/shared";
import { OVERFLOW_CLOSE_CODE, OutgoingBuffer } from "../outgoing-buffer.js";
import { FakeConnection } from "./fixtures.js";

function patch(n: number, componentId = "view"): ServerMessage {
  return { componentId, kind: "rendered", payload: { d: { "0": String(n) } } };
}

function pressured(): FakeConnection {
  const connection = new FakeConnection();
  connection.pressured = true;
  return connection;
}

describe("OutgoingBuffer", () => {
  it("sends directly while the socket keeps up", () => {
    const connection = new FakeConnection();
    const buffer = new OutgoingBuffer(connection);

    expect(buffer.push(patch(1))).toBe(true);
    expect(buffer.push(patch(2))).toBe(true);

    expect(connection.sent).toEqual([patch(1), patch(2)]);
    expect(buffer.pending).toBe(0);
  });

  it("queues under pressure and sends everything in order afterwards", () => {
    const connection = pressured();
    const buffer = new OutgoingBuffer(connection);

    buffer.push(patch(1));
    buffer.push(patch(2));
    expect(connection.sent).toEqual([]);
    expect(buffer.pending).toBe(2);

    connection.pressured = false;
    buffer.push(patch(3));

    expect(connection.sent).toEqual([patch(1), patch(2), patch(3)]);
    expect(buffer.pending).toBe(0);
  });

  it("flush() sends what is queued", () => {
    const connection = pressured();
    const buffer = new OutgoingBuffer(connection);
    buffer.push(patch(1));

    connection.pressured = false;
    buffer.flush();

    expect(connection.sent).toEqual([patch(1)]);
  });

  describe("overflow", () => {
    it("closes the socket instead of skipping a patch", () => {
      const connection = pressured();
      const onOverflow = vi.fn();
      const buffer = new OutgoingBuffer(connection, { maxBuffer: 2, onOverflow });

      expect(buffer.push(patch(1, "a"))).toBe(true);
      expect(buffer.push(patch(2, "b"))).toBe(true);
      expect(buffer.push(patch(3, "a"))).toBe(false);

      expect(connection.closeCode).toBe(OVERFLOW_CLOSE_CODE);
      expect(connection.closeReason).toBe("Outgoing buffer overflow");
      expect(onOverflow).toHaveBeenCalledTimes(1);
      expect(onOverflow).toHaveBeenCalledWith([patch(1, "a"), patch(2, "b"), patch(3, "a")]);
      expect(buffer.pending).toBe(0);
      expect(buffer.hasOverflowed).toBe(true);
    });

    it("refuses messages once it has given up", () => {
      const connection = pressured();
      const buffer = new OutgoingBuffer(connection, { maxBuffer: 1 });
      buffer.push(patch(1));
      buffer.push(patch(2));

      connection.connected = true;
      connection.pressured = false;

      expect(buffer.push(patch(3))).toBe(false);
      expect(connection.sent).toEqual([]);
    });
  });

  describe("closed sockets", () => {
    it("drops messages for a closed socket", () => {
      const connection = new FakeConnection();
      connection.connected = false;
      const buffer = new OutgoingBuffer(connection);

      expect(buffer.push(patch(1))).toBe(false);
      expect(buffer.pending).toBe(0);
    });

    it("stops flushing when the socket closes", () => {
      const connection = pressured();
      const buffer = new OutgoingBuffer(connection);
      for (let i = 0; i < 5; i++) {
        buffer.push(patch(i));
      }

      const send = connection.send.bind(connection);
      connection.send = (message) => {
        send(message);
        if (connection.sent.length === 2) connection.close(1000, "gone");
      };
      connection.pressured = false;
      buffer.flush();

      expect(connection.sent).toEqual([patch(0), patch(1)]);
      expect(buffer.pending).toBe(3);
    });

    it("clear() empties the queue", () => {
      const buffer = new OutgoingBuffer(pressured());
      buffer.push(patch(1));

      buffer.clear();

      expect(buffer.pending).toBe(0);
    });
  });
});
