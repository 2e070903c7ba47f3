/**
 * Subscriptions
 *
 * Ad-hoc bus topics a component listens to besides its own update topic.
 * Payloads arrive as bytes; each registration supplies the decoder that
 * turns them into a value and the mapping from that value to a message.
 *
 * @example
 * ```typescript
 * subscriptions(subs: Subscriptions<Msg>) {
 *   subs.on("chat/lobby", jsonDecoder(chatLine), (line) => ({ type: "line", line }));
 * }
 * ```
 *
 * @module @stitchview/core/subscriptions
 */

import { z } from "zod";
import { DecodeError } from "@stitchview/shared";

export type Decoder<T> = (payload: Uint8Array) => T;

export interface Subscriptions<M> {
  on<T>(topic: string, decode: Decoder<T>, toMessage: (value: T) => M): this;
}

export interface SubscriptionEntry<M> {
  readonly topic: string;
  /** Decode a payload into a message; throws DecodeError on bad payloads. */
  readonly receive: (payload: Uint8Array) => M;
}

export class SubscriptionSet<M> implements Subscriptions<M> {
  private readonly registered: SubscriptionEntry<M>[] = [];

  on<T>(topic: string, decode: Decoder<T>, toMessage: (value: T) => M): this {
    this.registered.push({
      topic,
      receive: (payload) => toMessage(decode(payload)),
    });
    return this;
  }

  get entries(): readonly SubscriptionEntry<M>[] {
    return this.registered;
  }

  get topics(): string[] {
    return this.registered.map((entry) => entry.topic);
  }
}

// ============================================================================
// Decoders
// ============================================================================

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

/**
 * Decode UTF-8 JSON and validate it.
 */
export function jsonDecoder<S extends z.ZodTypeAny>(schema: S): Decoder<z.output<S>> {
  return (payload) => {
    let value: unknown;
    try {
      value = JSON.parse(textDecoder.decode(payload));
    } catch (error) {
      throw new DecodeError("Payload is not JSON", undefined, { cause: error });
    }
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new DecodeError("Payload does not match schema", { issues: result.error.issues });
    }
    return result.data;
  };
}

export function encodeJson(value: unknown): Uint8Array {
  return textEncoder.encode(JSON.stringify(value));
}
