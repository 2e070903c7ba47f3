/**
 * Wire protocol
 *
 * JSON envelopes exchanged between a connected client and the server, and
 * the serialized forms of fragment trees and patches they carry.
 *
 * Server → client: `{ componentId, kind, payload }` where `kind` is
 * `initial_render` (a full {@link SerializedTree}), `rendered` (a
 * {@link TreePatch}) or `commands` (a list of {@link Command}).
 *
 * Client → server: `{ componentId, topic, data }`. Event data carries the
 * component's message as `m`, a percent-encoded JSON token, plus short
 * fields for the event payload.
 *
 * @module @stitchview/shared/protocol
 */

import { z } from "zod";
import { commandSchema, type Command } from "./commands.js";
import { DecodeError, SerializationError } from "./errors.js";
import { inputValueSchema, type EventPayload } from "./event-data.js";

// ============================================================================
// Serialized trees and patches
// ============================================================================

/** Text or message token, nested tree, or loop */
export type SerializedValue = string | SerializedTree | SerializedLoop;

export interface SerializedTree {
  f: string[];
  d: Record<string, SerializedValue>;
}

export interface SerializedLoop {
  f: string[];
  b: Record<string, Record<string, SerializedValue>>;
}

/**
 * One slot of a patch: a leaf value, a full value (new slot or kind change),
 * a recursive patch, or `null` for "removed".
 */
export type PatchValue = string | null | TreePatch | LoopPatch;

export interface TreePatch {
  f?: string[];
  d?: Record<string, PatchValue>;
}

/**
 * Loop patch. When `f` is present the template changed and every entry in
 * `b` is a full entry that replaces the client's copy.
 */
export interface LoopPatch {
  f?: string[];
  b: Record<string, Record<string, PatchValue> | null>;
}

export const serializedValueSchema: z.ZodType<SerializedValue> = z.lazy(() =>
  z.union([z.string(), serializedLoopSchema, serializedTreeSchema]),
);

export const serializedTreeSchema: z.ZodType<SerializedTree> = z.lazy(() =>
  z.object({
    f: z.array(z.string()),
    d: z.record(z.string(), serializedValueSchema),
  }),
);

export const serializedLoopSchema: z.ZodType<SerializedLoop> = z.lazy(() =>
  z.object({
    f: z.array(z.string()),
    b: z.record(z.string(), z.record(z.string(), serializedValueSchema)),
  }),
);

export const patchValueSchema: z.ZodType<PatchValue> = z.lazy(() =>
  z.union([z.string(), z.null(), loopPatchSchema, treePatchSchema]),
);

export const treePatchSchema: z.ZodType<TreePatch> = z.lazy(() =>
  z.object({
    f: z.array(z.string()).optional(),
    d: z.record(z.string(), patchValueSchema).optional(),
  }),
);

export const loopPatchSchema: z.ZodType<LoopPatch> = z.lazy(() =>
  z.object({
    f: z.array(z.string()).optional(),
    b: z.record(z.string(), z.record(z.string(), patchValueSchema).nullable()),
  }),
);

export function isSerializedLoop(value: SerializedValue): value is SerializedLoop {
  return typeof value === "object" && "b" in value;
}

export function isLoopPatch(value: TreePatch | LoopPatch): value is LoopPatch {
  return "b" in value;
}

// ============================================================================
// Message tokens
// ============================================================================

/**
 * Encode a component message as the token embedded in HTML attributes.
 *
 * @throws SerializationError when the value has no JSON form
 */
export function encodeMessageToken(message: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(message);
  } catch (error) {
    throw new SerializationError("Message token is not serializable", { cause: error });
  }
  if (json === undefined) {
    throw new SerializationError(`Message token is not serializable: ${typeof message}`);
  }
  return encodeURIComponent(json);
}

/**
 * @throws DecodeError when the token is not percent-encoded JSON
 */
export function decodeMessageToken(token: string): unknown {
  try {
    return JSON.parse(decodeURIComponent(token));
  } catch (error) {
    throw new DecodeError("Invalid message token", { token }, { cause: error });
  }
}

// ============================================================================
// Server → client
// ============================================================================

export type ServerMessage =
  | { componentId: string; kind: "initial_render"; payload: SerializedTree }
  | { componentId: string; kind: "rendered"; payload: TreePatch }
  | { componentId: string; kind: "commands"; payload: Command[] }
  | { kind: "health" };

/** Messages that belong to one mounted view */
export type ViewServerMessage = Extract<ServerMessage, { componentId: string }>;

export type ServerMessageKind = ServerMessage["kind"];

export const serverMessageSchema = z.discriminatedUnion("kind", [
  z.object({
    componentId: z.string(),
    kind: z.literal("initial_render"),
    payload: serializedTreeSchema,
  }),
  z.object({ componentId: z.string(), kind: z.literal("rendered"), payload: treePatchSchema }),
  z.object({ componentId: z.string(), kind: z.literal("commands"), payload: z.array(commandSchema) }),
  z.object({ kind: z.literal("health") }),
]);

export function decodeServerMessage(raw: string): ServerMessage {
  return parseJson(raw, serverMessageSchema, "server message");
}

// ============================================================================
// Client → server
// ============================================================================

/**
 * Event topics a client may send, grouped by the payload their data carries.
 */
export const EventTopics = {
  click: "message",
  window_focus: "message",
  window_blur: "message",
  input: "form",
  change: "form",
  submit: "form",
  focus: "form",
  blur: "form",
  keydown: "key",
  keyup: "key",
  window_keydown: "key",
  window_keyup: "key",
  mouseenter: "mouse",
  mouseover: "mouse",
  mouseleave: "mouse",
  mouseout: "mouse",
  mousemove: "mouse",
  scroll: "scroll",
} as const;

export type EventTopic = keyof typeof EventTopics;

export const MOUNT_TOPIC = "mount";

/** Liveness check; the server answers with a `health` message */
export const HEALTH_TOPIC = "health";

export type ClientTopic = typeof MOUNT_TOPIC | typeof HEALTH_TOPIC | EventTopic;

export interface ViewEnvelope {
  componentId: string;
  topic: typeof MOUNT_TOPIC | EventTopic;
  data?: Record<string, unknown>;
}

export type ClientEnvelope = ViewEnvelope | { topic: typeof HEALTH_TOPIC };

/**
 * A decoded client message.
 */
export type ClientMessage =
  | { type: "health" }
  | { type: "mount"; componentId: string }
  | {
      type: "event";
      componentId: string;
      topic: EventTopic;
      message: unknown;
      payload?: EventPayload;
    };

const envelopeSchema = z.object({
  componentId: z.string().min(1).optional(),
  topic: z.string(),
  data: z.record(z.string(), z.unknown()).optional(),
});

const tokenField = { m: z.string() };

const messageDataSchema = z.object(tokenField);

const formDataSchema = z.union([
  z.object({ ...tokenField, q: z.string() }),
  z.object({ ...tokenField, v: inputValueSchema }),
]);

const keyDataSchema = z.object({
  ...tokenField,
  k: z.string(),
  kc: z.string(),
  a: z.boolean(),
  c: z.boolean(),
  s: z.boolean(),
  me: z.boolean(),
});

const mouseDataSchema = z.object({
  ...tokenField,
  cx: z.number(),
  cy: z.number(),
  px: z.number(),
  py: z.number(),
  ox: z.number(),
  oy: z.number(),
  mx: z.number(),
  my: z.number(),
  sx: z.number(),
  sy: z.number(),
});

const scrollDataSchema = z.object({ ...tokenField, sx: z.number(), sy: z.number() });

function isEventTopic(topic: string): topic is EventTopic {
  return Object.prototype.hasOwnProperty.call(EventTopics, topic);
}

/**
 * Decode one text frame from a client.
 *
 * @throws DecodeError on malformed JSON, an unknown topic, or data that
 * does not match the topic's payload
 */
export function decodeClientMessage(raw: string): ClientMessage {
  const envelope = parseJson(raw, envelopeSchema, "client message");
  const { componentId, topic } = envelope;
  const data = envelope.data ?? {};

  if (topic === HEALTH_TOPIC) {
    return { type: "health" };
  }
  if (componentId === undefined) {
    throw new DecodeError(`Missing componentId for topic: ${topic}`, { topic });
  }
  if (topic === MOUNT_TOPIC) {
    return { type: "mount", componentId };
  }
  if (!isEventTopic(topic)) {
    throw new DecodeError(`Unknown topic: ${topic}`, { topic });
  }
  const eventTopic: EventTopic = topic;

  const event = (message: string, payload?: EventPayload): ClientMessage => ({
    type: "event",
    componentId,
    topic: eventTopic,
    message: decodeMessageToken(message),
    ...(payload ? { payload } : {}),
  });

  switch (EventTopics[eventTopic]) {
    case "message": {
      const parsed = validate(messageDataSchema, data, topic);
      return event(parsed.m);
    }
    case "form": {
      const parsed = validate(formDataSchema, data, topic);
      return "q" in parsed
        ? event(parsed.m, { type: "form", query: parsed.q })
        : event(parsed.m, { type: "input", value: parsed.v });
    }
    case "key": {
      const parsed = validate(keyDataSchema, data, topic);
      return event(parsed.m, {
        type: "key",
        key: parsed.k,
        code: parsed.kc,
        alt: parsed.a,
        ctrl: parsed.c,
        shift: parsed.s,
        meta: parsed.me,
      });
    }
    case "mouse": {
      const parsed = validate(mouseDataSchema, data, topic);
      return event(parsed.m, {
        type: "mouse",
        clientX: parsed.cx,
        clientY: parsed.cy,
        pageX: parsed.px,
        pageY: parsed.py,
        offsetX: parsed.ox,
        offsetY: parsed.oy,
        movementX: parsed.mx,
        movementY: parsed.my,
        screenX: parsed.sx,
        screenY: parsed.sy,
      });
    }
    case "scroll": {
      const parsed = validate(scrollDataSchema, data, topic);
      return event(parsed.m, { type: "scroll", scrollX: parsed.sx, scrollY: parsed.sy });
    }
  }
}

/**
 * Build the envelope a client sends for an event. The message is encoded
 * as a token; `payload` is spread into the short wire fields.
 */
export function encodeClientEvent(
  componentId: string,
  topic: EventTopic,
  message: unknown,
  payload?: EventPayload,
): ViewEnvelope {
  const data: Record<string, unknown> = { m: encodeMessageToken(message) };

  switch (payload?.type) {
    case undefined:
      break;
    case "form":
      data["q"] = payload.query;
      break;
    case "input":
      data["v"] = payload.value;
      break;
    case "key":
      Object.assign(data, {
        k: payload.key,
        kc: payload.code,
        a: payload.alt,
        c: payload.ctrl,
        s: payload.shift,
        me: payload.meta,
      });
      break;
    case "mouse":
      Object.assign(data, {
        cx: payload.clientX,
        cy: payload.clientY,
        px: payload.pageX,
        py: payload.pageY,
        ox: payload.offsetX,
        oy: payload.offsetY,
        mx: payload.movementX,
        my: payload.movementY,
        sx: payload.screenX,
        sy: payload.screenY,
      });
      break;
    case "scroll":
      Object.assign(data, { sx: payload.scrollX, sy: payload.scrollY });
      break;
  }

  return { componentId, topic, data };
}

export function encodeMount(componentId: string): ViewEnvelope {
  return { componentId, topic: MOUNT_TOPIC };
}

export function encodeHealth(): ClientEnvelope {
  return { topic: HEALTH_TOPIC };
}

// ============================================================================
// Helpers
// ============================================================================

function parseJson<S extends z.ZodTypeAny>(raw: string, schema: S, what: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new DecodeError(`Invalid JSON in ${what}`, undefined, { cause: error });
  }
  return validate(schema, json, what);
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(`Invalid ${what}`, { issues: result.error.issues });
  }
  return result.data;
}
