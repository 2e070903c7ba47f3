/**
 * Event payloads
 *
 * Structured data that accompanies a client event: the state of a form, an
 * input's value, key modifiers, pointer coordinates or scroll offsets.
 * {@link EventPayload} is the plain JSON form that crosses the bus;
 * {@link EventData} is what a component's `update` receives.
 *
 * @module @stitchview/shared/event-data
 */

import { z } from "zod";
import { DecodeError } from "./errors.js";

// ============================================================================
// Payloads
// ============================================================================

export type InputValue = boolean | string | string[];

export interface KeyData {
  key: string;
  code: string;
  alt: boolean;
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
}

export interface MouseData {
  clientX: number;
  clientY: number;
  pageX: number;
  pageY: number;
  offsetX: number;
  offsetY: number;
  movementX: number;
  movementY: number;
  screenX: number;
  screenY: number;
}

export interface ScrollData {
  scrollX: number;
  scrollY: number;
}

export type EventPayload =
  | { type: "form"; query: string }
  | { type: "input"; value: InputValue }
  | ({ type: "key" } & KeyData)
  | ({ type: "mouse" } & MouseData)
  | ({ type: "scroll" } & ScrollData);

export type EventData =
  | { type: "form"; form: Form }
  | { type: "input"; value: InputValue }
  | { type: "key"; key: KeyData }
  | { type: "mouse"; mouse: MouseData }
  | { type: "scroll"; scroll: ScrollData };

export const inputValueSchema = z.union([z.boolean(), z.string(), z.array(z.string())]);

const keyFields = {
  key: z.string(),
  code: z.string(),
  alt: z.boolean(),
  ctrl: z.boolean(),
  shift: z.boolean(),
  meta: z.boolean(),
};

const mouseFields = {
  clientX: z.number(),
  clientY: z.number(),
  pageX: z.number(),
  pageY: z.number(),
  offsetX: z.number(),
  offsetY: z.number(),
  movementX: z.number(),
  movementY: z.number(),
  screenX: z.number(),
  screenY: z.number(),
};

export const eventPayloadSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("form"), query: z.string() }),
  z.object({ type: z.literal("input"), value: inputValueSchema }),
  z.object({ type: z.literal("key"), ...keyFields }),
  z.object({ type: z.literal("mouse"), ...mouseFields }),
  z.object({ type: z.literal("scroll"), scrollX: z.number(), scrollY: z.number() }),
]);

// ============================================================================
// Form
// ============================================================================

export type FormValues = Record<string, string | string[]>;

/**
 * A submitted form, kept as its url-encoded query string.
 *
 * Repeated names and names ending in `[]` become arrays in
 * {@link Form.toObject}; the `[]` suffix is dropped from the key.
 */
export class Form {
  private readonly params: URLSearchParams;

  constructor(readonly query: string) {
    this.params = new URLSearchParams(query);
  }

  get(name: string): string | undefined {
    return this.params.get(name) ?? undefined;
  }

  getAll(name: string): string[] {
    return this.params.getAll(name);
  }

  toObject(): FormValues {
    const values: FormValues = {};
    for (const [rawKey, value] of this.params) {
      const isList = rawKey.endsWith("[]");
      const key = isList ? rawKey.slice(0, -2) : rawKey;
      const existing = values[key];

      if (existing === undefined) {
        values[key] = isList ? [value] : value;
      } else if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        values[key] = [existing, value];
      }
    }
    return values;
  }

  /**
   * Validate the form against a schema.
   *
   * @throws DecodeError when the values do not match
   */
  parse<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const result = schema.safeParse(this.toObject());
    if (!result.success) {
      throw new DecodeError("Form does not match schema", { issues: result.error.issues });
    }
    return result.data;
  }
}

// ============================================================================
// Conversion
// ============================================================================

export function toEventData(payload: EventPayload): EventData {
  switch (payload.type) {
    case "form":
      return { type: "form", form: new Form(payload.query) };
    case "input":
      return { type: "input", value: payload.value };
    case "key": {
      const { type: _type, ...key } = payload;
      return { type: "key", key };
    }
    case "mouse": {
      const { type: _type, ...mouse } = payload;
      return { type: "mouse", mouse };
    }
    case "scroll":
      return { type: "scroll", scroll: { scrollX: payload.scrollX, scrollY: payload.scrollY } };
  }
}
