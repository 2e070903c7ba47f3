/**
 * Per-instance topics
 *
 * Every embedded view talks to its observers over five topics scoped by
 * component id, each with its own JSON payload.
 *
 * | Topic                 | Publisher      | Payload                            |
 * |-----------------------|----------------|------------------------------------|
 * | `mounted`             | socket session | observer's url and headers         |
 * | `initial-render`      | engine         | version + full serialized tree     |
 * | `rendered`            | engine         | version + patch and/or commands    |
 * | `socket-disconnected` | socket session | empty                              |
 * | `update`              | socket session | message + optional event payload   |
 *
 * @module @stitchview/server/topics
 */

import { z } from "zod";
import {
  commandSchema,
  eventPayloadSchema,
  serializedTreeSchema,
  treePatchSchema,
} from "@stitchview/shared";
import { encodeJson, jsonDecoder } from "@stitchview/core";

const PREFIX = "stitchview/view";

export const Topics = {
  mounted: (componentId: string) => `${PREFIX}/${componentId}/mounted`,
  initialRender: (componentId: string) => `${PREFIX}/${componentId}/initial-render`,
  rendered: (componentId: string) => `${PREFIX}/${componentId}/rendered`,
  socketDisconnected: (componentId: string) => `${PREFIX}/${componentId}/socket-disconnected`,
  update: (componentId: string) => `${PREFIX}/${componentId}/update`,
} as const;

// ============================================================================
// Payloads
// ============================================================================

export const mountedPayloadSchema = z.object({
  url: z.string().optional(),
  headers: z.record(z.string(), z.string()).default({}),
});

export const initialRenderPayloadSchema = z.object({
  version: z.number().int().nonnegative(),
  tree: serializedTreeSchema,
});

export const renderedPayloadSchema = z.object({
  version: z.number().int().nonnegative(),
  patch: treePatchSchema.optional(),
  commands: z.array(commandSchema).optional(),
});

export const disconnectedPayloadSchema = z.object({});

export const updatePayloadSchema = z.object({
  message: z.unknown(),
  event: eventPayloadSchema.optional(),
});

export type MountedPayload = z.output<typeof mountedPayloadSchema>;
export type InitialRenderPayload = z.output<typeof initialRenderPayloadSchema>;
export type RenderedPayload = z.output<typeof renderedPayloadSchema>;
export type UpdatePayload = z.output<typeof updatePayloadSchema>;

export const decodeMounted = jsonDecoder(mountedPayloadSchema);
export const decodeInitialRender = jsonDecoder(initialRenderPayloadSchema);
export const decodeRendered = jsonDecoder(renderedPayloadSchema);
export const decodeDisconnected = jsonDecoder(disconnectedPayloadSchema);
export const decodeUpdate = jsonDecoder(updatePayloadSchema);

export { encodeJson as encodePayload };
