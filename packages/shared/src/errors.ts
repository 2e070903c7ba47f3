/**
 * Error taxonomy
 *
 * Every failure the runtime reports carries a stable `code` from
 * {@link ErrorCodes}. Component failures and closed channels are separate
 * classes so callers can tell "the component broke" from "the instance is
 * already gone".
 *
 * @module @stitchview/shared/errors
 */

export const ErrorCodes = {
  /** A component's mount or update hook failed */
  COMPONENT_ERROR: "COMPONENT_ERROR",
  /** A mailbox or subscription ended while a caller was waiting on it */
  CHANNEL_CLOSED: "CHANNEL_CLOSED",
  /** An incoming message or payload failed to parse or validate */
  DECODE_ERROR: "DECODE_ERROR",
  /** A message token could not be serialized */
  SERIALIZATION_ERROR: "SERIALIZATION_ERROR",
  /** A client referenced a component id nobody embedded */
  UNKNOWN_COMPONENT: "UNKNOWN_COMPONENT",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base
// ============================================================================

export class ViewError extends Error {
  override name = "ViewError";

  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// ============================================================================
// Subclasses
// ============================================================================

/**
 * A user component threw (or rejected) from `mount` or `update`. The
 * original value is kept as `cause`.
 */
export class ComponentError extends ViewError {
  override name = "ComponentError";

  constructor(
    readonly hook: "mount" | "update",
    cause: unknown,
    details?: Record<string, unknown>,
  ) {
    super(`Component ${hook} failed: ${describe(cause)}`, ErrorCodes.COMPONENT_ERROR, details, {
      cause,
    });
  }
}

export class ChannelClosedError extends ViewError {
  override name = "ChannelClosedError";

  constructor(readonly channel?: string) {
    super(channel ? `Channel closed: ${channel}` : "Channel closed", ErrorCodes.CHANNEL_CLOSED, {
      channel,
    });
  }
}

export class DecodeError extends ViewError {
  override name = "DecodeError";

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, ErrorCodes.DECODE_ERROR, details, options);
  }
}

export class SerializationError extends ViewError {
  override name = "SerializationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.SERIALIZATION_ERROR, undefined, options);
  }
}

// ============================================================================
// Guards
// ============================================================================

export function isViewError(error: unknown): error is ViewError {
  return error instanceof ViewError;
}

export function isComponentError(error: unknown): error is ComponentError {
  return error instanceof ComponentError;
}

export function isChannelClosedError(error: unknown): error is ChannelClosedError {
  return error instanceof ChannelClosedError;
}

export function isSerializationError(error: unknown): error is SerializationError {
  return error instanceof SerializationError;
}

function describe(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
