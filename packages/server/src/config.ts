/**
 * Server configuration
 *
 * Priority: explicit options > environment > defaults. Values from the
 * environment are strings and are coerced before validation.
 */

import { z } from "zod";

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const serverConfigSchema = z.object({
  /** Port the WebSocket transport listens on */
  port: z.coerce.number().int().min(0).max(65535).default(4400),
  host: z.string().min(1).default("127.0.0.1"),
  /** Path the WebSocket endpoint is served at */
  path: z.string().startsWith("/").default("/live"),
  /** How long an embedded view waits for its first observer */
  mountTimeoutMs: z.coerce.number().int().positive().default(30_000),
  mailboxCapacity: z.coerce.number().int().positive().default(1024),
  /** Per-subscription queue length on the in-process bus */
  subscriptionCapacity: z.coerce.number().int().positive().default(1024),
  /** Outgoing messages buffered per socket under write pressure */
  socketMaxBuffer: z.coerce.number().int().positive().default(1000),
  logLevel: z.enum(logLevels).default("info"),
});

export type ServerConfig = z.output<typeof serverConfigSchema>;

export type ServerConfigInput = z.input<typeof serverConfigSchema>;

const ENV_KEYS: Record<keyof ServerConfig, string> = {
  port: "STITCHVIEW_PORT",
  host: "STITCHVIEW_HOST",
  path: "STITCHVIEW_PATH",
  mountTimeoutMs: "STITCHVIEW_MOUNT_TIMEOUT_MS",
  mailboxCapacity: "STITCHVIEW_MAILBOX_CAPACITY",
  subscriptionCapacity: "STITCHVIEW_SUBSCRIPTION_CAPACITY",
  socketMaxBuffer: "STITCHVIEW_SOCKET_MAX_BUFFER",
  logLevel: "STITCHVIEW_LOG_LEVEL",
};

/**
 * Load configuration from options and the environment.
 *
 * @throws ZodError naming the invalid field
 */
export function loadConfig(
  options: ServerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const fromEnv: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      fromEnv[key] = value;
    }
  }

  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined),
  );

  return serverConfigSchema.parse({ ...fromEnv, ...defined });
}
