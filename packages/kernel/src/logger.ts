/**
 * Logger
 *
 * Named loggers backed by a single pino root. Every module asks for its
 * own logger with `Logger.for("Name")` and logs with pino's
 * `(mergingObject, message)` call form.
 *
 * @example
 * ```typescript
 * const log = Logger.for("ViewActor");
 * log.debug({ componentId }, "mounted");
 *
 * Logger.configure({ level: "debug" });
 * ```
 *
 * @module @stitchview/kernel/logger
 */

import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type KernelLogger = pino.Logger;

export interface LoggerConfig {
  /** Minimum level emitted by every logger */
  level?: LogLevel;
  /** Pino destination; defaults to stdout */
  destination?: pino.DestinationStream;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function levelFromEnv(): LogLevel {
  const value = process.env["STITCHVIEW_LOG_LEVEL"];
  return LEVELS.find((level) => level === value) ?? "info";
}

let root: pino.Logger | undefined;
const named = new Map<string, pino.Logger>();

function getRoot(): pino.Logger {
  root ??= pino({ name: "stitchview", level: levelFromEnv() });
  return root;
}

export const Logger = {
  /**
   * Get (or create) the logger for a named module.
   */
  for(name: string): KernelLogger {
    const existing = named.get(name);
    if (existing) return existing;
    const child = getRoot().child({ component: name });
    named.set(name, child);
    return child;
  },

  /**
   * Reconfigure logging. Loggers handed out earlier follow the new level;
   * a new destination only applies to loggers created afterwards.
   */
  configure(config: LoggerConfig): void {
    if (config.destination) {
      root = pino({ name: "stitchview", level: config.level ?? getRoot().level }, config.destination);
      named.clear();
    }
    if (config.level) {
      getRoot().level = config.level;
      for (const child of named.values()) {
        child.level = config.level;
      }
    }
  },

  /** Current root level */
  get level(): string {
    return getRoot().level;
  },
};
