/**
 * # StitchView Kernel
 *
 * Low-level primitives shared by every other package:
 *
 * - **Logger** - named pino loggers with one configurable level
 * - **Channel** - bounded async mailbox with backpressure
 * - **Deferred / raceTimeout** - one-shot replies and bounded waits
 *
 * @module @stitchview/kernel
 */

export { Logger, type KernelLogger, type LogLevel, type LoggerConfig } from "./logger.js";
export { Channel, type ChannelOptions } from "./channel.js";
export { createDeferred, raceTimeout, type Deferred, type TimeoutResult } from "./async.js";
export { sleep, waitFor, take } from "./testing.js";
