// Types
export type * from "./types/build.js";
export type * from "./types/snap.js";
export type * from "./types/webhook.js";
export type * from "./types/config.js";

// Values
export {
  configSchema,
  parseConfig,
  DEFAULT_BASE_URL,
  DEFAULT_ARCHITECTURES,
} from "./types/config.js";
export { LIVEFS_BUILD_EVENT, SNAP_BUILD_EVENT } from "./types/webhook.js";

// Utils
export { createLogger, setLogLevel, isLogLevel, LOG_LEVELS } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
export { retry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { parseDuration, humanizeDuration } from "./utils/duration.js";
