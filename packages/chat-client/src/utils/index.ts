/**
 * Barrel re-export for utility modules.
 */

// JSON POST
export { postJson } from "./http.js";
export type { HttpResponse, PostJsonOptions } from "./http.js";

// Retry utility
export { retry, calculateDelay, MAX_TIMER_DELAY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Error mapping utility
export { mapHttpError, isRecord } from "./error-mapping.js";

// Code extraction
export { extractCode, CODE_FENCE } from "./code.js";

// Logging
export { createLogger, formatLine, fileStamp } from "./logger.js";
export type { Logger, LoggerOptions, LogMeta } from "./logger.js";
