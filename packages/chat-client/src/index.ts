export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export utilities (retry, http, logging, code extraction)
export * from "./utils/index.js";

// Re-export conversation queue
export {
  ConversationQueue,
  normalizeInput,
  appendMessages,
  withSystemPrompt,
  clearQueue,
} from "./history/queue.js";
export type { QueueLimits } from "./history/queue.js";

// Re-export configuration
export { DEFAULT_CONFIG, resolveConfig, readEnv } from "./config.js";
export type { ChatConfig } from "./config.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Re-export factory functions
export {
  createChat,
  createChatFromEnv,
  listProviders,
  availableProviders,
} from "./client.js";
export type { ProviderName } from "./client.js";
