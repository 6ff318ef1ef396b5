/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, isRole } from "./enums.js";

// Message types
export type { Message, MessageLike, MessageInput } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
} from "./message.js";

// Request types
export type {
  GenerationParameters,
  CompletionRequest,
  CompletionResult,
  CompletionUsage,
  RemoteInvoker,
} from "./request.js";

// Error types
export {
  ChatError,
  InvalidMessageFormatError,
  CodeBlockNotFoundError,
  ConfigurationError,
  AbortError,
  RemoteCallFailedError,
  RetryExhaustedError,
  NetworkError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ServerError,
} from "./errors.js";
