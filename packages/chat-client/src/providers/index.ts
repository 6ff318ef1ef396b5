/**
 * Barrel re-export for all provider adapters.
 */

// Adapter interface
export type { ChatProvider, GetResponseOptions } from "./adapter.js";

// Shared base
export { BaseChat } from "./base.js";
export type {
  ChatOptions,
  ConnectionOptions,
  ProviderDefinition,
} from "./base.js";

// Chat Completions wire format
export {
  createChatCompletionsInvoker,
  translateRequest,
  translateResponse,
} from "./chat-completions/index.js";
export type {
  ChatCompletionsInvokerOptions,
  ChatCompletionMessage,
  ChatCompletionRequestBody,
} from "./chat-completions/index.js";

// OpenAI adapter
export {
  OpenAIChat,
  OPENAI_DEFINITION,
  OPENAI_DEFAULT_BASE_URL,
} from "./openai/index.js";
export type { OpenAIChatOptions, OpenAIParameters } from "./openai/index.js";

// Groq adapter
export { GroqChat, GROQ_DEFINITION, GROQ_DEFAULT_BASE_URL } from "./groq/index.js";
export type { GroqChatOptions, GroqParameters } from "./groq/index.js";
