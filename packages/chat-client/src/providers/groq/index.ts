/**
 * Groq chat adapter.
 *
 * Groq serves an OpenAI-compatible Chat Completions endpoint under
 * `/openai`. Sampling parameters are left to Groq's defaults unless the
 * caller sets them.
 */

import type { GenerationParameters } from "../../types/index.js";
import { BaseChat, type ChatOptions, type ProviderDefinition } from "../base.js";
import { createChatCompletionsInvoker } from "../chat-completions/index.js";

export type GroqParameters = GenerationParameters;

export type GroqChatOptions = ChatOptions<GroqParameters>;

export const GROQ_DEFAULT_BASE_URL = "https://api.groq.com/openai";

export const GROQ_DEFINITION: ProviderDefinition<GroqParameters> = {
  name: "groq",
  displayName: "Groq",
  apiKeyEnv: ["GROQ_KEY", "GROQ_API_KEY"],
  defaultModel: "llama-3.1-8b-instant",
  defaultParameters: {},
  createInvoker: (connection) =>
    createChatCompletionsInvoker<GroqParameters>({
      providerName: "groq",
      apiKey: connection.apiKey,
      baseUrl: connection.baseUrl ?? GROQ_DEFAULT_BASE_URL,
      defaultHeaders: connection.defaultHeaders,
      timeout: connection.timeout,
    }),
};

export class GroqChat extends BaseChat<GroqParameters> {
  constructor(options?: GroqChatOptions) {
    super(GROQ_DEFINITION, options);
  }
}
