/**
 * OpenAI chat adapter.
 *
 * Uses the Chat Completions API (POST /v1/chat/completions) with Bearer
 * token authentication. Sends explicit sampling parameters on every call.
 */

import type { GenerationParameters } from "../../types/index.js";
import { BaseChat, type ChatOptions, type ProviderDefinition } from "../base.js";
import { createChatCompletionsInvoker } from "../chat-completions/index.js";

export interface OpenAIParameters extends GenerationParameters {
  readonly temperature: number;
  readonly max_tokens: number;
  readonly top_p: number;
  readonly frequency_penalty: number;
  readonly presence_penalty: number;
}

export type OpenAIChatOptions = ChatOptions<OpenAIParameters>;

export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com";

export const OPENAI_DEFINITION: ProviderDefinition<OpenAIParameters> = {
  name: "openai",
  displayName: "OpenAI",
  apiKeyEnv: ["OPENAI_KEY", "OPENAI_API_KEY"],
  defaultModel: "gpt-4o-mini",
  defaultParameters: {
    temperature: 0,
    max_tokens: 400,
    top_p: 1,
    frequency_penalty: 0,
    presence_penalty: 0,
  },
  createInvoker: (connection) =>
    createChatCompletionsInvoker<OpenAIParameters>({
      providerName: "openai",
      apiKey: connection.apiKey,
      baseUrl: connection.baseUrl ?? OPENAI_DEFAULT_BASE_URL,
      defaultHeaders: connection.defaultHeaders,
      timeout: connection.timeout,
    }),
};

export class OpenAIChat extends BaseChat<OpenAIParameters> {
  constructor(options?: OpenAIChatOptions) {
    super(OPENAI_DEFINITION, options);
  }
}
