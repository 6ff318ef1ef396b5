/**
 * Provider registry and factory functions.
 *
 * `createChat` builds an adapter by provider name; `createChatFromEnv`
 * picks the first provider whose API key is present in the environment.
 */

import type { ChatProvider } from "./providers/adapter.js";
import type { ChatOptions, ProviderDefinition } from "./providers/base.js";
import { OpenAIChat, OPENAI_DEFINITION, type OpenAIChatOptions } from "./providers/openai/index.js";
import { GroqChat, GROQ_DEFINITION, type GroqChatOptions } from "./providers/groq/index.js";
import type { GenerationParameters } from "./types/request.js";
import { ConfigurationError } from "./types/errors.js";
import { readEnv } from "./config.js";

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export type ProviderName = "openai" | "groq";

type AnyChatOptions = ChatOptions<GenerationParameters>;

interface RegistryEntry {
  definition: Pick<ProviderDefinition<GenerationParameters>, "name" | "apiKeyEnv">;
  create(options?: AnyChatOptions): ChatProvider;
}

/** Registration order is the preference order used by `createChatFromEnv`. */
const PROVIDERS: Record<ProviderName, RegistryEntry> = {
  openai: {
    definition: OPENAI_DEFINITION,
    create: (options) => new OpenAIChat(options),
  },
  groq: {
    definition: GROQ_DEFINITION,
    create: (options) => new GroqChat(options),
  },
};

function isProviderName(name: string): name is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, name);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Names of every registered provider. */
export function listProviders(): ProviderName[] {
  return Object.keys(PROVIDERS).filter(isProviderName);
}

/** Providers whose API key is set in the environment, in preference order. */
export function availableProviders(): ProviderName[] {
  return listProviders().filter(
    (name) => readEnv(...PROVIDERS[name].definition.apiKeyEnv) !== undefined,
  );
}

/**
 * Build an adapter by provider name.
 *
 * @throws {ConfigurationError} for an unknown provider, or when no API key
 *   is available and no invoker is injected.
 */
export function createChat(provider: "openai", options?: OpenAIChatOptions): OpenAIChat;
export function createChat(provider: "groq", options?: GroqChatOptions): GroqChat;
export function createChat(provider: string, options?: AnyChatOptions): ChatProvider;
export function createChat(provider: string, options?: AnyChatOptions): ChatProvider {
  if (!isProviderName(provider)) {
    throw new ConfigurationError(
      `Provider "${provider}" is not registered. Available: ${listProviders().join(", ")}`,
    );
  }
  return PROVIDERS[provider].create(options);
}

/**
 * Build an adapter for the first provider with an API key in the
 * environment.
 *
 * @throws {ConfigurationError} when no provider key is set.
 */
export function createChatFromEnv(options?: AnyChatOptions): ChatProvider {
  const [first] = availableProviders();
  if (!first) {
    const vars = listProviders().flatMap((name) => PROVIDERS[name].definition.apiKeyEnv);
    throw new ConfigurationError(
      `No provider API key found in the environment (checked ${vars.join(", ")})`,
    );
  }
  return PROVIDERS[first].create(options);
}
