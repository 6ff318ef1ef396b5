/**
 * BaseChat: queue and retry logic shared by every vendor adapter.
 *
 * Vendors subclass it with a `ProviderDefinition` describing their name,
 * default model, generation parameters and how to build the HTTP invoker.
 * The conversation queue and the retry executor are composed here once.
 */

import { randomUUID } from "node:crypto";

import type { ChatProvider, GetResponseOptions } from "./adapter.js";
import { resolveConfig, readEnv, type ChatConfig } from "../config.js";
import { ConversationQueue, normalizeInput } from "../history/queue.js";
import {
  ConfigurationError,
  Role,
  createAssistantMessage,
  type CompletionRequest,
  type GenerationParameters,
  type Message,
  type MessageInput,
  type RemoteInvoker,
} from "../types/index.js";
import { createLogger, extractCode, retry, type Logger } from "../utils/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Connection settings handed to a provider's invoker factory. */
export interface ConnectionOptions {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  defaultHeaders?: Record<string, string>;
}

/** What a vendor contributes to BaseChat. */
export interface ProviderDefinition<P extends GenerationParameters> {
  /** Short provider id, also the logger name. */
  name: string;
  /** Human-facing vendor name used in messages. */
  displayName: string;
  /** Environment variables searched, in order, for the API key. */
  apiKeyEnv: readonly string[];
  defaultModel: string;
  defaultParameters: P;
  createInvoker(connection: ConnectionOptions): RemoteInvoker<P>;
}

/** Constructor options accepted by every adapter. */
export interface ChatOptions<P extends GenerationParameters>
  extends Partial<ChatConfig>,
    Partial<Omit<ConnectionOptions, "apiKey">> {
  /** API key; falls back to the provider's environment variables. */
  apiKey?: string;
  /** Model used when `getResponse` is called without one. */
  defaultModel?: string;
  /** Overrides merged onto the provider's default generation parameters. */
  parameters?: Partial<P>;
  /** Replaces the HTTP invoker (tests, proxies, custom transports). */
  invoker?: RemoteInvoker<P>;
  /** Logging collaborator; a winston logger is created when omitted. */
  logger?: Logger;
  /** Minimum level for the default logger. */
  logLevel?: string;
  /** Directory for the default logger's per-run log file. */
  logDir?: string;
  /** Jitter source for backoff, in [0, 1). */
  random?: () => number;
}

// ---------------------------------------------------------------------------
// BaseChat
// ---------------------------------------------------------------------------

export abstract class BaseChat<P extends GenerationParameters>
  implements ChatProvider
{
  readonly name: string;
  readonly defaultModel: string;
  readonly parameters: P;
  readonly config: Readonly<ChatConfig>;
  protected readonly logger: Logger;
  private readonly queue: ConversationQueue;
  private readonly invoker: RemoteInvoker<P>;
  private readonly sessionId: string;
  private readonly random: () => number;

  protected constructor(
    definition: ProviderDefinition<P>,
    options: ChatOptions<P> = {},
  ) {
    this.name = definition.name;
    this.config = resolveConfig(options);
    this.defaultModel = options.defaultModel ?? definition.defaultModel;
    this.parameters = { ...definition.defaultParameters, ...options.parameters };
    this.random = options.random ?? Math.random;
    this.sessionId = randomUUID();
    this.queue = new ConversationQueue({
      maxHistory: this.config.maxHistory,
      systemPrompt: this.config.systemPrompt,
    });
    this.invoker = options.invoker ?? this.buildInvoker(definition, options);
    this.logger =
      options.logger ??
      createLogger({
        name: definition.name,
        level: options.logLevel,
        logDir: options.logDir,
      });
  }

  private buildInvoker(
    definition: ProviderDefinition<P>,
    options: ChatOptions<P>,
  ): RemoteInvoker<P> {
    const apiKey = options.apiKey ?? readEnv(...definition.apiKeyEnv);
    if (!apiKey) {
      throw new ConfigurationError(
        `${definition.displayName} API key is required: pass apiKey or set ${definition.apiKeyEnv.join(" / ")}`,
      );
    }
    return definition.createInvoker({
      apiKey,
      baseUrl: options.baseUrl,
      timeout: options.timeout,
      defaultHeaders: options.defaultHeaders,
    });
  }

  // -----------------------------------------------------------------------
  // ChatProvider
  // -----------------------------------------------------------------------

  /**
   * The user messages are recorded before the first attempt and stay in
   * the queue if every attempt fails.
   */
  async getResponse(
    input: MessageInput,
    model?: string,
    options?: GetResponseOptions,
  ): Promise<string> {
    this.queue.append(normalizeInput(input));

    const request: CompletionRequest<P> = {
      model: model ?? this.defaultModel,
      messages: this.queue.messages,
      parameters: this.parameters,
    };

    try {
      const result = await retry(() => this.invoker(request), {
        maxRetries: this.config.maxRetries,
        baseDelay: this.config.baseDelay,
        random: this.random,
        logger: this.logger,
        label: this.name,
        signal: options?.signal,
      });

      this.queue.append([createAssistantMessage(result.text)]);
      this.logger.debug(`${this.name} reply received`, {
        sessionId: this.sessionId,
        model: result.model ?? request.model,
        finishReason: result.finishReason,
      });
      return result.text;
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Error occurred while getting ${this.name} response: ${detail}`,
        { sessionId: this.sessionId },
      );
      throw err;
    }
  }

  setSystemPrompt(prompt: string): void {
    if (this.queue.messages.some((m) => m.role === Role.SYSTEM)) {
      this.logger.info("System prompt already in the messages queue, updating it", {
        sessionId: this.sessionId,
      });
    }
    this.queue.setSystemPrompt(prompt);
  }

  clearHistory(): void {
    this.queue.clear();
  }

  extractCode(responseText: string): string[] {
    return extractCode(responseText);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getHistory(): readonly Message[] {
    return this.queue.messages;
  }

  /** Current system prompt, whether or not the queue holds it yet. */
  get systemPrompt(): string {
    return this.queue.systemPrompt;
  }
}
