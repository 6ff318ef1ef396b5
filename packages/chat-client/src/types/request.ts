/**
 * Request and result types exchanged with a remote completion invoker.
 */

import type { Message } from "./message.js";

// ---------------------------------------------------------------------------
// Generation parameters
// ---------------------------------------------------------------------------

/**
 * Sampling and length controls sent alongside the messages. Every field is
 * optional; omitted fields fall back to the provider's own defaults.
 */
export interface GenerationParameters {
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
}

// ---------------------------------------------------------------------------
// CompletionRequest / CompletionResult
// ---------------------------------------------------------------------------

/** The single input handed to a remote invoker. */
export interface CompletionRequest<
  P extends GenerationParameters = GenerationParameters,
> {
  /** Provider's native model ID. */
  readonly model: string;
  /** Snapshot of the conversation queue, system message first. */
  readonly messages: readonly Message[];
  readonly parameters: P;
}

/** Token accounting reported by the provider, when available. */
export interface CompletionUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

/** What a remote invoker resolves with on success. */
export interface CompletionResult {
  /** The assistant's reply text. */
  readonly text: string;
  /** Model that actually served the request. */
  readonly model?: string;
  /** Raw finish reason string ("stop", "length", ...). */
  readonly finishReason?: string;
  readonly usage?: CompletionUsage;
}

/**
 * The network collaborator each adapter supplies. Any rejection is treated
 * as retryable unless the error is a `ChatError` with `retryable === false`.
 */
export type RemoteInvoker<
  P extends GenerationParameters = GenerationParameters,
> = (request: CompletionRequest<P>) => Promise<CompletionResult>;
