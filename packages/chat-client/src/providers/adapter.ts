/**
 * ChatProvider interface: the contract every vendor adapter implements.
 */

import type { Message, MessageInput } from "../types/index.js";

/** Per-call options for `getResponse`. */
export interface GetResponseOptions {
  /**
   * Checked before each attempt and each backoff sleep. An attempt already
   * on the wire is not interrupted.
   */
  signal?: AbortSignal;
}

/**
 * One conversation with one vendor.
 *
 * Adapters are not safe for concurrent `getResponse` calls on the same
 * instance; callers serialize them.
 */
export interface ChatProvider {
  /** Provider name, e.g. "openai", "groq". */
  readonly name: string;

  /**
   * Append `input` to the conversation, ask the model, record and return
   * its reply. Uses the adapter's default model when `model` is omitted.
   */
  getResponse(
    input: MessageInput,
    model?: string,
    options?: GetResponseOptions,
  ): Promise<string>;

  /** Replace the system prompt, in the queue and for future resets. */
  setSystemPrompt(prompt: string): void;

  /** Drop all history except the system message. */
  clearHistory(): void;

  /** Lines of the first fenced code block in `responseText`. */
  extractCode(responseText: string): string[];

  /** Opaque identifier fixed at construction. */
  getSessionId(): string;

  /** Snapshot of the conversation queue, system message first. */
  getHistory(): readonly Message[];
}
