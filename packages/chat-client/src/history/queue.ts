/**
 * Conversation queue: bounded message history with a pinned system prompt.
 *
 * The free functions are pure and return new arrays; `ConversationQueue`
 * holds the live state for one adapter.
 */

import { Role, isRole } from "../types/enums.js";
import type { Message, MessageInput } from "../types/message.js";
import { createSystemMessage, createUserMessage } from "../types/message.js";
import { InvalidMessageFormatError } from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueLimits {
  /** Upper bound on queue length, system message included. */
  readonly maxHistory: number;
  /** Content for the system message when the queue has none. */
  readonly systemPrompt: string;
}

const FORMAT_HINT =
  "Invalid message format. Should be a string, list of strings, or list of properly formatted message objects.";

// ---------------------------------------------------------------------------
// normalizeInput
// ---------------------------------------------------------------------------

function isStructured(value: unknown): value is { role: unknown; content: unknown } {
  return (
    value != null &&
    typeof value === "object" &&
    "role" in value &&
    "content" in value
  );
}

/**
 * Turn caller input into canonical messages.
 *
 * Strings become user messages. Structured entries pass through as long as
 * every one has a known `role` and a string `content`; lists mixing strings
 * and objects are rejected.
 */
export function normalizeInput(input: MessageInput): Message[];
export function normalizeInput(input: unknown): Message[];
export function normalizeInput(input: unknown): Message[] {
  if (typeof input === "string") {
    return [createUserMessage(input)];
  }

  if (!Array.isArray(input)) {
    throw new InvalidMessageFormatError(FORMAT_HINT);
  }

  const items: readonly unknown[] = input;

  if (items.every((item): item is string => typeof item === "string")) {
    return items.map((item) => createUserMessage(item));
  }

  return items.map((item, index) => {
    if (!isStructured(item)) {
      throw new InvalidMessageFormatError(
        `${FORMAT_HINT} Entry ${index} is not a role/content object.`,
      );
    }
    if (!isRole(item.role)) {
      throw new InvalidMessageFormatError(
        `${FORMAT_HINT} Entry ${index} has unknown role ${JSON.stringify(item.role)}.`,
      );
    }
    if (typeof item.content !== "string") {
      throw new InvalidMessageFormatError(
        `${FORMAT_HINT} Entry ${index} content must be a string.`,
      );
    }
    return { role: item.role, content: item.content };
  });
}

// ---------------------------------------------------------------------------
// Queue operations
// ---------------------------------------------------------------------------

/**
 * Append `newMessages` and restore the queue invariants.
 *
 * An incoming system message overwrites the system slot rather than adding
 * a second one. When the result is longer than `maxHistory`, the oldest
 * non-system messages are dropped so that the system message plus the last
 * `maxHistory - 1` messages remain.
 */
export function appendMessages(
  queue: readonly Message[],
  newMessages: readonly Message[],
  limits: QueueLimits,
): Message[] {
  let system = queue[0]?.role === Role.SYSTEM ? queue[0] : undefined;
  const rest: Message[] = queue.filter((m) => m.role !== Role.SYSTEM);

  for (const message of newMessages) {
    if (message.role === Role.SYSTEM) {
      system = message;
    } else {
      rest.push(message);
    }
  }

  const head = system ?? createSystemMessage(limits.systemPrompt);
  const keep = Math.max(limits.maxHistory - 1, 0);
  const tail = rest.length > keep ? rest.slice(rest.length - keep) : rest;

  return [head, ...tail];
}

/**
 * Point the system slot at `prompt`: overwrite the existing system message
 * in place, or insert one at index 0.
 */
export function withSystemPrompt(
  queue: readonly Message[],
  prompt: string,
): Message[] {
  const index = queue.findIndex((m) => m.role === Role.SYSTEM);
  if (index === -1) {
    return [createSystemMessage(prompt), ...queue];
  }
  const next = [...queue];
  next[index] = createSystemMessage(prompt);
  return next;
}

/** A fresh queue holding only the system message. */
export function clearQueue(systemPrompt: string): Message[] {
  return [createSystemMessage(systemPrompt)];
}

// ---------------------------------------------------------------------------
// ConversationQueue
// ---------------------------------------------------------------------------

/**
 * Live conversation state for one adapter. Starts empty; the first append
 * or `setSystemPrompt` puts the system message in place.
 */
export class ConversationQueue {
  readonly maxHistory: number;
  private _systemPrompt: string;
  private _messages: Message[] = [];

  constructor(options: QueueLimits) {
    this.maxHistory = options.maxHistory;
    this._systemPrompt = options.systemPrompt;
  }

  /** Snapshot of the queue, oldest first. */
  get messages(): readonly Message[] {
    return [...this._messages];
  }

  get systemPrompt(): string {
    return this._systemPrompt;
  }

  get length(): number {
    return this._messages.length;
  }

  append(newMessages: readonly Message[]): readonly Message[] {
    for (const message of newMessages) {
      if (message.role === Role.SYSTEM) {
        this._systemPrompt = message.content;
      }
    }
    this._messages = appendMessages(this._messages, newMessages, {
      maxHistory: this.maxHistory,
      systemPrompt: this._systemPrompt,
    });
    return this.messages;
  }

  setSystemPrompt(prompt: string): void {
    this._systemPrompt = prompt;
    this._messages = withSystemPrompt(this._messages, prompt);
  }

  clear(): void {
    this._messages = clearQueue(this._systemPrompt);
  }
}
