/**
 * Message types for the chat client.
 */

import { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** The fundamental unit of conversation. */
export interface Message {
  /** Who produced this message. */
  readonly role: Role;
  /** Plain-text body. */
  readonly content: string;
}

/**
 * Anything a caller may pass where a structured message is expected.
 * Validated by `normalizeInput` before it enters a queue.
 */
export interface MessageLike {
  readonly role: unknown;
  readonly content: unknown;
}

/**
 * Accepted input shapes for `getResponse`: a single prompt, a list of
 * prompts, or a list of already-structured messages.
 */
export type MessageInput = string | readonly string[] | readonly MessageLike[];

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(content: string): Message {
  return { role: Role.SYSTEM, content };
}

/** Create a user message from plain text. */
export function createUserMessage(content: string): Message {
  return { role: Role.USER, content };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(content: string): Message {
  return { role: Role.ASSISTANT, content };
}
