/**
 * Configuration surface read by every adapter at construction.
 */

import { ConfigurationError } from "./types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ChatConfig {
  /** Content of the system message kept at the head of the queue. */
  systemPrompt: string;
  /** Upper bound on queue length, system message included. */
  maxHistory: number;
  /** Retries after the first attempt before giving up. */
  maxRetries: number;
  /** Backoff unit in milliseconds. */
  baseDelay: number;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Readonly<ChatConfig> = {
  systemPrompt: "You are a helpful assistant.",
  maxHistory: 10,
  maxRetries: 10,
  baseDelay: 1000,
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Merge `overrides` onto the defaults and validate the result.
 *
 * `maxHistory` must leave room for the system message plus the newest
 * message, so it is at least 2.
 */
export function resolveConfig(overrides?: Partial<ChatConfig>): ChatConfig {
  const config: ChatConfig = {
    systemPrompt: overrides?.systemPrompt ?? DEFAULT_CONFIG.systemPrompt,
    maxHistory: overrides?.maxHistory ?? DEFAULT_CONFIG.maxHistory,
    maxRetries: overrides?.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    baseDelay: overrides?.baseDelay ?? DEFAULT_CONFIG.baseDelay,
  };

  if (typeof config.systemPrompt !== "string") {
    throw new ConfigurationError("systemPrompt must be a string");
  }
  if (!Number.isInteger(config.maxHistory) || config.maxHistory < 2) {
    throw new ConfigurationError(
      `maxHistory must be an integer >= 2, got ${config.maxHistory}`,
    );
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new ConfigurationError(
      `maxRetries must be an integer >= 0, got ${config.maxRetries}`,
    );
  }
  if (!Number.isFinite(config.baseDelay) || config.baseDelay < 0) {
    throw new ConfigurationError(
      `baseDelay must be a non-negative number of milliseconds, got ${config.baseDelay}`,
    );
  }

  return config;
}

/** Return the first non-empty environment variable among `names`. */
export function readEnv(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name];
    if (value) return value;
  }
  return undefined;
}
