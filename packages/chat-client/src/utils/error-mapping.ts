/**
 * Error mapping utility for provider HTTP responses.
 *
 * Maps HTTP status codes and response bodies to the typed error hierarchy.
 */

import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  ContextLengthError,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Type guard: plain JSON object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Try to extract a human-readable error message from a provider response body. */
function extractMessage(body: unknown): string {
  if (isRecord(body)) {
    const nested = body["error"];

    // Both OpenAI and Groq nest under `error.message`.
    if (isRecord(nested) && typeof nested["message"] === "string") {
      return nested["message"];
    }

    if (typeof body["message"] === "string") {
      return body["message"];
    }

    if (typeof nested === "string") {
      return nested;
    }
  }

  if (typeof body === "string") return body;
  if (body === undefined) return "empty response body";

  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

/** Try to extract an error code from a provider response body. */
function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  const nested = body["error"];
  if (isRecord(nested)) {
    if (typeof nested["code"] === "string") return nested["code"];
    if (typeof nested["type"] === "string") return nested["type"];
  }

  if (typeof body["code"] === "string") return body["code"];
  if (typeof body["type"] === "string") return body["type"];

  return undefined;
}

interface ErrorConstructorOptions {
  provider: string;
  status_code?: number;
  error_code?: string;
  raw?: Record<string, unknown>;
}

/** Patterns checked against the error message for ambiguous status codes. */
const MESSAGE_PATTERNS: Array<{
  patterns: RegExp[];
  classify: (message: string, opts: ErrorConstructorOptions) => ProviderError;
}> = [
  {
    patterns: [/model .*not found/i, /does not exist/i],
    classify: (msg, opts) => new NotFoundError(msg, opts),
  },
  {
    patterns: [/context length/i, /too many tokens/i, /maximum context/i],
    classify: (msg, opts) => new ContextLengthError(msg, opts),
  },
];

function classifyByMessage(
  message: string,
  opts: ErrorConstructorOptions,
): ProviderError | undefined {
  for (const { patterns, classify } of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return classify(message, opts);
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `ProviderError`.
 *
 * @param status  - HTTP status code from the provider response.
 * @param body    - Parsed JSON body (or raw text) from the response.
 * @param provider - Provider name (e.g. "openai", "groq").
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
): ProviderError {
  const message = extractMessage(body);

  const opts: ErrorConstructorOptions = {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
    case 422:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 413:
      return new ContextLengthError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500 && status <= 599) {
    return new ServerError(message, opts);
  }

  // Anything else (408, 409, odd 3xx/4xx) stays retryable.
  return new ProviderError(message, { ...opts, retryable: true });
}
