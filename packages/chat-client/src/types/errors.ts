/**
 * Error hierarchy for the chat client.
 *
 * All library errors inherit from ChatError. Error class names are chosen to
 * avoid shadowing common language built-in names.
 */

// ---------------------------------------------------------------------------
// ChatError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all chat client errors. */
export class ChatError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ChatError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// Input and output shape errors: never retried
// ---------------------------------------------------------------------------

/** Input is not a string, list of strings, or list of role/content objects. */
export class InvalidMessageFormatError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidMessageFormatError";
  }
}

/** A response contained no closed fenced code block. */
export class CodeBlockNotFoundError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "CodeBlockNotFoundError";
  }
}

/** Misconfiguration (missing API key, bad limits, unknown provider). */
export class ConfigurationError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** Caller aborted before the next attempt started. Not retryable. */
export class AbortError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "AbortError";
  }
}

// ---------------------------------------------------------------------------
// Remote call errors
// ---------------------------------------------------------------------------

/** A single remote call attempt failed. Retryable. */
export class RemoteCallFailedError extends ChatError {
  /** 1-based number of the attempt that failed. */
  readonly attempt: number;

  constructor(message: string, options: { attempt: number; cause?: unknown }) {
    super(message, { cause: options.cause, retryable: true });
    this.name = "RemoteCallFailedError";
    this.attempt = options.attempt;
  }
}

/** The retry budget is spent. `cause` is the last RemoteCallFailedError. */
export class RetryExhaustedError extends ChatError {
  /** Total attempts made, including the first call. */
  readonly attempts: number;

  constructor(
    message: string,
    options: { attempts: number; cause: RemoteCallFailedError },
  ) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "RetryExhaustedError";
    this.attempts = options.attempts;
  }
}

/** Network-level failure (DNS, connection reset). Retryable. */
export class NetworkError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "NetworkError";
  }
}

// ---------------------------------------------------------------------------
// ProviderError: errors returned by the provider's HTTP API
// ---------------------------------------------------------------------------

type ProviderErrorOptions = {
  provider: string;
  status_code?: number;
  error_code?: string;
  retryable?: boolean;
  raw?: Record<string, unknown>;
  cause?: unknown;
};

type FixedRetryOptions = Omit<ProviderErrorOptions, "retryable">;

/** Error returned by an LLM provider. */
export class ProviderError extends ChatError {
  /** Which provider returned the error. */
  readonly provider: string;
  /** HTTP status code, if applicable. */
  readonly status_code?: number;
  /** Provider-specific error code. */
  readonly error_code?: string;
  /** Raw error response body from the provider. */
  readonly raw?: Record<string, unknown>;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.raw = options.raw;
  }
}

/** 401: Invalid API key, expired token. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions. */
export class AccessDeniedError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Model not found, endpoint not found. */
export class NotFoundError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters. */
export class InvalidRequestError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Input + output exceeds context window. */
export class ContextLengthError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContextLengthError";
  }
}

/** 429: Rate limit exceeded. */
export class RateLimitError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Provider internal error. */
export class ServerError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}
