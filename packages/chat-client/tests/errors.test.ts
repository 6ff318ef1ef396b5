import { describe, it, expect } from "vitest";
import {
  ChatError,
  InvalidMessageFormatError,
  CodeBlockNotFoundError,
  ConfigurationError,
  AbortError,
  RemoteCallFailedError,
  RetryExhaustedError,
  NetworkError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ServerError,
} from "../src/types/errors.js";

describe("ChatError", () => {
  it("is an instance of Error", () => {
    const err = new ChatError("something went wrong");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ChatError);
    expect(err.message).toBe("something went wrong");
    expect(err.name).toBe("ChatError");
  });

  it("defaults retryable to false", () => {
    expect(new ChatError("oops").retryable).toBe(false);
  });

  it("accepts a cause", () => {
    const cause = new Error("root cause");
    const err = new ChatError("wrapper", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("Non-retryable local errors", () => {
  const classes = [
    { Cls: InvalidMessageFormatError, name: "InvalidMessageFormatError" },
    { Cls: CodeBlockNotFoundError, name: "CodeBlockNotFoundError" },
    { Cls: ConfigurationError, name: "ConfigurationError" },
    { Cls: AbortError, name: "AbortError" },
  ] as const;

  for (const { Cls, name } of classes) {
    it(`${name} has retryable=false and correct name`, () => {
      const err = new Cls("test");
      expect(err.retryable).toBe(false);
      expect(err.name).toBe(name);
      expect(err).toBeInstanceOf(ChatError);
    });
  }
});

describe("RemoteCallFailedError", () => {
  it("is retryable and records the attempt", () => {
    const cause = new TypeError("socket hang up");
    const err = new RemoteCallFailedError("socket hang up", { attempt: 3, cause });
    expect(err.retryable).toBe(true);
    expect(err.attempt).toBe(3);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("RemoteCallFailedError");
  });
});

describe("RetryExhaustedError", () => {
  it("wraps the last remote failure and is not retryable", () => {
    const last = new RemoteCallFailedError("boom", { attempt: 4 });
    const err = new RetryExhaustedError("gave up", { attempts: 4, cause: last });
    expect(err.retryable).toBe(false);
    expect(err.attempts).toBe(4);
    expect(err.cause).toBe(last);
    expect(err.name).toBe("RetryExhaustedError");
  });
});

describe("NetworkError", () => {
  it("is retryable", () => {
    const err = new NetworkError("connection refused");
    expect(err.retryable).toBe(true);
    expect(err.name).toBe("NetworkError");
  });
});

describe("ProviderError", () => {
  it("carries all provider-specific fields", () => {
    const err = new ProviderError("Bad request", {
      provider: "openai",
      status_code: 400,
      error_code: "invalid_request",
      retryable: false,
      raw: { error: { message: "Bad request" } },
    });
    expect(err).toBeInstanceOf(ChatError);
    expect(err.provider).toBe("openai");
    expect(err.status_code).toBe(400);
    expect(err.error_code).toBe("invalid_request");
    expect(err.retryable).toBe(false);
    expect(err.raw).toEqual({ error: { message: "Bad request" } });
  });
});

describe("Non-retryable ProviderError subclasses", () => {
  const nonRetryableClasses = [
    { Cls: AuthenticationError, name: "AuthenticationError" },
    { Cls: AccessDeniedError, name: "AccessDeniedError" },
    { Cls: NotFoundError, name: "NotFoundError" },
    { Cls: InvalidRequestError, name: "InvalidRequestError" },
    { Cls: ContextLengthError, name: "ContextLengthError" },
  ] as const;

  for (const { Cls, name } of nonRetryableClasses) {
    it(`${name} has retryable=false and correct name`, () => {
      const err = new Cls("test", { provider: "groq" });
      expect(err.retryable).toBe(false);
      expect(err.name).toBe(name);
      expect(err).toBeInstanceOf(ProviderError);
    });
  }
});

describe("Retryable ProviderError subclasses", () => {
  const retryableClasses = [
    { Cls: RateLimitError, name: "RateLimitError" },
    { Cls: ServerError, name: "ServerError" },
  ] as const;

  for (const { Cls, name } of retryableClasses) {
    it(`${name} has retryable=true and correct name`, () => {
      const err = new Cls("test", { provider: "groq" });
      expect(err.retryable).toBe(true);
      expect(err.name).toBe(name);
      expect(err).toBeInstanceOf(ProviderError);
    });
  }
});
