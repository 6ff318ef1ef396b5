import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createChatCompletionsInvoker,
  translateRequest,
  translateResponse,
} from "../../src/providers/chat-completions/index.js";
import {
  AuthenticationError,
  NetworkError,
  ProviderError,
  RateLimitError,
  createSystemMessage,
  createUserMessage,
  type CompletionRequest,
} from "../../src/types/index.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a minimal mock fetch Response. */
function mockResponse(status: number, body: string): Response {
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: new Headers(),
    text: () => Promise.resolve(body),
  } as unknown as Response;
}

const baseRequest: CompletionRequest = {
  model: "llama-3.1-8b-instant",
  messages: [createSystemMessage("sys"), createUserMessage("Hello")],
  parameters: {},
};

function completionBody(content: unknown, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    id: "chatcmpl-1",
    model: "llama-3.1-8b-instant",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content, ...extra },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
  });
}

// ===========================================================================
// Request translation
// ===========================================================================

describe("translateRequest", () => {
  it("maps messages to role/content pairs in order", () => {
    const body = translateRequest(baseRequest);
    expect(body).toEqual({
      model: "llama-3.1-8b-instant",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "Hello" },
      ],
    });
  });

  it("includes only the generation parameters that are set", () => {
    const body = translateRequest({
      ...baseRequest,
      parameters: { temperature: 0, max_tokens: 400, presence_penalty: undefined },
    });
    expect(body.temperature).toBe(0);
    expect(body.max_tokens).toBe(400);
    expect("presence_penalty" in body).toBe(false);
    expect("top_p" in body).toBe(false);
  });

  it("passes every OpenAI sampling field through", () => {
    const body = translateRequest({
      ...baseRequest,
      parameters: {
        temperature: 0.2,
        max_tokens: 10,
        top_p: 0.9,
        frequency_penalty: 0.1,
        presence_penalty: 0.3,
      },
    });
    expect(body).toMatchObject({
      temperature: 0.2,
      max_tokens: 10,
      top_p: 0.9,
      frequency_penalty: 0.1,
      presence_penalty: 0.3,
    });
  });
});

// ===========================================================================
// Response translation
// ===========================================================================

describe("translateResponse", () => {
  it("extracts the first choice's text, model, finish reason and usage", () => {
    const result = translateResponse(JSON.parse(completionBody("Hi there")), "groq");
    expect(result).toEqual({
      text: "Hi there",
      model: "llama-3.1-8b-instant",
      finishReason: "stop",
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it("rejects a body without choices as a retryable ProviderError", () => {
    let caught: unknown;
    try {
      translateResponse({ id: "x" }, "openai");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProviderError);
    if (!(caught instanceof ProviderError)) return;
    expect(caught.retryable).toBe(true);
    expect(caught.message).toBe("Malformed openai response: missing choices");
  });

  it("rejects null content as a non-retryable ProviderError", () => {
    let caught: unknown;
    try {
      translateResponse(JSON.parse(completionBody(null)), "openai");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProviderError);
    if (!(caught instanceof ProviderError)) return;
    expect(caught.retryable).toBe(false);
    expect(caught.error_code).toBe("stop");
    expect(caught.message).toBe("openai reply has no text content (finish_reason: stop)");
  });

  it("reports a refusal with its text", () => {
    const body = JSON.parse(completionBody(null, { refusal: "I can't help with that." }));
    expect(() => translateResponse(body, "openai")).toThrow(
      "openai refused the request: I can't help with that.",
    );
  });

  it("rejects an empty choices array", () => {
    expect(() => translateResponse({ choices: [] }, "groq")).toThrow(
      "Malformed groq response: missing choices[0].message",
    );
  });
});

// ===========================================================================
// HTTP invoker
// ===========================================================================

describe("createChatCompletionsInvoker", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("POSTs to /v1/chat/completions with a Bearer token", async () => {
    const fetchMock = vi
      .fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>()
      .mockResolvedValue(mockResponse(200, completionBody("pong")));
    vi.stubGlobal("fetch", fetchMock);

    const invoke = createChatCompletionsInvoker({
      providerName: "groq",
      apiKey: "test-key",
      baseUrl: "https://api.groq.com/openai/",
      defaultHeaders: { "X-Trace": "abc" },
    });
    const result = await invoke(baseRequest);

    expect(result.text).toBe("pong");
    expect(fetchMock).toHaveBeenCalledOnce();
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe("https://api.groq.com/openai/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
      "X-Trace": "abc",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama-3.1-8b-instant",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "Hello" },
      ],
    });
  });

  it("maps error statuses through mapHttpError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        mockResponse(429, '{"error":{"message":"rate limited"}}'),
      ),
    );

    const invoke = createChatCompletionsInvoker({
      providerName: "openai",
      apiKey: "test-key",
      baseUrl: "https://api.openai.com",
    });

    const err = await invoke(baseRequest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    if (!(err instanceof RateLimitError)) return;
    expect(err.message).toBe("rate limited");
    expect(err.status_code).toBe(429);
    expect(err.provider).toBe("openai");
  });

  it("applies the per-attempt timeout to the request", async () => {
    const fetchMock = vi
      .fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>()
      .mockResolvedValue(mockResponse(200, completionBody("pong")));
    vi.stubGlobal("fetch", fetchMock);

    const invoke = createChatCompletionsInvoker({
      providerName: "groq",
      apiKey: "test-key",
      baseUrl: "https://api.groq.com/openai",
      timeout: 30000,
    });
    await invoke(baseRequest);

    expect(fetchMock.mock.calls[0]![1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("fails a null-content reply without marking it retryable", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(mockResponse(200, completionBody(null))));

    const invoke = createChatCompletionsInvoker({
      providerName: "groq",
      apiKey: "test-key",
      baseUrl: "https://api.groq.com/openai",
    });

    const err = await invoke(baseRequest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    if (!(err instanceof ProviderError)) return;
    expect(err.retryable).toBe(false);
  });

  it("uses the raw text when an error body is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(mockResponse(401, "Unauthorized")));

    const invoke = createChatCompletionsInvoker({
      providerName: "openai",
      apiKey: "test-key",
      baseUrl: "https://api.openai.com",
    });

    const err = await invoke(baseRequest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthenticationError);
    if (!(err instanceof AuthenticationError)) return;
    expect(err.message).toBe("Unauthorized");
  });

  it("wraps fetch failures in a retryable NetworkError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const invoke = createChatCompletionsInvoker({
      providerName: "groq",
      apiKey: "test-key",
      baseUrl: "https://api.groq.com/openai",
    });

    const err = await invoke(baseRequest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    if (!(err instanceof NetworkError)) return;
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("groq request failed: fetch failed");
  });
});
