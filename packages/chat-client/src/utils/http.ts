/**
 * JSON POST over the global `fetch`, used by the Chat Completions invoker.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Settled response; non-2xx statuses are returned, not thrown. */
export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON, or `undefined` when the text is not JSON. */
  body: unknown;
  text: string;
}

export interface PostJsonOptions {
  /** Added after `Content-Type: application/json`, which they may override. */
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds. Absent or 0 means none. */
  timeout?: number;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * POST `body` as JSON to `url`.
 *
 * @throws the `fetch` rejection on network failure or timeout.
 */
export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions = {},
): Promise<HttpResponse> {
  const { timeout } = options;

  const res = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: JSON.stringify(body),
    signal: timeout !== undefined && timeout > 0 ? AbortSignal.timeout(timeout) : undefined,
  });

  const text = await res.text();
  return { status: res.status, ok: res.ok, body: parseJson(text), text };
}
