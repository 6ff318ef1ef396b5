/**
 * HTTP remote invoker for Chat Completions endpoints.
 *
 * POSTs to `{baseUrl}/v1/chat/completions` with a Bearer token and maps
 * non-2xx statuses through `mapHttpError`. Fetch-level failures become
 * NetworkError so the retry executor sees a retryable error.
 */

import {
  NetworkError,
  type CompletionRequest,
  type CompletionResult,
  type GenerationParameters,
  type RemoteInvoker,
} from "../../types/index.js";
import { mapHttpError, postJson, type HttpResponse } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export interface ChatCompletionsInvokerOptions {
  /** Provider name used in errors. */
  providerName: string;
  apiKey: string;
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  /** Per-attempt timeout in milliseconds. */
  timeout?: number;
}

export function createChatCompletionsInvoker<P extends GenerationParameters>(
  options: ChatCompletionsInvokerOptions,
): RemoteInvoker<P> {
  const baseUrl = options.baseUrl.replace(/\/$/, "");
  const url = `${baseUrl}/v1/chat/completions`;
  const headers = {
    Authorization: `Bearer ${options.apiKey}`,
    ...options.defaultHeaders,
  };

  return async (request: CompletionRequest<P>): Promise<CompletionResult> => {
    const body = translateRequest(request);

    let httpRes: HttpResponse;
    try {
      httpRes = await postJson(url, body, { headers, timeout: options.timeout });
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`${options.providerName} request failed: ${detail}`, {
        cause: err,
      });
    }

    if (!httpRes.ok) {
      throw mapHttpError(httpRes.status, httpRes.body ?? httpRes.text, options.providerName);
    }

    return translateResponse(httpRes.body, options.providerName);
  };
}

export { translateRequest } from "./translate-request.js";
export type {
  ChatCompletionMessage,
  ChatCompletionRequestBody,
} from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
