/**
 * Translate a Chat Completions API response into a CompletionResult.
 */

import { ProviderError, type CompletionResult } from "../../types/index.js";
import { isRecord } from "../../utils/index.js";

function readNumber(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  return typeof value === "number" ? value : 0;
}

/**
 * Pull the first choice's text out of a response body.
 *
 * A body without `choices[0].message` is malformed and reported as a
 * retryable ProviderError. A message whose content is not text (a refusal,
 * a filtered reply) fails the same way on every attempt, so it is reported
 * as non-retryable.
 */
export function translateResponse(raw: unknown, providerName: string): CompletionResult {
  const malformed = (detail: string) =>
    new ProviderError(`Malformed ${providerName} response: ${detail}`, {
      provider: providerName,
      retryable: true,
      raw: isRecord(raw) ? raw : undefined,
    });

  const choices: unknown = isRecord(raw) ? raw["choices"] : undefined;
  if (!isRecord(raw) || !Array.isArray(choices)) {
    throw malformed("missing choices");
  }

  const choice: unknown = choices[0];
  const message = isRecord(choice) ? choice["message"] : undefined;
  if (!isRecord(choice) || !isRecord(message)) {
    throw malformed("missing choices[0].message");
  }

  const finishReason = choice["finish_reason"];
  const content = message["content"];
  if (typeof content !== "string") {
    const refusal = message["refusal"];
    const reason = typeof finishReason === "string" ? finishReason : undefined;
    throw new ProviderError(
      typeof refusal === "string"
        ? `${providerName} refused the request: ${refusal}`
        : `${providerName} reply has no text content (finish_reason: ${reason ?? "unknown"})`,
      { provider: providerName, retryable: false, error_code: reason, raw },
    );
  }

  const usage = raw["usage"];
  const model = raw["model"];

  return {
    text: content,
    model: typeof model === "string" ? model : undefined,
    finishReason: typeof finishReason === "string" ? finishReason : undefined,
    usage: isRecord(usage)
      ? {
          inputTokens: readNumber(usage, "prompt_tokens"),
          outputTokens: readNumber(usage, "completion_tokens"),
        }
      : undefined,
  };
}
