/**
 * Translate a CompletionRequest into Chat Completions API format.
 *
 * OpenAI and Groq share this wire format: a `messages` array of
 * role/content pairs plus flat sampling parameters.
 */

import type {
  CompletionRequest,
  GenerationParameters,
  Message,
} from "../../types/index.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

function translateMessages(messages: readonly Message[]): ChatCompletionMessage[] {
  return messages.map((m) => ({ role: m.role, content: m.content }));
}

export function translateRequest(
  request: CompletionRequest<GenerationParameters>,
): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: translateMessages(request.messages),
  };

  const p = request.parameters;

  if (p.temperature !== undefined) {
    body.temperature = p.temperature;
  }

  if (p.max_tokens !== undefined) {
    body.max_tokens = p.max_tokens;
  }

  if (p.top_p !== undefined) {
    body.top_p = p.top_p;
  }

  if (p.frequency_penalty !== undefined) {
    body.frequency_penalty = p.frequency_penalty;
  }

  if (p.presence_penalty !== undefined) {
    body.presence_penalty = p.presence_penalty;
  }

  return body;
}
