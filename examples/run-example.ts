/**
 * Example: asking a model for a shell command and pulling the code out.
 *
 * This script demonstrates how to:
 *   1. Build an adapter from whichever API key is in the environment
 *   2. Set a system prompt
 *   3. Send a question and print the reply
 *   4. Extract the lines of the first fenced code block
 *
 * Set OPENAI_KEY (or OPENAI_API_KEY) or GROQ_KEY (or GROQ_API_KEY) first.
 *
 * Usage:
 *   npm run example -- "list running docker containers"
 */

import {
  CodeBlockNotFoundError,
  RetryExhaustedError,
  createChatFromEnv,
} from "@convo/chat-client";

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const question = process.argv.slice(2).join(" ") || "list running docker containers";

  const chat = createChatFromEnv({ maxRetries: 3, logLevel: "warn" });
  chat.setSystemPrompt(
    "You write bash. Answer with a single ```bash fenced block and nothing else.",
  );

  console.log(`=== ${chat.name} (session ${chat.getSessionId()}) ===\n`);
  console.log(`> ${question}\n`);

  const reply = await chat.getResponse(question);
  console.log(reply);

  try {
    const lines = chat.extractCode(reply);
    console.log("\nExtracted commands:");
    for (const line of lines) {
      console.log(`  $ ${line}`);
    }
  } catch (err) {
    if (err instanceof CodeBlockNotFoundError) {
      console.log("\n(no code block in reply)");
    } else {
      throw err;
    }
  }

  console.log(`\nHistory holds ${chat.getHistory().length} messages.`);
}

main().catch((err: unknown) => {
  if (err instanceof RetryExhaustedError) {
    console.error(`Gave up after ${err.attempts} attempts:`, err.cause);
  } else {
    console.error("Example failed:", err);
  }
  process.exit(1);
});
