/**
 * Code-block extraction from model replies.
 */

import { CodeBlockNotFoundError } from "../types/errors.js";

export const CODE_FENCE = "```";

/**
 * Return the lines of the first fenced code block in `text`.
 *
 * The first line inside the fence (the language tag, possibly empty) is
 * dropped, as is the newline that precedes the closing fence.
 *
 * @throws {CodeBlockNotFoundError} when `text` has no closed fence pair.
 */
export function extractCode(text: string): string[] {
  const segments = text.split(CODE_FENCE);
  if (segments.length < 3) {
    throw new CodeBlockNotFoundError(
      "No closed ``` code block found in response",
    );
  }

  let block = segments[1] ?? "";
  if (block.endsWith("\r\n")) {
    block = block.slice(0, -2);
  } else if (block.endsWith("\n")) {
    block = block.slice(0, -1);
  }

  return block.split(/\r?\n/).slice(1);
}
