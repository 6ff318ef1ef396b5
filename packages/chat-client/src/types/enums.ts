/**
 * Core enums for the chat client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The three roles understood by every Chat Completions provider. */
export const Role = {
  /** Instructions shaping model behavior. Always first in the queue. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

const ROLE_VALUES: readonly string[] = Object.values(Role);

/** Type guard: is `value` one of the known role strings? */
export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_VALUES.includes(value);
}
