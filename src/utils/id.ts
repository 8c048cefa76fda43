import { randomBytes } from "node:crypto";

/**
 * Generate a compact, time-sortable identifier.
 * Format: base36(timestamp) + "-" + 8 hex chars of randomness.
 */
export function generateId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}

/** Connection handles are prefixed so they read clearly in logs. */
export function generateConnectionId(): string {
  return `conn-${generateId()}`;
}
