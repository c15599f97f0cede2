/**
 * Session identifiers.
 */

import { randomBytes } from "node:crypto";
import { SessionIdSchema } from "./schema.js";

/**
 * Generate a session ID.
 * Format: date prefix + random suffix (e.g., "20250115-a1b2c3d4")
 */
export function generateSessionId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(4).toString("hex");
  return `${datePart}-${randomPart}`;
}

export function isValidSessionId(sessionId: string): boolean {
  return SessionIdSchema.safeParse(sessionId).success;
}

/**
 * @throws RangeError if the ID could not be used as a storage key
 */
export function assertSessionId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new RangeError(
      `Invalid session id "${sessionId}": use 1-128 letters, digits, "_" or "-"`
    );
  }
}
