/**
 * Trace identifiers.
 * Every validation gets one, so a rejection shown generically to a user
 * can be found in the audit log.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique trace ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateTraceId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}
