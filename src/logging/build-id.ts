/**
 * Build ID generation.
 * Every registry build gets its own ID so log lines and registry
 * metadata from the same build can be correlated.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique build ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateBuildId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}
