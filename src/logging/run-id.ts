/**
 * Run IDs tag every log line and import summary of one CLI invocation.
 */

import { randomBytes } from "node:crypto";

/**
 * UTC date and six hex digits, e.g. "20250302-9f04c1".
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/** Replaces the current run ID; the CLI calls this once per invocation. */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/** null until initRunId() has been called */
export function getRunId(): string | null {
  return currentRunId;
}
