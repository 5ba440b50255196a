/**
 * Run ID generation and management.
 * Each organizer invocation gets a run ID so log lines from one run can be
 * grouped together.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: UTC date prefix + random hex suffix
 * (e.g. "20250301-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Called once by each entry point before any logging.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
