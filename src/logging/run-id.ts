/**
 * Run ids tag every log line of one CLI invocation or batch, so the entries
 * for a set of orders can be pulled out of a shared log.
 */

import { randomBytes } from "node:crypto";

/** "20260301-a1b2c3": UTC date, then six hex digits */
export const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Set the run id for this process. A caller that already has one (a
 * scheduler handing down RUN_ID) passes it in; otherwise a fresh id is made.
 *
 * @throws Error when the given id does not match RUN_ID_PATTERN
 */
export function initRunId(runId?: string): string {
  if (runId !== undefined && !RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run id: ${runId}`);
  }
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/** Null until initRunId has been called. */
export function getRunId(): string | null {
  return currentRunId;
}
