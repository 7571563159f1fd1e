/**
 * External collaborator contracts.
 *
 * Everything the pipeline reads or writes outside its own process goes
 * through this interface. Calls are async and run under a timeout; the
 * core planning and scoring functions never do.
 */

import type { TrustRegistry } from "../reference/schema.js";
import type { AnchorPortfolio } from "../portfolio/schema.js";
import type { Order, PreflightMatrix, PublisherProfile, SerpSignal } from "../preflight/schema.js";
import type { WriterBrief } from "../preflight/brief.js";
import type { ValidationReport } from "../qc/schema.js";
import type { OrderRecord } from "../orders/machine.js";
import { PipelineError } from "../types/errors.js";

export interface Collaborators {
  /** null when the publisher is unknown */
  getPublisherProfile(domain: string): Promise<PublisherProfile | null>;
  /** Zeroed counts when the target has no placements yet */
  getAnchorPortfolio(targetDomain: string): Promise<AnchorPortfolio>;
  getSerpSignal(query: string, locale: string): Promise<SerpSignal>;
  getTrustRegistry(): Promise<TrustRegistry>;
  persist(record: Readonly<OrderRecord>): Promise<void>;
  /** External drafting. previousReport is set when the writer is revising. */
  draft(
    order: Order,
    matrix: PreflightMatrix,
    brief: WriterBrief,
    previousReport: ValidationReport | null
  ): Promise<string>;
}

/**
 * Run one collaborator call with a time budget.
 *
 * @throws PipelineError TIMEOUT when the call does not settle in time
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new PipelineError("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`, {
          operation,
          timeoutMs,
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
