/**
 * Order pipeline and batch runner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE CYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   PENDING -> PREFLIGHT -> WRITING -> QC -> APPROVED | WRITING | FAILED
 *
 * A cycle starts from PENDING or from WRITING (revision after LIGHT_EDITS)
 * and runs strictly in order under the order's lease. Each step's output
 * becomes a transition only if the cycle has not been cancelled meanwhile.
 */

import type { OrderState } from "../config/qc/enums.js";
import type { ReferenceData } from "../reference/loader.js";
import { createWriterBrief } from "../preflight/brief.js";
import type { Order, PreflightMatrix } from "../preflight/schema.js";
import {
  nextStateForReport,
  transition,
  type OrderRecord,
  type TransitionOptions,
} from "../orders/machine.js";
import { CoreError, OrderStateError, PipelineError } from "../types/errors.js";
import type { OperationFailure } from "../types/result.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { withTimeout, type Collaborators } from "./collaborators.js";
import type { OrderLeaseManager } from "./lease.js";
import type { PreflightService } from "./service.js";

export interface OrderPipelineOptions {
  service: PreflightService;
  collaborators: Collaborators;
  leases: OrderLeaseManager;
  reference: ReferenceData;
  timeoutMs: number;
  autoFix?: boolean;
  /** Send LIGHT_EDITS reports back to the writer */
  editsRequested?: boolean;
  workerId?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function describe(err: unknown): string {
  if (err instanceof CoreError) {
    return `${err.kind}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

export class OrderPipeline {
  private readonly options: OrderPipelineOptions;
  private readonly logger: Logger;

  constructor(options: OrderPipelineOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger).child("pipeline");
  }

  /**
   * Run one cycle for an order and return its record at the end of it.
   *
   * @throws PipelineError CANCELLED when the signal fires (the record is
   *   left at its last completed step), LEASE_HELD when another worker owns
   *   the order
   */
  async run(
    record: Readonly<OrderRecord>,
    order: Order,
    runOptions: RunOptions = {}
  ): Promise<Readonly<OrderRecord>> {
    if (record.state !== "PENDING" && record.state !== "WRITING") {
      throw new OrderStateError("ILLEGAL_TRANSITION", `No cycle starts from ${record.state}`, {
        orderId: record.orderId,
        from: record.state,
      });
    }

    const { signal } = runOptions;
    this.checkpoint(signal, record);
    const lease = this.options.leases.acquire(order.id, this.options.workerId ?? "worker-1");
    let current = record;

    const step = (to: OrderState, options: Omit<TransitionOptions, "now"> = {}): void => {
      this.checkpoint(signal, current);
      current = transition(current, to, { ...options, now: this.options.now });
      this.logger.info(`Order ${current.orderId} -> ${to}`, {
        orderId: current.orderId,
        sequence: current.history.length,
      });
      this.persist(current);
    };

    try {
      let matrix: PreflightMatrix;
      try {
        if (current.state === "PENDING") {
          step("PREFLIGHT");
          matrix = await this.buildMatrix(order);
          step("WRITING", { matrix, reason: "matrix ready" });
        } else {
          matrix = await this.currentMatrix(current, order);
        }
      } catch (err) {
        if (err instanceof PipelineError && err.kind === "CANCELLED") {
          throw err;
        }
        step("FAILED", { reason: describe(err) });
        return current;
      }

      let article: string;
      try {
        const brief = createWriterBrief(order, matrix, this.options.reference.rulebook);
        article = await withTimeout("draft", this.options.timeoutMs, () =>
          this.options.collaborators.draft(order, matrix, brief, current.latestReport ?? null)
        );
      } catch (err) {
        step("FAILED", { reason: describe(err) });
        return current;
      }

      step("QC", { matrix });
      const validated = await this.options.service.validate(article, matrix, this.options.autoFix ?? true);
      if (!validated.success) {
        step("FAILED", { reason: `${validated.error.kind}: ${validated.error.message}` });
        return current;
      }

      const { report, article: scored } = validated.value;
      const next = nextStateForReport(report, { editsRequested: this.options.editsRequested ?? true });
      if (next === null) {
        this.checkpoint(signal, current);
        current = Object.freeze({ ...current, latestReport: report, article: scored });
        this.persist(current);
        return current;
      }
      step(next, { report, article: scored, reason: `QC ${report.status} (${report.score})` });
      return current;
    } finally {
      this.options.leases.release(lease);
    }
  }

  private async buildMatrix(order: Order): Promise<Readonly<PreflightMatrix>> {
    const result = await this.options.service.buildPreflight(order);
    if (!result.success) {
      // Planner failures keep their own kind
      throw new CoreError(result.error.kind, result.error.message, {
        ...result.error.context,
        orderId: order.id,
      });
    }
    return result.value;
  }

  /** The stored matrix, rebuilt when missing or stale. */
  private async currentMatrix(record: Readonly<OrderRecord>, order: Order): Promise<Readonly<PreflightMatrix>> {
    if (record.matrix === undefined) {
      return this.buildMatrix(order);
    }
    const stale = await this.options.service.isStale(record.matrix, order);
    if (!stale.success || stale.value) {
      this.logger.info("Rebuilding stale matrix", { orderId: order.id });
      return this.buildMatrix(order);
    }
    return record.matrix;
  }

  private checkpoint(signal: AbortSignal | undefined, record: Readonly<OrderRecord>): void {
    if (signal?.aborted) {
      throw new PipelineError("CANCELLED", `Order ${record.orderId} cancelled at ${record.state}`, {
        orderId: record.orderId,
        state: record.state,
      });
    }
  }

  private persist(record: Readonly<OrderRecord>): void {
    void this.options.collaborators.persist(record).catch((err: unknown) => {
      this.logger.warn("Persist failed", {
        orderId: record.orderId,
        state: record.state,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// BATCH
// ═══════════════════════════════════════════════════════════════════════════

export interface BatchItem {
  record: Readonly<OrderRecord>;
  order: Order;
}

export type BatchStatus = "COMPLETED" | "FAILED";

export interface BatchOutcome {
  orderId: string;
  status: BatchStatus;
  /** Record at the end of the cycle; absent when the run threw */
  record?: Readonly<OrderRecord>;
  error?: OperationFailure;
}

export interface BatchOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Run a cycle for every item with at most `concurrency` orders in flight.
 * Outcomes are per order and in input order; one failure never undoes
 * another order's progress.
 */
export async function runBatch(
  items: readonly BatchItem[],
  pipeline: OrderPipeline,
  options: BatchOptions
): Promise<BatchOutcome[]> {
  const outcomes: BatchOutcome[] = [];
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        return;
      }
      outcomes[index] = await runOne(item);
    }
  }

  async function runOne({ record, order }: BatchItem): Promise<BatchOutcome> {
    try {
      const finished = await pipeline.run(record, order, { signal: options.signal });
      return {
        orderId: order.id,
        status: finished.state === "FAILED" ? "FAILED" : "COMPLETED",
        record: finished,
      };
    } catch (err) {
      const error: OperationFailure =
        err instanceof CoreError
          ? err.toJSON()
          : { kind: "INTERNAL", message: err instanceof Error ? err.message : String(err), context: {} };
      return { orderId: order.id, status: "FAILED", error };
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, options.concurrency), items.length) }, () =>
    worker()
  );
  await Promise.all(workers);
  return outcomes;
}
