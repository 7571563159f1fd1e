/**
 * Order lifecycle state machine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TRANSITIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   PENDING   -> PREFLIGHT | CANCELLED
 *   PREFLIGHT -> WRITING | FAILED
 *   WRITING   -> QC | FAILED
 *   QC        -> APPROVED | WRITING | FAILED
 *   APPROVED  -> DELIVERED | FAILED
 *   FAILED    -> PENDING            (explicit retry)
 *   DELIVERED, CANCELLED            (terminal)
 *
 * Records are immutable; every transition returns a new frozen record with
 * one more history entry.
 */

import type { OrderState, ReportStatus } from "../config/qc/enums.js";
import { deepFreeze } from "../config/qc/loader.js";
import type { PreflightMatrix } from "../preflight/schema.js";
import type { ValidationReport } from "../qc/schema.js";
import { OrderStateError } from "../types/errors.js";

export const TRANSITIONS: Readonly<Record<OrderState, readonly OrderState[]>> = {
  PENDING: ["PREFLIGHT", "CANCELLED"],
  PREFLIGHT: ["WRITING", "FAILED"],
  WRITING: ["QC", "FAILED"],
  QC: ["APPROVED", "WRITING", "FAILED"],
  APPROVED: ["DELIVERED", "FAILED"],
  FAILED: ["PENDING"],
  DELIVERED: [],
  CANCELLED: [],
};

/** Report status each guarded QC exit requires. */
const QC_EXIT_GUARDS: Partial<Record<OrderState, ReportStatus>> = {
  APPROVED: "APPROVED",
  WRITING: "LIGHT_EDITS",
};

export interface OrderTransition {
  /** 1-based, gapless */
  sequence: number;
  from: OrderState;
  to: OrderState;
  reason?: string;
  /** ISO timestamp */
  at: string;
}

export interface OrderRecord {
  orderId: string;
  state: OrderState;
  history: OrderTransition[];
  latestReport?: ValidationReport;
  matrix?: PreflightMatrix;
  /** Article text latestReport scored, after any automatic fix */
  article?: string;
}

export interface TransitionOptions {
  reason?: string;
  /** Report produced by the step that ends here; becomes latestReport */
  report?: ValidationReport;
  /** Matrix built by the step that ends here */
  matrix?: PreflightMatrix;
  /** Article as scored by the report that ends here */
  article?: string;
  now?: () => Date;
}

export function createOrderRecord(orderId: string): Readonly<OrderRecord> {
  const record: OrderRecord = { orderId, state: "PENDING", history: [] };
  return deepFreeze(record);
}

export function canTransition(from: OrderState, to: OrderState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: OrderState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Apply one transition. Re-applying the transition that produced the
 * current state returns the record unchanged.
 *
 * @throws OrderStateError ILLEGAL_TRANSITION for moves outside the table,
 *   GUARD_FAILED when a QC exit does not match the latest report
 */
export function transition(
  record: Readonly<OrderRecord>,
  to: OrderState,
  options: TransitionOptions = {}
): Readonly<OrderRecord> {
  const last = record.history[record.history.length - 1];
  if (last !== undefined && last.to === to && record.state === to) {
    return record;
  }

  const from = record.state;
  if (!canTransition(from, to)) {
    throw new OrderStateError("ILLEGAL_TRANSITION", `Cannot move order from ${from} to ${to}`, {
      orderId: record.orderId,
      from,
      to,
    });
  }

  const report = options.report ?? record.latestReport;
  const required = from === "QC" ? QC_EXIT_GUARDS[to] : undefined;
  if (required !== undefined && report?.status !== required) {
    throw new OrderStateError(
      "GUARD_FAILED",
      `QC -> ${to} requires report status ${required}, got ${report?.status ?? "none"}`,
      { orderId: record.orderId, from, to, status: report?.status ?? null }
    );
  }

  const entry: OrderTransition = {
    sequence: record.history.length + 1,
    from,
    to,
    at: (options.now ?? (() => new Date()))().toISOString(),
  };
  if (options.reason !== undefined) {
    entry.reason = options.reason;
  }

  const next: OrderRecord = {
    orderId: record.orderId,
    state: to,
    history: [...record.history, entry],
  };
  if (report !== undefined) {
    next.latestReport = report;
  }
  const matrix = options.matrix ?? record.matrix;
  if (matrix !== undefined) {
    next.matrix = matrix;
  }
  const article = options.article ?? record.article;
  if (article !== undefined) {
    next.article = article;
  }
  return deepFreeze(next);
}

export interface ReportExitOptions {
  /** Whether a LIGHT_EDITS report goes back to the writer */
  editsRequested?: boolean;
}

/**
 * Where a QC step leads. null means the order stays in QC until someone
 * decides about the requested edits.
 */
export function nextStateForReport(
  report: Pick<ValidationReport, "status">,
  options: ReportExitOptions = {}
): OrderState | null {
  switch (report.status) {
    case "APPROVED":
      return "APPROVED";
    case "LIGHT_EDITS":
      return (options.editsRequested ?? true) ? "WRITING" : null;
    case "BLOCKED":
      return "FAILED";
  }
}
