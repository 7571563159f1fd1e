/**
 * Structured error base.
 *
 * Every module-level error carries a machine-readable `kind` and a flat
 * context record, so callers branch on kind and logs get the context as-is.
 */

export type ErrorContext = Record<string, string | number | boolean | null>;

export class CoreError<K extends string = string> extends Error {
  public readonly kind: K;
  public readonly context: ErrorContext;

  constructor(kind: K, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = "CoreError";
    this.kind = kind;
    this.context = context;
  }

  format(): string {
    const lines = [`${this.name} [${this.kind}]: ${this.message}`];
    for (const [key, value] of Object.entries(this.context)) {
      lines.push(`  - ${key}: ${String(value)}`);
    }
    return lines.join("\n");
  }

  toJSON(): { kind: K; message: string; context: ErrorContext } {
    return { kind: this.kind, message: this.message, context: this.context };
  }
}

export type PreflightErrorKind =
  | "DEPENDENCY_UNAVAILABLE"
  | "INSUFFICIENT_LSI_CANDIDATES"
  | "INVALID_ORDER"
  | "INVALID_MATRIX";

export class PreflightError extends CoreError<PreflightErrorKind> {
  constructor(kind: PreflightErrorKind, message: string, context: ErrorContext = {}) {
    super(kind, message, context);
    this.name = "PreflightError";
  }
}

export type OrderStateErrorKind = "ILLEGAL_TRANSITION" | "GUARD_FAILED";

export class OrderStateError extends CoreError<OrderStateErrorKind> {
  constructor(kind: OrderStateErrorKind, message: string, context: ErrorContext = {}) {
    super(kind, message, context);
    this.name = "OrderStateError";
  }
}

export type PipelineErrorKind =
  | "TIMEOUT"
  | "DEPENDENCY_UNAVAILABLE"
  | "LEASE_HELD"
  | "CANCELLED"
  | "INTERNAL";

export class PipelineError extends CoreError<PipelineErrorKind> {
  constructor(kind: PipelineErrorKind, message: string, context: ErrorContext = {}) {
    super(kind, message, context);
    this.name = "PipelineError";
  }
}
