/**
 * QC policy loader and validator.
 *
 * Same contract as every other loader in the project: validate with zod,
 * fail fast with structured issues, deep-freeze what passes.
 */

import type { ZodIssue } from "zod";
import { QcPolicySchema, type QcPolicy } from "./schema.js";

export interface PolicyValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

export class QcPolicyError extends Error {
  public readonly issues: PolicyValidationIssue[];

  constructor(message: string, issues: PolicyValidationIssue[]) {
    super(message);
    this.name = "QcPolicyError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["QC policy validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function toValidationIssues(zodIssues: ZodIssue[]): PolicyValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const key of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, key);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and freeze a QC policy.
 *
 * @throws QcPolicyError if validation fails
 */
export function loadQcPolicy(input: unknown): Readonly<QcPolicy> {
  const result = QcPolicySchema.safeParse(input);

  if (!result.success) {
    const issues = toValidationIssues(result.error.issues);
    throw new QcPolicyError(
      `Invalid QC policy: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a policy without loading it.
 * Useful for checking a policy file before a batch run.
 */
export function validateQcPolicy(input: unknown): {
  success: boolean;
  policy?: QcPolicy;
  errors?: PolicyValidationIssue[];
} {
  const result = QcPolicySchema.safeParse(input);

  if (result.success) {
    return { success: true, policy: result.data };
  }

  return {
    success: false,
    errors: toValidationIssues(result.error.issues),
  };
}
