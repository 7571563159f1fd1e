/**
 * Validation report shapes.
 *
 * Reports are persisted with the order record, so they carry their own zod
 * schema and are re-validated when read back.
 */

import { z } from "zod";
import {
  FixType,
  IssueCategory,
  IssueSeverity,
  ReportStatus,
  ScoreCategory,
} from "../config/qc/enums.js";

export const IssueLocationSchema = z
  .object({
    section: z.number().int().min(0).optional(),
    paragraph: z.number().int().min(0).optional(),
    sentence: z.number().int().min(0).optional(),
  })
  .strict();

export type IssueLocation = z.infer<typeof IssueLocationSchema>;

export const ValidationIssueSchema = z
  .object({
    severity: IssueSeverity,
    category: IssueCategory,
    code: z.string().regex(/^[A-Z][A-Z0-9_]*$/),
    message: z.string().min(1),
    location: IssueLocationSchema.optional(),
    /** Scoring category that emitted the issue */
    source: ScoreCategory,
    /** A hard block: the report cannot pass while it stands */
    blocking: z.boolean(),
  })
  .strict();

export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;

export const FixRecordSchema = z
  .object({
    type: FixType,
    /** Issue code the fix targeted */
    code: z.string().min(1),
    applied: z.boolean(),
    description: z.string(),
  })
  .strict();

export type FixRecord = z.infer<typeof FixRecordSchema>;

export const RecommendationSchema = z
  .object({
    code: z.string().min(1),
    action: z.string().min(1),
  })
  .strict();

export type Recommendation = z.infer<typeof RecommendationSchema>;

const CategoryScore = z.number().min(0).max(100);

export const ScoreBreakdownSchema = z
  .object({
    preflight: CategoryScore,
    draft: CategoryScore,
    anchor: CategoryScore,
    trust: CategoryScore,
    lsi: CategoryScore,
    fit: CategoryScore,
    compliance: CategoryScore,
  })
  .strict();

export type ScoreBreakdown = z.infer<typeof ScoreBreakdownSchema>;

export const ValidationReportSchema = z
  .object({
    status: ReportStatus,
    score: z.number().min(0).max(100),
    breakdown: ScoreBreakdownSchema,
    issues: z.array(ValidationIssueSchema),
    autoFixAttempts: z.union([z.literal(0), z.literal(1)]),
    autoFixes: z.array(FixRecordSchema).max(1),
    humanSignoffRequired: z.boolean(),
    recommendations: z.array(RecommendationSchema),
    nextActions: z.array(z.string()),
    qualifyingTrustSignals: z.number().int().min(0),
    matrixFingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .strict();

export type ValidationReport = z.infer<typeof ValidationReportSchema>;

/** What one category evaluator returns. */
export interface CategoryResult {
  score: number;
  issues: ValidationIssue[];
}
