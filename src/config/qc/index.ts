/**
 * QC policy module.
 *
 * Usage:
 *   import { loadQcPolicy, DEFAULT_QC_POLICY } from "./config/qc/index.js";
 *
 *   const policy = loadQcPolicy(DEFAULT_QC_POLICY);
 *
 *   const stricter = loadQcPolicy({
 *     ...DEFAULT_QC_POLICY,
 *     thresholds: { ...DEFAULT_QC_POLICY.thresholds, approvedMin: 90 },
 *   });
 */

// Domain enums
export {
  TrustTier,
  tierRank,
  AnchorType,
  ComplianceTag,
  LsiCategory,
  BALANCED_LSI_CATEGORIES,
  VoiceTone,
  VoicePerspective,
  ScoreCategory,
  IssueSeverity,
  IssueCategory,
  ReportStatus,
  OrderState,
  FixType,
} from "./enums.js";

export type {
  QcPolicy,
  CategoryWeights,
  StatusThresholds,
  LsiPolicy,
} from "./schema.js";

export {
  QcPolicySchema,
  CategoryWeightsSchema,
  StatusThresholdsSchema,
  LsiPolicySchema,
  SCORE_CATEGORIES,
} from "./schema.js";

export {
  loadQcPolicy,
  validateQcPolicy,
  deepFreeze,
  toValidationIssues,
  QcPolicyError,
  type PolicyValidationIssue,
} from "./loader.js";

export { DEFAULT_QC_POLICY } from "./defaults.js";
