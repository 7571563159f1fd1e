/**
 * QC scoring engine.
 */

export {
  IssueLocationSchema,
  ValidationIssueSchema,
  FixRecordSchema,
  RecommendationSchema,
  ScoreBreakdownSchema,
  ValidationReportSchema,
  type IssueLocation,
  type ValidationIssue,
  type FixRecord,
  type Recommendation,
  type ScoreBreakdown,
  type ValidationReport,
  type CategoryResult,
} from "./schema.js";

export { analyzeArticle, normalizeUrl, type ArticleFacts, type QcContext } from "./facts.js";

export {
  CATEGORY_EVALUATORS,
  evaluatePreflight,
  evaluateDraft,
  evaluateAnchor,
  evaluateTrust,
  evaluateLsi,
  evaluateFit,
  evaluateCompliance,
  midpointSections,
  lsiCountScore,
  lsiWindowCounts,
  detectTone,
  dominantPerspective,
  type Evaluator,
} from "./evaluators.js";

export {
  SIGNOFF_CODES,
  actionFor,
  weightedScore,
  decideStatus,
  requiresHumanSignoff,
  rankIssues,
  buildRecommendations,
  nextActions,
} from "./scoring.js";

export { evaluate } from "./engine.js";
export { formatValidationReport } from "./format.js";
