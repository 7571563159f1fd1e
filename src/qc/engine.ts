/**
 * QC scoring engine.
 *
 * `evaluate` is pure: the same article, matrix and context always give the
 * same report. Nothing is read from the clock or from global state.
 */

import { deepFreeze } from "../config/qc/loader.js";
import type { ScoreCategory } from "../config/qc/enums.js";
import type { PreflightMatrix } from "../preflight/schema.js";
import { analyzeArticle, type QcContext } from "./facts.js";
import { CATEGORY_EVALUATORS } from "./evaluators.js";
import {
  buildRecommendations,
  decideStatus,
  nextActions,
  requiresHumanSignoff,
  weightedScore,
} from "./scoring.js";
import type { CategoryResult, ScoreBreakdown, ValidationReport } from "./schema.js";

export function evaluate(
  articleText: string,
  matrix: PreflightMatrix,
  context: QcContext
): Readonly<ValidationReport> {
  const facts = analyzeArticle(articleText, matrix, context);
  const results = new Map<ScoreCategory, CategoryResult>(
    CATEGORY_EVALUATORS.map(({ category, evaluate: evaluator }) => [
      category,
      evaluator(facts, matrix, context),
    ])
  );

  const scoreOf = (category: ScoreCategory): number => results.get(category)?.score ?? 0;
  const breakdown: ScoreBreakdown = {
    preflight: scoreOf("preflight"),
    draft: scoreOf("draft"),
    anchor: scoreOf("anchor"),
    trust: scoreOf("trust"),
    lsi: scoreOf("lsi"),
    fit: scoreOf("fit"),
    compliance: scoreOf("compliance"),
  };
  const issues = [...results.values()].flatMap((result) => result.issues);

  const { policy } = context;
  const score = weightedScore(breakdown, policy.weights);
  const status = decideStatus(score, issues, policy.thresholds);

  const report: ValidationReport = {
    status,
    score,
    breakdown,
    issues,
    autoFixAttempts: 0,
    autoFixes: [],
    humanSignoffRequired: requiresHumanSignoff(
      breakdown,
      issues,
      facts.qualifyingTrustSignals,
      policy.thresholds
    ),
    recommendations: buildRecommendations(issues, policy.weights, policy.maxRecommendations),
    nextActions: nextActions(status, issues, policy.weights),
    qualifyingTrustSignals: facts.qualifyingTrustSignals,
    matrixFingerprint: matrix.inputFingerprint,
  };
  return deepFreeze(report);
}
