/**
 * QC policy schema.
 *
 * The policy holds every threshold, weight and penalty the planner and the
 * scoring engine apply. It is loaded once, frozen, and passed to each call so
 * that a stored report can be replayed against the exact policy that made it.
 */

import { z } from "zod";
import { ScoreCategory, TrustTier } from "./enums.js";

const Penalty = z.number().min(0).max(100);

/** Float slack when summing the seven weights. */
const WEIGHT_TOLERANCE = 1e-6;

/**
 * One weight per scored category. All seven keys are required.
 */
export const CategoryWeightsSchema = z
  .object({
    preflight: z.number().min(0).max(1),
    draft: z.number().min(0).max(1),
    anchor: z.number().min(0).max(1),
    trust: z.number().min(0).max(1),
    lsi: z.number().min(0).max(1),
    fit: z.number().min(0).max(1),
    compliance: z.number().min(0).max(1),
  })
  .strict()
  .describe("Weight of each category in the aggregate score");

export type CategoryWeights = z.infer<typeof CategoryWeightsSchema>;

export const StatusThresholdsSchema = z
  .object({
    /** Aggregate score at or above which a clean report is APPROVED */
    approvedMin: z.number().min(0).max(100),

    /** Aggregate score below which a report is BLOCKED */
    lightEditsMin: z.number().min(0).max(100),

    /** Any category below this requires human signoff */
    signoffCategoryMin: z.number().min(0).max(100),
  })
  .strict();

export type StatusThresholds = z.infer<typeof StatusThresholdsSchema>;

export const LsiPolicySchema = z
  .object({
    min: z.number().int().min(1).describe("Fewest distinct LSI lemmas near the anchor"),
    max: z.number().int().min(1).describe("Most distinct LSI lemmas before over-optimization"),
    targetCount: z
      .number()
      .int()
      .min(1)
      .describe("Number of terms the planner aims to select"),
    radiusSentences: z.number().int().min(0),
    maxRepeat: z
      .number()
      .int()
      .min(1)
      .describe("Times one lemma may appear in the window before it counts as overuse"),
    relatedCap: z
      .number()
      .int()
      .min(0)
      .describe("How many unselected candidates the matrix keeps as related vocabulary"),
    excessPenalty: Penalty,
    overusePenalty: Penalty,
  })
  .strict();

export type LsiPolicy = z.infer<typeof LsiPolicySchema>;

export const AnchorPolicySchema = z
  .object({
    placementPenalty: Penalty,
    depthPenalty: Penalty,
    maxParagraphDepth: z
      .number()
      .int()
      .min(1)
      .describe("Deepest paragraph (1-based, within its section) the anchor may sit in"),
  })
  .strict();

export const TrustPolicySchema = z
  .object({
    requiredSignals: z.number().int().min(0),
    minTier: TrustTier,
    suggestedSources: z.number().int().min(0),
    missingSignalPenalty: Penalty,
  })
  .strict();

export const DraftPolicySchema = z
  .object({
    minSections: z.number().int().min(0),
    sectionPenalty: Penalty,
    emptySectionPenalty: Penalty,
    /** Relative deviation above which a word-count warning is raised */
    wordCountWarnDeviation: z.number().min(0).max(1),
    /** Relative deviation above which the word count blocks shipping */
    wordCountBlockDeviation: z.number().min(0).max(1),
    wordCountWarnPenalty: Penalty,
    wordCountBlockPenalty: Penalty,
  })
  .strict();

export const PreflightPolicySchema = z
  .object({
    missingLinkPenalty: Penalty,
    multipleLinkPenalty: Penalty,
    discouragedTypePenalty: Penalty,
    missingBridgePenalty: Penalty,
  })
  .strict();

export const FitPolicySchema = z
  .object({
    /** Marker difference needed before a text counts as formal or conversational */
    toneMargin: z.number().int().min(1),
    adjacentTonePenalty: Penalty,
    oppositeTonePenalty: Penalty,
    /** Pronoun hits needed before a perspective counts as dominant */
    perspectiveMinHits: z.number().int().min(1),
    perspectivePenalty: Penalty,
    promotionalLimit: z.number().int().min(0),
    promotionalPenalty: Penalty,
  })
  .strict();

export const QcPolicySchema = z
  .object({
    /** Semantic version, part of every matrix fingerprint */
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    weights: CategoryWeightsSchema,
    thresholds: StatusThresholdsSchema,
    lsi: LsiPolicySchema,
    anchor: AnchorPolicySchema,
    trust: TrustPolicySchema,
    draft: DraftPolicySchema,
    preflight: PreflightPolicySchema,
    fit: FitPolicySchema,
    maxRecommendations: z.number().int().min(0),
  })
  .strict()
  .superRefine((policy, ctx) => {
    const total = ScoreCategory.options.reduce(
      (sum, category) => sum + policy.weights[category],
      0
    );
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["weights"],
        message: `Category weights must sum to 1.0, got ${total.toFixed(4)}`,
      });
    }

    const { min, max, targetCount } = policy.lsi;
    if (min > targetCount || targetCount > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lsi", "targetCount"],
        message: `LSI bounds must satisfy min <= targetCount <= max (${min} / ${targetCount} / ${max})`,
      });
    }

    if (policy.thresholds.lightEditsMin > policy.thresholds.approvedMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["thresholds", "lightEditsMin"],
        message: "lightEditsMin cannot exceed approvedMin",
      });
    }

    if (policy.draft.wordCountWarnDeviation > policy.draft.wordCountBlockDeviation) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["draft", "wordCountWarnDeviation"],
        message: "wordCountWarnDeviation cannot exceed wordCountBlockDeviation",
      });
    }
  });

export type QcPolicy = z.infer<typeof QcPolicySchema>;

/** Categories in breakdown order, re-exported for loops over the weights. */
export const SCORE_CATEGORIES: readonly ScoreCategory[] = ScoreCategory.options;
