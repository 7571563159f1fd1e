/**
 * Default QC policy.
 *
 * Category weights sum to 1.0. Thresholds follow the publishing rules:
 * 85 and above ships, 70 to 85 goes back for light edits, below 70 blocks.
 */

import type { QcPolicy } from "./schema.js";

export const DEFAULT_QC_POLICY: QcPolicy = {
  version: "1.0.0",

  weights: {
    preflight: 0.25,
    draft: 0.15,
    anchor: 0.2,
    trust: 0.15,
    lsi: 0.15,
    fit: 0.05,
    compliance: 0.05,
  },

  thresholds: {
    approvedMin: 85,
    lightEditsMin: 70,
    signoffCategoryMin: 50,
  },

  lsi: {
    min: 6,
    max: 10,
    targetCount: 8,
    radiusSentences: 2,
    maxRepeat: 2,
    relatedCap: 12,
    excessPenalty: 10,
    overusePenalty: 10,
  },

  anchor: {
    placementPenalty: 30,
    depthPenalty: 15,
    maxParagraphDepth: 3,
  },

  trust: {
    requiredSignals: 2,
    minTier: "T2",
    suggestedSources: 3,
    missingSignalPenalty: 20,
  },

  draft: {
    minSections: 3,
    sectionPenalty: 20,
    emptySectionPenalty: 10,
    wordCountWarnDeviation: 0.1,
    wordCountBlockDeviation: 0.2,
    wordCountWarnPenalty: 10,
    wordCountBlockPenalty: 30,
  },

  preflight: {
    missingLinkPenalty: 30,
    multipleLinkPenalty: 10,
    discouragedTypePenalty: 20,
    missingBridgePenalty: 10,
  },

  fit: {
    toneMargin: 3,
    adjacentTonePenalty: 20,
    oppositeTonePenalty: 40,
    perspectiveMinHits: 3,
    perspectivePenalty: 15,
    promotionalLimit: 3,
    promotionalPenalty: 20,
  },

  maxRecommendations: 4,
};
