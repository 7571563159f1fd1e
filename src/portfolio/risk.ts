/**
 * Anchor portfolio risk model.
 *
 * risk = 0.7 * exact share + 0.3 * (1 - diversity), where diversity is the
 * Shannon entropy of the four type shares normalized by ln 4. Pure functions
 * of the four counts.
 */

import { AnchorType } from "../config/qc/enums.js";
import {
  OPTIMAL_RATIOS,
  type AnchorCounts,
  type AnchorRecommendation,
  type RiskLevel,
} from "./schema.js";

const EXACT_WEIGHT = 0.7;
const DIVERSITY_WEIGHT = 0.3;

export const LOW_RISK_MAX = 0.3;
export const MEDIUM_RISK_MAX = 0.6;

/** Tie order when two types are equally far below their band. */
const PREFERENCE_ORDER: readonly AnchorType[] = ["brand", "partial", "generic", "exact"];

export function totalLinks(counts: AnchorCounts): number {
  return counts.exact + counts.partial + counts.brand + counts.generic;
}

export function share(counts: AnchorCounts, type: AnchorType): number {
  const total = totalLinks(counts);
  return total === 0 ? 0 : counts[type] / total;
}

export function exactRatio(counts: AnchorCounts): number {
  return share(counts, "exact");
}

/**
 * Normalized Shannon entropy of the type mix, 0..1. An empty portfolio
 * counts as fully diverse.
 */
export function diversity(counts: AnchorCounts): number {
  const total = totalLinks(counts);
  if (total === 0) {
    return 1;
  }
  let entropy = 0;
  for (const type of AnchorType.options) {
    const p = counts[type] / total;
    if (p > 0) {
      entropy -= p * Math.log(p);
    }
  }
  return entropy / Math.log(AnchorType.options.length);
}

export function risk(counts: AnchorCounts): number {
  return EXACT_WEIGHT * exactRatio(counts) + DIVERSITY_WEIGHT * (1 - diversity(counts));
}

export function riskLevel(value: number): RiskLevel {
  if (value <= LOW_RISK_MAX) {
    return "low";
  }
  if (value <= MEDIUM_RISK_MAX) {
    return "medium";
  }
  return "high";
}

/**
 * The type whose share is furthest below its optimal band; brand when
 * every type is inside or above its band.
 */
export function mostUnderrepresented(counts: AnchorCounts): AnchorType {
  let best: AnchorType = "brand";
  let bestGap = 0;
  for (const type of PREFERENCE_ORDER) {
    const gap = OPTIMAL_RATIOS[type][0] - share(counts, type);
    if (gap > bestGap) {
      best = type;
      bestGap = gap;
    }
  }
  return best;
}

export function recommendAnchorTypes(counts: AnchorCounts): AnchorRecommendation {
  const value = risk(counts);
  const level = riskLevel(value);

  switch (level) {
    case "high":
      return {
        risk: value,
        riskLevel: level,
        allowedTypes: ["brand", "generic"],
        forbiddenTypes: ["exact"],
        preferredType: "brand",
        maxExactShare: 0,
      };
    case "medium":
      return {
        risk: value,
        riskLevel: level,
        allowedTypes: [...AnchorType.options],
        forbiddenTypes: [],
        preferredType: "partial",
        maxExactShare: 0.1,
      };
    case "low":
      return {
        risk: value,
        riskLevel: level,
        allowedTypes: [...AnchorType.options],
        forbiddenTypes: [],
        preferredType: mostUnderrepresented(counts),
        maxExactShare: 0.2,
      };
  }
}
