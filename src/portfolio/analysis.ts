/**
 * Portfolio change analysis, used after a link is placed to report how the
 * mix moved and what to aim for next.
 */

import { AnchorType } from "../config/qc/enums.js";
import { diversity, risk, riskLevel, share, totalLinks } from "./risk.js";
import { OPTIMAL_RATIOS, type AnchorCounts, type RiskLevel } from "./schema.js";

export type RiskDirection = "improved" | "worsened" | "unchanged";

export type RecommendationPriority = "high" | "medium" | "low";

export interface PortfolioRecommendation {
  action: "increase" | "decrease" | "diversify";
  anchorType: AnchorType;
  rationale: string;
  priority: RecommendationPriority;
}

export interface MixChange {
  type: AnchorType;
  from: number;
  to: number;
  change: number;
}

export interface PortfolioComparison {
  oldRisk: number;
  newRisk: number;
  riskChange: number;
  direction: RiskDirection;
  riskLevel: RiskLevel;
  mixChanges: MixChange[];
  recommendations: PortfolioRecommendation[];
}

/** Risk moves smaller than this are reported as unchanged. */
const UNCHANGED_EPSILON = 0.01;
const DIVERSIFY_BELOW = 0.7;
const MAX_RECOMMENDATIONS = 4;

const PRIORITY_ORDER: Record<RecommendationPriority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function formatPercent(value: number, digits: number): string {
  return `${(value * 100).toFixed(digits)}%`;
}

/**
 * Counts after one more link of `type`. The input is not modified.
 */
export function applyPlacement(counts: AnchorCounts, type: AnchorType): AnchorCounts {
  return { ...counts, [type]: counts[type] + 1 };
}

export function portfolioRecommendations(
  counts: AnchorCounts,
  level: RiskLevel
): PortfolioRecommendation[] {
  if (totalLinks(counts) === 0) {
    return [
      {
        action: "increase",
        anchorType: "brand",
        rationale: "Start building the portfolio with brand anchors",
        priority: "high",
      },
    ];
  }

  const recommendations: PortfolioRecommendation[] = [];
  const [exactMin, exactMax] = OPTIMAL_RATIOS.exact;
  const exact = share(counts, "exact");

  if (exact > exactMax) {
    recommendations.push({
      action: "decrease",
      anchorType: "exact",
      rationale: `Exact match share (${formatPercent(exact, 1)}) exceeds the safe ceiling (${formatPercent(exactMax, 0)})`,
      priority: "high",
    });
  } else if (exact < exactMin && level === "low") {
    recommendations.push({
      action: "increase",
      anchorType: "exact",
      rationale: "Exact matches can be added safely for stronger relevance",
      priority: "low",
    });
  }

  if (share(counts, "partial") < OPTIMAL_RATIOS.partial[0]) {
    recommendations.push({
      action: "increase",
      anchorType: "partial",
      rationale: "Partial matches balance relevance and safety",
      priority: level === "high" ? "high" : "medium",
    });
  }

  if (share(counts, "brand") < OPTIMAL_RATIOS.brand[0]) {
    recommendations.push({
      action: "increase",
      anchorType: "brand",
      rationale: "Brand anchors are the safest type",
      priority: level === "high" ? "high" : "medium",
    });
  }

  if (share(counts, "generic") < OPTIMAL_RATIOS.generic[0]) {
    recommendations.push({
      action: "increase",
      anchorType: "generic",
      rationale: "Generic anchors make the profile look natural",
      priority: "medium",
    });
  }

  if (diversity(counts) < DIVERSIFY_BELOW && recommendations.length < 3) {
    recommendations.push({
      action: "diversify",
      anchorType: "generic",
      rationale: "Spread anchors across more types",
      priority: "medium",
    });
  }

  // Array.prototype.sort is stable, so equal priorities keep rule order
  return recommendations
    .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority])
    .slice(0, MAX_RECOMMENDATIONS);
}

export function comparePortfolios(
  before: AnchorCounts,
  after: AnchorCounts
): PortfolioComparison {
  const oldRisk = risk(before);
  const newRisk = risk(after);
  const riskChange = newRisk - oldRisk;

  let direction: RiskDirection;
  if (Math.abs(riskChange) < UNCHANGED_EPSILON) {
    direction = "unchanged";
  } else if (riskChange < 0) {
    direction = "improved";
  } else {
    direction = "worsened";
  }

  const mixChanges: MixChange[] = [];
  for (const type of AnchorType.options) {
    if (before[type] !== after[type]) {
      mixChanges.push({
        type,
        from: before[type],
        to: after[type],
        change: after[type] - before[type],
      });
    }
  }

  const level = riskLevel(newRisk);

  return {
    oldRisk: round3(oldRisk),
    newRisk: round3(newRisk),
    riskChange: round3(riskChange),
    direction,
    riskLevel: level,
    mixChanges,
    recommendations: portfolioRecommendations(after, level),
  };
}
