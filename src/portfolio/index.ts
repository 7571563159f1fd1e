/**
 * Anchor portfolio risk model.
 */

export {
  AnchorCountsSchema,
  AnchorPortfolioSchema,
  EMPTY_COUNTS,
  OPTIMAL_RATIOS,
  type AnchorCounts,
  type AnchorPortfolio,
  type AnchorRecommendation,
  type RiskLevel,
} from "./schema.js";
export {
  totalLinks,
  share,
  exactRatio,
  diversity,
  risk,
  riskLevel,
  mostUnderrepresented,
  recommendAnchorTypes,
  LOW_RISK_MAX,
  MEDIUM_RISK_MAX,
} from "./risk.js";
export {
  applyPlacement,
  comparePortfolios,
  portfolioRecommendations,
  type PortfolioComparison,
  type PortfolioRecommendation,
  type MixChange,
  type RiskDirection,
} from "./analysis.js";
export {
  classifyAnchor,
  brandTokens,
  targetKeywords,
  GENERIC_ANCHORS,
} from "./classify.js";
