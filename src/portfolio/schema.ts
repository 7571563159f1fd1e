/**
 * Anchor portfolio shapes.
 */

import { z } from "zod";
import { AnchorType } from "../config/qc/enums.js";

const Count = z.number().int().min(0);

export const AnchorCountsSchema = z
  .object({
    exact: Count,
    partial: Count,
    brand: Count,
    generic: Count,
  })
  .strict();

export type AnchorCounts = z.infer<typeof AnchorCountsSchema>;

export const AnchorPortfolioSchema = z
  .object({
    targetDomain: z.string().min(1),
    counts: AnchorCountsSchema,
  })
  .strict();

export type AnchorPortfolio = z.infer<typeof AnchorPortfolioSchema>;

export type RiskLevel = "low" | "medium" | "high";

export interface AnchorRecommendation {
  risk: number;
  riskLevel: RiskLevel;
  allowedTypes: AnchorType[];
  forbiddenTypes: AnchorType[];
  preferredType: AnchorType;
  /** Largest share of exact anchors the next placement may push toward */
  maxExactShare: number;
}

export const EMPTY_COUNTS: AnchorCounts = Object.freeze({
  exact: 0,
  partial: 0,
  brand: 0,
  generic: 0,
});

/**
 * Healthy share band per anchor type.
 */
export const OPTIMAL_RATIOS: Readonly<Record<AnchorType, readonly [number, number]>> = {
  exact: [0.05, 0.15],
  partial: [0.2, 0.4],
  brand: [0.25, 0.45],
  generic: [0.15, 0.3],
};
