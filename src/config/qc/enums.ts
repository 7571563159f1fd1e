/**
 * Domain enumerations shared by planning, scoring and the order lifecycle.
 *
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║  These values appear in persisted matrices and reports. Renaming one      ║
 * ║  breaks replay of every stored record that uses it.                       ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { z } from "zod";

/**
 * Authority tier of a cited domain. T1 is highest (government, statutory
 * bodies), T4 lowest.
 */
export const TrustTier = z.enum(["T1", "T2", "T3", "T4"]);
export type TrustTier = z.infer<typeof TrustTier>;

/** Numeric rank of a tier; lower is more authoritative. */
export function tierRank(tier: TrustTier): number {
  return TrustTier.options.indexOf(tier) + 1;
}

export const AnchorType = z.enum(["exact", "partial", "brand", "generic"]);
export type AnchorType = z.infer<typeof AnchorType>;

/**
 * Topic tags that require a disclaimer. Which of them are regulated is
 * decided by the compliance rulebook, not here.
 */
export const ComplianceTag = z.enum([
  "gambling",
  "finance",
  "health",
  "legal",
  "crypto",
  "sponsored",
]);
export type ComplianceTag = z.infer<typeof ComplianceTag>;

/**
 * Semantic buckets for LSI terms. "general" holds terms that fit none of
 * the five balanced categories and is only used to fill.
 */
export const LsiCategory = z.enum([
  "process",
  "measurement",
  "failure-mode",
  "tool",
  "temporal",
  "general",
]);
export type LsiCategory = z.infer<typeof LsiCategory>;

/** The five categories the LSI selection balances across, in round order. */
export const BALANCED_LSI_CATEGORIES: readonly LsiCategory[] = [
  "process",
  "measurement",
  "failure-mode",
  "tool",
  "temporal",
];

export const VoiceTone = z.enum(["formal", "neutral", "conversational"]);
export type VoiceTone = z.infer<typeof VoiceTone>;

export const VoicePerspective = z.enum([
  "first_person",
  "second_person",
  "third_person",
  "mixed",
]);
export type VoicePerspective = z.infer<typeof VoicePerspective>;

/**
 * The seven scored categories. Order is the order of the breakdown.
 */
export const ScoreCategory = z.enum([
  "preflight",
  "draft",
  "anchor",
  "trust",
  "lsi",
  "fit",
  "compliance",
]);
export type ScoreCategory = z.infer<typeof ScoreCategory>;

export const IssueSeverity = z.enum(["error", "warning", "info"]);
export type IssueSeverity = z.infer<typeof IssueSeverity>;

export const IssueCategory = z.enum([
  "anchor",
  "trust",
  "lsi",
  "compliance",
  "structure",
  "content",
]);
export type IssueCategory = z.infer<typeof IssueCategory>;

export const ReportStatus = z.enum(["APPROVED", "LIGHT_EDITS", "BLOCKED"]);
export type ReportStatus = z.infer<typeof ReportStatus>;

export const OrderState = z.enum([
  "PENDING",
  "PREFLIGHT",
  "WRITING",
  "QC",
  "APPROVED",
  "DELIVERED",
  "FAILED",
  "CANCELLED",
]);
export type OrderState = z.infer<typeof OrderState>;

export const FixType = z.enum([
  "add_disclaimer",
  "move_link",
  "inject_lsi",
  "add_trust",
]);
export type FixType = z.infer<typeof FixType>;
