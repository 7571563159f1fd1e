/**
 * Status decision, signoff, recommendation ranking and next actions.
 */

import type { CategoryWeights, StatusThresholds } from "../config/qc/schema.js";
import type { IssueSeverity, ReportStatus } from "../config/qc/enums.js";
import type {
  Recommendation,
  ScoreBreakdown,
  ValidationIssue,
} from "./schema.js";

/** Codes that always need a human to look, whatever the score. */
export const SIGNOFF_CODES: ReadonlySet<string> = new Set([
  "ANCHOR_IN_HEADER",
  "ERR_TRUST_COMPETITOR",
  "ERR_COMPLIANCE",
]);

const SEVERITY_RANK: Record<IssueSeverity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

const ACTIONS: Record<string, string> = {
  MISSING_PRIMARY_LINK: "Link the anchor text to the target URL",
  LINK_TARGET_MISMATCH: "Point the anchor link at the target URL",
  MULTIPLE_TARGET_LINKS: "Keep a single link to the target",
  ANCHOR_TYPE_DISCOURAGED: "Rewrite the anchor as a brand or generic phrase",
  ANCHOR_TYPE_NOT_PREFERRED: "Use the preferred anchor type on the next placement",
  BRIDGE_CONCEPT_MISSING: "Work the bridge concept into the article",
  ANCHOR_NOT_FOUND: "Add the anchor text to the body and link it",
  ANCHOR_IN_HEADER: "Move the anchor out of the heading into body text",
  ANCHOR_PLACEMENT_WRONG: "Move the link into a middle section",
  ANCHOR_TOO_DEEP: "Move the link into one of the first paragraphs of its section",
  BRIDGE_NOT_NEAR_ANCHOR: "Mention the bridge concept near the anchor",
  ANCHOR_NOT_FOUND_FOR_LSI: "Place the anchor in body text so related terms can surround it",
  INSUFFICIENT_LSI_TERMS: "Add planned LSI terms near the anchor",
  EXCESSIVE_LSI_TERMS: "Thin out related terms around the anchor",
  LSI_OVERUSE: "Vary repeated terms near the anchor",
  ERR_TRUST_COMPETITOR: "Remove every competitor link, mention and name",
  ERR_TRUST_UNREGISTERED_REGULATED: "Replace links to unregistered regulated sites",
  MISSING_TRUST_SIGNALS: "Cite authoritative sources from the trust plan",
  INSUFFICIENT_TRUST_SIGNALS: "Cite another authoritative source from the trust plan",
  LOW_TIER_SOURCE: "Prefer higher-tier sources for citations",
  UNREGISTERED_SOURCE: "Replace unregistered sources with registered ones",
  ERR_COMPLIANCE: "Remove prohibited claims",
  INSUFFICIENT_SECTIONS: "Split the article into more sections",
  EMPTY_SECTION: "Fill or remove empty sections",
  WORD_COUNT_MISMATCH: "Bring the length within the target word range",
  TONE_MISMATCH: "Match the publisher's tone",
  PERSPECTIVE_MISMATCH: "Rewrite in the publisher's perspective",
  OVERLY_PROMOTIONAL: "Cut promotional phrasing",
};

const DISCLAIMER_CODE = /^MISSING_([A-Z]+)_DISCLAIMER$/;

/** Imperative for an issue code. */
export function actionFor(code: string): string {
  const action = ACTIONS[code];
  if (action !== undefined) {
    return action;
  }
  const disclaimer = DISCLAIMER_CODE.exec(code);
  if (disclaimer?.[1]) {
    return `Add the ${disclaimer[1].toLowerCase()} disclaimer`;
  }
  return `Resolve ${code}`;
}

export function weightedScore(breakdown: ScoreBreakdown, weights: CategoryWeights): number {
  const total =
    breakdown.preflight * weights.preflight +
    breakdown.draft * weights.draft +
    breakdown.anchor * weights.anchor +
    breakdown.trust * weights.trust +
    breakdown.lsi * weights.lsi +
    breakdown.fit * weights.fit +
    breakdown.compliance * weights.compliance;
  return Math.round(total * 10) / 10;
}

/**
 * BLOCKED on any hard block or a score under `lightEditsMin`; APPROVED at
 * `approvedMin` and above; LIGHT_EDITS between.
 */
export function decideStatus(
  score: number,
  issues: readonly ValidationIssue[],
  thresholds: StatusThresholds
): ReportStatus {
  if (issues.some((issue) => issue.blocking) || score < thresholds.lightEditsMin) {
    return "BLOCKED";
  }
  if (score >= thresholds.approvedMin) {
    return "APPROVED";
  }
  return "LIGHT_EDITS";
}

export function requiresHumanSignoff(
  breakdown: ScoreBreakdown,
  issues: readonly ValidationIssue[],
  qualifyingTrustSignals: number,
  thresholds: StatusThresholds
): boolean {
  return (
    issues.some((issue) => SIGNOFF_CODES.has(issue.code)) ||
    Object.values(breakdown).some((score) => score < thresholds.signoffCategoryMin) ||
    qualifyingTrustSignals === 0
  );
}

function locationKey(issue: ValidationIssue): [number, number, number] {
  const location = issue.location;
  return [location?.section ?? -1, location?.paragraph ?? -1, location?.sentence ?? -1];
}

/**
 * Issues in fixing order: hard blocks first, then by the weight of the
 * emitting category, severity, code and location. Stable for equal inputs.
 */
export function rankIssues(
  issues: readonly ValidationIssue[],
  weights: CategoryWeights
): ValidationIssue[] {
  return [...issues].sort((a, b) => {
    if (a.blocking !== b.blocking) return a.blocking ? -1 : 1;
    const weightDiff = weights[b.source] - weights[a.source];
    if (weightDiff !== 0) return weightDiff;
    const severityDiff = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
    if (severityDiff !== 0) return severityDiff;
    if (a.code !== b.code) return a.code < b.code ? -1 : 1;
    const [as, ap, at] = locationKey(a);
    const [bs, bp, bt] = locationKey(b);
    return as - bs || ap - bp || at - bt;
  });
}

/** One recommendation per code, in ranked order, capped. */
export function buildRecommendations(
  issues: readonly ValidationIssue[],
  weights: CategoryWeights,
  cap: number
): Recommendation[] {
  const codes: string[] = [];
  for (const issue of rankIssues(issues, weights)) {
    if (!codes.includes(issue.code)) {
      codes.push(issue.code);
    }
  }
  return codes.slice(0, cap).map((code) => ({ code, action: actionFor(code) }));
}

export function nextActions(
  status: ReportStatus,
  issues: readonly ValidationIssue[],
  weights: CategoryWeights
): string[] {
  switch (status) {
    case "APPROVED":
      return ["Proceed to delivery"];
    case "LIGHT_EDITS":
      return ["Apply the recommended edits", "Re-run QC on the revised article"];
    case "BLOCKED": {
      const actions = ["Address critical issues before resubmitting"];
      for (const issue of rankIssues(issues, weights)) {
        const action = actionFor(issue.code);
        if (issue.blocking && !actions.includes(action)) {
          actions.push(action);
        }
      }
      actions.push("Request human review");
      return actions;
    }
  }
}
