/**
 * Auto-fix controller.
 *
 * At most one automatic edit per order: the highest-ranked eligible issue
 * gets its fix, the article is evaluated once more and the attempt is
 * recorded on the report. A report that already carries an attempt is
 * returned unchanged. Eligibility is fixed by code; anchor-in-heading,
 * competitor and prohibited-claim findings always go to a person.
 */

import type { FixType } from "../config/qc/enums.js";
import { deepFreeze } from "../config/qc/loader.js";
import type { PreflightMatrix } from "../preflight/schema.js";
import { evaluate } from "../qc/engine.js";
import type { QcContext } from "../qc/facts.js";
import { rankIssues } from "../qc/scoring.js";
import type { FixRecord, ValidationReport } from "../qc/schema.js";
import { addDisclaimer, addTrust, disclaimerTag, injectLsi, moveLink, type Fix } from "./fixes.js";

export const MAX_AUTOFIX_ATTEMPTS = 1;

const FIX_BY_CODE: Readonly<Record<string, FixType>> = {
  ANCHOR_PLACEMENT_WRONG: "move_link",
  INSUFFICIENT_LSI_TERMS: "inject_lsi",
  INSUFFICIENT_TRUST_SIGNALS: "add_trust",
};

const FIXES: Readonly<Record<FixType, Fix>> = {
  add_disclaimer: addDisclaimer,
  move_link: moveLink,
  inject_lsi: injectLsi,
  add_trust: addTrust,
};

export interface FixOutcome {
  article: string;
  report: Readonly<ValidationReport>;
  /** null when no attempt was made */
  fix: FixRecord | null;
}

/** The fix for an issue code, or null when the code is not auto-fixable. */
export function fixTypeFor(code: string): FixType | null {
  if (disclaimerTag(code) !== null) {
    return "add_disclaimer";
  }
  return FIX_BY_CODE[code] ?? null;
}

function withAttempt(report: Readonly<ValidationReport>, fix: FixRecord): Readonly<ValidationReport> {
  const updated: ValidationReport = {
    ...report,
    autoFixAttempts: MAX_AUTOFIX_ATTEMPTS,
    autoFixes: [fix],
  };
  return deepFreeze(updated);
}

export function maybeFix(
  articleText: string,
  report: Readonly<ValidationReport>,
  matrix: PreflightMatrix,
  context: QcContext
): FixOutcome {
  if (report.autoFixAttempts >= MAX_AUTOFIX_ATTEMPTS) {
    return { article: articleText, report, fix: null };
  }

  for (const issue of rankIssues(report.issues, context.policy.weights)) {
    const type = fixTypeFor(issue.code);
    if (type === null) {
      continue;
    }

    const attempt = FIXES[type](articleText, issue, matrix, context);
    const fix: FixRecord = {
      type,
      code: issue.code,
      applied: attempt.applied,
      description: attempt.description,
    };
    if (!attempt.applied) {
      return { article: articleText, report: withAttempt(report, fix), fix };
    }
    const rescored = evaluate(attempt.article, matrix, context);
    return { article: attempt.article, report: withAttempt(rescored, fix), fix };
  }

  return { article: articleText, report, fix: null };
}
