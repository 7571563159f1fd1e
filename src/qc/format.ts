/**
 * Plain-text rendering of a validation report.
 */

import { ScoreCategory } from "../config/qc/enums.js";
import type { ValidationReport } from "./schema.js";

const LABEL_WIDTH = 12;

export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [`QC REPORT: ${report.status} (score ${report.score.toFixed(1)})`, ""];

  lines.push("Breakdown:");
  for (const category of ScoreCategory.options) {
    lines.push(`  ${category.padEnd(LABEL_WIDTH)}${report.breakdown[category]}`);
  }

  lines.push("", `Issues (${report.issues.length}):`);
  for (const issue of report.issues) {
    const suffix = issue.blocking ? " [blocking]" : "";
    lines.push(`  [${issue.severity.toUpperCase()}] ${issue.code}: ${issue.message}${suffix}`);
  }

  if (report.recommendations.length > 0) {
    lines.push("", "Recommendations:");
    report.recommendations.forEach((recommendation, index) => {
      lines.push(`  ${index + 1}. ${recommendation.action} (${recommendation.code})`);
    });
  }

  lines.push("", "Next actions:");
  for (const action of report.nextActions) {
    lines.push(`  - ${action}`);
  }

  lines.push("");
  lines.push(`Trust signals: ${report.qualifyingTrustSignals}`);
  lines.push(`Human signoff: ${report.humanSignoffRequired ? "required" : "not required"}`);
  const [fix] = report.autoFixes;
  lines.push(
    fix ? `Auto-fix: ${fix.type} for ${fix.code} (${fix.applied ? "applied" : "not applied"})` : "Auto-fix: none"
  );

  return lines.join("\n");
}
