/**
 * The four automatic edits. Each takes the article text and the issue that
 * asked for it and returns the edited text, or the reason it could not
 * apply. None of them re-scores anything.
 */

import { ComplianceTag } from "../config/qc/enums.js";
import type { PreflightMatrix } from "../preflight/schema.js";
import type { Paragraph } from "../lexical/parser.js";
import { sameSite } from "../trust/registry.js";
import { analyzeArticle, type QcContext } from "../qc/facts.js";
import { lsiWindowCounts, midpointSections } from "../qc/evaluators.js";
import type { ValidationIssue } from "../qc/schema.js";

export interface FixAttempt {
  article: string;
  applied: boolean;
  description: string;
}

export type Fix = (
  articleText: string,
  issue: ValidationIssue,
  matrix: PreflightMatrix,
  context: QcContext
) => FixAttempt;

const DISCLAIMER_CODE = /^MISSING_([A-Z]+)_DISCLAIMER$/;

function skipped(articleText: string, description: string): FixAttempt {
  return { article: articleText, applied: false, description };
}

/** "a", "a and b", "a, b and c" */
export function joinList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join("");
  }
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

// ═══════════════════════════════════════════════════════════════════════════
// add_disclaimer
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Disclaimer tag named by a MISSING_<TAG>_DISCLAIMER code, or null.
 */
export function disclaimerTag(code: string): ComplianceTag | null {
  const match = DISCLAIMER_CODE.exec(code);
  const parsed = ComplianceTag.safeParse(match?.[1]?.toLowerCase());
  return parsed.success ? parsed.data : null;
}

export const addDisclaimer: Fix = (articleText, issue, _matrix, context) => {
  const tag = disclaimerTag(issue.code);
  if (tag === null) {
    return skipped(articleText, `${issue.code} names no known disclaimer`);
  }
  const disclaimer = context.rulebook.rules[tag].disclaimer;
  return {
    article: `${articleText.trimEnd()}\n\n${disclaimer}`,
    applied: true,
    description: `Added ${tag} disclaimer`,
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// move_link
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Moves the paragraph holding the anchor to the top of the first middle
 * section, right below its heading.
 */
export const moveLink: Fix = (articleText, _issue, matrix, context) => {
  const { article, position } = analyzeArticle(articleText, matrix, context);
  if (position === null || position.paragraphIndex === null) {
    return skipped(articleText, "Anchor is not in a body paragraph");
  }

  const [targetIndex] = midpointSections(article.sections.length);
  const target = targetIndex === undefined ? undefined : article.sections[targetIndex];
  if (target === undefined) {
    return skipped(articleText, "No middle section to move the link into");
  }
  if (target.index === position.sectionIndex) {
    return skipped(articleText, "Anchor is already in a middle section");
  }

  const paragraphs: Paragraph[] =
    position.sectionIndex === null
      ? article.lead
      : article.sections[position.sectionIndex]?.paragraphs ?? [];
  const paragraph = paragraphs[position.paragraphIndex];
  if (paragraph === undefined) {
    return skipped(articleText, "Anchor is not in a body paragraph");
  }

  const lines = splitLines(articleText);
  lines.splice(paragraph.line, 1);
  const headingLine = paragraph.line < target.line ? target.line - 1 : target.line;
  lines.splice(headingLine + 1, 0, "", paragraph.raw);

  return {
    article: lines.join("\n"),
    applied: true,
    description: `Moved the anchor paragraph into section ${target.index + 1}`,
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// inject_lsi
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Adds one sentence naming missing planned terms right after the anchor
 * sentence, enough of them to reach the minimum.
 */
export const injectLsi: Fix = (articleText, _issue, matrix, context) => {
  const { article, position } = analyzeArticle(articleText, matrix, context);
  if (position === null || position.sentenceIndex === null || position.paragraphIndex === null) {
    return skipped(articleText, "Anchor is not in a body sentence");
  }

  const found = new Map(lsiWindowCounts(article, position, matrix, context.lemmatizer));
  const needed = matrix.lsi.policy.min - found.size;
  const picks = matrix.lsi.terms.filter((term) => !found.has(term.lemma)).slice(0, Math.max(0, needed));
  if (picks.length === 0) {
    return skipped(articleText, "No planned terms are missing near the anchor");
  }

  const paragraphs =
    position.sectionIndex === null
      ? article.lead
      : article.sections[position.sectionIndex]?.paragraphs ?? [];
  const paragraph = paragraphs[position.paragraphIndex];
  if (paragraph === undefined) {
    return skipped(articleText, "Anchor is not in a body sentence");
  }

  const raw = paragraph.raw;
  const start = Math.max(0, raw.toLowerCase().indexOf(matrix.anchor.text.trim().toLowerCase()));
  const sentenceEnd = /[.!?](?=\s|$)/g;
  sentenceEnd.lastIndex = start;
  const end = sentenceEnd.exec(raw);
  const insertAt = end === null ? raw.length : end.index + 1;
  const sentence = `It is worth tracking ${joinList(picks.map((term) => term.term))} here.`;

  const lines = splitLines(articleText);
  lines[paragraph.line] = `${raw.slice(0, insertAt)} ${sentence}${raw.slice(insertAt)}`;

  return {
    article: lines.join("\n"),
    applied: true,
    description: `Inserted ${picks.length} LSI terms after the anchor sentence`,
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// add_trust
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Appends a "Further reading" paragraph citing planned trust sources the
 * article does not link yet.
 */
export const addTrust: Fix = (articleText, _issue, matrix, context) => {
  const facts = analyzeArticle(articleText, matrix, context);
  const missing = matrix.trust.requiredCount - facts.qualifyingTrustSignals;
  if (missing <= 0) {
    return skipped(articleText, "Trust signals already meet the requirement");
  }

  const sources = matrix.trust.sources
    .filter((source) => !facts.outbound.some((link) => sameSite(link.domain, source.domain)))
    .slice(0, missing);
  if (sources.length === 0) {
    return skipped(articleText, "Every planned trust source is already linked");
  }

  const links = sources.map((source) => `[${source.domain}](https://${source.domain}/)`);
  return {
    article: `${articleText.trimEnd()}\n\nFurther reading: ${joinList(links)}.`,
    applied: true,
    description: `Cited ${sources.map((source) => source.domain).join(", ")}`,
  };
};
