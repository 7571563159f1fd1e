/**
 * The seven category evaluators.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SCORING TABLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each evaluator starts from 100 (or from a formula), subtracts the policy
 * penalty for every finding, and reports the findings as issues. Evaluators
 * are plain functions in a fixed table; the engine folds them into one
 * weighted score.
 */

import type {
  IssueCategory,
  IssueSeverity,
  ScoreCategory,
  VoicePerspective,
  VoiceTone,
} from "../config/qc/enums.js";
import { tokenizeWords, type ParsedArticle } from "../lexical/parser.js";
import { headingsContaining, window, type AnchorPosition } from "../lexical/locate.js";
import { extractLemmas, type Lemmatizer } from "../lexical/lemmatizer.js";
import { meetsTier, UNKNOWN_TIER } from "../trust/registry.js";
import {
  checkCompliance,
  countPhrase,
  disclaimerCode,
  findCompetitorHits,
  findProhibitedClaims,
  findUnregisteredRegulatedLinks,
  isRegulated,
} from "../trust/compliance.js";
import type { VoiceMarkers } from "../reference/schema.js";
import type { PreflightMatrix } from "../preflight/schema.js";
import type { ArticleFacts, QcContext } from "./facts.js";
import type { CategoryResult, IssueLocation, ValidationIssue } from "./schema.js";

export type Evaluator = (
  facts: ArticleFacts,
  matrix: PreflightMatrix,
  context: QcContext
) => CategoryResult;

interface IssueOptions {
  blocking?: boolean;
  location?: IssueLocation;
}

function makeIssue(
  source: ScoreCategory,
  category: IssueCategory,
  severity: IssueSeverity,
  code: string,
  message: string,
  options: IssueOptions = {}
): ValidationIssue {
  const issue: ValidationIssue = {
    severity,
    category,
    code,
    message,
    source,
    blocking: options.blocking ?? false,
  };
  if (options.location) {
    issue.location = options.location;
  }
  return issue;
}

function locationOf(position: AnchorPosition): IssueLocation {
  const location: IssueLocation = {};
  if (position.sectionIndex !== null) {
    location.section = position.sectionIndex;
  }
  if (position.paragraphIndex !== null) {
    location.paragraph = position.paragraphIndex;
  }
  if (position.sentenceIndex !== null) {
    location.sentence = position.sentenceIndex;
  }
  return location;
}

function clamp(score: number): number {
  return Math.max(0, Math.min(100, score));
}

// ═══════════════════════════════════════════════════════════════════════════
// PREFLIGHT CONFORMANCE
// ═══════════════════════════════════════════════════════════════════════════

export const evaluatePreflight: Evaluator = (facts, matrix, context) => {
  const penalties = context.policy.preflight;
  const issues: ValidationIssue[] = [];
  let score = 100;

  const anchor = matrix.anchor.text.trim().toLowerCase();
  const primary = facts.targetLinks.filter((link) => link.text.toLowerCase() === anchor);

  if (primary.length === 0) {
    score -= penalties.missingLinkPenalty;
    const [elsewhere] = facts.anchorLinks;
    issues.push(
      elsewhere
        ? makeIssue(
            "preflight",
            "anchor",
            "error",
            "LINK_TARGET_MISMATCH",
            `Anchor "${matrix.anchor.text}" links to ${elsewhere.url} instead of ${matrix.targetUrl}`
          )
        : makeIssue(
            "preflight",
            "anchor",
            "error",
            "MISSING_PRIMARY_LINK",
            `No link with anchor "${matrix.anchor.text}" to ${matrix.targetUrl}`
          )
    );
  }

  if (facts.targetLinks.length > 1) {
    score -= penalties.multipleLinkPenalty;
    issues.push(
      makeIssue(
        "preflight",
        "anchor",
        "warning",
        "MULTIPLE_TARGET_LINKS",
        `${facts.targetLinks.length} links point to the target; expected one`
      )
    );
  }

  if (matrix.anchor.forbiddenTypes.includes(matrix.anchor.type)) {
    score -= penalties.discouragedTypePenalty;
    issues.push(
      makeIssue(
        "preflight",
        "anchor",
        "warning",
        "ANCHOR_TYPE_DISCOURAGED",
        `Anchor type ${matrix.anchor.type} is discouraged at ${matrix.anchor.riskLevel} portfolio risk`
      )
    );
  } else if (matrix.anchor.type !== matrix.anchor.preferredType) {
    issues.push(
      makeIssue(
        "preflight",
        "anchor",
        "info",
        "ANCHOR_TYPE_NOT_PREFERRED",
        `Anchor type ${matrix.anchor.type}; the portfolio would benefit most from ${matrix.anchor.preferredType}`
      )
    );
  }

  const bodyLemmas = extractLemmas(facts.article.sentences, context.lemmatizer);
  if (!matrix.bridge.lemmas.some((lemma) => bodyLemmas.has(lemma))) {
    score -= penalties.missingBridgePenalty;
    issues.push(
      makeIssue(
        "preflight",
        "content",
        "warning",
        "BRIDGE_CONCEPT_MISSING",
        `Bridge concept "${matrix.bridge.label}" is never mentioned`
      )
    );
  }

  return { score: clamp(score), issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// ANCHOR PLACEMENT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Indices of the sections that count as the article's midpoint. The lead is
 * never part of it.
 */
export function midpointSections(sectionCount: number): number[] {
  if (sectionCount >= 3) {
    return Array.from({ length: sectionCount - 2 }, (_, i) => i + 1);
  }
  if (sectionCount === 2) {
    return [1];
  }
  if (sectionCount === 1) {
    return [0];
  }
  return [];
}

export const evaluateAnchor: Evaluator = (facts, matrix, context) => {
  const { position, article } = facts;

  if (position === null) {
    return {
      score: 0,
      issues: [
        makeIssue(
          "anchor",
          "anchor",
          "error",
          "ANCHOR_NOT_FOUND",
          `Anchor text "${matrix.anchor.text}" does not appear in the article`,
          { blocking: true }
        ),
      ],
    };
  }

  const [heading] = headingsContaining(article, matrix.anchor.text);
  if (heading) {
    return {
      score: 0,
      issues: [
        makeIssue(
          "anchor",
          "anchor",
          "error",
          "ANCHOR_IN_HEADER",
          `Anchor text appears in the heading "${heading.heading}"`,
          { blocking: true, location: { section: heading.index } }
        ),
      ],
    };
  }

  const penalties = context.policy.anchor;
  const issues: ValidationIssue[] = [];
  let score = 100;
  const location = locationOf(position);

  const sectionCount = article.sections.length;
  if (position.sectionIndex === null || !midpointSections(sectionCount).includes(position.sectionIndex)) {
    score -= penalties.placementPenalty;
    issues.push(
      makeIssue(
        "anchor",
        "anchor",
        "warning",
        "ANCHOR_PLACEMENT_WRONG",
        position.sectionIndex === null
          ? "Anchor sits in the lead; move it to a middle section"
          : `Anchor sits in section ${position.sectionIndex + 1} of ${sectionCount}; move it to a middle section`,
        { location }
      )
    );
  }

  const maxDepth = matrix.placement.maxParagraphDepth;
  if (position.paragraphIndex !== null && position.paragraphIndex + 1 > maxDepth) {
    score -= penalties.depthPenalty;
    issues.push(
      makeIssue(
        "anchor",
        "anchor",
        "warning",
        "ANCHOR_TOO_DEEP",
        `Anchor is in paragraph ${position.paragraphIndex + 1}; keep it within the first ${maxDepth}`,
        { location }
      )
    );
  }

  const nearby = extractLemmas(
    window(article, position, matrix.lsi.policy.radiusSentences),
    context.lemmatizer
  );
  if (!matrix.bridge.lemmas.some((lemma) => nearby.has(lemma))) {
    issues.push(
      makeIssue(
        "anchor",
        "content",
        "info",
        "BRIDGE_NOT_NEAR_ANCHOR",
        `No "${matrix.bridge.label}" vocabulary near the anchor`,
        { location }
      )
    );
  }

  return { score: clamp(score), issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// LSI COVERAGE
// ═══════════════════════════════════════════════════════════════════════════

/** Score for a count of distinct in-window lemmas, before overuse. */
export function lsiCountScore(
  distinct: number,
  min: number,
  max: number,
  excessPenalty: number
): number {
  if (distinct < min) {
    return Math.round((100 * distinct) / min);
  }
  if (distinct > max) {
    return Math.max(0, 100 - excessPenalty * (distinct - max));
  }
  return 100;
}

/**
 * Planned lemmas (selected terms and related vocabulary) in the window
 * around the anchor, with their counts, sorted by lemma.
 */
export function lsiWindowCounts(
  article: ParsedArticle,
  position: AnchorPosition,
  matrix: PreflightMatrix,
  lemmatizer: Lemmatizer
): Array<[string, number]> {
  const counts = extractLemmas(window(article, position, matrix.lsi.policy.radiusSentences), lemmatizer);
  const vocabulary = new Set([...matrix.lsi.terms.map((term) => term.lemma), ...matrix.lsi.related]);
  return [...counts]
    .filter(([lemma]) => vocabulary.has(lemma))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export const evaluateLsi: Evaluator = (facts, matrix, context) => {
  const { position } = facts;
  if (position === null || position.sentenceIndex === null) {
    return {
      score: 0,
      issues: [
        makeIssue(
          "lsi",
          "lsi",
          "error",
          "ANCHOR_NOT_FOUND_FOR_LSI",
          "Anchor not found in the body, so there is no window to measure"
        ),
      ],
    };
  }

  const lsiPolicy = matrix.lsi.policy;
  const location = locationOf(position);
  const found = lsiWindowCounts(facts.article, position, matrix, context.lemmatizer);

  const distinct = found.length;
  const issues: ValidationIssue[] = [];
  let score = lsiCountScore(distinct, lsiPolicy.min, lsiPolicy.max, context.policy.lsi.excessPenalty);

  if (distinct < lsiPolicy.min) {
    issues.push(
      makeIssue(
        "lsi",
        "lsi",
        "error",
        "INSUFFICIENT_LSI_TERMS",
        `${distinct} LSI terms near the anchor; at least ${lsiPolicy.min} required`,
        { location }
      )
    );
  } else if (distinct > lsiPolicy.max) {
    issues.push(
      makeIssue(
        "lsi",
        "lsi",
        "warning",
        "EXCESSIVE_LSI_TERMS",
        `${distinct} LSI terms near the anchor; at most ${lsiPolicy.max} read naturally`,
        { location }
      )
    );
  }

  for (const [lemma, count] of found) {
    if (count > lsiPolicy.maxRepeat) {
      score -= context.policy.lsi.overusePenalty;
      issues.push(
        makeIssue(
          "lsi",
          "lsi",
          "warning",
          "LSI_OVERUSE",
          `"${lemma}" appears ${count} times near the anchor (max ${lsiPolicy.maxRepeat})`,
          { location }
        )
      );
    }
  }

  return { score: clamp(score), issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// TRUST
// ═══════════════════════════════════════════════════════════════════════════

export const evaluateTrust: Evaluator = (facts, matrix, context) => {
  const issues: ValidationIssue[] = [];

  const viaByDomain = new Map<string, string[]>();
  for (const hit of findCompetitorHits(facts.article, context.registry)) {
    viaByDomain.set(hit.domain, [...(viaByDomain.get(hit.domain) ?? []), hit.via]);
  }
  for (const [domain, vias] of viaByDomain) {
    issues.push(
      makeIssue(
        "trust",
        "trust",
        "error",
        "ERR_TRUST_COMPETITOR",
        `Competitor ${domain} appears in the article (${vias.join(", ")})`,
        { blocking: true }
      )
    );
  }

  const unregistered = findUnregisteredRegulatedLinks(
    facts.outbound,
    context.rulebook,
    matrix.targetDomain
  );
  for (const link of unregistered) {
    issues.push(
      makeIssue(
        "trust",
        "trust",
        "error",
        "ERR_TRUST_UNREGISTERED_REGULATED",
        `Link to unregistered ${link.tag} site ${link.domain}`,
        { blocking: true }
      )
    );
  }

  const blocked = issues.length > 0;
  const required = matrix.trust.requiredCount;
  const qualifying = facts.qualifyingTrustSignals;
  let score = 100;

  if (blocked) {
    score = 0;
  } else if (required > 0 && qualifying === 0) {
    score = 0;
    issues.push(
      makeIssue(
        "trust",
        "trust",
        "error",
        "MISSING_TRUST_SIGNALS",
        `No ${matrix.trust.minTier}-or-better sources cited; ${required} required`
      )
    );
  } else if (qualifying < required) {
    score = 100 - context.policy.trust.missingSignalPenalty * (required - qualifying);
    issues.push(
      makeIssue(
        "trust",
        "trust",
        "warning",
        "INSUFFICIENT_TRUST_SIGNALS",
        `${qualifying} of ${required} required trust signals cited`
      )
    );
  }

  const flagged = new Set(unregistered.map((link) => link.domain));
  const advised = new Set<string>();
  for (const link of facts.outbound) {
    if (link.competitor || flagged.has(link.domain) || advised.has(link.domain)) {
      continue;
    }
    if (link.tier === UNKNOWN_TIER) {
      advised.add(link.domain);
      issues.push(
        makeIssue(
          "trust",
          "trust",
          "info",
          "UNREGISTERED_SOURCE",
          `${link.domain} is not in the trust registry`
        )
      );
    } else if (!meetsTier(link.tier, matrix.trust.minTier)) {
      advised.add(link.domain);
      issues.push(
        makeIssue(
          "trust",
          "trust",
          "info",
          "LOW_TIER_SOURCE",
          `${link.domain} is ${link.tier}; only ${matrix.trust.minTier} or better counts as a trust signal`
        )
      );
    }
  }

  return { score: clamp(score), issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// COMPLIANCE
// ═══════════════════════════════════════════════════════════════════════════

export const evaluateCompliance: Evaluator = (facts, matrix, context) => {
  const { rulebook } = context;
  const tags = matrix.compliance.tags;
  const issues: ValidationIssue[] = [];

  const claims = findProhibitedClaims(facts.text, tags, rulebook);
  for (const claim of claims) {
    issues.push(
      makeIssue(
        "compliance",
        "compliance",
        "error",
        "ERR_COMPLIANCE",
        `Prohibited ${claim.tag} claim: "${claim.phrase}"`,
        { blocking: true }
      )
    );
  }

  const missing = checkCompliance(facts.text, tags, rulebook);
  let regulatedMissing = false;
  for (const tag of missing) {
    const regulated = isRegulated(tag, rulebook);
    regulatedMissing = regulatedMissing || regulated;
    issues.push(
      makeIssue(
        "compliance",
        "compliance",
        regulated ? "error" : "warning",
        disclaimerCode(tag),
        `Missing ${tag} disclaimer`,
        { blocking: regulated }
      )
    );
  }

  let score: number;
  if (claims.length > 0 || regulatedMissing) {
    score = 0;
  } else if (tags.length === 0) {
    score = 100;
  } else {
    score = Math.round((100 * (tags.length - missing.length)) / tags.length);
  }

  return { score, issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// DRAFT STRUCTURE
// ═══════════════════════════════════════════════════════════════════════════

export const evaluateDraft: Evaluator = (facts, matrix, context) => {
  const policy = context.policy.draft;
  const { sections, wordCount } = facts.article;
  const issues: ValidationIssue[] = [];
  let score = 100;

  if (sections.length < policy.minSections) {
    score -= policy.sectionPenalty;
    issues.push(
      makeIssue(
        "draft",
        "structure",
        "warning",
        "INSUFFICIENT_SECTIONS",
        `${sections.length} sections; at least ${policy.minSections} expected`
      )
    );
  }

  for (const section of sections) {
    if (section.paragraphs.length === 0) {
      score -= policy.emptySectionPenalty;
      issues.push(
        makeIssue(
          "draft",
          "structure",
          "warning",
          "EMPTY_SECTION",
          `Section "${section.heading}" has no body text`,
          { location: { section: section.index } }
        )
      );
    }
  }

  const target = matrix.wordCount.target;
  const deviation = Math.abs(wordCount - target) / target;
  const percent = Math.round(deviation * 100);
  if (deviation > policy.wordCountBlockDeviation) {
    score -= policy.wordCountBlockPenalty;
    issues.push(
      makeIssue(
        "draft",
        "content",
        "error",
        "WORD_COUNT_MISMATCH",
        `${wordCount} words against a target of ${target} (${percent}% off)`,
        { blocking: true }
      )
    );
  } else if (deviation > policy.wordCountWarnDeviation) {
    score -= policy.wordCountWarnPenalty;
    issues.push(
      makeIssue(
        "draft",
        "content",
        "warning",
        "WORD_COUNT_MISMATCH",
        `${wordCount} words against a target of ${target} (${percent}% off)`
      )
    );
  }

  return { score: clamp(score), issues };
};

// ═══════════════════════════════════════════════════════════════════════════
// PUBLISHER FIT
// ═══════════════════════════════════════════════════════════════════════════

const PERSPECTIVES = ["first_person", "second_person", "third_person"] as const;

function countMarkers(text: string, markers: readonly string[]): number {
  return markers.reduce((sum, marker) => sum + countPhrase(text, marker), 0);
}

export function detectTone(formal: number, informal: number, margin: number): VoiceTone {
  if (formal - informal >= margin) {
    return "formal";
  }
  if (informal - formal >= margin) {
    return "conversational";
  }
  return "neutral";
}

/**
 * The perspective with the most pronoun hits, when it has at least
 * `minHits` and no other perspective ties it.
 */
export function dominantPerspective(
  text: string,
  pronouns: VoiceMarkers["pronouns"],
  minHits: number
): VoicePerspective | null {
  const tokens = tokenizeWords(text.toLowerCase());
  const hits = PERSPECTIVES.map((perspective) => {
    const words = new Set(pronouns[perspective]);
    return { perspective, count: tokens.filter((token) => words.has(token)).length };
  }).sort((a, b) => b.count - a.count);

  const [top, runnerUp] = hits;
  if (!top || top.count < minHits || (runnerUp && runnerUp.count === top.count)) {
    return null;
  }
  return top.perspective;
}

export const evaluateFit: Evaluator = (facts, matrix, context) => {
  const policy = context.policy.fit;
  const markers = context.voiceMarkers;
  const voice = matrix.voice;
  const issues: ValidationIssue[] = [];
  let score = 100;

  const tone = detectTone(
    countMarkers(facts.text, markers.formal),
    countMarkers(facts.text, markers.informal),
    policy.toneMargin
  );
  if (tone !== voice.tone) {
    const opposite = tone !== "neutral" && voice.tone !== "neutral";
    score -= opposite ? policy.oppositeTonePenalty : policy.adjacentTonePenalty;
    issues.push(
      makeIssue(
        "fit",
        "content",
        "warning",
        "TONE_MISMATCH",
        `Article reads ${tone}; the publisher writes ${voice.tone}`
      )
    );
  }

  const perspective = dominantPerspective(facts.text, markers.pronouns, policy.perspectiveMinHits);
  if (voice.perspective !== "mixed" && perspective !== null && perspective !== voice.perspective) {
    score -= policy.perspectivePenalty;
    issues.push(
      makeIssue(
        "fit",
        "content",
        "warning",
        "PERSPECTIVE_MISMATCH",
        `Article is written in the ${perspective.replace("_", " ")}; the publisher uses the ${voice.perspective.replace("_", " ")}`
      )
    );
  }

  const promotional = countMarkers(facts.text, markers.promotional);
  if (promotional > policy.promotionalLimit) {
    score -= policy.promotionalPenalty;
    issues.push(
      makeIssue(
        "fit",
        "content",
        "warning",
        "OVERLY_PROMOTIONAL",
        `${promotional} promotional phrases; at most ${policy.promotionalLimit} allowed`
      )
    );
  }

  return { score: clamp(score), issues };
};

/**
 * Evaluation table, in breakdown order.
 */
export const CATEGORY_EVALUATORS: ReadonlyArray<{
  category: ScoreCategory;
  evaluate: Evaluator;
}> = [
  { category: "preflight", evaluate: evaluatePreflight },
  { category: "draft", evaluate: evaluateDraft },
  { category: "anchor", evaluate: evaluateAnchor },
  { category: "trust", evaluate: evaluateTrust },
  { category: "lsi", evaluate: evaluateLsi },
  { category: "fit", evaluate: evaluateFit },
  { category: "compliance", evaluate: evaluateCompliance },
];
