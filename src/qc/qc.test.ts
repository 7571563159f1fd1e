/**
 * QC Scoring Engine Tests
 *
 * These tests verify:
 *   1. The sample articles score as expected end to end
 *   2. Category scores combine into the right status and ranked fixes
 *   3. Each category evaluator scores and reports its own issues
 *   4. Reports format for the terminal
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { evaluate } from "./engine.js";
import { analyzeArticle, normalizeUrl } from "./facts.js";
import {
  detectTone,
  dominantPerspective,
  evaluateAnchor,
  evaluateDraft,
  evaluateFit,
  evaluateLsi,
  lsiCountScore,
  midpointSections,
} from "./evaluators.js";
import {
  buildRecommendations,
  decideStatus,
  nextActions,
  rankIssues,
  requiresHumanSignoff,
} from "./scoring.js";
import { formatValidationReport } from "./format.js";
import type { ValidationIssue } from "./schema.js";
import { canonicalJson } from "../preflight/fingerprint.js";
import {
  ANCHOR_LINK,
  CLEAN_ARTICLE,
  TARGET_URL,
  buildMatrix,
  fullLength,
  padArticle,
  policy,
  qcContext,
  reference,
} from "../testing/fixtures.js";

const matrix = buildMatrix();

function codes(issues: readonly ValidationIssue[]): string[] {
  return issues.map((issue) => issue.code);
}

function issue(overrides: Partial<ValidationIssue> & Pick<ValidationIssue, "code">): ValidationIssue {
  return {
    severity: "warning",
    category: "anchor",
    message: overrides.code,
    source: "anchor",
    blocking: false,
    ...overrides,
  };
}

const PERFECT = {
  preflight: 100,
  draft: 100,
  anchor: 100,
  trust: 100,
  lsi: 100,
  fit: 100,
  compliance: 100,
};

// ═══════════════════════════════════════════════════════════════════════════
// END-TO-END SCENARIOS
// ═══════════════════════════════════════════════════════════════════════════

test("a draft meeting every threshold is approved", () => {
  const report = evaluate(fullLength(CLEAN_ARTICLE), matrix, qcContext);

  assert.equal(report.status, "APPROVED");
  assert.equal(report.score, 100);
  assert.deepEqual(report.breakdown, PERFECT);
  assert.deepEqual(codes(report.issues), ["ANCHOR_TYPE_NOT_PREFERRED"]);
  assert.equal(report.humanSignoffRequired, false);
  assert.equal(report.qualifyingTrustSignals, 2);
  assert.equal(report.autoFixAttempts, 0);
  assert.deepEqual(report.nextActions, ["Proceed to delivery"]);
  assert.equal(report.matrixFingerprint, matrix.inputFingerprint);
});

test("a draft without the anchor is blocked", () => {
  const article = fullLength(CLEAN_ARTICLE.replace(ANCHOR_LINK, "a separate pot"));
  const report = evaluate(article, matrix, qcContext);

  assert.equal(report.breakdown.anchor, 0);
  assert.equal(report.breakdown.lsi, 0);
  assert.equal(report.breakdown.preflight, 70);
  assert.equal(report.score, 57.5);
  assert.equal(report.status, "BLOCKED");
  assert.equal(report.humanSignoffRequired, true);
  assert.deepEqual(
    report.recommendations.map((recommendation) => recommendation.code),
    ["ANCHOR_NOT_FOUND", "MISSING_PRIMARY_LINK", "ANCHOR_TYPE_NOT_PREFERRED", "ANCHOR_NOT_FOUND_FOR_LSI"]
  );
  assert.deepEqual(report.nextActions, [
    "Address critical issues before resubmitting",
    "Add the anchor text to the body and link it",
    "Request human review",
  ]);
});

test("an anchor in a heading blocks regardless of score", () => {
  const article = fullLength(CLEAN_ARTICLE.replace("## Keep money aside", "## Why savings accounts help"));
  const report = evaluate(article, matrix, qcContext);

  assert.equal(report.breakdown.anchor, 0);
  assert.equal(report.score, 80);
  assert.equal(report.status, "BLOCKED");
  assert.equal(report.humanSignoffRequired, true);
  assert.equal(report.recommendations[0]?.code, "ANCHOR_IN_HEADER");
  assert.deepEqual(report.issues.find((entry) => entry.code === "ANCHOR_IN_HEADER")?.location, {
    section: 1,
  });
});

test("evaluation is deterministic", () => {
  const article = fullLength(CLEAN_ARTICLE);

  assert.equal(
    canonicalJson(evaluate(article, matrix, qcContext)),
    canonicalJson(evaluate(article, matrix, qcContext))
  );
});

test("reports are frozen", () => {
  const report = evaluate(fullLength(CLEAN_ARTICLE), matrix, qcContext);

  assert.ok(Object.isFrozen(report));
  assert.ok(Object.isFrozen(report.issues));
});

// ═══════════════════════════════════════════════════════════════════════════
// STATUS AND RANKING
// ═══════════════════════════════════════════════════════════════════════════

test("a mid score with a placement warning asks for light edits", () => {
  const issues = [issue({ code: "ANCHOR_PLACEMENT_WRONG" })];

  assert.equal(decideStatus(78, issues, policy.thresholds), "LIGHT_EDITS");
  assert.equal(
    requiresHumanSignoff({ ...PERFECT, anchor: 70, lsi: 60 }, issues, 2, policy.thresholds),
    false
  );
  assert.deepEqual(buildRecommendations(issues, policy.weights, 4), [
    { code: "ANCHOR_PLACEMENT_WRONG", action: "Move the link into a middle section" },
  ]);
  assert.deepEqual(nextActions("LIGHT_EDITS", issues, policy.weights), [
    "Apply the recommended edits",
    "Re-run QC on the revised article",
  ]);
});

test("status thresholds are inclusive at the top", () => {
  assert.equal(decideStatus(85, [], policy.thresholds), "APPROVED");
  assert.equal(decideStatus(84.9, [], policy.thresholds), "LIGHT_EDITS");
  assert.equal(decideStatus(70, [], policy.thresholds), "LIGHT_EDITS");
  assert.equal(decideStatus(69.9, [], policy.thresholds), "BLOCKED");
  assert.equal(
    decideStatus(99, [issue({ code: "WORD_COUNT_MISMATCH", blocking: true })], policy.thresholds),
    "BLOCKED"
  );
});

test("signoff follows codes, weak categories and missing trust", () => {
  const { thresholds } = policy;

  assert.equal(requiresHumanSignoff(PERFECT, [issue({ code: "ERR_COMPLIANCE" })], 2, thresholds), true);
  assert.equal(requiresHumanSignoff({ ...PERFECT, fit: 49 }, [], 2, thresholds), true);
  assert.equal(requiresHumanSignoff(PERFECT, [], 0, thresholds), true);
  assert.equal(requiresHumanSignoff({ ...PERFECT, fit: 50 }, [], 1, thresholds), false);
});

test("ranking puts blocks first, then weight, severity and code", () => {
  const ranked = rankIssues(
    [
      issue({ code: "TONE_MISMATCH", source: "fit" }),
      issue({ code: "LSI_OVERUSE", source: "lsi" }),
      issue({ code: "INSUFFICIENT_LSI_TERMS", source: "lsi", severity: "error" }),
      issue({ code: "EXCESSIVE_LSI_TERMS", source: "lsi" }),
      issue({ code: "WORD_COUNT_MISMATCH", source: "draft", blocking: true }),
      issue({ code: "ANCHOR_TOO_DEEP", source: "anchor" }),
    ],
    policy.weights
  );

  assert.deepEqual(codes(ranked), [
    "WORD_COUNT_MISMATCH",
    "ANCHOR_TOO_DEEP",
    "INSUFFICIENT_LSI_TERMS",
    "EXCESSIVE_LSI_TERMS",
    "LSI_OVERUSE",
    "TONE_MISMATCH",
  ]);
});

test("recommendations keep one entry per code and respect the cap", () => {
  const recommendations = buildRecommendations(
    [
      issue({ code: "LSI_OVERUSE", source: "lsi" }),
      issue({ code: "LSI_OVERUSE", source: "lsi" }),
      issue({ code: "MISSING_GAMBLING_DISCLAIMER", source: "compliance", blocking: true }),
      issue({ code: "ANCHOR_TOO_DEEP" }),
      issue({ code: "TONE_MISMATCH", source: "fit" }),
      issue({ code: "EMPTY_SECTION", source: "draft" }),
    ],
    policy.weights,
    4
  );

  assert.deepEqual(recommendations, [
    { code: "MISSING_GAMBLING_DISCLAIMER", action: "Add the gambling disclaimer" },
    { code: "ANCHOR_TOO_DEEP", action: "Move the link into one of the first paragraphs of its section" },
    { code: "EMPTY_SECTION", action: "Fill or remove empty sections" },
    { code: "LSI_OVERUSE", action: "Vary repeated terms near the anchor" },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CATEGORY EVALUATORS
// ═══════════════════════════════════════════════════════════════════════════

test("midpoint sections by section count", () => {
  assert.deepEqual(midpointSections(0), []);
  assert.deepEqual(midpointSections(1), [0]);
  assert.deepEqual(midpointSections(2), [1]);
  assert.deepEqual(midpointSections(3), [1]);
  assert.deepEqual(midpointSections(5), [1, 2, 3]);
});

test("anchor outside the midpoint loses the placement penalty", () => {
  const text = [
    "# Title",
    "## One",
    `Keep a buffer in ${ANCHOR_LINK} for emergencies.`,
    "## Two",
    "Closing words here.",
  ].join("\n");
  const result = evaluateAnchor(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 70);
  assert.deepEqual(codes(result.issues), ["ANCHOR_PLACEMENT_WRONG", "BRIDGE_NOT_NEAR_ANCHOR"]);
  assert.equal(result.issues[0]?.message, "Anchor sits in section 1 of 2; move it to a middle section");
});

test("anchor past the third paragraph is too deep", () => {
  const text = [
    "# Title",
    "## One",
    "Opening words.",
    "## Two",
    "First point.",
    "Second point.",
    "Third point.",
    `Keep a buffer in ${ANCHOR_LINK} for emergencies.`,
  ].join("\n");
  const result = evaluateAnchor(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 85);
  assert.deepEqual(codes(result.issues), ["ANCHOR_TOO_DEEP", "BRIDGE_NOT_NEAR_ANCHOR"]);
  assert.deepEqual(result.issues[0]?.location, { section: 1, paragraph: 3, sentence: 4 });
});

test("LSI count score at and around the bounds", () => {
  assert.equal(lsiCountScore(0, 6, 10, 10), 0);
  assert.equal(lsiCountScore(5, 6, 10, 10), 83);
  assert.equal(lsiCountScore(6, 6, 10, 10), 100);
  assert.equal(lsiCountScore(10, 6, 10, 10), 100);
  assert.equal(lsiCountScore(11, 6, 10, 10), 90);
  assert.equal(lsiCountScore(25, 6, 10, 10), 0);
});

/**
 * Two sentences either side of the anchor sentence, so the window holds
 * exactly these five. The anchor text adds "savings" and "account".
 */
function lsiWindowArticle(before: [string, string], after: [string, string]): string {
  return [
    "# Title",
    "## A",
    "Intro text.",
    "## B",
    [...before, `Keep a buffer in ${ANCHOR_LINK}.`, ...after].join(" "),
    "## C",
    "End.",
  ].join("\n");
}

test("five planned lemmas near the anchor fall one short", () => {
  const text = lsiWindowArticle(
    ["Think about the budget and the quote.", "Note the deadline."],
    ["Stay calm.", "Move on."]
  );
  const result = evaluateLsi(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 83);
  assert.deepEqual(codes(result.issues), ["INSUFFICIENT_LSI_TERMS"]);
  assert.equal(result.issues[0]?.message, "5 LSI terms near the anchor; at least 6 required");
});

test("six planned lemmas near the anchor meet the minimum", () => {
  const text = lsiWindowArticle(
    ["Think about the budget and the quote.", "Note the deadline."],
    ["Watch for damp.", "Move on."]
  );
  const result = evaluateLsi(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("ten planned lemmas near the anchor sit at the maximum", () => {
  const text = lsiWindowArticle(
    ["Think about the budget and the quote.", "Watch for damp and debt."],
    ["Track each deadline in a spreadsheet.", "A renovation needs a comparison first."]
  );
  const result = evaluateLsi(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("eleven planned lemmas near the anchor read as stuffed", () => {
  const text = lsiWindowArticle(
    ["Think about the budget and the quote.", "Watch for damp and debt."],
    ["Track each deadline in a spreadsheet.", "A renovation needs a contractor comparison first."]
  );
  const result = evaluateLsi(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 90);
  assert.deepEqual(codes(result.issues), ["EXCESSIVE_LSI_TERMS"]);
  assert.equal(result.issues[0]?.message, "11 LSI terms near the anchor; at most 10 read naturally");
});

test("thin and repeated LSI vocabulary is penalized", () => {
  const text = [
    "# Title",
    "## A",
    "Intro text.",
    "## B",
    `The budget matters. A budget needs care. Keep ${ANCHOR_LINK} in the budget too.`,
    "## C",
    "End.",
  ].join("\n");
  const result = evaluateLsi(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 40);
  assert.deepEqual(codes(result.issues), ["INSUFFICIENT_LSI_TERMS", "LSI_OVERUSE"]);
  assert.equal(result.issues[0]?.message, "3 LSI terms near the anchor; at least 6 required");
  assert.equal(result.issues[1]?.message, '"budget" appears 3 times near the anchor (max 2)');
});

test("competitor names block the trust category", () => {
  const article = fullLength(`${CLEAN_ARTICLE}\n\nRivalBank offers similar products.`);
  const report = evaluate(article, matrix, qcContext);

  assert.equal(report.breakdown.trust, 0);
  assert.equal(report.status, "BLOCKED");
  assert.equal(report.humanSignoffRequired, true);
  assert.equal(
    report.issues.find((entry) => entry.code === "ERR_TRUST_COMPETITOR")?.message,
    "Competitor rivalbank.com appears in the article (name)"
  );
});

test("a competitor named in a heading or the title blocks", () => {
  const drafts = [
    CLEAN_ARTICLE.replace("## Wrapping up", "## Why RivalBank falls short"),
    CLEAN_ARTICLE.replace(
      "# Planning a household renovation budget",
      "# Planning a renovation budget without RivalBank"
    ),
  ];

  for (const draft of drafts) {
    const report = evaluate(fullLength(draft), matrix, qcContext);
    assert.equal(report.breakdown.trust, 0);
    assert.equal(report.status, "BLOCKED");
    assert.equal(
      report.issues.find((entry) => entry.code === "ERR_TRUST_COMPETITOR")?.message,
      "Competitor rivalbank.com appears in the article (name)"
    );
  }
});

test("one citation short costs twenty trust points", () => {
  const article = fullLength(
    CLEAN_ARTICLE.replace(
      "[consumer bureau](https://www.consumerfinance.gov/consumer-tools)",
      "consumer bureau"
    )
  );
  const report = evaluate(article, matrix, qcContext);

  assert.equal(report.breakdown.trust, 80);
  assert.equal(report.qualifyingTrustSignals, 1);
  assert.equal(report.score, 97);
  assert.equal(report.status, "APPROVED");
  assert.ok(codes(report.issues).includes("INSUFFICIENT_TRUST_SIGNALS"));
});

test("unregistered regulated links and low tiers", () => {
  const article = fullLength(
    `${CLEAN_ARTICLE}\n\nSee [this lender](https://www.quickloan-offers.net/apply) and [a post](https://medium.com/some-post).`
  );
  const report = evaluate(article, matrix, qcContext);
  const trustIssues = report.issues.filter((entry) => entry.source === "trust");

  assert.equal(report.breakdown.trust, 0);
  assert.deepEqual(codes(trustIssues), ["ERR_TRUST_UNREGISTERED_REGULATED", "LOW_TIER_SOURCE"]);
  assert.equal(trustIssues[0]?.message, "Link to unregistered finance site quickloan-offers.net");
});

test("missing regulated disclaimer blocks", () => {
  const gambling = buildMatrix({
    constraints: { targetWordCount: 800, complianceTags: ["gambling"] },
  });
  const report = evaluate(fullLength(CLEAN_ARTICLE), gambling, qcContext);

  assert.equal(report.breakdown.compliance, 0);
  assert.equal(report.score, 95);
  assert.equal(report.status, "BLOCKED");
  assert.deepEqual(report.recommendations[0], {
    code: "MISSING_GAMBLING_DISCLAIMER",
    action: "Add the gambling disclaimer",
  });
});

test("prohibited claims are flagged", () => {
  const article = fullLength(`${CLEAN_ARTICLE}\n\nThese accounts promise guaranteed returns.`);
  const report = evaluate(article, matrix, qcContext);

  assert.equal(report.breakdown.compliance, 0);
  assert.equal(
    report.issues.find((entry) => entry.code === "ERR_COMPLIANCE")?.message,
    'Prohibited finance claim: "guaranteed returns"'
  );
  assert.equal(report.humanSignoffRequired, true);
});

test("word count deviation warns then blocks", () => {
  const short = evaluateDraft(analyzeArticle(CLEAN_ARTICLE, matrix, qcContext), matrix, qcContext);
  assert.equal(short.score, 70);
  assert.equal(short.issues[0]?.blocking, true);

  const article = padArticle(CLEAN_ARTICLE, 680);
  const near = evaluateDraft(analyzeArticle(article, matrix, qcContext), matrix, qcContext);
  assert.equal(near.score, 90);
  assert.deepEqual(near.issues[0], {
    severity: "warning",
    category: "content",
    code: "WORD_COUNT_MISMATCH",
    message: "688 words against a target of 800 (14% off)",
    source: "draft",
    blocking: false,
  });
});

test("structure problems add up", () => {
  const text = "# Title\n## One\nText here.\n## Two\n";
  const result = evaluateDraft(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 40);
  assert.deepEqual(codes(result.issues), ["INSUFFICIENT_SECTIONS", "EMPTY_SECTION", "WORD_COUNT_MISMATCH"]);
  assert.deepEqual(result.issues[1]?.location, { section: 1 });
});

test("tone and perspective detection", () => {
  const { pronouns } = reference.voiceMarkers;

  assert.equal(detectTone(5, 1, 3), "formal");
  assert.equal(detectTone(1, 4, 3), "conversational");
  assert.equal(detectTone(2, 0, 3), "neutral");
  assert.equal(dominantPerspective("You can see your plan. You will.", pronouns, 3), "second_person");
  assert.equal(dominantPerspective("We and you. Our plan, your plan.", pronouns, 2), null);
  assert.equal(dominantPerspective("You and your plan.", pronouns, 3), null);
});

test("fit penalizes tone, perspective and promotion", () => {
  const text = [
    "# Title",
    "## One",
    "Hey, this is awesome stuff and totally cool. You will love your new plan, you really will.",
    "Buy now, act now, limited time, unbeatable value.",
  ].join("\n");
  const result = evaluateFit(analyzeArticle(text, matrix, qcContext), matrix, qcContext);

  assert.equal(result.score, 45);
  assert.deepEqual(codes(result.issues), ["TONE_MISMATCH", "PERSPECTIVE_MISMATCH", "OVERLY_PROMOTIONAL"]);
  assert.equal(result.issues[0]?.message, "Article reads conversational; the publisher writes neutral");
});

test("URLs compare by host and path", () => {
  assert.equal(normalizeUrl(TARGET_URL), "northbank.com/savings-accounts");
  assert.equal(normalizeUrl("https://northbank.com/savings-accounts/?ref=1"), "northbank.com/savings-accounts");
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

test("report text lists status, breakdown and signoff", () => {
  const lines = formatValidationReport(evaluate(fullLength(CLEAN_ARTICLE), matrix, qcContext)).split(
    "\n"
  );

  assert.equal(lines[0], "QC REPORT: APPROVED (score 100.0)");
  assert.equal(lines[2], "Breakdown:");
  assert.equal(lines[3], "  preflight   100");
  assert.equal(lines[9], "  compliance  100");
  assert.ok(lines.includes("Human signoff: not required"));
  assert.ok(lines.includes("Auto-fix: none"));
});
