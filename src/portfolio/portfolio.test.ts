/**
 * Anchor Portfolio Tests
 *
 * These tests verify:
 *   1. Portfolio risk is scored against the target mix
 *   2. The recommended anchor type moves the mix toward target
 *   3. Adding one anchor reports how the mix changes
 *   4. Anchor text is classified by type
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  diversity,
  risk,
  riskLevel,
  recommendAnchorTypes,
  mostUnderrepresented,
} from "./risk.js";
import { applyPlacement, comparePortfolios, portfolioRecommendations } from "./analysis.js";
import { classifyAnchor, brandTokens, targetKeywords } from "./classify.js";
import { EMPTY_COUNTS, type AnchorCounts } from "./schema.js";

function counts(exact: number, partial: number, brand: number, generic: number): AnchorCounts {
  return { exact, partial, brand, generic };
}

function assertClose(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// RISK
// ═══════════════════════════════════════════════════════════════════════════

test("empty portfolio is fully diverse and riskless", () => {
  assert.equal(diversity(EMPTY_COUNTS), 1);
  assert.equal(risk(EMPTY_COUNTS), 0);
  assert.equal(riskLevel(risk(EMPTY_COUNTS)), "low");
});

test("all-exact portfolio is maximal risk", () => {
  assert.equal(diversity(counts(10, 0, 0, 0)), 0);
  assertClose(risk(counts(10, 0, 0, 0)), 1);
  assert.equal(riskLevel(1), "high");
});

test("uniform mix carries only the exact share", () => {
  assertClose(diversity(counts(5, 5, 5, 5)), 1);
  assertClose(risk(counts(5, 5, 5, 5)), 0.175);
});

test("half exact, half partial sits in the medium band", () => {
  const value = risk(counts(1, 1, 0, 0));
  assertClose(value, 0.5);
  assert.equal(riskLevel(value), "medium");
});

test("risk depends only on the proportions", () => {
  assertClose(risk(counts(2, 4, 6, 8)), risk(counts(1, 2, 3, 4)));
});

test("level boundaries are inclusive on the upper side", () => {
  assert.equal(riskLevel(0.3), "low");
  assert.equal(riskLevel(0.30001), "medium");
  assert.equal(riskLevel(0.6), "medium");
  assert.equal(riskLevel(0.60001), "high");
});

// ═══════════════════════════════════════════════════════════════════════════
// RECOMMENDATIONS
// ═══════════════════════════════════════════════════════════════════════════

test("high risk forbids exact anchors", () => {
  const recommendation = recommendAnchorTypes(counts(10, 0, 0, 0));

  assert.equal(recommendation.riskLevel, "high");
  assert.deepEqual(recommendation.allowedTypes, ["brand", "generic"]);
  assert.deepEqual(recommendation.forbiddenTypes, ["exact"]);
  assert.equal(recommendation.preferredType, "brand");
  assert.equal(recommendation.maxExactShare, 0);
});

test("medium risk allows everything but prefers partial", () => {
  const recommendation = recommendAnchorTypes(counts(1, 1, 0, 0));

  assert.equal(recommendation.riskLevel, "medium");
  assert.deepEqual(recommendation.allowedTypes, ["exact", "partial", "brand", "generic"]);
  assert.deepEqual(recommendation.forbiddenTypes, []);
  assert.equal(recommendation.preferredType, "partial");
  assert.equal(recommendation.maxExactShare, 0.1);
});

test("low risk prefers the type furthest below its band", () => {
  // shares: exact 0.1, partial 0.4, brand 0.4, generic 0.1 -> generic is 0.05 short
  const recommendation = recommendAnchorTypes(counts(1, 4, 4, 1));

  assert.equal(recommendation.riskLevel, "low");
  assert.equal(recommendation.preferredType, "generic");
  assert.equal(recommendation.maxExactShare, 0.2);
});

test("empty portfolio prefers brand", () => {
  assert.equal(mostUnderrepresented(EMPTY_COUNTS), "brand");
  assert.equal(mostUnderrepresented(counts(1, 3, 4, 2)), "brand");
});

// ═══════════════════════════════════════════════════════════════════════════
// CHANGE ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════

test("applyPlacement adds one link without touching the input", () => {
  const before = counts(5, 2, 1, 1);
  const after = applyPlacement(before, "exact");

  assert.deepEqual(after, counts(6, 2, 1, 1));
  assert.deepEqual(before, counts(5, 2, 1, 1));
});

test("another exact anchor worsens an exact-heavy portfolio", () => {
  const before = counts(5, 2, 1, 1);
  const comparison = comparePortfolios(before, applyPlacement(before, "exact"));

  assert.equal(comparison.direction, "worsened");
  assert.equal(comparison.riskLevel, "medium");
  assert.deepEqual(comparison.mixChanges, [{ type: "exact", from: 5, to: 6, change: 1 }]);
  assert.deepEqual(
    comparison.recommendations.map((rec) => `${rec.action}:${rec.anchorType}:${rec.priority}`),
    ["decrease:exact:high", "increase:brand:medium", "increase:generic:medium"]
  );
  assert.equal(
    comparison.recommendations[0]?.rationale,
    "Exact match share (60.0%) exceeds the safe ceiling (15%)"
  );
});

test("a brand anchor improves the same portfolio", () => {
  const before = counts(5, 2, 1, 1);
  assert.equal(comparePortfolios(before, applyPlacement(before, "brand")).direction, "improved");
});

test("identical portfolios are unchanged", () => {
  const comparison = comparePortfolios(counts(1, 1, 1, 1), counts(1, 1, 1, 1));
  assert.equal(comparison.direction, "unchanged");
  assert.equal(comparison.riskChange, 0);
  assert.deepEqual(comparison.mixChanges, []);
});

test("empty portfolio recommendation starts with brand", () => {
  assert.deepEqual(
    portfolioRecommendations(EMPTY_COUNTS, "low").map((rec) => rec.anchorType),
    ["brand"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

const TARGET = "https://www.northbank.com/savings-accounts";
const KEYWORDS = targetKeywords(TARGET, "savings account rates");

test("keywords come from the URL path and the query", () => {
  assert.deepEqual(KEYWORDS, ["savings", "accounts", "account", "rates"]);
});

test("brand tokens drop the public suffix and split hyphens", () => {
  assert.deepEqual(brandTokens(TARGET), ["northbank"]);
  assert.deepEqual(brandTokens("https://luckyspin-casino.com/play"), ["luckyspin", "casino"]);
});

test("anchor classification", () => {
  assert.equal(classifyAnchor("NorthBank", TARGET, KEYWORDS), "brand");
  assert.equal(classifyAnchor("northbank.com", TARGET, KEYWORDS), "brand");
  assert.equal(classifyAnchor("North Bank savings", TARGET, KEYWORDS), "partial");
  assert.equal(classifyAnchor("savings accounts", TARGET, KEYWORDS), "exact");
  assert.equal(classifyAnchor("high-yield savings", TARGET, KEYWORDS), "partial");
  assert.equal(classifyAnchor("Click here", TARGET, KEYWORDS), "generic");
  assert.equal(classifyAnchor("renovation ideas", TARGET, KEYWORDS), "generic");
});
