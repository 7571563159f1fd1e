/**
 * Preflight Matrix Builder Tests
 *
 * These tests verify:
 *   1. The matrix holds the planned terms, anchor, trust and compliance sections
 *   2. The same inputs give the same matrix and fingerprint
 *   3. Missing profiles and thin vocabularies fail with a kind
 *   4. The SERP query and writer brief are built from the matrix
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { buildPreflightMatrix } from "./builder.js";
import { canonicalJson, isMatrixStale } from "./fingerprint.js";
import { chooseBridge } from "./bridge.js";
import { extractQuery, detectIntents } from "./query.js";
import { createWriterBrief, formatWriterBrief } from "./brief.js";
import { lemmatizeTerm } from "../lexical/lemmatizer.js";
import { parseReference } from "../reference/loader.js";
import { LsiLexiconSchema } from "../reference/schema.js";
import { PreflightError } from "../types/errors.js";
import {
  ORDER,
  PROFILE,
  SERP,
  PORTFOLIO,
  TARGET_URL,
  buildMatrix,
  context,
  lemmatizer,
  reference,
  registry,
  policy,
} from "../testing/fixtures.js";

const fingerprintInputs = {
  order: ORDER,
  profile: PROFILE,
  serp: SERP,
  portfolio: PORTFOLIO.counts,
  registry,
  reference,
  policy,
};

// ═══════════════════════════════════════════════════════════════════════════
// MATRIX CONTENT
// ═══════════════════════════════════════════════════════════════════════════

test("industries come from the profile and target keywords", () => {
  const matrix = buildMatrix();

  assert.deepEqual(matrix.industries, { publisher: "home", target: "finance" });
  assert.equal(matrix.targetDomain, "northbank.com");
  assert.equal(matrix.query, "plan household renovation budget");
  assert.deepEqual(matrix.intents, ["informational"]);
});

test("LSI terms are balanced round-robin across categories", () => {
  const { terms } = buildMatrix().lsi;

  assert.deepEqual(
    terms.map((term) => term.term),
    ["budget", "quote", "damp", "spreadsheet", "deadline", "renovation", "comparison", "debt"]
  );
  assert.deepEqual(
    terms.map((term) => term.category),
    [
      "process",
      "measurement",
      "failure-mode",
      "tool",
      "temporal",
      "process",
      "measurement",
      "failure-mode",
    ]
  );
});

test("bridge terms and sources are marked", () => {
  const { terms } = buildMatrix().lsi;

  assert.deepEqual(
    terms.filter((term) => term.bridge).map((term) => term.term),
    ["budget", "spreadsheet"]
  );
  assert.deepEqual(
    terms.map((term) => term.source),
    ["both", "both", "lexicon", "lexicon", "lexicon", "both", "lexicon", "lexicon"]
  );
});

test("unselected candidates become related vocabulary", () => {
  const { related, policy: lsiPolicy } = buildMatrix().lsi;

  assert.equal(related.length, 12);
  assert.equal(related[0], lemmatizeTerm("contractor", lemmatizer));
  assert.equal(related[1], "savings");
  assert.deepEqual(lsiPolicy, { min: 6, max: 10, radiusSentences: 2, maxRepeat: 2 });
});

test("bridge concept favours concepts spanning both industries", () => {
  const matrix = buildMatrix();

  assert.equal(matrix.bridge.label, "household budgeting");
  assert.deepEqual(
    matrix.candidateBridges.map((candidate) => [candidate.label, candidate.score]),
    [
      ["household budgeting", 0.96],
      ["travel budgeting", 0.8],
      ["digital tools", 0.7],
    ]
  );
});

test("anchor plan combines classification and portfolio risk", () => {
  assert.deepEqual(buildMatrix().anchor, {
    text: "savings accounts",
    type: "exact",
    risk: 0.093,
    riskLevel: "low",
    allowedTypes: ["exact", "partial", "brand", "generic"],
    forbiddenTypes: [],
    preferredType: "brand",
    maxExactShare: 0.2,
  });
});

test("compliance, trust and word plans", () => {
  const matrix = buildMatrix();

  assert.deepEqual(matrix.compliance, { tags: ["finance"], regulatedTags: ["finance"] });
  assert.deepEqual(
    matrix.trust.sources.map((source) => source.domain),
    ["census.gov", "consumerfinance.gov", "gamblingcommission.gov.uk"]
  );
  assert.equal(matrix.trust.requiredCount, 2);
  assert.deepEqual(matrix.wordCount, { target: 800, min: 640, max: 960 });
  assert.deepEqual(matrix.placement, { zone: "midpoint", maxParagraphDepth: 3 });
});

test("order tags are merged with implied tags and sorted", () => {
  const matrix = buildMatrix({
    constraints: { targetWordCount: 800, complianceTags: ["sponsored"] },
  });

  assert.deepEqual(matrix.compliance.tags, ["finance", "sponsored"]);
  assert.deepEqual(matrix.compliance.regulatedTags, ["finance"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DETERMINISM
// ═══════════════════════════════════════════════════════════════════════════

test("equal inputs give identical matrices", () => {
  const first = buildMatrix();
  const second = buildMatrix();

  assert.equal(canonicalJson(first), canonicalJson(second));
  assert.match(first.inputFingerprint, /^[0-9a-f]{64}$/);
  assert.ok(Object.isFrozen(first.lsi.terms));
});

test("canonical JSON sorts keys at every depth", () => {
  assert.equal(canonicalJson({ b: 1, a: { d: [2, 1], c: null } }), '{"a":{"c":null,"d":[2,1]},"b":1}');
});

test("changed inputs make a matrix stale", () => {
  const matrix = buildMatrix();

  assert.equal(isMatrixStale(matrix, fingerprintInputs), false);
  assert.equal(
    isMatrixStale(matrix, { ...fingerprintInputs, serp: { ...SERP, lsiTerms: ["savings"] } }),
    true
  );
  assert.equal(
    isMatrixStale(matrix, { ...fingerprintInputs, registry: { ...registry, version: "2027.01.1" } }),
    true
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

function assertPreflightError(fn: () => unknown, kind: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof PreflightError);
    assert.equal(err.kind, kind);
    return true;
  });
}

test("missing profile or portfolio is a dependency failure", () => {
  assertPreflightError(
    () => buildPreflightMatrix(ORDER, null, SERP, PORTFOLIO, context),
    "DEPENDENCY_UNAVAILABLE"
  );
  assertPreflightError(
    () => buildPreflightMatrix(ORDER, PROFILE, SERP, null, context),
    "DEPENDENCY_UNAVAILABLE"
  );
});

test("thin vocabulary fails with INSUFFICIENT_LSI_CANDIDATES", () => {
  const lexicon = parseReference(
    LsiLexiconSchema,
    {
      version: "test",
      industries: {
        general: {
          keywords: [],
          terms: [
            { term: "overview", category: "general" },
            { term: "guide", category: "general" },
          ],
        },
      },
    },
    "test lexicon"
  );

  assertPreflightError(
    () =>
      buildPreflightMatrix(
        ORDER,
        PROFILE,
        { ...SERP, lsiTerms: ["savings", "budget"] },
        PORTFOLIO,
        { ...context, reference: { ...reference, lexicon } }
      ),
    "INSUFFICIENT_LSI_CANDIDATES"
  );
});

test("no matching concept falls back to the default bridge", () => {
  const choice = chooseBridge(
    reference.midpoints,
    { publisher: "pets", target: "automotive" },
    lemmatizer
  );

  assert.equal(choice.bridge.label, "everyday planning");
  assert.deepEqual(
    choice.candidates.map((candidate) => [candidate.label, candidate.score]),
    [["everyday planning", 0.5]]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// QUERY AND BRIEF
// ═══════════════════════════════════════════════════════════════════════════

test("query keeps the first content words of the topic", () => {
  const stopwords = new Set(reference.lemmaRules.stopwords);

  assert.equal(extractQuery(ORDER.topic, stopwords), "plan household renovation budget");
  assert.equal(extractQuery("Go to it", stopwords), "go to it");
});

test("intents fall back to topic and URL markers", () => {
  assert.deepEqual(
    detectIntents("Budget tips for renovations", "https://spinhaven.com/casino-offer"),
    ["informational", "commercial"]
  );
  assert.deepEqual(detectIntents("Kitchen colours this year", TARGET_URL), ["informational"]);
});

test("writer brief carries the plan", () => {
  const matrix = buildMatrix();
  const brief = createWriterBrief(ORDER, matrix, reference.rulebook);

  assert.deepEqual(brief.disclaimers, [reference.rulebook.rules.finance.disclaimer]);
  assert.equal(brief.lsiTerms.length, 8);
  assert.deepEqual(brief.outline.map((section) => section.part), [
    "introduction",
    "midpoint",
    "conclusion",
  ]);

  const lines = formatWriterBrief(brief).split("\n");
  assert.equal(lines[0], "WRITER BRIEF: ord-1001");
  assert.equal(lines[2], `Anchor: "savings accounts" -> ${TARGET_URL} (exact)`);
  assert.equal(lines[3], "Length: 640-960 words (target 800)");
  assert.equal(lines[4], "Voice: neutral, third person");
});
