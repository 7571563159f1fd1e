/**
 * Shared fixtures for the test suites: one home-renovation order linking to
 * a savings-account page, with its publisher profile, SERP signal and
 * portfolio, plus the loaded reference context.
 */

import { DEFAULT_QC_POLICY } from "../config/qc/defaults.js";
import { loadQcPolicy } from "../config/qc/loader.js";
import { loadReferenceData, loadTrustRegistryFile } from "../reference/loader.js";
import { RuleTableLemmatizer } from "../lexical/lemmatizer.js";
import { buildPreflightMatrix, type PreflightContext } from "../preflight/builder.js";
import {
  OrderSchema,
  PublisherProfileSchema,
  SerpSignalSchema,
  type Order,
  type PreflightMatrix,
  type PublisherProfile,
  type SerpSignal,
} from "../preflight/schema.js";
import type { AnchorPortfolio } from "../portfolio/schema.js";
import { parseArticle } from "../lexical/parser.js";
import type { QcContext } from "../qc/facts.js";

export const reference = loadReferenceData();
export const registry = loadTrustRegistryFile();
export const policy = loadQcPolicy(DEFAULT_QC_POLICY);
export const lemmatizer = new RuleTableLemmatizer(reference.lemmaRules);

export const context: PreflightContext = { reference, registry, policy, lemmatizer };

export const qcContext: QcContext = {
  registry,
  rulebook: reference.rulebook,
  voiceMarkers: reference.voiceMarkers,
  lemmatizer,
  policy,
};

export const TARGET_URL = "https://www.northbank.com/savings-accounts";

export const ORDER: Order = OrderSchema.parse({
  id: "ord-1001",
  customerId: "cust-17",
  publisherDomain: "homesteadjournal.com",
  targetUrl: TARGET_URL,
  anchorText: "savings accounts",
  topic: "How to plan a household renovation budget",
  constraints: { targetWordCount: 800 },
});

export const PROFILE: PublisherProfile = PublisherProfileSchema.parse({
  domain: "homesteadjournal.com",
  industry: "home",
  topics: ["renovation", "gardening"],
  voice: { tone: "neutral", perspective: "third_person" },
});

export const SERP: SerpSignal = SerpSignalSchema.parse({
  query: "plan household renovation budget",
  locale: "en-US",
  lsiTerms: ["renovation budget", "contractor quote", "savings"],
  intents: ["informational"],
});

export const PORTFOLIO: AnchorPortfolio = {
  targetDomain: "northbank.com",
  counts: { exact: 1, partial: 3, brand: 4, generic: 2 },
};

export function buildMatrix(overrides: Partial<Order> = {}): Readonly<PreflightMatrix> {
  return buildPreflightMatrix({ ...ORDER, ...overrides }, PROFILE, SERP, PORTFOLIO, context);
}

// ═══════════════════════════════════════════════════════════════════════════
// ARTICLES
// ═══════════════════════════════════════════════════════════════════════════

export const ANCHOR_LINK = `[savings accounts](${TARGET_URL})`;

/**
 * A clean draft for ORDER: three sections, anchor in the middle one with
 * eight planned lemmas around it, two T1 citations and the finance
 * disclaimer. 98 words before padding.
 */
export const CLEAN_ARTICLE = [
  "# Planning a household renovation budget",
  "",
  "Renovating a home is easier with a clear plan. The steps below cover the essentials.",
  "",
  "## Start with the numbers",
  "",
  "Write down what the work should cost before any contractor visits. Official figures from the [census](https://www.census.gov/construction) help set expectations.",
  "",
  "## Keep money aside",
  "",
  `A renovation budget works best in a spreadsheet that lists every quote next to its deadline. Households that keep a buffer in ${ANCHOR_LINK} absorb surprises without debt. Ask each builder for a written estimate. Write the figures down before work starts. Guidance from the [consumer bureau](https://www.consumerfinance.gov/consumer-tools) explains the trade-offs.`,
  "",
  "## Wrapping up",
  "",
  "This article is for information only and is not financial advice. Capital at risk.",
].join("\n");

/** Ten words with no planned lemma, marker or pronoun. */
const FILLER_SENTENCE = "Small steps add up over the course of a year.";
const FILLER_WORDS = 10;

/**
 * Append one filler paragraph so the body holds at least `words` words
 * (and fewer than `words + 10`).
 */
export function padArticle(text: string, words: number): string {
  const missing = words - parseArticle(text).wordCount;
  if (missing <= 0) {
    return text;
  }
  const filler = Array.from({ length: Math.ceil(missing / FILLER_WORDS) }, () => FILLER_SENTENCE);
  return `${text}\n\n${filler.join(" ")}`;
}

/** A draft at the order's 800-word target. */
export function fullLength(text: string): string {
  return padArticle(text, 800);
}
