/**
 * Preflight matrix builder.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DETERMINISTIC PLANNING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Equal inputs give byte-identical matrices: no clock, no randomness, and
 * every list is sorted by a total order. Missing inputs fail the build with
 * DEPENDENCY_UNAVAILABLE rather than falling back to defaults.
 */

import type { QcPolicy } from "../config/qc/schema.js";
import { tierRank, type ComplianceTag } from "../config/qc/enums.js";
import { deepFreeze, toValidationIssues } from "../config/qc/loader.js";
import type { ReferenceData } from "../reference/loader.js";
import type { LsiLexicon, TrustRegistry } from "../reference/schema.js";
import type { Lemmatizer } from "../lexical/lemmatizer.js";
import { findRegistryEntry, hostOf } from "../trust/registry.js";
import { impliedComplianceTags, isRegulated } from "../trust/compliance.js";
import { recommendAnchorTypes } from "../portfolio/risk.js";
import { classifyAnchor, targetKeywords } from "../portfolio/classify.js";
import type { AnchorPortfolio } from "../portfolio/schema.js";
import { PreflightError } from "../types/errors.js";
import { computeInputFingerprint } from "./fingerprint.js";
import { collectLsiCandidates, selectLsiTerms, type Industries } from "./lsi.js";
import { chooseBridge } from "./bridge.js";
import { detectIntents } from "./query.js";
import {
  PreflightMatrixSchema,
  type Order,
  type PreflightMatrix,
  type PublisherProfile,
  type SerpSignal,
  type TrustSource,
} from "./schema.js";

export const MATRIX_VERSION = "1.0";

/** Relative slack around the target word count. */
const WORD_COUNT_TOLERANCE = 0.2;

export interface PreflightContext {
  reference: ReferenceData;
  registry: TrustRegistry;
  policy: QcPolicy;
  lemmatizer: Lemmatizer;
}

/**
 * Target industry: the registry category when the lexicon knows it,
 * otherwise the industry with the most keyword hits in the URL and anchor.
 */
export function detectTargetIndustry(
  targetUrl: string,
  anchorText: string,
  registry: TrustRegistry,
  lexicon: LsiLexicon
): string {
  const host = hostOf(targetUrl);
  const entry = host === null ? undefined : findRegistryEntry(host, registry);
  if (entry && entry.category in lexicon.industries) {
    return entry.category;
  }

  const haystack = `${targetUrl} ${anchorText}`.toLowerCase();
  let best = "general";
  let bestHits = 0;
  for (const industry of Object.keys(lexicon.industries).sort()) {
    if (industry === "general") {
      continue;
    }
    const industryLexicon = lexicon.industries[industry];
    const hits = industryLexicon
      ? industryLexicon.keywords.filter((keyword) => haystack.includes(keyword.toLowerCase())).length
      : 0;
    if (hits > bestHits) {
      best = industry;
      bestHits = hits;
    }
  }
  return best;
}

export function selectTrustSources(
  registry: TrustRegistry,
  count: number
): TrustSource[] {
  return registry.entries
    .filter((entry) => !entry.competitor && tierRank(entry.tier) <= tierRank("T2"))
    .map((entry) => ({ domain: entry.domain, tier: entry.tier, category: entry.category }))
    .sort(
      (a, b) =>
        tierRank(a.tier) - tierRank(b.tier) ||
        (a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0)
    )
    .slice(0, count);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Build the preflight matrix for one order.
 *
 * @throws PreflightError DEPENDENCY_UNAVAILABLE when the profile or the
 *   portfolio is missing, INSUFFICIENT_LSI_CANDIDATES when the vocabulary is
 *   too thin, INVALID_MATRIX if the result fails its schema
 */
export function buildPreflightMatrix(
  order: Order,
  profile: PublisherProfile | null,
  serp: SerpSignal,
  portfolio: AnchorPortfolio | null,
  context: PreflightContext
): Readonly<PreflightMatrix> {
  if (profile === null) {
    throw new PreflightError(
      "DEPENDENCY_UNAVAILABLE",
      `No publisher profile for ${order.publisherDomain}`,
      { orderId: order.id, dependency: "publisherProfile" }
    );
  }
  if (portfolio === null) {
    throw new PreflightError(
      "DEPENDENCY_UNAVAILABLE",
      `No anchor portfolio for ${order.targetUrl}`,
      { orderId: order.id, dependency: "anchorPortfolio" }
    );
  }

  const { reference, registry, policy, lemmatizer } = context;
  const targetDomain = hostOf(order.targetUrl) ?? order.targetUrl;

  const industries: Industries = {
    publisher: profile.industry,
    target: detectTargetIndustry(order.targetUrl, order.anchorText, registry, reference.lexicon),
  };

  const lsi = selectLsiTerms(
    collectLsiCandidates(serp.lsiTerms, industries, reference.lexicon, lemmatizer),
    industries,
    policy.lsi
  );

  const { bridge, candidates } = chooseBridge(reference.midpoints, industries, lemmatizer);

  const recommendation = recommendAnchorTypes(portfolio.counts);
  const anchorType = classifyAnchor(
    order.anchorText,
    order.targetUrl,
    targetKeywords(order.targetUrl, serp.query)
  );

  const tags: ComplianceTag[] = [
    ...new Set([
      ...order.constraints.complianceTags,
      ...impliedComplianceTags(targetDomain, registry, reference.rulebook),
    ]),
  ].sort();

  const target = order.constraints.targetWordCount;

  const draft = {
    matrixVersion: MATRIX_VERSION,
    orderId: order.id,
    publisherDomain: order.publisherDomain,
    targetUrl: order.targetUrl,
    targetDomain,
    locale: order.locale,
    query: serp.query,
    intents: serp.intents.length > 0 ? [...serp.intents] : detectIntents(order.topic, order.targetUrl),
    industries,
    anchor: {
      text: order.anchorText,
      type: anchorType,
      risk: round3(recommendation.risk),
      riskLevel: recommendation.riskLevel,
      allowedTypes: recommendation.allowedTypes,
      forbiddenTypes: recommendation.forbiddenTypes,
      preferredType: recommendation.preferredType,
      maxExactShare: recommendation.maxExactShare,
    },
    bridge,
    candidateBridges: candidates,
    placement: {
      zone: "midpoint" as const,
      maxParagraphDepth: policy.anchor.maxParagraphDepth,
    },
    lsi: {
      terms: lsi.terms,
      related: lsi.related,
      policy: {
        min: policy.lsi.min,
        max: policy.lsi.max,
        radiusSentences: policy.lsi.radiusSentences,
        maxRepeat: policy.lsi.maxRepeat,
      },
    },
    trust: {
      requiredCount: policy.trust.requiredSignals,
      minTier: policy.trust.minTier,
      preferredTiers: ["T1" as const, "T2" as const],
      sources: selectTrustSources(registry, policy.trust.suggestedSources),
    },
    compliance: {
      tags,
      regulatedTags: tags.filter((tag) => isRegulated(tag, reference.rulebook)),
    },
    wordCount: {
      target,
      min: Math.round(target * (1 - WORD_COUNT_TOLERANCE)),
      max: Math.round(target * (1 + WORD_COUNT_TOLERANCE)),
    },
    voice: profile.voice,
    registryVersion: registry.version,
    inputFingerprint: computeInputFingerprint({
      order,
      profile,
      serp,
      portfolio: portfolio.counts,
      registry,
      reference,
      policy,
    }),
  };

  const result = PreflightMatrixSchema.safeParse(draft);
  if (!result.success) {
    const [first] = toValidationIssues(result.error.issues);
    throw new PreflightError(
      "INVALID_MATRIX",
      `Preflight matrix failed validation: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`,
      { orderId: order.id, issues: result.error.issues.length }
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a stored matrix (from disk or persistence) before reuse.
 */
export function parsePreflightMatrix(input: unknown): Readonly<PreflightMatrix> {
  const result = PreflightMatrixSchema.safeParse(input);
  if (!result.success) {
    const [first] = toValidationIssues(result.error.issues);
    throw new PreflightError(
      "INVALID_MATRIX",
      `Stored matrix is invalid: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`,
      { issues: result.error.issues.length }
    );
  }
  return deepFreeze(result.data);
}
