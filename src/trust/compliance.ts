/**
 * Compliance checks: competitor exposure, unregistered links in regulated
 * verticals, required disclaimers and prohibited claims.
 */

import type { ComplianceTag } from "../config/qc/enums.js";
import type {
  ComplianceRulebook,
  TrustRegistry,
} from "../reference/schema.js";
import type { ParsedArticle } from "../lexical/parser.js";
import { documentText } from "../lexical/parser.js";
import {
  classifyLinks,
  findRegistryEntry,
  sameSite,
  UNKNOWN_TIER,
  type ClassifiedLink,
} from "./registry.js";

export type CompetitorHitKind = "link" | "mention" | "name";

export interface CompetitorHit {
  domain: string;
  via: CompetitorHitKind;
  /** The text that matched */
  match: string;
}

export interface UnregisteredRegulatedLink {
  url: string;
  domain: string;
  tag: ComplianceTag;
}

export interface ProhibitedClaim {
  tag: ComplianceTag;
  phrase: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word occurrences of a phrase.
 */
export function countPhrase(text: string, phrase: string): number {
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`,
    "giu"
  );
  return text.match(pattern)?.length ?? 0;
}

function ruleEntries(
  rulebook: ComplianceRulebook
): Array<[ComplianceTag, ComplianceRulebook["rules"][ComplianceTag]]> {
  return [
    ["gambling", rulebook.rules.gambling],
    ["finance", rulebook.rules.finance],
    ["health", rulebook.rules.health],
    ["legal", rulebook.rules.legal],
    ["crypto", rulebook.rules.crypto],
    ["sponsored", rulebook.rules.sponsored],
  ];
}

export function isRegulated(tag: ComplianceTag, rulebook: ComplianceRulebook): boolean {
  return rulebook.rules[tag].regulated;
}

/**
 * Competitor-flagged registry domains linked, mentioned as a bare domain, or
 * named anywhere in the article, title and headings included. One hit per
 * domain and kind.
 */
export function findCompetitorHits(
  article: ParsedArticle,
  registry: TrustRegistry
): CompetitorHit[] {
  const hits: CompetitorHit[] = [];
  const classified = classifyLinks(article.links, registry);
  const text = documentText(article);

  for (const entry of registry.entries) {
    if (!entry.competitor) {
      continue;
    }

    const linked = classified.find((link) => sameSite(link.domain, entry.domain) && link.competitor);
    if (linked) {
      hits.push({ domain: entry.domain, via: "link", match: linked.url });
    }

    if (countPhrase(text, entry.domain) > 0) {
      hits.push({ domain: entry.domain, via: "mention", match: entry.domain });
    }

    const name = entry.names.find((candidate) => countPhrase(text, candidate) > 0);
    if (name !== undefined) {
      hits.push({ domain: entry.domain, via: "name", match: name });
    }
  }

  return hits;
}

/**
 * Links to unregistered hosts whose name matches a regulated tag's domain
 * patterns. The target itself is excluded.
 */
export function findUnregisteredRegulatedLinks(
  classified: readonly ClassifiedLink[],
  rulebook: ComplianceRulebook,
  excludeDomain: string
): UnregisteredRegulatedLink[] {
  const found: UnregisteredRegulatedLink[] = [];
  for (const link of classified) {
    if (link.tier !== UNKNOWN_TIER || sameSite(link.domain, excludeDomain)) {
      continue;
    }
    const match = ruleEntries(rulebook).find(
      ([, rule]) =>
        rule.regulated &&
        rule.domainPatterns.some((pattern) => link.domain.includes(pattern.toLowerCase()))
    );
    if (match) {
      found.push({ url: link.url, domain: link.domain, tag: match[0] });
    }
  }
  return found;
}

/**
 * Required tags with no disclaimer phrase in the text, in input order.
 */
export function checkCompliance(
  text: string,
  requiredTags: readonly ComplianceTag[],
  rulebook: ComplianceRulebook
): ComplianceTag[] {
  const lower = text.toLowerCase();
  return requiredTags.filter(
    (tag) => !rulebook.rules[tag].phrases.some((phrase) => lower.includes(phrase.toLowerCase()))
  );
}

export function disclaimerCode(tag: ComplianceTag): string {
  return `MISSING_${tag.toUpperCase()}_DISCLAIMER`;
}

/**
 * Forbidden phrases of the required regulated tags found in the text.
 */
export function findProhibitedClaims(
  text: string,
  tags: readonly ComplianceTag[],
  rulebook: ComplianceRulebook
): ProhibitedClaim[] {
  const lower = text.toLowerCase();
  const claims: ProhibitedClaim[] = [];
  for (const tag of tags) {
    const rule = rulebook.rules[tag];
    if (!rule.regulated) {
      continue;
    }
    for (const phrase of rule.forbidden) {
      if (lower.includes(phrase.toLowerCase())) {
        claims.push({ tag, phrase });
      }
    }
  }
  return claims;
}

/**
 * Tags a target implies by its registered category, or by host patterns
 * when it is not registered. Sorted.
 */
export function impliedComplianceTags(
  targetDomain: string,
  registry: TrustRegistry,
  rulebook: ComplianceRulebook
): ComplianceTag[] {
  const entry = findRegistryEntry(targetDomain, registry);
  const host = targetDomain.toLowerCase();

  return ruleEntries(rulebook)
    .filter(([, rule]) =>
      entry
        ? rule.categories.includes(entry.category)
        : rule.domainPatterns.some((pattern) => host.includes(pattern.toLowerCase()))
    )
    .map(([tag]) => tag)
    .sort();
}
