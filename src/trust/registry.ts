/**
 * Trust registry lookups and outbound link classification.
 */

import { tierRank, type TrustTier } from "../config/qc/enums.js";
import type { TrustRegistry, TrustRegistryEntry } from "../reference/schema.js";

export const UNKNOWN_TIER = "UNKNOWN" as const;

export interface ClassifiedLink {
  url: string;
  domain: string;
  /** Registry domain the host matched, null when unregistered */
  registeredDomain: string | null;
  tier: TrustTier | typeof UNKNOWN_TIER;
  competitor: boolean;
  category: string | null;
}

/**
 * Lower-case host without "www.", or null for relative and malformed URLs.
 */
export function hostOf(url: string): string | null {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host.startsWith("www.") ? host.slice(4) : host;
  } catch {
    return null;
  }
}

/**
 * Registry entry for a host, matching the domain itself or any subdomain.
 * The longest registered domain wins.
 */
export function findRegistryEntry(
  domain: string,
  registry: TrustRegistry
): TrustRegistryEntry | undefined {
  const host = domain.toLowerCase().replace(/^www\./, "");
  let best: TrustRegistryEntry | undefined;
  for (const entry of registry.entries) {
    const matches = host === entry.domain || host.endsWith(`.${entry.domain}`);
    if (matches && (!best || entry.domain.length > best.domain.length)) {
      best = entry;
    }
  }
  return best;
}

export function classifyLinks(
  links: ReadonlyArray<{ url: string }>,
  registry: TrustRegistry
): ClassifiedLink[] {
  const classified: ClassifiedLink[] = [];
  for (const link of links) {
    const domain = hostOf(link.url);
    if (domain === null) {
      continue;
    }
    const entry = findRegistryEntry(domain, registry);
    classified.push({
      url: link.url,
      domain,
      registeredDomain: entry ? entry.domain : null,
      tier: entry ? entry.tier : UNKNOWN_TIER,
      competitor: entry ? entry.competitor : false,
      category: entry ? entry.category : null,
    });
  }
  return classified;
}

/**
 * Whether a tier is at least as authoritative as `minTier`.
 */
export function meetsTier(
  tier: TrustTier | typeof UNKNOWN_TIER,
  minTier: TrustTier
): boolean {
  return tier !== UNKNOWN_TIER && tierRank(tier) <= tierRank(minTier);
}

/**
 * Distinct non-competitor registry domains at or above `minTier`; two
 * subdomains of one registered site count once. The target's own domain
 * never counts as a citation.
 */
export function countQualifyingTrustSignals(
  classified: readonly ClassifiedLink[],
  minTier: TrustTier = "T2",
  excludeDomain?: string
): number {
  const domains = new Set<string>();
  for (const link of classified) {
    if (link.competitor || !meetsTier(link.tier, minTier)) {
      continue;
    }
    if (excludeDomain !== undefined && sameSite(link.domain, excludeDomain)) {
      continue;
    }
    domains.add(link.registeredDomain ?? link.domain);
  }
  return domains.size;
}

/** True when one host is the other or a subdomain of it. */
export function sameSite(a: string, b: string): boolean {
  const left = a.toLowerCase().replace(/^www\./, "");
  const right = b.toLowerCase().replace(/^www\./, "");
  return left === right || left.endsWith(`.${right}`) || right.endsWith(`.${left}`);
}
