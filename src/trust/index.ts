/**
 * Trust and compliance checks.
 */

export {
  hostOf,
  findRegistryEntry,
  classifyLinks,
  meetsTier,
  countQualifyingTrustSignals,
  sameSite,
  UNKNOWN_TIER,
  type ClassifiedLink,
} from "./registry.js";
export {
  countPhrase,
  isRegulated,
  findCompetitorHits,
  findUnregisteredRegulatedLinks,
  checkCompliance,
  disclaimerCode,
  findProhibitedClaims,
  impliedComplianceTags,
  type CompetitorHit,
  type CompetitorHitKind,
  type UnregisteredRegulatedLink,
  type ProhibitedClaim,
} from "./compliance.js";
