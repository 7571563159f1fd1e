/**
 * Preflight planning: matrix, fingerprint and writer brief.
 */

export * from "./schema.js";
export {
  buildPreflightMatrix,
  parsePreflightMatrix,
  detectTargetIndustry,
  selectTrustSources,
  MATRIX_VERSION,
  type PreflightContext,
} from "./builder.js";
export {
  canonicalJson,
  sha256Hex,
  computeInputFingerprint,
  isMatrixStale,
  type FingerprintInputs,
} from "./fingerprint.js";
export {
  collectLsiCandidates,
  rankCandidates,
  selectLsiTerms,
  isBridgeCandidate,
  lexiconIndustries,
  type Industries,
  type LsiCandidate,
  type LsiSelection,
} from "./lsi.js";
export { chooseBridge, type BridgeChoice } from "./bridge.js";
export { extractQuery, detectIntents } from "./query.js";
export {
  createWriterBrief,
  formatWriterBrief,
  type WriterBrief,
  type BriefSection,
} from "./brief.js";
