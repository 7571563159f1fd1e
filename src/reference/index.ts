/**
 * Static reference data: lexicon, lemma rules, compliance rulebook,
 * midpoint concepts, voice markers and the trust registry.
 */

export * from "./schema.js";
export {
  ReferenceDataError,
  REFERENCE_FILES,
  defaultDataDir,
  parseReference,
  readJsonFile,
  loadReferenceData,
  loadTrustRegistry,
  loadTrustRegistryFile,
  type ReferenceData,
} from "./loader.js";
