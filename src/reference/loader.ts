/**
 * Reference data loader.
 *
 * Reads the JSON tables under data/, validates each against its schema and
 * deep-freezes the result. Parsing and file access are split so tests can
 * hand in objects directly.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ZodType, ZodTypeDef } from "zod";

import {
  deepFreeze,
  toValidationIssues,
  type PolicyValidationIssue,
} from "../config/qc/loader.js";
import {
  ComplianceRulebookSchema,
  LemmaRulesSchema,
  LsiLexiconSchema,
  MidpointCatalogSchema,
  TrustRegistrySchema,
  VoiceMarkersSchema,
  type ComplianceRulebook,
  type LemmaRules,
  type LsiLexicon,
  type MidpointCatalog,
  type TrustRegistry,
  type VoiceMarkers,
} from "./schema.js";

export class ReferenceDataError extends Error {
  public readonly source: string;
  public readonly issues: PolicyValidationIssue[];

  constructor(source: string, message: string, issues: PolicyValidationIssue[] = []) {
    super(message);
    this.name = "ReferenceDataError";
    this.source = source;
    this.issues = issues;
  }

  format(): string {
    const lines = [`Reference data ${this.source} failed to load: ${this.message}`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Everything the planner and the scoring engine read besides the policy and
 * the trust registry (which is fetched per run and versioned on its own).
 */
export interface ReferenceData {
  readonly lexicon: LsiLexicon;
  readonly lemmaRules: LemmaRules;
  readonly rulebook: ComplianceRulebook;
  readonly midpoints: MidpointCatalog;
  readonly voiceMarkers: VoiceMarkers;
}

export const REFERENCE_FILES = {
  lexicon: "lsi-lexicon.json",
  lemmaRules: "lemma-rules.json",
  rulebook: "compliance-rules.json",
  midpoints: "midpoints.json",
  voiceMarkers: "voice-markers.json",
  registry: "trust-registry.json",
} as const;

/**
 * Locate data/ beside the package root. Sources run from src/reference,
 * compiled output from dist/src/reference.
 */
export function defaultDataDir(): string {
  for (const relative of ["../../data/", "../../../data/"]) {
    const candidate = fileURLToPath(new URL(relative, import.meta.url));
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  throw new ReferenceDataError("data/", "Reference data directory not found");
}

/**
 * Validate and freeze one reference table.
 */
export function parseReference<T extends object>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  source: string
): Readonly<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error.issues);
    throw new ReferenceDataError(
      source,
      `${issues.length} validation error(s)`,
      issues
    );
  }
  return deepFreeze(result.data);
}

export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ReferenceDataError(path, "File not found");
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return parsed;
  } catch (err) {
    throw new ReferenceDataError(
      path,
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function loadReferenceData(dataDir: string = defaultDataDir()): ReferenceData {
  const load = <T extends object>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    file: string
  ): Readonly<T> => parseReference(schema, readJsonFile(join(dataDir, file)), file);

  return {
    lexicon: load(LsiLexiconSchema, REFERENCE_FILES.lexicon),
    lemmaRules: load(LemmaRulesSchema, REFERENCE_FILES.lemmaRules),
    rulebook: load(ComplianceRulebookSchema, REFERENCE_FILES.rulebook),
    midpoints: load(MidpointCatalogSchema, REFERENCE_FILES.midpoints),
    voiceMarkers: load(VoiceMarkersSchema, REFERENCE_FILES.voiceMarkers),
  };
}

export function loadTrustRegistry(input: unknown): Readonly<TrustRegistry> {
  return parseReference(TrustRegistrySchema, input, "trust registry");
}

export function loadTrustRegistryFile(
  dataDir: string = defaultDataDir()
): Readonly<TrustRegistry> {
  const file = REFERENCE_FILES.registry;
  return parseReference(TrustRegistrySchema, readJsonFile(join(dataDir, file)), file);
}
