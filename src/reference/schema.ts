/**
 * Schemas for the static reference data under data/.
 *
 * Each file carries its own version string so that a matrix can record
 * which reference snapshot produced it.
 */

import { z } from "zod";
import { LsiCategory, TrustTier } from "../config/qc/enums.js";

const Version = z.string().min(1);

/** One lower-case token, hyphens allowed ("side-effects"). */
const SingleTerm = z
  .string()
  .regex(/^[\p{Ll}\p{N}]+(?:-[\p{Ll}\p{N}]+)*$/u, "Must be a single lower-case token");

// ═══════════════════════════════════════════════════════════════════════════
// LSI LEXICON
// ═══════════════════════════════════════════════════════════════════════════

export const LexiconTermSchema = z
  .object({
    term: SingleTerm,
    category: LsiCategory,
  })
  .strict();

export type LexiconTerm = z.infer<typeof LexiconTermSchema>;

export const IndustryLexiconSchema = z
  .object({
    /** Substrings that point a URL or anchor at this industry */
    keywords: z.array(z.string().min(1)),
    terms: z.array(LexiconTermSchema),
  })
  .strict();

export type IndustryLexicon = z.infer<typeof IndustryLexiconSchema>;

export const LsiLexiconSchema = z
  .object({
    version: Version,
    industries: z.record(z.string(), IndustryLexiconSchema),
  })
  .strict()
  .refine((lexicon) => "general" in lexicon.industries, {
    message: "Lexicon must define a 'general' industry",
    path: ["industries"],
  });

export type LsiLexicon = z.infer<typeof LsiLexiconSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// LEMMA RULES
// ═══════════════════════════════════════════════════════════════════════════

export const LemmaRulesSchema = z
  .object({
    version: Version,
    /** Irregular forms mapped to their lemma */
    exceptions: z.record(z.string(), z.string()),
    /** Words kept verbatim even though they look inflected */
    protected: z.array(z.string()),
    stopwords: z.array(z.string()),
  })
  .strict();

export type LemmaRules = z.infer<typeof LemmaRulesSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COMPLIANCE RULEBOOK
// ═══════════════════════════════════════════════════════════════════════════

export const ComplianceRuleSchema = z
  .object({
    regulated: z.boolean(),
    /** Canonical disclaimer phrases; any one satisfies the tag */
    phrases: z.array(z.string().min(1)).min(1),
    /** Claims that may never appear when the tag applies */
    forbidden: z.array(z.string().min(1)),
    /** Host substrings that mark an unregistered domain as belonging to the tag */
    domainPatterns: z.array(z.string().min(1)),
    /** Registry categories that imply the tag */
    categories: z.array(z.string().min(1)),
    /** Text inserted by the disclaimer auto-fix */
    disclaimer: z.string().min(1),
  })
  .strict();

export type ComplianceRule = z.infer<typeof ComplianceRuleSchema>;

export const ComplianceRulebookSchema = z
  .object({
    version: Version,
    rules: z
      .object({
        gambling: ComplianceRuleSchema,
        finance: ComplianceRuleSchema,
        health: ComplianceRuleSchema,
        legal: ComplianceRuleSchema,
        crypto: ComplianceRuleSchema,
        sponsored: ComplianceRuleSchema,
      })
      .strict(),
  })
  .strict();

export type ComplianceRulebook = z.infer<typeof ComplianceRulebookSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// MIDPOINT CONCEPTS
// ═══════════════════════════════════════════════════════════════════════════

export const MidpointConceptSchema = z
  .object({
    label: z.string().min(1),
    industries: z.array(z.string().min(1)).min(1),
    score: z.number().min(0).max(1),
    lemmas: z.array(SingleTerm).min(1),
    rationale: z.string().min(1),
  })
  .strict();

export type MidpointConcept = z.infer<typeof MidpointConceptSchema>;

export const MidpointCatalogSchema = z
  .object({
    version: Version,
    concepts: z.array(MidpointConceptSchema),
    fallback: z
      .object({
        label: z.string().min(1),
        rationale: z.string().min(1),
        lemmas: z.array(SingleTerm).min(1),
      })
      .strict(),
  })
  .strict();

export type MidpointCatalog = z.infer<typeof MidpointCatalogSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// VOICE MARKERS
// ═══════════════════════════════════════════════════════════════════════════

export const VoiceMarkersSchema = z
  .object({
    version: Version,
    formal: z.array(z.string().min(1)),
    informal: z.array(z.string().min(1)),
    promotional: z.array(z.string().min(1)),
    pronouns: z
      .object({
        first_person: z.array(z.string().min(1)),
        second_person: z.array(z.string().min(1)),
        third_person: z.array(z.string().min(1)),
      })
      .strict(),
  })
  .strict();

export type VoiceMarkers = z.infer<typeof VoiceMarkersSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// TRUST REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export const TrustRegistryEntrySchema = z
  .object({
    /** Registrable domain, lower-case, no "www." */
    domain: z
      .string()
      .regex(/^(?!www\.)[a-z0-9-]+(?:\.[a-z0-9-]+)+$/, "Must be a bare lower-case domain"),
    tier: TrustTier,
    competitor: z.boolean(),
    /** Kind of site: government, news, encyclopedia, bank, casino, ... */
    category: z.string().min(1),
    /** Brand names matched as whole words in article text (competitors) */
    names: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type TrustRegistryEntry = z.infer<typeof TrustRegistryEntrySchema>;

export const TrustRegistrySchema = z
  .object({
    version: Version,
    entries: z.array(TrustRegistryEntrySchema),
  })
  .strict()
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.entries.forEach((entry, index) => {
      if (seen.has(entry.domain)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", index, "domain"],
          message: `Duplicate registry domain: ${entry.domain}`,
        });
      }
      seen.add(entry.domain);
    });
  });

export type TrustRegistry = z.infer<typeof TrustRegistrySchema>;
