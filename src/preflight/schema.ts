/**
 * Order inputs and the preflight matrix.
 *
 * The matrix is the contract between planning and scoring. It holds no
 * timestamps, so equal inputs always serialize to equal matrices.
 */

import { z } from "zod";
import {
  AnchorType,
  ComplianceTag,
  LsiCategory,
  TrustTier,
  VoicePerspective,
  VoiceTone,
} from "../config/qc/enums.js";

// ═══════════════════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════════════════

export const OrderConstraintsSchema = z
  .object({
    targetWordCount: z.number().int().min(300).max(3000).default(800),
    /** Free-form hint for the writer; scoring uses the publisher voice */
    tone: z.string().min(1).optional(),
    complianceTags: z.array(ComplianceTag).default([]),
  })
  .strict();

export const OrderSchema = z
  .object({
    id: z.string().min(1),
    customerId: z.string().min(1),
    publisherDomain: z.string().min(1),
    targetUrl: z.string().url(),
    anchorText: z.string().trim().min(1),
    topic: z.string().min(10).describe("Working title or brief for the article"),
    locale: z.string().min(2).default("en-US"),
    constraints: OrderConstraintsSchema.default({}),
  })
  .strict();

export type Order = z.infer<typeof OrderSchema>;
export type OrderInput = z.input<typeof OrderSchema>;

export const VoiceSchema = z
  .object({
    tone: VoiceTone,
    perspective: VoicePerspective,
  })
  .strict();

export type Voice = z.infer<typeof VoiceSchema>;

export const PublisherProfileSchema = z
  .object({
    domain: z.string().min(1),
    industry: z.string().min(1),
    topics: z.array(z.string()).default([]),
    voice: VoiceSchema,
    locale: z.string().min(2).default("en-US"),
  })
  .strict();

export type PublisherProfile = z.infer<typeof PublisherProfileSchema>;

export const SerpSignalSchema = z
  .object({
    query: z.string().min(1),
    locale: z.string().min(2),
    /** Ranked, most relevant first */
    lsiTerms: z.array(z.string().min(1)),
    intents: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type SerpSignal = z.infer<typeof SerpSignalSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// MATRIX
// ═══════════════════════════════════════════════════════════════════════════

export const LsiTermSchema = z
  .object({
    lemma: z.string().min(1),
    /** Surface form shown to writers */
    term: z.string().min(1),
    category: LsiCategory,
    bridge: z.boolean(),
    source: z.enum(["serp", "lexicon", "both"]),
  })
  .strict();

export type LsiTerm = z.infer<typeof LsiTermSchema>;

export const BridgeConceptSchema = z
  .object({
    label: z.string().min(1),
    rationale: z.string().min(1),
    lemmas: z.array(z.string().min(1)).min(1),
  })
  .strict();

export type BridgeConcept = z.infer<typeof BridgeConceptSchema>;

export const BridgeCandidateSchema = z
  .object({
    label: z.string().min(1),
    score: z.number().min(0).max(1),
    rationale: z.string().min(1),
  })
  .strict();

export type BridgeCandidate = z.infer<typeof BridgeCandidateSchema>;

export const TrustSourceSchema = z
  .object({
    domain: z.string().min(1),
    tier: TrustTier,
    category: z.string().min(1),
  })
  .strict();

export type TrustSource = z.infer<typeof TrustSourceSchema>;

export const PreflightMatrixSchema = z
  .object({
    matrixVersion: z.string().min(1),
    orderId: z.string().min(1),
    publisherDomain: z.string().min(1),
    targetUrl: z.string().url(),
    targetDomain: z.string().min(1),
    locale: z.string().min(2),
    query: z.string().min(1),
    intents: z.array(z.string()),
    industries: z
      .object({
        publisher: z.string().min(1),
        target: z.string().min(1),
      })
      .strict(),
    anchor: z
      .object({
        text: z.string().min(1),
        type: AnchorType,
        risk: z.number().min(0).max(1),
        riskLevel: z.enum(["low", "medium", "high"]),
        allowedTypes: z.array(AnchorType),
        forbiddenTypes: z.array(AnchorType),
        preferredType: AnchorType,
        maxExactShare: z.number().min(0).max(1),
      })
      .strict(),
    bridge: BridgeConceptSchema,
    candidateBridges: z.array(BridgeCandidateSchema).max(3),
    placement: z
      .object({
        zone: z.literal("midpoint"),
        maxParagraphDepth: z.number().int().min(1),
      })
      .strict(),
    lsi: z
      .object({
        terms: z.array(LsiTermSchema).min(6).max(10),
        related: z.array(z.string().min(1)),
        policy: z
          .object({
            min: z.number().int(),
            max: z.number().int(),
            radiusSentences: z.number().int().min(0),
            maxRepeat: z.number().int().min(1),
          })
          .strict(),
      })
      .strict(),
    trust: z
      .object({
        requiredCount: z.number().int().min(0),
        minTier: TrustTier,
        preferredTiers: z.array(TrustTier),
        sources: z.array(TrustSourceSchema),
      })
      .strict(),
    compliance: z
      .object({
        tags: z.array(ComplianceTag),
        regulatedTags: z.array(ComplianceTag),
      })
      .strict(),
    wordCount: z
      .object({
        target: z.number().int().min(1),
        min: z.number().int().min(1),
        max: z.number().int().min(1),
      })
      .strict(),
    voice: VoiceSchema,
    registryVersion: z.string().min(1),
    inputFingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .strict()
  .superRefine((matrix, ctx) => {
    const lemmas = matrix.lsi.terms.map((term) => term.lemma);
    if (new Set(lemmas).size !== lemmas.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lsi", "terms"],
        message: "LSI lemmas must be unique",
      });
    }
    if (matrix.wordCount.min > matrix.wordCount.target || matrix.wordCount.target > matrix.wordCount.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["wordCount"],
        message: "Word range must contain the target",
      });
    }
  });

export type PreflightMatrix = z.infer<typeof PreflightMatrixSchema>;
