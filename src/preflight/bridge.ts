/**
 * Midpoint bridge selection: the concept that lets an article move from the
 * publisher's subject to the target's without a jump.
 */

import type { MidpointCatalog } from "../reference/schema.js";
import { lemmatizeTerm, type Lemmatizer } from "../lexical/lemmatizer.js";
import type { BridgeCandidate, BridgeConcept } from "./schema.js";
import type { Industries } from "./lsi.js";

const BOTH_INDUSTRIES_BOOST = 1.2;
const MAX_CANDIDATES = 3;
const FALLBACK_SCORE = 0.5;

export interface BridgeChoice {
  bridge: BridgeConcept;
  candidates: BridgeCandidate[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function conceptLemmas(words: readonly string[], lemmatizer: Lemmatizer): string[] {
  const lemmas: string[] = [];
  for (const word of words) {
    const lemma = lemmatizeTerm(word, lemmatizer);
    if (lemma !== null && !lemmas.includes(lemma)) {
      lemmas.push(lemma);
    }
  }
  return lemmas;
}

export function chooseBridge(
  catalog: MidpointCatalog,
  industries: Industries,
  lemmatizer: Lemmatizer
): BridgeChoice {
  const scored: Array<{ candidate: BridgeCandidate; lemmas: string[] }> = [];

  for (const concept of catalog.concepts) {
    const publisherMatch = concept.industries.includes(industries.publisher);
    const targetMatch = concept.industries.includes(industries.target);
    if (!publisherMatch && !targetMatch) {
      continue;
    }
    const score =
      publisherMatch && targetMatch
        ? Math.min(1, concept.score * BOTH_INDUSTRIES_BOOST)
        : concept.score;
    scored.push({
      candidate: { label: concept.label, score: round2(score), rationale: concept.rationale },
      lemmas: conceptLemmas(concept.lemmas, lemmatizer),
    });
  }

  scored.sort(
    (a, b) =>
      b.candidate.score - a.candidate.score ||
      (a.candidate.label < b.candidate.label ? -1 : a.candidate.label > b.candidate.label ? 1 : 0)
  );

  const best = scored[0];
  if (!best) {
    const { fallback } = catalog;
    return {
      bridge: {
        label: fallback.label,
        rationale: fallback.rationale,
        lemmas: conceptLemmas(fallback.lemmas, lemmatizer),
      },
      candidates: [
        { label: fallback.label, score: FALLBACK_SCORE, rationale: fallback.rationale },
      ],
    };
  }

  return {
    bridge: {
      label: best.candidate.label,
      rationale: best.candidate.rationale,
      lemmas: best.lemmas,
    },
    candidates: scored.slice(0, MAX_CANDIDATES).map((entry) => entry.candidate),
  };
}
