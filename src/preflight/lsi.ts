/**
 * LSI term selection.
 *
 * Candidates come from the SERP terms and from the static lexicon of the
 * publisher industry, the target industry and "general". Selection walks the
 * five balanced categories round-robin so no single category crowds out the
 * others, then fills from whatever remains.
 */

import {
  BALANCED_LSI_CATEGORIES,
  type LsiCategory,
} from "../config/qc/enums.js";
import type { LsiPolicy } from "../config/qc/schema.js";
import type { LsiLexicon } from "../reference/schema.js";
import { tokenizeWords } from "../lexical/parser.js";
import { lemmatizeTerm, type Lemmatizer } from "../lexical/lemmatizer.js";
import { PreflightError } from "../types/errors.js";
import type { LsiTerm } from "./schema.js";

export interface Industries {
  publisher: string;
  target: string;
}

export interface LsiCandidate {
  lemma: string;
  term: string;
  category: LsiCategory;
  inSerp: boolean;
  /** Rank of the first SERP term that produced the lemma */
  serpRank: number;
  inLexicon: boolean;
  industries: Set<string>;
}

export interface LsiSelection {
  terms: LsiTerm[];
  related: string[];
}

export function lexiconIndustries(industries: Industries): string[] {
  return [...new Set([industries.publisher, industries.target, "general"])];
}

export function collectLsiCandidates(
  serpTerms: readonly string[],
  industries: Industries,
  lexicon: LsiLexicon,
  lemmatizer: Lemmatizer
): LsiCandidate[] {
  const byLemma = new Map<string, LsiCandidate>();

  serpTerms.forEach((phrase, rank) => {
    for (const token of tokenizeWords(phrase.toLowerCase())) {
      const lemma = lemmatizeTerm(token, lemmatizer);
      if (lemma === null) {
        continue;
      }
      const existing = byLemma.get(lemma);
      if (existing) {
        existing.serpRank = Math.min(existing.serpRank, rank);
        continue;
      }
      byLemma.set(lemma, {
        lemma,
        term: token,
        category: "general",
        inSerp: true,
        serpRank: rank,
        inLexicon: false,
        industries: new Set(),
      });
    }
  });

  for (const industry of lexiconIndustries(industries)) {
    const entry = lexicon.industries[industry];
    if (!entry) {
      continue;
    }
    for (const { term, category } of entry.terms) {
      const lemma = lemmatizeTerm(term, lemmatizer);
      if (lemma === null) {
        continue;
      }
      const existing = byLemma.get(lemma);
      if (existing) {
        if (!existing.inLexicon) {
          existing.category = category;
        }
        existing.inLexicon = true;
        existing.industries.add(industry);
        continue;
      }
      byLemma.set(lemma, {
        lemma,
        term,
        category,
        inSerp: false,
        serpRank: Number.POSITIVE_INFINITY,
        inLexicon: true,
        industries: new Set([industry]),
      });
    }
  }

  return [...byLemma.values()];
}

/** A term both industries' lexicons share. */
export function isBridgeCandidate(candidate: LsiCandidate, industries: Industries): boolean {
  return (
    industries.publisher !== industries.target &&
    candidate.industries.has(industries.publisher) &&
    candidate.industries.has(industries.target)
  );
}

/**
 * Priority: bridge terms, then terms in both SERP and lexicon, then SERP
 * rank, then lemma.
 */
export function rankCandidates(
  candidates: readonly LsiCandidate[],
  industries: Industries
): LsiCandidate[] {
  const key = (candidate: LsiCandidate): [number, number, number] => [
    isBridgeCandidate(candidate, industries) ? 0 : 1,
    candidate.inSerp && candidate.inLexicon ? 0 : 1,
    candidate.serpRank,
  ];

  return [...candidates].sort((a, b) => {
    const [a0, a1, a2] = key(a);
    const [b0, b1, b2] = key(b);
    if (a0 !== b0) return a0 - b0;
    if (a1 !== b1) return a1 - b1;
    if (a2 !== b2) return a2 < b2 ? -1 : 1;
    return a.lemma < b.lemma ? -1 : a.lemma > b.lemma ? 1 : 0;
  });
}

function toTerm(candidate: LsiCandidate, industries: Industries): LsiTerm {
  return {
    lemma: candidate.lemma,
    term: candidate.term,
    category: candidate.category,
    bridge: isBridgeCandidate(candidate, industries),
    source: candidate.inSerp && candidate.inLexicon ? "both" : candidate.inSerp ? "serp" : "lexicon",
  };
}

/**
 * @throws PreflightError INSUFFICIENT_LSI_CANDIDATES when fewer than
 *   `policy.min` candidates exist
 */
export function selectLsiTerms(
  candidates: readonly LsiCandidate[],
  industries: Industries,
  policy: LsiPolicy
): LsiSelection {
  if (candidates.length < policy.min) {
    throw new PreflightError(
      "INSUFFICIENT_LSI_CANDIDATES",
      `Only ${candidates.length} LSI candidates, at least ${policy.min} required`,
      { candidates: candidates.length, required: policy.min }
    );
  }

  const ranked = rankCandidates(candidates, industries);
  const selected: LsiCandidate[] = [];
  const queues = BALANCED_LSI_CATEGORIES.map((category) =>
    ranked.filter((candidate) => candidate.category === category)
  );

  let progressed = true;
  while (selected.length < policy.targetCount && progressed) {
    progressed = false;
    for (const queue of queues) {
      if (selected.length >= policy.targetCount) {
        break;
      }
      const next = queue.shift();
      if (next) {
        selected.push(next);
        progressed = true;
      }
    }
  }

  const remaining = ranked.filter((candidate) => !selected.includes(candidate));
  const fill = [
    ...remaining.filter((candidate) => candidate.category !== "general"),
    ...remaining.filter((candidate) => candidate.category === "general"),
  ];
  for (const candidate of fill) {
    if (selected.length >= policy.targetCount) {
      break;
    }
    selected.push(candidate);
  }

  const related = ranked
    .filter((candidate) => !selected.includes(candidate))
    .slice(0, policy.relatedCap)
    .map((candidate) => candidate.lemma);

  return {
    terms: selected.map((candidate) => toTerm(candidate, industries)),
    related,
  };
}
