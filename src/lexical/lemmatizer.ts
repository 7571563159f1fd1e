/**
 * Lemmatization for LSI matching.
 *
 * The scoring engine only needs one guarantee: the same surface form always
 * maps to the same lemma. The default strategy is table-driven with Porter
 * stemming (from `natural`) as the last step.
 */

import natural from "natural";

import type { LemmaRules } from "../reference/schema.js";
import { tokenizeWords, type Sentence } from "./parser.js";

export interface LemmaContext {
  /** The token opens its sentence, so capitalization says nothing */
  sentenceInitial: boolean;
}

export interface Lemmatizer {
  /** Lemma for a token, or null when the token is a stopword. */
  lemmatize(token: string, context: LemmaContext): string | null;
}

const ACRONYM = /^(?=.*\p{L})[\p{Lu}\p{N}]{2,}$/u;
const CAPITALIZED = /^\p{Lu}/u;

export class RuleTableLemmatizer implements Lemmatizer {
  private readonly exceptions: ReadonlyMap<string, string>;
  private readonly protectedWords: ReadonlySet<string>;
  private readonly stopwords: ReadonlySet<string>;

  constructor(rules: LemmaRules) {
    this.exceptions = new Map(Object.entries(rules.exceptions));
    this.protectedWords = new Set(rules.protected.map((word) => word.toLowerCase()));
    this.stopwords = new Set(rules.stopwords.map((word) => word.toLowerCase()));
  }

  lemmatize(token: string, context: LemmaContext): string | null {
    const lower = token.toLowerCase();

    if (this.stopwords.has(lower)) {
      return null;
    }

    const exception = this.exceptions.get(lower);
    if (exception !== undefined) {
      return exception;
    }

    if (this.protectedWords.has(lower)) {
      return lower;
    }

    // Proper nouns and acronyms keep their case
    if (ACRONYM.test(token)) {
      return token;
    }
    if (!context.sentenceInitial && CAPITALIZED.test(token)) {
      return token;
    }

    return natural.PorterStemmer.stem(lower);
  }
}

/**
 * Lemma of a dictionary term (lexicon entry, SERP phrase token). Terms are
 * matched as if they opened a sentence, so case never makes them proper nouns.
 */
export function lemmatizeTerm(term: string, lemmatizer: Lemmatizer): string | null {
  return lemmatizer.lemmatize(term.toLowerCase(), { sentenceInitial: true });
}

/** Lemmas of each content word in a phrase, stopwords dropped. */
export function phraseLemmas(phrase: string, lemmatizer: Lemmatizer): string[] {
  const lemmas: string[] = [];
  for (const token of tokenizeWords(phrase)) {
    const lemma = lemmatizeTerm(token, lemmatizer);
    if (lemma !== null) {
      lemmas.push(lemma);
    }
  }
  return lemmas;
}

/**
 * Lemma multiset of a sentence window.
 */
export function extractLemmas(
  sentences: readonly Sentence[],
  lemmatizer: Lemmatizer
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const sentence of sentences) {
    tokenizeWords(sentence.text).forEach((token, position) => {
      const lemma = lemmatizer.lemmatize(token, { sentenceInitial: position === 0 });
      if (lemma !== null) {
        counts.set(lemma, (counts.get(lemma) ?? 0) + 1);
      }
    });
  }
  return counts;
}
