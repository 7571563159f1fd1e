/**
 * Anchor location and sentence windows.
 */

import type { ParsedArticle, Section, Sentence } from "./parser.js";

export const NOT_FOUND = "NOT_FOUND" as const;
export type NotFound = typeof NOT_FOUND;

export interface AnchorPosition {
  /** null when the anchor sits in the lead */
  sectionIndex: number | null;
  /** null when the anchor was only found in a heading */
  paragraphIndex: number | null;
  sentenceIndex: number | null;
  inHeading: boolean;
  /** True when the occurrence is the text of a link */
  linked: boolean;
  linkUrl: string | null;
}

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

function firstSentenceWith(
  sentences: Sentence[],
  anchor: string
): Sentence | undefined {
  return sentences.find((sentence) => contains(sentence.text, anchor));
}

/**
 * Find the anchor text, case-insensitive.
 *
 * Body link text wins over plain body text, which wins over a heading.
 */
export function locate(article: ParsedArticle, anchor: string): AnchorPosition | NotFound {
  const needle = anchor.trim();
  if (needle.length === 0) {
    return NOT_FOUND;
  }

  const link = article.links.find(
    (candidate) => candidate.text.toLowerCase() === needle.toLowerCase()
  );
  if (link) {
    const paragraphSentences = article.sentences.filter(
      (sentence) =>
        sentence.sectionIndex === link.sectionIndex &&
        sentence.paragraphIndex === link.paragraphIndex
    );
    const sentence =
      firstSentenceWith(paragraphSentences, needle) ?? paragraphSentences[0];
    return {
      sectionIndex: link.sectionIndex,
      paragraphIndex: link.paragraphIndex,
      sentenceIndex: sentence ? sentence.index : null,
      inHeading: false,
      linked: true,
      linkUrl: link.url,
    };
  }

  const sentence = firstSentenceWith(article.sentences, needle);
  if (sentence) {
    return {
      sectionIndex: sentence.sectionIndex,
      paragraphIndex: sentence.paragraphIndex,
      sentenceIndex: sentence.index,
      inHeading: false,
      linked: false,
      linkUrl: null,
    };
  }

  const [section] = headingsContaining(article, needle);
  if (section) {
    return {
      sectionIndex: section.index,
      paragraphIndex: null,
      sentenceIndex: null,
      inHeading: true,
      linked: false,
      linkUrl: null,
    };
  }

  return NOT_FOUND;
}

/** Every section whose heading holds the anchor. The title is not a section. */
export function headingsContaining(article: ParsedArticle, anchor: string): Section[] {
  const needle = anchor.trim();
  if (needle.length === 0) {
    return [];
  }
  return article.sections.filter((section) => contains(section.heading, needle));
}

/**
 * Sentences within `radius` of the anchor sentence, clipped at the ends of
 * the document. Empty when the position has no sentence.
 */
export function window(
  article: ParsedArticle,
  position: AnchorPosition,
  radius = 2
): Sentence[] {
  if (position.sentenceIndex === null) {
    return [];
  }
  const start = Math.max(0, position.sentenceIndex - radius);
  const end = Math.min(article.sentences.length - 1, position.sentenceIndex + radius);
  return article.sentences.slice(start, end + 1);
}
