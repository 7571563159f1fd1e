/**
 * Article facts shared by every category evaluator.
 *
 * The article is parsed, the anchor located and the outbound links
 * classified once per evaluation.
 */

import type { QcPolicy } from "../config/qc/schema.js";
import type {
  ComplianceRulebook,
  TrustRegistry,
  VoiceMarkers,
} from "../reference/schema.js";
import { bodyText, parseArticle, type ArticleLink, type ParsedArticle } from "../lexical/parser.js";
import { locate, NOT_FOUND, type AnchorPosition } from "../lexical/locate.js";
import type { Lemmatizer } from "../lexical/lemmatizer.js";
import {
  classifyLinks,
  countQualifyingTrustSignals,
  hostOf,
  type ClassifiedLink,
} from "../trust/registry.js";
import type { PreflightMatrix } from "../preflight/schema.js";

/**
 * Everything an evaluation reads besides the article and the matrix. The
 * registry is a snapshot; nothing here is global.
 */
export interface QcContext {
  registry: TrustRegistry;
  rulebook: ComplianceRulebook;
  voiceMarkers: VoiceMarkers;
  lemmatizer: Lemmatizer;
  policy: QcPolicy;
}

export interface ArticleFacts {
  article: ParsedArticle;
  /** Plain body text, headings excluded */
  text: string;
  /** null when the anchor text is nowhere in the article */
  position: AnchorPosition | null;
  /** Links whose URL is the order's target */
  targetLinks: ArticleLink[];
  /** Links whose text is the anchor, wherever they point */
  anchorLinks: ArticleLink[];
  /** Classified outbound links, the target excluded */
  outbound: ClassifiedLink[];
  qualifyingTrustSignals: number;
}

/**
 * Host without "www." plus the path without a trailing slash. Query and
 * fragment are ignored.
 */
export function normalizeUrl(url: string): string {
  const host = hostOf(url);
  if (host === null) {
    return url.trim().toLowerCase();
  }
  const path = new URL(url).pathname.replace(/\/+$/, "");
  return `${host}${path}`;
}

export function analyzeArticle(
  articleText: string,
  matrix: PreflightMatrix,
  context: QcContext
): ArticleFacts {
  const article = parseArticle(articleText);
  const located = locate(article, matrix.anchor.text);
  const target = normalizeUrl(matrix.targetUrl);
  const anchor = matrix.anchor.text.trim().toLowerCase();

  const targetLinks = article.links.filter((link) => normalizeUrl(link.url) === target);
  const anchorLinks = article.links.filter((link) => link.text.toLowerCase() === anchor);
  const outbound = classifyLinks(
    article.links.filter((link) => normalizeUrl(link.url) !== target),
    context.registry
  );

  return {
    article,
    text: bodyText(article),
    position: located === NOT_FOUND ? null : located,
    targetLinks,
    anchorLinks,
    outbound,
    qualifyingTrustSignals: countQualifyingTrustSignals(
      outbound,
      matrix.trust.minTier,
      matrix.targetDomain
    ),
  };
}
