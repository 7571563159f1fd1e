/**
 * Anchor text classification.
 */

import type { AnchorType } from "../config/qc/enums.js";
import { hostOf } from "../trust/registry.js";

/** Anchors that say nothing about the target. */
export const GENERIC_ANCHORS: ReadonlySet<string> = new Set([
  "click here",
  "here",
  "read more",
  "learn more",
  "more info",
  "this site",
  "this page",
  "this article",
  "this guide",
  "website",
  "the website",
  "visit",
  "source",
  "link",
]);

const FILLER = new Set(["a", "an", "the", "of", "for", "to", "in", "on", "and", "with", "at", "by"]);

const SKIPPED_LABELS = new Set(["www", "co", "com", "org", "net"]);

const SLUG_NOISE = new Set(["html", "htm", "php", "aspx", "index"]);

function splitTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Brand tokens of a target: the labels of its host before the public
 * suffix, split on hyphens ("luckyspin-casino.com" -> luckyspin, casino).
 */
export function brandTokens(targetUrl: string): string[] {
  const host = hostOf(targetUrl) ?? "";
  const labels = host.split(".").slice(0, -1).filter((label) => !SKIPPED_LABELS.has(label));
  return labels.flatMap((label) => label.split("-")).filter((token) => token.length > 0);
}

/**
 * Keyword tokens for exact-match detection: URL path words plus the query.
 */
export function targetKeywords(targetUrl: string, query: string): string[] {
  let path = "";
  try {
    path = new URL(targetUrl).pathname;
  } catch {
    path = "";
  }
  const tokens = [...splitTokens(path), ...splitTokens(query)].filter(
    (token) => token.length > 1 && !SLUG_NOISE.has(token) && !FILLER.has(token)
  );
  return [...new Set(tokens)];
}

export function classifyAnchor(
  anchor: string,
  targetUrl: string,
  keywords: readonly string[]
): AnchorType {
  const normalized = anchor.trim().toLowerCase().replace(/\s+/g, " ");
  if (GENERIC_ANCHORS.has(normalized)) {
    return "generic";
  }

  const brand = brandTokens(targetUrl);
  const brandJoined = brand.join("");
  const host = hostOf(targetUrl);
  const despaced = normalized.replace(/[^\p{L}\p{N}]/gu, "");
  const tokens = splitTokens(normalized);

  if (
    normalized === host ||
    (brandJoined.length > 0 && despaced === brandJoined) ||
    brand.includes(despaced)
  ) {
    return "brand";
  }

  if (
    tokens.some((token) => brand.includes(token)) ||
    (brandJoined.length > 0 && despaced.includes(brandJoined))
  ) {
    return "partial";
  }

  const content = tokens.filter((token) => !FILLER.has(token));
  const keywordSet = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  if (content.length > 0 && content.every((token) => keywordSet.has(token))) {
    return "exact";
  }
  if (content.some((token) => keywordSet.has(token))) {
    return "partial";
  }
  return "generic";
}
