/**
 * Search query and intent derivation from an order topic.
 */

import { tokenizeWords } from "../lexical/parser.js";

const MIN_QUERY_WORDS = 2;
const MAX_QUERY_WORDS = 4;
const FALLBACK_QUERY_WORDS = 3;

const INFORMATIONAL_MARKERS = ["guide", "tips", "how", "what", "why", "avoid", "explained"];
const COMMERCIAL_MARKERS = ["casino", "betting", "buy", "shop", "pricing", "offer", "apply"];

/**
 * First two to four content words of the topic. Falls back to the first
 * three words when fewer than two content words remain.
 */
export function extractQuery(topic: string, stopwords: ReadonlySet<string>): string {
  const words = tokenizeWords(topic.toLowerCase());
  const content = words.filter((word) => word.length > 2 && !stopwords.has(word));

  if (content.length >= MIN_QUERY_WORDS) {
    return content.slice(0, MAX_QUERY_WORDS).join(" ");
  }
  return words.slice(0, FALLBACK_QUERY_WORDS).join(" ");
}

/**
 * Intents when the SERP signal carries none.
 */
export function detectIntents(topic: string, targetUrl: string): string[] {
  const topicLower = topic.toLowerCase();
  const urlLower = targetUrl.toLowerCase();
  const intents: string[] = [];

  if (INFORMATIONAL_MARKERS.some((marker) => tokenizeWords(topicLower).includes(marker))) {
    intents.push("informational");
  }
  if (COMMERCIAL_MARKERS.some((marker) => urlLower.includes(marker))) {
    intents.push("commercial");
  }
  if (intents.length === 0) {
    intents.push("informational");
  }
  return intents;
}
