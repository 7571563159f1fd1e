/**
 * Lexical Analyzer Tests
 *
 * These tests verify:
 *   1. Markdown parses into sections, paragraphs and sentences
 *   2. The anchor is located by its link
 *   3. Sentence windows around the anchor stay in bounds
 *   4. Lemmas are stable for the same surface form
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { parseArticle } from "./parser.js";
import { locate, headingsContaining, window, NOT_FOUND, type AnchorPosition } from "./locate.js";
import { RuleTableLemmatizer, extractLemmas, lemmatizeTerm, phraseLemmas } from "./lemmatizer.js";
import { loadReferenceData } from "../reference/loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const ARTICLE = [
  "# Planning a kitchen renovation",
  "",
  "A renovation starts long before the first tile comes off. Most owners underestimate the work.",
  "",
  "## Setting the scope",
  "",
  "Write down every room you want to change. Keep the list short.",
  "",
  "## Paying for the work",
  "",
  "A clear budget keeps the project honest. Many owners keep their reserve in [savings accounts](https://www.northbank.com/savings-accounts) while work is underway. Compare the interest rate before you commit.",
  "",
  "## Finishing touches",
  "",
  "Plan the final week carefully.",
].join("\n");

const lemmatizer = new RuleTableLemmatizer(loadReferenceData().lemmaRules);

function mustLocate(text: string, anchor: string): AnchorPosition {
  const position = locate(parseArticle(text), anchor);
  assert.notEqual(position, NOT_FOUND);
  if (position === NOT_FOUND) {
    throw new Error("unreachable");
  }
  return position;
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

test("parses title, lead and sections", () => {
  const article = parseArticle(ARTICLE);

  assert.equal(article.title, "Planning a kitchen renovation");
  assert.equal(article.lead.length, 1);
  assert.deepEqual(
    article.sections.map((section) => section.heading),
    ["Setting the scope", "Paying for the work", "Finishing touches"]
  );
  assert.equal(article.sections[1]?.level, 2);
});

test("paragraphs and headings keep their source lines", () => {
  const article = parseArticle(ARTICLE);

  assert.equal(article.lead[0]?.line, 2);
  assert.deepEqual(
    article.sections.map((section) => [section.line, section.paragraphs[0]?.line]),
    [
      [4, 6],
      [8, 10],
      [12, 14],
    ]
  );
});

test("splits sentences into one document-wide stream", () => {
  const article = parseArticle(ARTICLE);

  assert.equal(article.sentences.length, 8);
  assert.equal(article.sentences[0]?.sectionIndex, null);
  assert.equal(
    article.sentences[5]?.text,
    "Many owners keep their reserve in savings accounts while work is underway."
  );
  assert.equal(article.sentences[5]?.sectionIndex, 1);
  assert.deepEqual(
    article.sentences.map((sentence) => sentence.index),
    [0, 1, 2, 3, 4, 5, 6, 7]
  );
});

test("word count covers paragraphs only", () => {
  assert.equal(parseArticle(ARTICLE).wordCount, 58);
});

test("links keep their text, url and location", () => {
  const article = parseArticle(ARTICLE);

  assert.deepEqual(article.links, [
    {
      text: "savings accounts",
      url: "https://www.northbank.com/savings-accounts",
      sectionIndex: 1,
      paragraphIndex: 0,
    },
  ]);
  assert.equal(
    article.sections[1]?.paragraphs[0]?.text.includes("](https"),
    false
  );
});

test("second level-one heading starts a section", () => {
  const article = parseArticle("# Title\n\n# Another\n\nBody text.");
  assert.equal(article.title, "Title");
  assert.equal(article.sections.length, 1);
  assert.equal(article.sections[0]?.level, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// LOCATING
// ═══════════════════════════════════════════════════════════════════════════

test("link text is preferred and matched case-insensitively", () => {
  const position = mustLocate(ARTICLE, "Savings Accounts");

  assert.deepEqual(position, {
    sectionIndex: 1,
    paragraphIndex: 0,
    sentenceIndex: 5,
    inHeading: false,
    linked: true,
    linkUrl: "https://www.northbank.com/savings-accounts",
  });
});

test("plain body occurrence in the lead", () => {
  const position = mustLocate(ARTICLE, "renovation");

  assert.equal(position.sectionIndex, null);
  assert.equal(position.sentenceIndex, 0);
  assert.equal(position.linked, false);
});

test("heading-only occurrence is reported as in heading", () => {
  const position = mustLocate(ARTICLE, "Finishing");

  assert.equal(position.inHeading, true);
  assert.equal(position.sectionIndex, 2);
  assert.equal(position.sentenceIndex, null);
});

test("missing anchor is NOT_FOUND", () => {
  assert.equal(locate(parseArticle(ARTICLE), "wallpaper"), NOT_FOUND);
  assert.equal(locate(parseArticle(ARTICLE), "   "), NOT_FOUND);
});

test("headingsContaining lists every matching heading", () => {
  const sections = headingsContaining(parseArticle(ARTICLE), "the");
  assert.deepEqual(
    sections.map((section) => section.index),
    [0, 1]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// WINDOWS
// ═══════════════════════════════════════════════════════════════════════════

test("window spans radius sentences on both sides", () => {
  const article = parseArticle(ARTICLE);
  const sentences = window(article, mustLocate(ARTICLE, "savings accounts"));

  assert.deepEqual(
    sentences.map((sentence) => sentence.index),
    [3, 4, 5, 6, 7]
  );
});

test("window clips at document start and end", () => {
  const article = parseArticle(ARTICLE);
  const start = window(article, mustLocate(ARTICLE, "renovation"), 2);
  const end = window(article, mustLocate(ARTICLE, "final week"), 2);

  assert.deepEqual(start.map((sentence) => sentence.index), [0, 1, 2]);
  assert.deepEqual(end.map((sentence) => sentence.index), [5, 6, 7]);
});

test("window of a heading position is empty", () => {
  const article = parseArticle(ARTICLE);
  assert.deepEqual(window(article, mustLocate(ARTICLE, "Finishing")), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// LEMMAS
// ═══════════════════════════════════════════════════════════════════════════

test("stopwords have no lemma", () => {
  assert.equal(lemmatizer.lemmatize("The", { sentenceInitial: true }), null);
});

test("exception table wins over stemming", () => {
  assert.equal(lemmatizer.lemmatize("children", { sentenceInitial: false }), "child");
  assert.equal(lemmatizer.lemmatize("Children", { sentenceInitial: true }), "child");
});

test("protected words are kept verbatim", () => {
  assert.equal(lemmatizer.lemmatize("news", { sentenceInitial: false }), "news");
  assert.equal(lemmatizer.lemmatize("savings", { sentenceInitial: false }), "savings");
});

test("proper nouns and acronyms keep their case", () => {
  assert.equal(lemmatizer.lemmatize("Stockholm", { sentenceInitial: false }), "Stockholm");
  assert.equal(lemmatizer.lemmatize("SERP", { sentenceInitial: true }), "SERP");
});

test("inflected forms share a lemma", () => {
  const lemma = (word: string) => lemmatizer.lemmatize(word, { sentenceInitial: false });

  assert.equal(lemma("records"), lemma("record"));
  assert.equal(lemma("archives"), lemma("archive"));
  assert.equal(lemma("connected"), "connect");
  assert.equal(lemmatizer.lemmatize("Budgets", { sentenceInitial: true }), lemma("budget"));
});

test("terms are never treated as proper nouns", () => {
  assert.equal(lemmatizeTerm("Budget", lemmatizer), lemmatizeTerm("budget", lemmatizer));
  assert.deepEqual(
    phraseLemmas("the interest rate", lemmatizer),
    [lemmatizeTerm("interest", lemmatizer), lemmatizeTerm("rate", lemmatizer)]
  );
});

test("extractLemmas counts each lemma across the window", () => {
  const article = parseArticle("Budget planning matters. The budget keeps planning honest.");
  const counts = extractLemmas(article.sentences, lemmatizer);

  assert.equal(counts.size, 5);
  assert.equal(counts.get(lemmatizeTerm("budget", lemmatizer) ?? ""), 2);
  assert.equal(counts.get(lemmatizeTerm("planning", lemmatizer) ?? ""), 2);
  assert.equal(counts.has("the"), false);
});
