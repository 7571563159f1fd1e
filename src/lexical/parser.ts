/**
 * Markdown article parser.
 *
 * Recognizes only what drafted articles use: a `# ` title, `##`-level
 * section headings, non-blank lines as paragraphs and `[text](url)` links.
 * Everything before the first section heading is the lead.
 */

export interface ArticleLink {
  text: string;
  url: string;
  /** null for the lead */
  sectionIndex: number | null;
  paragraphIndex: number;
}

export interface Sentence {
  /** Position in the document-wide sentence stream */
  index: number;
  text: string;
  sectionIndex: number | null;
  paragraphIndex: number;
}

export interface Paragraph {
  /** 0-based position within its section (or the lead) */
  index: number;
  /** 0-based line in the source text */
  line: number;
  raw: string;
  /** Raw text with links reduced to their text */
  text: string;
  links: ArticleLink[];
  sentences: Sentence[];
}

export interface Section {
  index: number;
  heading: string;
  /** Number of leading # characters */
  level: number;
  /** 0-based line of the heading in the source text */
  line: number;
  paragraphs: Paragraph[];
}

export interface ParsedArticle {
  raw: string;
  title: string | null;
  lead: Paragraph[];
  sections: Section[];
  /** All body sentences in document order */
  sentences: Sentence[];
  /** All body links in document order */
  links: ArticleLink[];
  wordCount: number;
}

interface SourceLine {
  text: string;
  line: number;
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const LINK_PATTERN = /\[([^\]]+)\]\(([^)\s]+)\)/g;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

export function tokenizeWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

export function stripLinks(text: string): string {
  return text.replace(LINK_PATTERN, (_match, linkText: string) => linkText);
}

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function extractLinks(
  raw: string,
  sectionIndex: number | null,
  paragraphIndex: number
): ArticleLink[] {
  const links: ArticleLink[] = [];
  for (const match of raw.matchAll(LINK_PATTERN)) {
    const [, text, url] = match;
    if (text !== undefined && url !== undefined) {
      links.push({ text: text.trim(), url, sectionIndex, paragraphIndex });
    }
  }
  return links;
}

export function parseArticle(text: string): ParsedArticle {
  const lines = text.split(/\r?\n/);

  let title: string | null = null;
  const leadLines: SourceLine[] = [];
  const sectionDrafts: Array<{ heading: string; level: number; line: number; lines: SourceLine[] }> = [];

  lines.forEach((rawLine, lineNumber) => {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }

    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      const hashes = heading[1] ?? "#";
      const headingText = (heading[2] ?? "").trim();
      if (hashes.length === 1 && title === null && sectionDrafts.length === 0) {
        title = headingText;
      } else {
        sectionDrafts.push({
          heading: headingText,
          level: hashes.length,
          line: lineNumber,
          lines: [],
        });
      }
      return;
    }

    const current = sectionDrafts[sectionDrafts.length - 1];
    if (current) {
      current.lines.push({ text: line, line: lineNumber });
    } else {
      leadLines.push({ text: line, line: lineNumber });
    }
  });

  const sentences: Sentence[] = [];
  const links: ArticleLink[] = [];
  let wordCount = 0;

  const buildParagraphs = (
    paragraphLines: SourceLine[],
    sectionIndex: number | null
  ): Paragraph[] =>
    paragraphLines.map(({ text: raw, line }, paragraphIndex) => {
      const plain = stripLinks(raw);
      const paragraphLinks = extractLinks(raw, sectionIndex, paragraphIndex);
      const paragraphSentences: Sentence[] = [];
      for (const sentenceText of splitSentences(plain)) {
        const sentence = {
          index: sentences.length,
          text: sentenceText,
          sectionIndex,
          paragraphIndex,
        };
        sentences.push(sentence);
        paragraphSentences.push(sentence);
      }
      links.push(...paragraphLinks);
      wordCount += tokenizeWords(plain).length;
      return {
        index: paragraphIndex,
        line,
        raw,
        text: plain,
        links: paragraphLinks,
        sentences: paragraphSentences,
      };
    });

  const lead = buildParagraphs(leadLines, null);
  const sections: Section[] = sectionDrafts.map((draft, index) => ({
    index,
    heading: draft.heading,
    level: draft.level,
    line: draft.line,
    paragraphs: buildParagraphs(draft.lines, index),
  }));

  return { raw: text, title, lead, sections, sentences, links, wordCount };
}

/** Paragraphs of the lead followed by every section, in document order. */
export function allParagraphs(article: ParsedArticle): Paragraph[] {
  return [...article.lead, ...article.sections.flatMap((section) => section.paragraphs)];
}

/** Plain body text (lead and sections, no headings or URLs). */
export function bodyText(article: ParsedArticle): string {
  return allParagraphs(article)
    .map((paragraph) => paragraph.text)
    .join("\n");
}

/** Title, every heading and the body, links reduced to their text. */
export function documentText(article: ParsedArticle): string {
  const headings = article.sections.map((section) => stripLinks(section.heading));
  const title = article.title === null ? [] : [stripLinks(article.title)];
  return [...title, ...headings, bodyText(article)].join("\n");
}
