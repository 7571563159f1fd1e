/**
 * Lexical window analysis: article parsing, anchor location, sentence
 * windows and lemma extraction.
 */

export {
  parseArticle,
  tokenizeWords,
  stripLinks,
  splitSentences,
  allParagraphs,
  bodyText,
  documentText,
  type ParsedArticle,
  type Section,
  type Paragraph,
  type Sentence,
  type ArticleLink,
} from "./parser.js";
export {
  locate,
  headingsContaining,
  window,
  NOT_FOUND,
  type NotFound,
  type AnchorPosition,
} from "./locate.js";
export {
  RuleTableLemmatizer,
  lemmatizeTerm,
  phraseLemmas,
  extractLemmas,
  type Lemmatizer,
  type LemmaContext,
} from "./lemmatizer.js";
