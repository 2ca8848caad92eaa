/**
 * Rule-based reading of circular bodies: paragraph topics, the author list
 * and the report's primary intent.
 *
 * Intent is scored by key phrases (report-intents.json). A phrase found in
 * the subject counts twice, one found in the scientific paragraphs once;
 * on a tie the intent listed first wins, so a circular that reads as a test
 * is never taken for a detection.
 */
import intentTable from './report-intents.json';
import { isReportIntent } from '../types/candidate';
import type { CircularAuthor, ReportIntent } from '../types/candidate';

export type ParagraphTopic =
  | 'AuthorList'
  | 'ScientificContent'
  | 'ExternalLinks'
  | 'ContactInformation'
  | 'Acknowledgements'
  | 'CitationInstructions'
  | 'Correction';

interface IntentRule {
  intent: ReportIntent;
  patterns: RegExp[];
}

const INTENT_RULES: IntentRule[] = intentTable.intents.map(({ label, phrases }) => {
  if (!isReportIntent(label)) {
    throw new Error(`Unknown report intent in report-intents.json: ${label}`);
  }
  return { intent: label, patterns: phrases.map(phrasePattern) };
});

// "A. Smith, B. Jones (Inst) report on behalf of the Swift team:"
const AUTHOR_LIST_TAIL = /\s*(?:\breports?\b[^:]*|\bon behalf of\b[^:]*):\s*$/i;
const AFFILIATION_GROUP = /([^()]*)\(([^)]*)\)/;
const NAME_SEPARATOR = /,|\band\b/;

const CORRECTION = /^\[GCN OP NOTE\]|this circular was adjusted/i;
const CITATION = /\b(?:can|may) be cited\b|\bcitable\b/i;
const ACKNOWLEDGEMENT = /^(?:we (?:thank|acknowledge|are grateful)|acknowledg)/i;
const CONTACT = /[\w.+-]+@[\w-]+\.[\w.-]+|^contact\b/i;
const LINK = /https?:\/\/\S+/gi;

/**
 * Topic of each body paragraph, in order
 */
export function labelParagraphs(paragraphs: string[]): ParagraphTopic[] {
  return paragraphs.map((paragraph, index) => labelParagraph(paragraph, index));
}

function labelParagraph(paragraph: string, index: number): ParagraphTopic {
  if (index === 0 && AUTHOR_LIST_TAIL.test(paragraph)) return 'AuthorList';
  if (CORRECTION.test(paragraph)) return 'Correction';
  if (CITATION.test(paragraph)) return 'CitationInstructions';
  if (ACKNOWLEDGEMENT.test(paragraph)) return 'Acknowledgements';
  if (CONTACT.test(paragraph)) return 'ContactInformation';

  // Mostly links
  const withoutLinks = paragraph.replace(LINK, '').trim();
  if (withoutLinks.length < paragraph.length && withoutLinks.length <= 120) return 'ExternalLinks';

  return 'ScientificContent';
}

/**
 * Authors and their affiliations. Every name before a parenthesised
 * institution belongs to it; names after the last one have none.
 */
export function parseAuthorList(paragraph: string): CircularAuthor[] {
  const text = paragraph.replace(AUTHOR_LIST_TAIL, '').replace(/\s+/g, ' ');
  const authors: CircularAuthor[] = [];

  const groups = new RegExp(AFFILIATION_GROUP.source, 'g');
  let consumed = 0;
  let match: RegExpExecArray | null;
  while ((match = groups.exec(text)) !== null) {
    const affiliation = match[2].trim();
    for (const name of splitNames(match[1])) {
      authors.push(affiliation ? { name, affiliation } : { name });
    }
    consumed = match.index + match[0].length;
  }

  for (const name of splitNames(text.slice(consumed))) {
    authors.push({ name });
  }
  return authors;
}

/**
 * Highest-scoring intent, or undefined when no key phrase appears at all
 */
export function classifyReportIntent(subject: string, body: string): ReportIntent | undefined {
  let best: { intent: ReportIntent; score: number } | undefined;

  for (const { intent, patterns } of INTENT_RULES) {
    const score = patterns.reduce(
      (sum, pattern) => sum + (pattern.test(subject) ? 2 : 0) + (pattern.test(body) ? 1 : 0),
      0
    );
    if (score > 0 && (!best || score > best.score)) {
      best = { intent, score };
    }
  }

  return best?.intent;
}

function splitNames(text: string): string[] {
  return text
    .split(NAME_SEPARATOR)
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

function phrasePattern(phrase: string): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`, 'i');
}
