/**
 * Text helpers for GCN circulars
 */

export interface CircularHeader {
  circularId: string;
  subject: string;
  createdOn: string;
  submitter: string;
  email: string;
}

export interface ParsedCircular {
  header: CircularHeader;
  /** Body paragraphs following the header */
  paragraphs: string[];
}

const HEADER =
  /TITLE:\s*(.*?)\s*NUMBER:\s*(.*?)\s*SUBJECT:\s*(.*?)\s*DATE:\s*(.*?)\s*FROM:\s*(.*?)(?:\s*\n|$)/;
const SUBMITTER_WITH_EMAIL = /^\s*(.*?)\s*<([^>]+)>\s*$/;

/**
 * Split text into trimmed, non-empty paragraphs separated by blank lines
 */
export function splitTextIntoParagraphs(rawText: string): string[] {
  return rawText
    .replace(/\n\s*\n/g, '\n\n')
    .split('\n\n')
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);
}

/**
 * Join paragraphs sharing a topic, in their original order
 */
export function groupParagraphsByTopic<T extends string>(
  paragraphs: string[],
  topics: T[]
): Partial<Record<T, string>> {
  if (paragraphs.length !== topics.length) {
    throw new Error(`Paragraph-topic length mismatch: ${paragraphs.length} vs ${topics.length}`);
  }

  const grouped: Partial<Record<T, string>> = {};
  paragraphs.forEach((paragraph, index) => {
    const topic = topics[index];
    const previous = grouped[topic];
    grouped[topic] = previous === undefined ? paragraph : `${previous}\n\n${paragraph}`;
  });
  return grouped;
}

/**
 * Match the TITLE/NUMBER/SUBJECT/DATE/FROM block of a circular
 * @returns null when the header is not there
 */
export function parseCircularHeader(text: string): CircularHeader | null {
  return matchHeader(text)?.header ?? null;
}

export function parseCircular(text: string): ParsedCircular | null {
  const matched = matchHeader(text);
  if (!matched) return null;

  return {
    header: matched.header,
    paragraphs: splitTextIntoParagraphs(text.slice(matched.end)),
  };
}

function matchHeader(text: string): { header: CircularHeader; end: number } | null {
  const match = HEADER.exec(text);
  if (!match) return null;

  const [, , number, subject, date, from] = match;

  let submitter = from;
  let email = '';
  const withEmail = SUBMITTER_WITH_EMAIL.exec(from);
  if (withEmail) {
    submitter = withEmail[1];
    email = withEmail[2].trim();
  }

  return {
    header: {
      circularId: number.trim(),
      subject: subject.trim(),
      createdOn: date.trim(),
      submitter: submitter.trim(),
      email,
    },
    end: match.index + match[0].length,
  };
}
