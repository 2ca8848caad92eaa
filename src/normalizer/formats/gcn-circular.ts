/**
 * GCN circulars: free text with a fixed header block. The position is read
 * from an `RA, Dec = …` statement in the body, the event from the designation
 * in the subject. Circulars whose intent reads as NON_EVENT_REPORT (tests,
 * simulations, administrative notes) are rejected.
 */
import { priorFor } from '../../config/resolution';
import type { ResolutionConfig } from '../../config/resolution';
import type { EventCandidate } from '../../types/candidate';
import { toDegrees } from '../../utils/sky';
import { NonEventNoticeError } from '../../utils/errors';
import { buildCandidate, malformed } from '../candidate-builder';
import { groupParagraphsByTopic, parseCircular } from '../circular-text';
import { classifyReportIntent, labelParagraphs, parseAuthorList } from '../report-intent';
import { FormatContext, NoticeFormat } from '../format';

export interface Designation {
  prefix: string;
  /** Normalized, e.g. `GRB 230918A`, `S230918ab`, `IceCube-230918A` */
  name: string;
  eventType: string;
  /** UTC midnight of the date encoded in the designation, when it has one */
  dateMs?: number;
}

const DESIGNATION = /\b(GRB|EP|FRB|IceCube-|S|SN|AT)\s?(\d{8}|\d{6}|\d{4})([A-Za-z]{1,3})\b/;

const DESIGNATION_TYPES: Record<string, string> = {
  GRB: 'GRB',
  EP: 'FXT',
  FRB: 'FRB',
  'IceCube-': 'NEUTRINO',
  S: 'GW',
  SN: 'SN',
  AT: 'UNKNOWN',
};

// Prefixes written with a space before the date part
const SPACED_PREFIXES = new Set(['GRB', 'FRB', 'SN', 'AT']);

const SUBJECT_INSTRUMENTS: Array<[RegExp, string]> = [
  [/swift[\s/-]*bat/i, 'swift-bat'],
  [/swift[\s/-]*xrt/i, 'swift-xrt'],
  [/swift[\s/-]*uvot/i, 'swift-uvot'],
  [/fermi[\s/-]*gbm/i, 'fermi-gbm'],
  [/fermi[\s/-]*lat/i, 'fermi-lat'],
  [/\bEP[\s/-]*WXT\b/i, 'ep-wxt'],
  [/\bEP[\s/-]*FXT\b/i, 'ep-fxt'],
  [/icecube/i, 'icecube'],
  [/\b(LIGO|Virgo|KAGRA|LVK)\b/i, 'lvk'],
];

// Instrument implied by the designation when the subject names none
const DESIGNATION_INSTRUMENTS: Record<string, string> = {
  EP: 'ep-wxt',
  'IceCube-': 'icecube',
  S: 'lvk',
};

const RA_DEC = /RA\s*,?\s*Dec(?:\s*\(J2000\))?\s*[=:]\s*([+-]?\d+(?:\.\d+)?)\s*,\s*([+-]?\d+(?:\.\d+)?)/i;
const ERROR_RADIUS =
  /(?:uncertainty|error(?:\s+radius)?|radius)\s+(?:of\s+)?(\d+(?:\.\d+)?)\s*(arcsec|arcmin|deg(?:rees?)?)/i;
const BODY_TIME = /\b(\d{1,2}):(\d{2}):(\d{2}(?:\.\d+)?)\s*UT\b/;
const HEADER_DATE = /^(\d{2})\/(\d{2})\/(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/;

export function parseDesignation(text: string): Designation | undefined {
  const match = DESIGNATION.exec(text);
  if (!match) return undefined;

  const [, prefix, digits, suffix] = match;
  const name = `${prefix}${SPACED_PREFIXES.has(prefix) ? ' ' : ''}${digits}${suffix}`;

  let dateMs: number | undefined;
  if (digits.length === 6) {
    dateMs = Date.UTC(2000 + Number(digits.slice(0, 2)), Number(digits.slice(2, 4)) - 1, Number(digits.slice(4, 6)));
  } else if (digits.length === 8) {
    dateMs = Date.UTC(Number(digits.slice(0, 4)), Number(digits.slice(4, 6)) - 1, Number(digits.slice(6, 8)));
  }

  return { prefix, name, eventType: DESIGNATION_TYPES[prefix] ?? 'UNKNOWN', dateMs };
}

export class GcnCircularFormat implements NoticeFormat {
  readonly source = 'gcn-circular';

  parse(payload: unknown, { config, noticeRef }: FormatContext): EventCandidate {
    if (typeof payload !== 'string') {
      throw malformed(this.source, noticeRef, '/', 'payload must be circular text');
    }

    const circular = parseCircular(payload);
    if (!circular) {
      throw malformed(this.source, noticeRef, '/header', 'does not match the GCN circular header format');
    }
    const { header, paragraphs } = circular;

    const topics = groupParagraphsByTopic(paragraphs, labelParagraphs(paragraphs));
    const reportIntent = classifyReportIntent(header.subject, topics.ScientificContent ?? '');
    if (reportIntent === 'NON_EVENT_REPORT') {
      throw new NonEventNoticeError({ source: this.source, noticeRef, intent: reportIntent });
    }

    const designation = parseDesignation(header.subject);
    const instrument = this.instrument(header.subject, designation);

    // Coordinates and their uncertainty are read from the same paragraph
    const located = paragraphs.find(paragraph => RA_DEC.test(paragraph));
    const position = located ? RA_DEC.exec(located) : null;
    if (!located || !position) {
      throw malformed(this.source, noticeRef, '/body', 'no "RA, Dec =" position found');
    }

    return buildCandidate({
      candidateId: `circular:${header.circularId}`,
      source: this.source,
      timestampMs: this.timestamp(paragraphs, designation, header.createdOn, noticeRef),
      ra: parseFloat(position[1]),
      dec: parseFloat(position[2]),
      errorRadius: this.errorRadius(located, paragraphs, config),
      instrument,
      eventType: designation?.eventType ?? config.instrumentEventTypes[instrument] ?? 'UNKNOWN',
      typeConfirmed: designation !== undefined && config.normalizer.confirmedDesignations.includes(designation.prefix),
      confidence: priorFor(config, this.source),
      eventName: designation?.name,
      rawRef: noticeRef,
      reportIntent,
      authors: topics.AuthorList !== undefined ? parseAuthorList(topics.AuthorList) : undefined,
    });
  }

  private instrument(subject: string, designation: Designation | undefined): string {
    for (const [pattern, tag] of SUBJECT_INSTRUMENTS) {
      if (pattern.test(subject)) return tag;
    }
    return (designation && DESIGNATION_INSTRUMENTS[designation.prefix]) || 'circular';
  }

  private errorRadius(located: string, paragraphs: string[], config: ResolutionConfig): number {
    const match = ERROR_RADIUS.exec(located) ?? ERROR_RADIUS.exec(paragraphs.join('\n\n'));
    const degrees = match ? toDegrees(parseFloat(match[1]), match[2]) : undefined;
    return degrees ?? config.normalizer.defaultErrorRadiusDeg;
  }

  /**
   * Trigger time stated in the body on the designation's date; otherwise the
   * circular's own header date.
   */
  private timestamp(
    paragraphs: string[],
    designation: Designation | undefined,
    createdOn: string,
    noticeRef: string
  ): number {
    const bodyTime = paragraphs.map(paragraph => BODY_TIME.exec(paragraph)).find(match => match !== null);
    if (designation?.dateMs !== undefined && bodyTime) {
      const seconds = Number(bodyTime[1]) * 3600 + Number(bodyTime[2]) * 60 + parseFloat(bodyTime[3]);
      return designation.dateMs + Math.round(seconds * 1000);
    }

    const header = HEADER_DATE.exec(createdOn);
    if (!header) {
      throw malformed(this.source, noticeRef, '/DATE', 'no trigger time in the body and no usable header date');
    }
    const [, yy, mm, dd, hh, min, ss] = header;
    return Date.UTC(2000 + Number(yy), Number(mm) - 1, Number(dd), Number(hh), Number(min), Number(ss));
  }
}
