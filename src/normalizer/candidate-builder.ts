/**
 * Final checks shared by every notice format. A format gathers raw field
 * values; the builder range-checks them and freezes the candidate.
 */
import { MalformedNoticeError } from '../utils/errors';
import type { ValidationError } from '../utils/schema-validator';
import type { CircularAuthor, EventCandidate, ReportIntent } from '../types/candidate';
import { normalizeRa } from '../utils/sky';

export interface CandidateFields {
  candidateId: string;
  source: string;
  timestampMs: number;
  ra: number;
  dec: number;
  errorRadius: number;
  instrument: string;
  eventType: string;
  typeConfirmed: boolean;
  confidence: number;
  eventName?: string;
  rawRef: string;
  reportIntent?: ReportIntent;
  authors?: CircularAuthor[];
}

export function buildCandidate(fields: CandidateFields): EventCandidate {
  const issues: ValidationError[] = [];
  const fail = (path: string, message: string): void => {
    issues.push({ path, message });
  };

  if (!fields.candidateId) fail('/candidateId', 'must not be empty');
  if (!fields.instrument) fail('/instrument', 'must not be empty');
  if (!Number.isFinite(fields.timestampMs)) fail('/timestamp', 'must be a valid date');

  if (!Number.isFinite(fields.ra)) {
    fail('/ra', 'must be a finite number');
  } else if (fields.ra < 0 || fields.ra > 360) {
    fail('/ra', 'must be within [0, 360] degrees');
  }

  if (!Number.isFinite(fields.dec)) {
    fail('/dec', 'must be a finite number');
  } else if (fields.dec < -90 || fields.dec > 90) {
    fail('/dec', 'must be within [-90, 90] degrees');
  }

  if (!Number.isFinite(fields.errorRadius) || fields.errorRadius <= 0) {
    fail('/errorRadius', 'must be a positive number of degrees');
  }

  if (!(fields.confidence >= 0 && fields.confidence <= 1)) {
    fail('/confidence', 'must be within [0, 1]');
  }

  if (issues.length > 0) {
    throw new MalformedNoticeError(`Malformed ${fields.source} notice: ${issues[0].path} ${issues[0].message}`, {
      source: fields.source,
      noticeRef: fields.rawRef,
      issues,
    });
  }

  const candidate: EventCandidate = {
    candidateId: fields.candidateId,
    source: fields.source,
    timestamp: new Date(fields.timestampMs).toISOString(),
    timestampMs: fields.timestampMs,
    position: Object.freeze({
      ra: normalizeRa(fields.ra),
      dec: fields.dec,
      errorRadius: fields.errorRadius,
    }),
    instrument: fields.instrument,
    eventType: fields.eventType,
    typeConfirmed: fields.typeConfirmed,
    confidence: fields.confidence,
    rawRef: fields.rawRef,
    ...(fields.eventName ? { eventName: fields.eventName } : {}),
    ...(fields.reportIntent ? { reportIntent: fields.reportIntent } : {}),
    ...(fields.authors && fields.authors.length > 0
      ? { authors: Object.freeze(fields.authors.map(author => Object.freeze({ ...author }))) }
      : {}),
  };

  return Object.freeze(candidate);
}

/**
 * Shorthand for a single-issue rejection raised while reading a payload
 */
export function malformed(source: string, noticeRef: string, path: string, message: string): MalformedNoticeError {
  return new MalformedNoticeError(`Malformed ${source} notice: ${path} ${message}`, {
    source,
    noticeRef,
    issues: [{ path, message }],
  });
}
