/**
 * Classic GCN text notices: one `KEY: value` field per line.
 *
 *   NOTICE_TYPE:  Swift-BAT GRB Position
 *   TRIGGER_NUM:  1187000,   Seg_Num: 0
 *   GRB_RA:       123.4560d {+08h 13m 49s} (J2000),
 *   GRB_DEC:      -12.3450d {-12d 20' 42"} (J2000),
 *   GRB_ERROR:    3.00 [arcmin radius, statistical only]
 *   GRB_DATE:     20205 TJD;   261 DOY;   23/09/18
 *   GRB_TIME:     45296.00 SOD {12:34:56.00} UT
 *   SOLN_STATUS:  Definite GRB
 */
import { priorFor } from '../../config/resolution';
import type { EventCandidate } from '../../types/candidate';
import { toDegrees } from '../../utils/sky';
import { buildCandidate, malformed } from '../candidate-builder';
import { FormatContext, NoticeFormat, slugify } from '../format';

const FIELD_LINE = /^([A-Z][A-Z0-9_]*):\s*(.*)$/;
const LEADING_NUMBER = /^([+-]?\d+(?:\.\d+)?)/;
const ERROR_WITH_UNIT = /^(\d+(?:\.\d+)?)\s*\[\s*(arcsec|arcmin|deg)/i;
const CALENDAR_DATE = /(\d{2})\/(\d{2})\/(\d{2})/;
const TRUNCATED_JD = /(\d+)\s*TJD/;
const SECONDS_OF_DAY = /^(\d+(?:\.\d+)?)\s*SOD/;

// TJD = MJD - 40000; MJD 40587 is 1970-01-01
const TJD_EPOCH_OFFSET = 40000;
const MJD_UNIX_EPOCH = 40587;
const DAY_MS = 86_400_000;

/**
 * Read the fields of a classic notice. Later duplicates of a key are ignored.
 */
export function parseClassicFields(text: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const match = FIELD_LINE.exec(line.trim());
    if (match && !fields.has(match[1])) {
      fields.set(match[1], match[2].trim());
    }
  }
  return fields;
}

export class GcnClassicFormat implements NoticeFormat {
  readonly source = 'gcn-classic';

  parse(payload: unknown, { config, noticeRef }: FormatContext): EventCandidate {
    if (typeof payload !== 'string') {
      throw malformed(this.source, noticeRef, '/', 'payload must be notice text');
    }

    const fields = parseClassicFields(payload);
    const field = (...keys: string[]): string | undefined => {
      for (const key of keys) {
        const value = fields.get(key);
        if (value !== undefined) return value;
      }
      return undefined;
    };

    const noticeType = field('NOTICE_TYPE');
    if (!noticeType) {
      throw malformed(this.source, noticeRef, '/NOTICE_TYPE', 'is required');
    }
    const instrument = slugify(noticeType.split(/\s+/)[0]);

    const ra = this.number(field('GRB_RA', 'SRC_RA'), '/GRB_RA', noticeRef);
    const dec = this.number(field('GRB_DEC', 'SRC_DEC'), '/GRB_DEC', noticeRef);
    const errorRadius = this.errorRadius(field('GRB_ERROR', 'SRC_ERROR'), config.normalizer.defaultErrorRadiusDeg, noticeRef);
    const timestampMs = this.timestamp(field('GRB_DATE', 'DISCOVERY_DATE'), field('GRB_TIME', 'DISCOVERY_TIME'), noticeRef);

    const triggerField = field('TRIGGER_NUM', 'EVENT_NUM') ?? '';
    const trigger = LEADING_NUMBER.exec(triggerField)?.[1];
    if (!trigger) {
      throw malformed(this.source, noticeRef, '/TRIGGER_NUM', 'is required');
    }
    const segment = /Seg_Num:\s*(\d+)/i.exec(triggerField)?.[1] ?? '0';

    const definite = /definite\s+grb/i.test(field('SOLN_STATUS') ?? '');
    const prior = priorFor(config, this.source);

    return buildCandidate({
      candidateId: `${instrument}:${trigger}:${slugify(noticeType)}:${segment}`,
      source: this.source,
      timestampMs,
      ra,
      dec,
      errorRadius,
      instrument,
      eventType: definite ? 'GRB' : config.instrumentEventTypes[instrument] ?? 'UNKNOWN',
      typeConfirmed: definite,
      confidence: definite ? Math.max(prior, config.normalizer.confirmedConfidence) : prior,
      rawRef: noticeRef,
    });
  }

  private number(value: string | undefined, path: string, noticeRef: string): number {
    const match = value !== undefined ? LEADING_NUMBER.exec(value) : null;
    if (!match) {
      throw malformed(this.source, noticeRef, path, 'must start with a number of degrees');
    }
    return parseFloat(match[1]);
  }

  private errorRadius(value: string | undefined, fallback: number, noticeRef: string): number {
    if (value === undefined) return fallback;

    const match = ERROR_WITH_UNIT.exec(value);
    const degrees = match ? toDegrees(parseFloat(match[1]), match[2]) : undefined;
    if (degrees === undefined) {
      throw malformed(this.source, noticeRef, '/GRB_ERROR', 'must give a radius with an [arcsec|arcmin|deg] unit');
    }
    return degrees;
  }

  /**
   * Calendar date (yy/mm/dd) when present, else the truncated Julian day,
   * plus the seconds of day.
   */
  private timestamp(date: string | undefined, time: string | undefined, noticeRef: string): number {
    if (date === undefined || time === undefined) {
      throw malformed(this.source, noticeRef, '/GRB_DATE', 'date and time are required');
    }

    let dayMs: number;
    const calendar = CALENDAR_DATE.exec(date);
    const tjd = TRUNCATED_JD.exec(date);
    if (calendar) {
      const [year, month, day] = [2000 + parseInt(calendar[1], 10), parseInt(calendar[2], 10), parseInt(calendar[3], 10)];
      dayMs = Date.UTC(year, month - 1, day);
      // Date.UTC rolls 23/13/40 over into a later, valid date
      const parsed = new Date(dayMs);
      if (parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        throw malformed(this.source, noticeRef, '/GRB_DATE', `${calendar[0]} is not a calendar date`);
      }
    } else if (tjd) {
      dayMs = (parseInt(tjd[1], 10) + TJD_EPOCH_OFFSET - MJD_UNIX_EPOCH) * DAY_MS;
    } else {
      throw malformed(this.source, noticeRef, '/GRB_DATE', 'must contain yy/mm/dd or a TJD');
    }

    const sod = SECONDS_OF_DAY.exec(time);
    if (!sod) {
      throw malformed(this.source, noticeRef, '/GRB_TIME', 'must give seconds of day (SOD)');
    }
    return dayMs + Math.round(parseFloat(sod[1]) * 1000);
  }
}
