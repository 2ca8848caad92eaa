/**
 * GCN unified JSON alerts, as distributed over GCN Kafka
 */
import { validateGcnJsonNotice, SchemaValidationError } from '../../utils/schema-validator';
import { MalformedNoticeError } from '../../utils/errors';
import { priorFor } from '../../config/resolution';
import type { ResolutionConfig } from '../../config/resolution';
import type { EventCandidate } from '../../types/candidate';
import type { GcnJsonNotice } from '../../types/notice';
import { buildCandidate } from '../candidate-builder';
import { FormatContext, NoticeFormat, slugify } from '../format';

export class GcnJsonFormat implements NoticeFormat {
  readonly source = 'gcn-json';

  parse(payload: unknown, { config, noticeRef }: FormatContext): EventCandidate {
    let notice: GcnJsonNotice;
    try {
      notice = validateGcnJsonNotice(payload);
    } catch (err) {
      if (err instanceof SchemaValidationError) {
        throw new MalformedNoticeError('Malformed gcn-json notice: schema validation failed', {
          source: this.source,
          noticeRef,
          issues: err.errors,
        });
      }
      throw err;
    }

    const instrument = slugify(notice.instrument ? `${notice.mission}-${notice.instrument}` : notice.mission);
    const idPart = notice.id && notice.id.length > 0 ? notice.id.join('-') : notice.trigger_time;
    const classified = this.classify(notice, instrument, config);

    return buildCandidate({
      candidateId: `${instrument}:${idPart}:${notice.record_number ?? 1}`,
      source: this.source,
      timestampMs: Date.parse(notice.trigger_time),
      ra: notice.ra,
      dec: notice.dec,
      errorRadius: notice.ra_dec_error ?? config.normalizer.defaultErrorRadiusDeg,
      instrument,
      eventType: classified.eventType,
      typeConfirmed: classified.typeConfirmed,
      confidence: classified.confidence,
      eventName: notice.event_name,
      rawRef: noticeRef,
    });
  }

  /**
   * Pick the most probable class, summing probabilities of labels that alias
   * to the same event type (BNS and NSBH both count towards GW).
   */
  private classify(
    notice: GcnJsonNotice,
    instrument: string,
    config: ResolutionConfig
  ): { eventType: string; typeConfirmed: boolean; confidence: number } {
    const totals = new Map<string, number>();
    for (const [label, probability] of Object.entries(notice.classification ?? {})) {
      const eventType = config.eventTypes.aliases[label] ?? label;
      totals.set(eventType, (totals.get(eventType) ?? 0) + probability);
    }

    let best: { eventType: string; probability: number } | undefined;
    for (const [eventType, probability] of [...totals].sort(([a], [b]) => a.localeCompare(b))) {
      if (!best || probability > best.probability) {
        best = { eventType, probability };
      }
    }

    if (best) {
      const confidence = Math.min(1, best.probability);
      return {
        eventType: best.eventType,
        typeConfirmed: confidence >= config.normalizer.confirmedConfidence,
        confidence,
      };
    }

    return {
      eventType: config.instrumentEventTypes[instrument] ?? 'UNKNOWN',
      typeConfirmed: false,
      confidence: priorFor(config, this.source),
    };
  }
}
