/**
 * Notice Normalizer - raw notices to immutable event candidates
 *
 * Formats are registered by source tag; `normalize` dispatches on the tag of
 * the envelope and never inspects the payload to guess its format.
 */
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { MalformedNoticeError } from '../utils/errors';
import type { ResolutionConfig } from '../config/resolution';
import type { EventCandidate } from '../types/candidate';
import type { RawNotice } from '../types/notice';
import type { NoticeFormat } from './format';
import { GcnJsonFormat } from './formats/gcn-json';
import { GcnClassicFormat } from './formats/gcn-classic';
import { GcnCircularFormat } from './formats/gcn-circular';

export function defaultFormats(): NoticeFormat[] {
  return [new GcnJsonFormat(), new GcnClassicFormat(), new GcnCircularFormat()];
}

export class NoticeNormalizer {
  private formats: Map<string, NoticeFormat> = new Map();

  constructor(
    private readonly config: ResolutionConfig,
    formats: NoticeFormat[] = defaultFormats()
  ) {
    for (const format of formats) {
      this.register(format);
    }
  }

  register(format: NoticeFormat): void {
    if (this.formats.has(format.source)) {
      logger.warn({ source: format.source }, 'Replacing registered notice format');
    }
    this.formats.set(format.source, format);
  }

  get sources(): string[] {
    return [...this.formats.keys()];
  }

  /**
   * @throws MalformedNoticeError when the notice cannot become a candidate
   */
  normalize(raw: RawNotice): EventCandidate {
    const noticeRef = raw.ref ?? uuidv4();
    const source = typeof raw.source === 'string' ? raw.source : '';

    if (!source) {
      throw new MalformedNoticeError('Notice has no source tag', {
        source,
        noticeRef,
        issues: [{ path: '/source', message: 'is required' }],
      });
    }

    const format = this.formats.get(source);
    if (!format) {
      throw new MalformedNoticeError(`Unrecognised notice source: ${source}`, {
        source,
        noticeRef,
        issues: [{ path: '/source', message: `must be one of ${this.sources.join(', ')}` }],
      });
    }

    const candidate = format.parse(raw.payload, { config: this.config, noticeRef });
    logger.debug({ candidateId: candidate.candidateId, source, noticeRef }, 'Normalized notice');
    return candidate;
  }
}

export type { NoticeFormat, FormatContext } from './format';
