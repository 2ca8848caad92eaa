import type { EventCandidate } from '../types/candidate';
import type { ResolutionConfig } from '../config/resolution';

export interface FormatContext {
  config: ResolutionConfig;
  /** Reference the resulting candidate and any rejection point back to */
  noticeRef: string;
}

/**
 * One recognised notice format. Implementations read the payload and never
 * modify it.
 */
export interface NoticeFormat {
  /** Source tag this format is registered under */
  readonly source: string;
  /** @throws MalformedNoticeError */
  parse(payload: unknown, context: FormatContext): EventCandidate;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
