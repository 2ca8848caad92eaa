/**
 * Canonical event-candidate record produced by the notice normalizer
 */

/**
 * Sky position in degrees (J2000). `errorRadius` is the positional
 * uncertainty radius, also in degrees.
 */
export interface SkyPosition {
  ra: number;
  dec: number;
  errorRadius: number;
}

/**
 * Primary communication intent of a circular
 */
export const REPORT_INTENTS = [
  'NEW_EVENT_DETECTION',
  'FOLLOW_UP_OBSERVATION',
  'NON_DETECTION_LIMIT',
  'ANALYSIS_REFINEMENT',
  'CALL_FOR_FOLLOWUP',
  'NON_EVENT_REPORT',
] as const;

export type ReportIntent = (typeof REPORT_INTENTS)[number];

export function isReportIntent(value: string): value is ReportIntent {
  return REPORT_INTENTS.some(intent => intent === value);
}

export interface CircularAuthor {
  name: string;
  affiliation?: string;
}

/**
 * One notice, normalized. Frozen once built.
 */
export interface EventCandidate {
  /** Source identifier, unique per notice; re-submissions carry the same id */
  readonly candidateId: string;
  readonly source: string;
  /** ISO 8601 UTC */
  readonly timestamp: string;
  readonly timestampMs: number;
  readonly position: Readonly<SkyPosition>;
  /** Instrument tag, e.g. `swift-bat`, `fermi-gbm` */
  readonly instrument: string;
  /** Event-type label, e.g. `GRB`, `GW`, `NEUTRINO`, `UNKNOWN` */
  readonly eventType: string;
  /** True when the notice itself asserts the event type */
  readonly typeConfirmed: boolean;
  /** In [0, 1] */
  readonly confidence: number;
  /** Designation such as `GRB 230918A`, when the notice names the event */
  readonly eventName?: string;
  /** Reference to the raw payload the candidate was built from */
  readonly rawRef: string;
  /** Circulars only */
  readonly reportIntent?: ReportIntent;
  readonly authors?: ReadonlyArray<Readonly<CircularAuthor>>;
}
