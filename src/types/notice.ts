/**
 * Raw notice envelope delivered by the ingestion transport
 */
export interface RawNotice {
  /** Format tag used to pick a parser, e.g. `gcn-json` */
  source: string;
  /** Vendor payload: JSON object for `gcn-json`, text for the others */
  payload: unknown;
  /** Transport-level reference (message id, archive path) */
  ref?: string;
  receivedAt?: string;
}

/**
 * GCN unified JSON alert (the subset the normalizer reads)
 */
export interface GcnJsonNotice {
  mission: string;
  instrument?: string;
  /** ISO 8601 */
  trigger_time: string;
  alert_datetime?: string;
  /** Degrees */
  ra: number;
  /** Degrees */
  dec: number;
  /** Degrees, 90% containment radius */
  ra_dec_error?: number;
  id?: Array<string | number>;
  record_number?: number;
  alert_type?: string;
  event_name?: string;
  /** Probability per source class, e.g. `{ "BNS": 0.97 }` */
  classification?: Record<string, number>;
}
