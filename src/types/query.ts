/**
 * Query boundary: requests, filters and summaries returned to callers
 */
import type { EventCandidate, SkyPosition } from './candidate';
import type { EdgeKind } from './graph';

export type TraversalKind = 'lookup' | 'neighbors' | 'traverse' | 'search' | 'nearest';

export interface TimeRange {
  /** ISO 8601, inclusive */
  from?: string;
  /** ISO 8601, inclusive */
  to?: string;
}

export interface ConeFilter {
  ra: number;
  dec: number;
  radiusDeg: number;
}

export interface NodeFilter {
  classification?: string | string[];
  instrument?: string | string[];
  timeRange?: TimeRange;
  cone?: ConeFilter;
  name?: string;
  confirmedOnly?: boolean;
}

export interface QueryRequest {
  traversal: TraversalKind;
  /** Start node for lookup / neighbors / traverse */
  root?: string;
  filter?: NodeFilter;
  /** Search origin for `nearest` */
  position?: { ra: number; dec: number };
  edgeKinds?: EdgeKind[];
  depth?: number;
  limit?: number;
}

export interface NodeSummary {
  id: string;
  classification: string;
  classificationConfirmed: boolean;
  position: SkyPosition;
  firstSeen: string;
  lastSeen: string;
  candidateCount: number;
  instruments: string[];
  names: string[];
  revision: number;
  /** Hops from the root in traversals; separation in degrees for `nearest` */
  distance?: number;
}

export interface EdgeSummary {
  id: string;
  kind: EdgeKind;
  /** Endpoints with node ids resolved to their canonical node */
  from: string;
  to: string;
  createdAt: string;
}

export interface QueryResult {
  nodes: NodeSummary[];
  edges: EdgeSummary[];
  truncated: boolean;
  truncatedBy?: 'depth' | 'results';
}

/**
 * Provenance of a node: its merge chain, the nodes folded into it and the
 * evidence it was built from
 */
export interface HistoryResult {
  /** Canonical id the requested id resolves to */
  nodeId: string;
  /** Requested id first, canonical id last */
  chain: string[];
  node: NodeSummary;
  superseded: Array<NodeSummary & { mergedInto: string }>;
  candidates: EventCandidate[];
  edges: EdgeSummary[];
}
