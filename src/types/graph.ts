/**
 * Graph model: transient nodes, append-only edges and ambiguous cases
 */
import type { EventCandidate, SkyPosition } from './candidate';

export type EdgeKind = 'TEMPORAL_SUCCESSOR' | 'CO_DETECTED_BY' | 'CLASSIFIED_AS' | 'MERGED_WITH';

/**
 * A resolved physical transient.
 *
 * Position is the inverse-variance weighted centroid of the contributing
 * candidates, accumulated as a weighted sum of unit vectors so that merges
 * and attachments stay exact and RA wrap-around needs no special casing.
 */
export interface TransientNode {
  id: string;
  position: SkyPosition;
  /** Σ w·(x, y, z) over contributing candidates, w = 1/σ² */
  vectorSum: [number, number, number];
  /** Σ w */
  weightSum: number;
  firstSeen: string;
  lastSeen: string;
  firstSeenMs: number;
  lastSeenMs: number;
  /** Evidence order (order of attachment) */
  candidateIds: string[];
  instruments: string[];
  /** Designations reported for this transient */
  names: string[];
  classification: string;
  classificationConfirmed: boolean;
  /** Accumulated confidence per event-type label */
  classificationEvidence: Record<string, number>;
  revision: number;
  /** Store sequence at creation; lower means created earlier */
  createdSeq: number;
  /** Store sequence at the last mutation */
  updatedSeq: number;
  createdAt: string;
  updatedAt: string;
  /** Set once the node is superseded by a merge */
  mergedInto?: string;
}

/**
 * Edge endpoints are node ids (`tn-…`) or entity ids with a kind prefix:
 * `instrument:<tag>`, `class:<label>`, `candidate:<candidateId>`.
 */
export interface GraphEdge {
  id: string;
  kind: EdgeKind;
  from: string;
  to: string;
  /** Node that owns the edge when neither endpoint is a node */
  scope?: string;
  createdAt: string;
  attributes?: Record<string, string | number | boolean>;
}

export type CaseStatus = 'open' | 'resolved';

export interface CaseResolution {
  action: 'attached' | 'created';
  nodeId: string;
  reason: 'reevaluation' | 'manual';
  /** Competing nodes folded together while resolving */
  mergedNodeIds?: string[];
}

/**
 * A candidate the resolver could not place with confidence.
 */
export interface AmbiguousCase {
  id: string;
  candidateId: string;
  competingNodeIds: string[];
  /** Match score per competing node at the last evaluation */
  scores: Record<string, number>;
  status: CaseStatus;
  openedAt: string;
  resolvedAt?: string;
  resolution?: CaseResolution;
  revision: number;
}

export type CandidateMembership =
  | { kind: 'node'; nodeId: string; directNodeId: string }
  | { kind: 'case'; caseId: string };

/**
 * One atomic unit of writes. Everything in a change set becomes visible to
 * readers together or not at all.
 */
export interface ChangeSet {
  candidates?: EventCandidate[];
  /** Full node snapshots; revision must be exactly one past the stored one */
  nodes?: TransientNode[];
  edges?: GraphEdge[];
  cases?: AmbiguousCase[];
  redirects?: Array<{ from: string; to: string }>;
}

export const NODE_ID_PREFIX = 'tn-';

export function instrumentVertex(tag: string): string {
  return `instrument:${tag}`;
}

export function classificationVertex(label: string): string {
  return `class:${label}`;
}

export function candidateVertex(candidateId: string): string {
  return `candidate:${candidateId}`;
}

export function isNodeId(id: string): boolean {
  return id.startsWith(NODE_ID_PREFIX);
}
