/**
 * Pure node transitions used by the updater. Each returns the next snapshot
 * of the node plus the edges the transition writes; nothing is stored here.
 */
import { v4 as uuidv4 } from 'uuid';
import { addScaled, fromVector, positionWeight, toUnitVector } from '../utils/sky';
import type { EventCandidate } from '../types/candidate';
import type { EdgeKind, GraphEdge, TransientNode } from '../types/graph';
import { candidateVertex, classificationVertex, instrumentVertex } from '../types/graph';

export const UNKNOWN_TYPE = 'UNKNOWN';

export interface Transition {
  node: TransientNode;
  edges: GraphEdge[];
  /** Classification became confirmed in this transition */
  corroborated: boolean;
}

export interface Stamp {
  seq: number;
  now: string;
  /** Uncertainty floor applied to candidate weights */
  floorDeg: number;
}

export function makeEdge(
  kind: EdgeKind,
  from: string,
  to: string,
  now: string,
  scope?: string,
  attributes?: GraphEdge['attributes']
): GraphEdge {
  return {
    id: uuidv4(),
    kind,
    from,
    to,
    createdAt: now,
    ...(scope !== undefined ? { scope } : {}),
    ...(attributes !== undefined ? { attributes } : {}),
  };
}

/**
 * A brand-new node holding a single candidate
 */
export function seedNode(id: string, candidate: EventCandidate, stamp: Stamp): Transition {
  const empty: TransientNode = {
    id,
    position: { ...candidate.position },
    vectorSum: [0, 0, 0],
    weightSum: 0,
    firstSeen: candidate.timestamp,
    lastSeen: candidate.timestamp,
    firstSeenMs: candidate.timestampMs,
    lastSeenMs: candidate.timestampMs,
    candidateIds: [],
    instruments: [],
    names: [],
    classification: UNKNOWN_TYPE,
    classificationConfirmed: false,
    classificationEvidence: {},
    revision: 0,
    createdSeq: stamp.seq,
    updatedSeq: stamp.seq,
    createdAt: stamp.now,
    updatedAt: stamp.now,
  };
  return absorbCandidate(empty, candidate, stamp);
}

/**
 * Attach a candidate: fold its position into the centroid, extend the time
 * span, and write the succession, co-detection and classification edges.
 */
export function absorbCandidate(node: TransientNode, candidate: EventCandidate, stamp: Stamp): Transition {
  const edges: GraphEdge[] = [];
  const weight = positionWeight(candidate.position.errorRadius, stamp.floorDeg);
  const vectorSum = addScaled(node.vectorSum, toUnitVector(candidate.position.ra, candidate.position.dec), weight);
  const weightSum = node.weightSum + weight;

  const previous = node.candidateIds[node.candidateIds.length - 1];
  if (previous !== undefined) {
    edges.push(
      makeEdge('TEMPORAL_SUCCESSOR', candidateVertex(previous), candidateVertex(candidate.candidateId), stamp.now, node.id)
    );
  }

  const instruments = [...node.instruments];
  if (!instruments.includes(candidate.instrument)) {
    instruments.push(candidate.instrument);
    edges.push(makeEdge('CO_DETECTED_BY', node.id, instrumentVertex(candidate.instrument), stamp.now));
  }

  const names = [...node.names];
  if (candidate.eventName && !names.includes(candidate.eventName)) {
    names.push(candidate.eventName);
  }

  const evidence = { ...node.classificationEvidence };
  if (candidate.eventType !== UNKNOWN_TYPE) {
    evidence[candidate.eventType] = (evidence[candidate.eventType] ?? 0) + candidate.confidence;
  }

  let classification: string;
  let confirmed: boolean;
  if (node.classificationConfirmed) {
    // The first confirmed label stands
    classification = node.classification;
    confirmed = true;
  } else if (candidate.typeConfirmed && candidate.eventType !== UNKNOWN_TYPE) {
    classification = candidate.eventType;
    confirmed = true;
  } else {
    classification = leadingLabel(evidence, node.classification);
    confirmed = false;
  }

  const next: TransientNode = {
    ...node,
    position: centroid(vectorSum, weightSum),
    vectorSum,
    weightSum,
    firstSeenMs: Math.min(node.firstSeenMs, candidate.timestampMs),
    lastSeenMs: Math.max(node.lastSeenMs, candidate.timestampMs),
    firstSeen: candidate.timestampMs < node.firstSeenMs ? candidate.timestamp : node.firstSeen,
    lastSeen: candidate.timestampMs > node.lastSeenMs ? candidate.timestamp : node.lastSeen,
    candidateIds: [...node.candidateIds, candidate.candidateId],
    instruments,
    names,
    classificationEvidence: evidence,
    ...bump(node, stamp),
  };

  return withClassification(node, next, classification, confirmed, edges, stamp.now);
}

/**
 * Fold `superseded` into `canonical`. Returns both next snapshots; the
 * superseded one is only marked with `mergedInto`.
 */
export function combineNodes(
  canonical: TransientNode,
  superseded: TransientNode,
  stamp: Stamp,
  attributes: GraphEdge['attributes'] = {}
): { canonical: Transition; superseded: TransientNode } {
  const edges: GraphEdge[] = [];

  const vectorSum = addScaled(canonical.vectorSum, superseded.vectorSum, 1);
  const weightSum = canonical.weightSum + superseded.weightSum;

  const lastOfCanonical = canonical.candidateIds[canonical.candidateIds.length - 1];
  const firstOfSuperseded = superseded.candidateIds[0];
  if (lastOfCanonical !== undefined && firstOfSuperseded !== undefined) {
    edges.push(
      makeEdge(
        'TEMPORAL_SUCCESSOR',
        candidateVertex(lastOfCanonical),
        candidateVertex(firstOfSuperseded),
        stamp.now,
        canonical.id
      )
    );
  }
  edges.push(makeEdge('MERGED_WITH', canonical.id, superseded.id, stamp.now, undefined, attributes));

  const evidence = { ...canonical.classificationEvidence };
  for (const [label, weight] of Object.entries(superseded.classificationEvidence)) {
    evidence[label] = (evidence[label] ?? 0) + weight;
  }

  let classification: string;
  let confirmed: boolean;
  if (canonical.classificationConfirmed) {
    classification = canonical.classification;
    confirmed = true;
  } else if (superseded.classificationConfirmed) {
    classification = superseded.classification;
    confirmed = true;
  } else {
    classification = leadingLabel(evidence, canonical.classification);
    confirmed = false;
  }

  const next: TransientNode = {
    ...canonical,
    position: centroid(vectorSum, weightSum),
    vectorSum,
    weightSum,
    firstSeenMs: Math.min(canonical.firstSeenMs, superseded.firstSeenMs),
    lastSeenMs: Math.max(canonical.lastSeenMs, superseded.lastSeenMs),
    firstSeen: superseded.firstSeenMs < canonical.firstSeenMs ? superseded.firstSeen : canonical.firstSeen,
    lastSeen: superseded.lastSeenMs > canonical.lastSeenMs ? superseded.lastSeen : canonical.lastSeen,
    candidateIds: [...canonical.candidateIds, ...superseded.candidateIds.filter(id => !canonical.candidateIds.includes(id))],
    instruments: union(canonical.instruments, superseded.instruments),
    names: union(canonical.names, superseded.names),
    classificationEvidence: evidence,
    ...bump(canonical, stamp),
  };

  return {
    canonical: withClassification(canonical, next, classification, confirmed, edges, stamp.now),
    superseded: { ...superseded, mergedInto: canonical.id, ...bump(superseded, stamp) },
  };
}

/**
 * Mark a node's classification as confirmed, optionally relabelling it
 */
export function confirmClassification(node: TransientNode, label: string, stamp: Stamp): Transition {
  return withClassification(node, { ...node, ...bump(node, stamp) }, label, true, [], stamp.now, { reason: 'manual' });
}

/**
 * Weighted centroid; the fused uncertainty is 1/√Σw
 */
export function centroid(vectorSum: [number, number, number], weightSum: number): TransientNode['position'] {
  const { ra, dec } = fromVector(vectorSum);
  return { ra, dec, errorRadius: weightSum > 0 ? 1 / Math.sqrt(weightSum) : 0 };
}

/**
 * Label with the most evidence; `current` wins ties
 */
export function leadingLabel(evidence: Record<string, number>, current: string): string {
  let best = current;
  let bestScore = evidence[current] ?? -Infinity;
  for (const [label, score] of Object.entries(evidence).sort(([a], [b]) => a.localeCompare(b))) {
    if (score > bestScore) {
      best = label;
      bestScore = score;
    }
  }
  return best;
}

function withClassification(
  before: TransientNode,
  next: TransientNode,
  classification: string,
  confirmed: boolean,
  edges: GraphEdge[],
  now: string,
  attributes: GraphEdge['attributes'] = {}
): Transition {
  const changed = classification !== before.classification || confirmed !== before.classificationConfirmed;
  if (changed) {
    edges.push(
      makeEdge('CLASSIFIED_AS', next.id, classificationVertex(classification), now, undefined, {
        ...attributes,
        confirmed,
      })
    );
  }

  return {
    node: { ...next, classification, classificationConfirmed: confirmed },
    edges,
    corroborated: confirmed && !before.classificationConfirmed,
  };
}

function bump(node: TransientNode, stamp: Stamp): Pick<TransientNode, 'revision' | 'updatedSeq' | 'updatedAt'> {
  return { revision: node.revision + 1, updatedSeq: stamp.seq, updatedAt: stamp.now };
}

function union(a: string[], b: string[]): string[] {
  return [...a, ...b.filter(item => !a.includes(item))];
}
