/**
 * Graph Updater - applies resolver decisions to the store
 *
 * Each operation reads, transforms and commits under the locks of every
 * node, candidate and case it touches, and lands as one commit: a reader
 * never sees a candidate attached to a node whose position has not moved.
 * Node ids are resolved to their canonical node under the lock; if a merge
 * moved one while we waited, the locks are released and taken again.
 */
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import {
  CaseStateError,
  GraphIntegrityError,
  UnknownCaseError,
  UnknownNodeError,
} from '../utils/errors';
import type { ResolutionConfig } from '../config/resolution';
import type { GraphRepository } from '../graph-store/repository';
import { NodeLockManager, candidateLockKey, caseLockKey } from '../graph-store/locks';
import type { EventCandidate } from '../types/candidate';
import type { AmbiguousCase, CaseResolution, GraphEdge, TransientNode } from '../types/graph';
import { NODE_ID_PREFIX } from '../types/graph';
import type { MatchResult } from '../matcher/spatiotemporal-matcher';
import {
  Stamp,
  UNKNOWN_TYPE,
  absorbCandidate,
  combineNodes,
  confirmClassification,
  seedNode,
} from './node-state';

const MAX_LOCK_ATTEMPTS = 5;

export interface AttachResult {
  node: TransientNode;
  /** The node's classification became confirmed */
  corroborated: boolean;
}

export interface MergeResult {
  canonical: TransientNode;
  supersededId: string;
  corroborated: boolean;
}

export type CaseAction = { action: 'attach'; nodeId: string } | { action: 'create' };

export interface CaseResolutionResult {
  entry: AmbiguousCase;
  node: TransientNode;
  corroborated: boolean;
}

export interface CorroborationResult {
  node: TransientNode;
  /** False when the node already carried that confirmed label */
  changed: boolean;
}

export class GraphUpdater {
  constructor(
    private readonly store: GraphRepository,
    private readonly config: ResolutionConfig,
    private readonly locks: NodeLockManager = new NodeLockManager()
  ) {}

  /**
   * Store the candidate as the first evidence of a new node
   */
  async createNode(candidate: EventCandidate): Promise<TransientNode> {
    return this.locks.withLocks([candidateLockKey(candidate.candidateId)], async () => {
      const { node, edges } = seedNode(this.newNodeId(), candidate, this.stamp());
      await this.store.commit({ candidates: [candidate], nodes: [node], edges });

      logger.info({ nodeId: node.id, candidateId: candidate.candidateId }, 'Created transient node');
      return node;
    });
  }

  /**
   * Store the candidate and attach it to a node (or the node it was merged into)
   */
  async attachCandidate(candidate: EventCandidate, nodeId: string): Promise<AttachResult> {
    return this.withNodeLocks([nodeId], [candidateLockKey(candidate.candidateId)], async ([canonicalId]) => {
      const current = this.requireNode(canonicalId);
      const { node, edges, corroborated } = absorbCandidate(current, candidate, this.stamp());
      await this.store.commit({ candidates: [candidate], nodes: [node], edges });

      logger.info(
        { nodeId: node.id, candidateId: candidate.candidateId, candidates: node.candidateIds.length },
        'Attached candidate to transient node'
      );
      return { node, corroborated };
    });
  }

  /**
   * Store the candidate under a new open case; the competing nodes are not touched
   */
  async openCase(candidate: EventCandidate, competitors: MatchResult[]): Promise<AmbiguousCase> {
    return this.locks.withLocks([candidateLockKey(candidate.candidateId)], async () => {
      const entry: AmbiguousCase = {
        id: `case-${uuidv4()}`,
        candidateId: candidate.candidateId,
        ...this.competition(competitors),
        status: 'open',
        openedAt: new Date().toISOString(),
        revision: 1,
      };
      await this.store.commit({ candidates: [candidate], cases: [entry] });

      logger.info(
        { caseId: entry.id, candidateId: candidate.candidateId, competingNodeIds: entry.competingNodeIds },
        'Opened ambiguous case'
      );
      return entry;
    });
  }

  /**
   * Record fresh scores on a case that stays open
   */
  async rescoreCase(caseId: string, competitors: MatchResult[]): Promise<AmbiguousCase> {
    return this.locks.withLocks([caseLockKey(caseId)], async () => {
      const current = this.requireOpenCase(caseId);
      const entry: AmbiguousCase = {
        ...current,
        ...this.competition(competitors),
        revision: current.revision + 1,
      };
      await this.store.commit({ cases: [entry] });
      return entry;
    });
  }

  /**
   * Close an open case by attaching its candidate to a node or by starting
   * a new node with it
   */
  async resolveCase(
    caseId: string,
    action: CaseAction,
    reason: CaseResolution['reason'],
    mergedNodeIds: string[] = []
  ): Promise<CaseResolutionResult> {
    const entry = this.store.getCase(caseId);
    if (!entry) throw new UnknownCaseError(caseId);

    const keys = [caseLockKey(caseId), candidateLockKey(entry.candidateId)];
    const nodeIds = action.action === 'attach' ? [action.nodeId] : [];

    return this.withNodeLocks(nodeIds, keys, async canonicalIds => {
      const canonicalId: string | undefined = canonicalIds[0];
      const current = this.requireOpenCase(caseId);
      const candidate = this.store.getCandidate(current.candidateId);
      if (!candidate) {
        throw new GraphIntegrityError(`Case ${caseId} refers to unknown candidate ${current.candidateId}`);
      }

      const stamp = this.stamp();
      const transition =
        canonicalId !== undefined
          ? absorbCandidate(this.requireNode(canonicalId), candidate, stamp)
          : seedNode(this.newNodeId(), candidate, stamp);

      const resolved: AmbiguousCase = {
        ...current,
        status: 'resolved',
        resolvedAt: stamp.now,
        resolution: {
          action: canonicalId !== undefined ? 'attached' : 'created',
          nodeId: transition.node.id,
          reason,
          ...(mergedNodeIds.length > 0 ? { mergedNodeIds } : {}),
        },
        revision: current.revision + 1,
      };

      await this.store.commit({ nodes: [transition.node], edges: transition.edges, cases: [resolved] });
      metrics.casesResolvedTotal.inc({ reason });

      logger.info(
        { caseId, candidateId: current.candidateId, resolution: resolved.resolution },
        'Resolved ambiguous case'
      );
      return {
        entry: resolved,
        node: transition.node,
        corroborated: canonicalId !== undefined && transition.corroborated,
      };
    });
  }

  /**
   * Fold two nodes into one. The earlier-created node stays canonical; the
   * other is kept, marked as merged into it, and redirected.
   */
  async mergeNodes(
    firstId: string,
    secondId: string,
    reason: CaseResolution['reason'],
    score?: number
  ): Promise<MergeResult> {
    return this.withNodeLocks([firstId, secondId], [], async ([a, b]) => {
      if (a === b) {
        throw new GraphIntegrityError(`Nodes ${firstId} and ${secondId} are already one node`);
      }

      const nodeA = this.requireNode(a);
      const nodeB = this.requireNode(b);
      const [canonical, superseded] =
        nodeA.createdSeq < nodeB.createdSeq || (nodeA.createdSeq === nodeB.createdSeq && nodeA.id < nodeB.id)
          ? [nodeA, nodeB]
          : [nodeB, nodeA];

      const attributes: GraphEdge['attributes'] = { reason, ...(score !== undefined ? { score } : {}) };
      const merged = combineNodes(canonical, superseded, this.stamp(), attributes);

      await this.store.commit({
        nodes: [merged.canonical.node, merged.superseded],
        edges: merged.canonical.edges,
        redirects: [{ from: superseded.id, to: canonical.id }],
      });
      metrics.nodeMergesTotal.inc({ reason });

      logger.info({ canonicalId: canonical.id, supersededId: superseded.id, reason, score }, 'Merged transient nodes');
      return {
        canonical: merged.canonical.node,
        supersededId: superseded.id,
        corroborated: merged.canonical.corroborated,
      };
    });
  }

  /**
   * Confirm a node's classification from outside evidence
   * @param label new label; defaults to the node's current classification
   */
  async corroborate(nodeId: string, label?: string): Promise<CorroborationResult> {
    return this.withNodeLocks([nodeId], [], async ([canonicalId]) => {
      const current = this.requireNode(canonicalId);
      const target = label !== undefined ? this.config.eventTypes.aliases[label] ?? label : current.classification;

      if (target === UNKNOWN_TYPE) {
        throw new GraphIntegrityError(`Node ${canonicalId} has no classification to confirm`);
      }
      if (current.classificationConfirmed && current.classification === target) {
        return { node: current, changed: false };
      }

      const { node, edges } = confirmClassification(current, target, this.stamp());
      await this.store.commit({ nodes: [node], edges });

      logger.info({ nodeId: node.id, classification: target }, 'Corroborated transient node');
      return { node, changed: true };
    });
  }

  /**
   * Take the locks of the canonical forms of `nodeIds` plus `extraKeys` and
   * run `fn` with the canonical ids, retrying if a merge moved them meanwhile
   */
  private async withNodeLocks<T>(
    nodeIds: string[],
    extraKeys: string[],
    fn: (canonicalIds: string[]) => Promise<T>
  ): Promise<T> {
    for (let attempt = 1; attempt <= MAX_LOCK_ATTEMPTS; attempt++) {
      const expected = nodeIds.map(id => this.requireCanonical(id));
      const release = await this.locks.acquire([...expected, ...extraKeys]);
      try {
        const actual = nodeIds.map(id => this.requireCanonical(id));
        if (actual.every((id, index) => id === expected[index])) {
          return await fn(actual);
        }
        logger.debug({ nodeIds, expected, actual, attempt }, 'Node merged while waiting for its lock, retrying');
      } finally {
        release();
      }
    }
    throw new GraphIntegrityError(`Could not lock nodes ${nodeIds.join(', ')}: merges kept moving them`);
  }

  private requireCanonical(id: string): string {
    const canonical = this.store.resolveNodeId(id);
    if (canonical === undefined) throw new UnknownNodeError(id);
    return canonical;
  }

  private requireNode(id: string): TransientNode {
    const node = this.store.getNode(id);
    if (!node) throw new UnknownNodeError(id);
    return node;
  }

  private requireOpenCase(caseId: string): AmbiguousCase {
    const entry = this.store.getCase(caseId);
    if (!entry) throw new UnknownCaseError(caseId);
    if (entry.status !== 'open') {
      throw new CaseStateError(caseId, `Case ${caseId} is already ${entry.status}`);
    }
    return entry;
  }

  private competition(competitors: MatchResult[]): Pick<AmbiguousCase, 'competingNodeIds' | 'scores'> {
    const scores: Record<string, number> = {};
    for (const match of competitors) {
      scores[match.nodeId] = match.score;
    }
    return { competingNodeIds: competitors.map(match => match.nodeId), scores };
  }

  private stamp(): Stamp {
    return {
      seq: this.store.nextSequence(),
      now: new Date().toISOString(),
      floorDeg: this.config.matcher.minPositionalErrorDeg,
    };
  }

  private newNodeId(): string {
    return `${NODE_ID_PREFIX}${uuidv4()}`;
  }
}
