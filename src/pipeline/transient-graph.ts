/**
 * Transient graph - per-candidate orchestration of matcher, resolver and
 * updater over one explicit store handle.
 *
 * Emits:
 *   node-created        (node: TransientNode)
 *   candidate-attached  (node: TransientNode, candidateId: string)
 *   case-opened         (entry: AmbiguousCase)
 *   case-resolved       (entry: AmbiguousCase)
 *   nodes-merged        (merge: { canonicalId, supersededId, reason })
 *   node-corroborated   (nodeId: string)
 *
 * A node corroborated event re-scores the open cases referencing that node,
 * up to `resolver.maxCasesPerReevaluation` cases per event, cascading through
 * nodes that become corroborated along the way.
 */
import { EventEmitter } from 'events';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { GraphIntegrityError, UnknownCaseError, UnknownNodeError } from '../utils/errors';
import type { ResolutionConfig } from '../config/resolution';
import type { GraphRepository } from '../graph-store/repository';
import { NodeLockManager, SPAWN_LOCK_KEY } from '../graph-store/locks';
import { SpatiotemporalMatcher } from '../matcher/spatiotemporal-matcher';
import { EntityResolver, settledState } from '../resolver/entity-resolver';
import type { ResolutionDecision } from '../resolver/entity-resolver';
import { GraphUpdater } from '../updater/graph-updater';
import type { CaseResolutionResult } from '../updater/graph-updater';
import type { EventCandidate } from '../types/candidate';
import type { AmbiguousCase, CaseResolution, TransientNode } from '../types/graph';
import type { ProcessOutcome } from '../types/outcome';

export interface TransientGraphDeps {
  store: GraphRepository;
  config: ResolutionConfig;
  locks?: NodeLockManager;
}

export type ManualCaseAction =
  | { action: 'attach'; nodeId: string }
  | { action: 'create' }
  | { action: 'merge-nodes' };

export interface ReevaluationSummary {
  trigger: string;
  casesExamined: number;
  resolved: Array<{ caseId: string; action: 'attached' | 'created'; nodeId: string }>;
  merges: Array<{ canonicalId: string; supersededId: string }>;
  /** Cases were left unexamined because the bound was reached */
  truncated: boolean;
}

interface CaseReevaluation {
  resolution?: { caseId: string; action: 'attached' | 'created'; nodeId: string };
  merges: Array<{ canonicalId: string; supersededId: string }>;
  corroborated: string[];
}

export class TransientGraph extends EventEmitter {
  readonly store: GraphRepository;
  readonly matcher: SpatiotemporalMatcher;
  readonly resolver: EntityResolver;
  readonly updater: GraphUpdater;
  private readonly locks: NodeLockManager;

  constructor(private readonly deps: TransientGraphDeps) {
    super();
    this.store = deps.store;
    this.locks = deps.locks ?? new NodeLockManager();
    this.matcher = new SpatiotemporalMatcher(deps.store, deps.config);
    this.resolver = new EntityResolver(deps.config);
    this.updater = new GraphUpdater(deps.store, deps.config, this.locks);
  }

  /**
   * Match, decide and apply one candidate. Re-submitting a stored candidate
   * changes nothing and reports `duplicate`.
   *
   * New nodes are only created under the spawn lock, after matching again:
   * partitions run concurrently and a detection of the same transient may
   * have produced a node since the first look.
   */
  async process(candidate: EventCandidate): Promise<ProcessOutcome> {
    const existing = this.duplicateOutcome(candidate.candidateId);
    if (existing) return existing;

    try {
      const decision = this.decide(candidate);
      if (decision.action !== 'create') {
        return await this.apply(candidate, decision);
      }

      return await this.locks.withLocks([SPAWN_LOCK_KEY], async () => {
        const duplicate = this.duplicateOutcome(candidate.candidateId);
        if (duplicate) return duplicate;
        return this.apply(candidate, this.decide(candidate));
      });
    } catch (err) {
      // Lost a race against a concurrent submission of the same candidate
      const duplicate = err instanceof GraphIntegrityError ? this.duplicateOutcome(candidate.candidateId) : undefined;
      if (duplicate) return duplicate;
      throw err;
    }
  }

  /**
   * Close a case by hand. `merge-nodes` folds every competing node into the
   * earliest-created one and attaches the candidate there.
   */
  async resolveCaseManually(caseId: string, request: ManualCaseAction): Promise<AmbiguousCase> {
    const entry = this.store.getCase(caseId);
    if (!entry) throw new UnknownCaseError(caseId);

    let result: CaseResolutionResult;
    if (request.action === 'merge-nodes') {
      const merges = await this.mergeAll(this.competingNodes(entry), 'manual');
      const canonicalId = this.requireCanonical(entry.competingNodeIds[0]);
      result = await this.updater.resolveCase(
        caseId,
        { action: 'attach', nodeId: canonicalId },
        'manual',
        merges.map(merge => merge.supersededId)
      );
    } else {
      result = await this.updater.resolveCase(caseId, request, 'manual');
    }

    this.emit(result.entry.resolution?.action === 'created' ? 'node-created' : 'candidate-attached', result.node, entry.candidateId);
    this.emit('case-resolved', result.entry);

    if (result.corroborated) {
      await this.reevaluate(result.node.id);
    }
    return result.entry;
  }

  /**
   * Confirm a node's classification from outside evidence and re-evaluate
   * the cases that reference it
   */
  async corroborate(
    nodeId: string,
    label?: string
  ): Promise<{ node: TransientNode; changed: boolean; reevaluation: ReevaluationSummary }> {
    const { node, changed } = await this.updater.corroborate(nodeId, label);
    const reevaluation = await this.reevaluate(node.id);
    const current = this.store.getNode(node.id) ?? node;
    return { node: current, changed, reevaluation };
  }

  /**
   * Handle a node corroborated event
   */
  async reevaluate(nodeId: string): Promise<ReevaluationSummary> {
    metrics.reevaluationsTotal.inc();
    this.emit('node-corroborated', nodeId);

    const summary: ReevaluationSummary = { trigger: nodeId, casesExamined: 0, resolved: [], merges: [], truncated: false };
    const budget = this.deps.config.resolver.maxCasesPerReevaluation;
    const examined = new Set<string>();
    const queue = [nodeId];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      const cases = this.store
        .listCases({ status: 'open', nodeId: current })
        .filter(entry => !examined.has(entry.id));

      for (const entry of cases) {
        if (summary.casesExamined >= budget) {
          summary.truncated = true;
          break;
        }
        examined.add(entry.id);
        summary.casesExamined++;

        const outcome = await this.reevaluateCase(entry.id);
        summary.merges.push(...outcome.merges);
        if (outcome.resolution) summary.resolved.push(outcome.resolution);
        queue.push(...outcome.corroborated);
      }

      if (summary.truncated) break;
    }

    logger.info(summary, 'Re-evaluated ambiguous cases');
    return summary;
  }

  private decide(candidate: EventCandidate): ResolutionDecision {
    const decision = this.resolver.decide(candidate, this.matcher.findMatches(candidate));
    logger.debug(
      { candidateId: candidate.candidateId, action: decision.action, state: decision.state, settled: settledState(decision) },
      'Candidate resolved against the graph'
    );
    return decision;
  }

  private async apply(candidate: EventCandidate, decision: ResolutionDecision): Promise<ProcessOutcome> {
    switch (decision.action) {
      case 'create': {
        const node = await this.updater.createNode(candidate);
        this.emit('node-created', node);
        return { status: 'created', candidateId: candidate.candidateId, nodeId: node.id };
      }

      case 'merge': {
        const { node, corroborated } = await this.updater.attachCandidate(candidate, decision.nodeId);
        this.emit('candidate-attached', node, candidate.candidateId);
        if (corroborated) {
          await this.reevaluate(node.id);
        }
        return {
          status: 'merged',
          candidateId: candidate.candidateId,
          nodeId: this.store.resolveNodeId(node.id) ?? node.id,
          score: decision.score,
        };
      }

      case 'defer': {
        const entry = await this.updater.openCase(candidate, decision.competitors);
        this.emit('case-opened', entry);
        return {
          status: 'ambiguous',
          candidateId: candidate.candidateId,
          caseId: entry.id,
          competingNodeIds: entry.competingNodeIds,
        };
      }
    }
  }

  /**
   * Merge competing nodes that turned out to be one transient, then decide
   * the case again against what is left
   */
  private async reevaluateCase(caseId: string): Promise<CaseReevaluation> {
    const result: CaseReevaluation = { merges: [], corroborated: [] };

    const entry = this.store.getCase(caseId);
    if (!entry || entry.status !== 'open') return result;

    const candidate = this.store.getCandidate(entry.candidateId);
    if (!candidate) {
      throw new GraphIntegrityError(`Case ${caseId} refers to unknown candidate ${entry.candidateId}`);
    }

    const merges = await this.mergeAll(this.competingNodes(entry), 'reevaluation');
    for (const merge of merges) {
      result.merges.push({ canonicalId: merge.canonicalId, supersededId: merge.supersededId });
      if (merge.corroborated) result.corroborated.push(merge.canonicalId);
    }

    const matches = this.matcher.rankAgainst(candidate, this.competingNodes(entry));
    const decision = this.resolver.decide(candidate, matches);

    if (decision.action === 'defer') {
      if (this.scoresChanged(entry, decision.competitors)) {
        await this.updater.rescoreCase(caseId, decision.competitors);
      }
      logger.debug({ caseId, competitors: decision.competitors.length }, 'Case remains ambiguous');
      return result;
    }

    const resolution = await this.updater.resolveCase(
      caseId,
      decision.action === 'merge' ? { action: 'attach', nodeId: decision.nodeId } : { action: 'create' },
      'reevaluation',
      merges.map(merge => merge.supersededId)
    );

    this.emit(decision.action === 'merge' ? 'candidate-attached' : 'node-created', resolution.node, entry.candidateId);
    this.emit('case-resolved', resolution.entry);

    result.resolution = {
      caseId,
      action: decision.action === 'merge' ? 'attached' : 'created',
      nodeId: resolution.node.id,
    };
    if (resolution.corroborated) result.corroborated.push(resolution.node.id);
    return result;
  }

  /**
   * Repeatedly fold the most compatible pair among `nodes` until no pair
   * reaches the merge threshold (or, for manual merges, until one is left)
   */
  private async mergeAll(
    nodes: TransientNode[],
    reason: CaseResolution['reason']
  ): Promise<Array<{ canonicalId: string; supersededId: string; corroborated: boolean }>> {
    const merges: Array<{ canonicalId: string; supersededId: string; corroborated: boolean }> = [];
    let remaining = nodes;

    while (remaining.length > 1) {
      let pair: { canonicalId: string; supersededId: string; score?: number } | undefined;

      if (reason === 'manual') {
        const [first, second] = [...remaining].sort((a, b) => a.createdSeq - b.createdSeq);
        pair = { canonicalId: first.id, supersededId: second.id };
      } else {
        pair = this.resolver.proposeNodeMerge(remaining, (a, b) => this.matcher.nodeCompatibility(a, b));
      }
      if (!pair) break;

      const merge = await this.updater.mergeNodes(pair.canonicalId, pair.supersededId, reason, pair.score);
      merges.push({ canonicalId: merge.canonical.id, supersededId: merge.supersededId, corroborated: merge.corroborated });
      this.emit('nodes-merged', { canonicalId: merge.canonical.id, supersededId: merge.supersededId, reason });

      remaining = this.canonicalNodes(remaining.map(node => node.id));
    }

    return merges;
  }

  private competingNodes(entry: AmbiguousCase): TransientNode[] {
    return this.canonicalNodes(entry.competingNodeIds);
  }

  /**
   * Current canonical snapshots of `ids`, deduplicated, in first-seen order
   */
  private canonicalNodes(ids: string[]): TransientNode[] {
    const seen = new Set<string>();
    const nodes: TransientNode[] = [];
    for (const id of ids) {
      const canonical = this.store.resolveNodeId(id);
      if (canonical === undefined || seen.has(canonical)) continue;
      seen.add(canonical);
      const node = this.store.getNode(canonical);
      if (node) nodes.push(node);
    }
    return nodes;
  }

  private scoresChanged(entry: AmbiguousCase, competitors: Array<{ nodeId: string; score: number }>): boolean {
    if (competitors.length !== entry.competingNodeIds.length) return true;
    return competitors.some(
      (match, index) => match.nodeId !== entry.competingNodeIds[index] || match.score !== entry.scores[match.nodeId]
    );
  }

  private requireCanonical(id: string): string {
    const canonical = this.store.resolveNodeId(id);
    if (canonical === undefined) throw new UnknownNodeError(id);
    return canonical;
  }

  private duplicateOutcome(candidateId: string): ProcessOutcome | undefined {
    const membership = this.store.findMembership(candidateId);
    if (!membership) return undefined;

    logger.info({ candidateId, membership }, 'Candidate already stored, skipping');
    return membership.kind === 'node'
      ? { status: 'duplicate', candidateId, nodeId: membership.nodeId }
      : { status: 'duplicate', candidateId, caseId: membership.caseId };
  }
}
