/**
 * Entity Resolver - turns ranked matches into a decision
 *
 *   no match at or above acceptance          → UNMATCHED    → create
 *   top match clearly ahead of every other   → SINGLE_MATCH → merge
 *   two or more matches within the margin    → MULTI_MATCH  → defer (open a case)
 *
 * Applied decisions end RESOLVED (create, merge) or AMBIGUOUS (defer).
 */
import { thresholdsFor } from '../config/resolution';
import type { ResolutionConfig } from '../config/resolution';
import type { EventCandidate } from '../types/candidate';
import type { TransientNode } from '../types/graph';
import type { MatchResult } from '../matcher/spatiotemporal-matcher';

export type ResolutionState = 'UNMATCHED' | 'SINGLE_MATCH' | 'MULTI_MATCH' | 'RESOLVED' | 'AMBIGUOUS';

export type ResolutionDecision =
  | { action: 'create'; state: 'UNMATCHED'; candidateId: string; bestScore?: number }
  | { action: 'merge'; state: 'SINGLE_MATCH'; candidateId: string; nodeId: string; score: number }
  | { action: 'defer'; state: 'MULTI_MATCH'; candidateId: string; competitors: MatchResult[] };

export interface NodeMergeProposal {
  canonicalId: string;
  supersededId: string;
  score: number;
}

/**
 * State a decision leaves the candidate in once applied
 */
export function settledState(decision: ResolutionDecision): Extract<ResolutionState, 'RESOLVED' | 'AMBIGUOUS'> {
  return decision.action === 'defer' ? 'AMBIGUOUS' : 'RESOLVED';
}

export class EntityResolver {
  constructor(private readonly config: ResolutionConfig) {}

  decide(candidate: EventCandidate, matches: MatchResult[]): ResolutionDecision {
    const { acceptanceThreshold, marginThreshold } = thresholdsFor(this.config, candidate.eventType);
    const top = matches[0];

    if (!top || top.score < acceptanceThreshold) {
      return {
        action: 'create',
        state: 'UNMATCHED',
        candidateId: candidate.candidateId,
        ...(top ? { bestScore: top.score } : {}),
      };
    }

    // A runner-up inside the margin blocks the merge even when it sits
    // below the acceptance threshold itself
    const competitors = matches.filter(match => top.score - match.score < marginThreshold);
    if (competitors.length === 1) {
      return {
        action: 'merge',
        state: 'SINGLE_MATCH',
        candidateId: candidate.candidateId,
        nodeId: top.nodeId,
        score: top.score,
      };
    }

    return { action: 'defer', state: 'MULTI_MATCH', candidateId: candidate.candidateId, competitors };
  }

  /**
   * Best pair of competing nodes that should be folded into one, if any.
   * The earlier-created node is canonical.
   */
  proposeNodeMerge(
    nodes: TransientNode[],
    compatibility: (a: TransientNode, b: TransientNode) => number
  ): NodeMergeProposal | undefined {
    let best: NodeMergeProposal | undefined;

    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        const score = compatibility(nodes[i], nodes[j]);
        if (score < this.config.resolver.nodeMergeThreshold) continue;
        if (best && score <= best.score) continue;

        const [canonical, superseded] = earlierFirst(nodes[i], nodes[j]);
        best = { canonicalId: canonical.id, supersededId: superseded.id, score };
      }
    }

    return best;
  }
}

function earlierFirst(a: TransientNode, b: TransientNode): [TransientNode, TransientNode] {
  if (a.createdSeq !== b.createdSeq) {
    return a.createdSeq < b.createdSeq ? [a, b] : [b, a];
  }
  return a.id < b.id ? [a, b] : [b, a];
}
