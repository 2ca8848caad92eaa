/**
 * Spatiotemporal Matcher - scores a candidate against the nodes it could
 * belong to. Read-only with respect to the graph.
 *
 * A node is eligible when the candidate time falls inside the node's time
 * span widened by the temporal tolerance. Eligible nodes are scored by
 * positional agreement, raised for the same or a cooperating instrument,
 * and zeroed when both sides carry confirmed, conflicting event types.
 */
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { angularSeparation } from '../utils/sky';
import { areCooperating, thresholdsFor, typesConflict } from '../config/resolution';
import type { ResolutionConfig } from '../config/resolution';
import type { GraphRepository } from '../graph-store/repository';
import type { EventCandidate, SkyPosition } from '../types/candidate';
import type { TransientNode } from '../types/graph';

export interface MatchResult {
  nodeId: string;
  /** Combined score in [0, 1] */
  score: number;
  spatialScore: number;
  separationDeg: number;
  /** Combined positional uncertainty the separation was measured against */
  sigmaDeg: number;
  bonus: number;
}

interface Scored {
  result: MatchResult;
  node: TransientNode;
}

export class SpatiotemporalMatcher {
  constructor(
    private readonly store: GraphRepository,
    private readonly config: ResolutionConfig
  ) {}

  /**
   * Ranked matches with a positive score, best first. An empty list means
   * the candidate is a new transient.
   */
  findMatches(candidate: EventCandidate): MatchResult[] {
    const endTimer = metrics.matchDuration.startTimer();

    const windowMs = this.widestToleranceSec() * 1000;
    const nodes = this.store.listNodes({
      timeRange: { fromMs: candidate.timestampMs - windowMs, toMs: candidate.timestampMs + windowMs },
    });

    const ranked = this.rankAgainst(candidate, nodes);
    endTimer();

    logger.debug(
      {
        candidateId: candidate.candidateId,
        eligible: nodes.length,
        matches: ranked.map(match => ({ nodeId: match.nodeId, score: match.score })),
      },
      'Scored candidate against graph'
    );
    return ranked;
  }

  /**
   * Score and rank a candidate against a given set of nodes, dropping
   * zero scores
   */
  rankAgainst(candidate: EventCandidate, nodes: TransientNode[]): MatchResult[] {
    const scored: Scored[] = [];
    for (const node of nodes) {
      const result = this.score(candidate, node);
      if (result.score > 0) {
        scored.push({ result, node });
      }
    }
    return this.rank(scored);
  }

  /**
   * Score one candidate against one node; zero outside the temporal gate
   */
  score(candidate: EventCandidate, node: TransientNode): MatchResult {
    const separationDeg = angularSeparation(candidate.position, node.position);
    const sigmaDeg = this.combinedSigma(candidate.position, node.position);
    const base: MatchResult = { nodeId: node.id, score: 0, spatialScore: 0, separationDeg, sigmaDeg, bonus: 0 };

    const toleranceMs = Math.max(this.toleranceSec(candidate.eventType), this.toleranceSec(node.classification)) * 1000;
    if (candidate.timestampMs < node.firstSeenMs - toleranceMs || candidate.timestampMs > node.lastSeenMs + toleranceMs) {
      return base;
    }

    if (
      candidate.typeConfirmed &&
      node.classificationConfirmed &&
      typesConflict(this.config, candidate.eventType, node.classification)
    ) {
      return base;
    }

    const spatialScore = this.spatial(separationDeg, sigmaDeg);
    const bonus = this.instrumentBonus(candidate.instrument, node.instruments);

    return {
      ...base,
      score: Math.min(1, spatialScore * (1 + bonus)),
      spatialScore,
      bonus,
    };
  }

  /**
   * Likelihood that two nodes are one transient: positional agreement of
   * their centroids, provided their widened time spans overlap and their
   * confirmed types do not conflict.
   */
  nodeCompatibility(a: TransientNode, b: TransientNode): number {
    const toleranceMs = Math.max(this.toleranceSec(a.classification), this.toleranceSec(b.classification)) * 1000;
    if (a.firstSeenMs - toleranceMs > b.lastSeenMs + toleranceMs || b.firstSeenMs - toleranceMs > a.lastSeenMs + toleranceMs) {
      return 0;
    }

    if (a.classificationConfirmed && b.classificationConfirmed && typesConflict(this.config, a.classification, b.classification)) {
      return 0;
    }

    return this.spatial(angularSeparation(a.position, b.position), this.combinedSigma(a.position, b.position));
  }

  private spatial(separationDeg: number, sigmaDeg: number): number {
    const ratio = separationDeg / sigmaDeg;
    if (ratio > this.config.matcher.maxSeparationSigma) return 0;
    return Math.exp(-0.5 * ratio * ratio);
  }

  private combinedSigma(a: SkyPosition, b: SkyPosition): number {
    const floor = this.config.matcher.minPositionalErrorDeg;
    const sa = Math.max(a.errorRadius, floor);
    const sb = Math.max(b.errorRadius, floor);
    return Math.sqrt(sa * sa + sb * sb);
  }

  private instrumentBonus(instrument: string, nodeInstruments: string[]): number {
    if (nodeInstruments.includes(instrument)) {
      return this.config.matcher.sameInstrumentBonus;
    }
    if (nodeInstruments.some(other => areCooperating(this.config, instrument, other))) {
      return this.config.matcher.cooperatingInstrumentBonus;
    }
    return 0;
  }

  private toleranceSec(eventType: string): number {
    return thresholdsFor(this.config, eventType).temporalToleranceSec;
  }

  private widestToleranceSec(): number {
    const overrides = Object.values(this.config.eventTypeOverrides).map(
      override => override.temporalToleranceSec ?? 0
    );
    return Math.max(this.config.matcher.temporalToleranceSec, ...overrides);
  }

  /**
   * Best first. Scores within `tieEpsilon` of the top are ordered by smaller
   * positional uncertainty, then most recently updated, then id.
   */
  private rank(scored: Scored[]): MatchResult[] {
    if (scored.length === 0) return [];

    scored.sort((a, b) => b.result.score - a.result.score || a.node.id.localeCompare(b.node.id));

    const top = scored[0].result.score;
    const epsilon = this.config.matcher.tieEpsilon;
    const tied = scored.filter(entry => top - entry.result.score <= epsilon);
    const rest = scored.slice(tied.length);

    tied.sort(
      (a, b) =>
        a.node.position.errorRadius - b.node.position.errorRadius ||
        b.node.updatedSeq - a.node.updatedSeq ||
        a.node.id.localeCompare(b.node.id)
    );

    return [...tied, ...rest].map(entry => entry.result);
  }
}
