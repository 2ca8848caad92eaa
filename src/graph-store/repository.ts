/**
 * Storage boundary consumed by the matcher, resolver, updater and query
 * engine. Reads are synchronous snapshots; every write goes through a single
 * atomic `commit`.
 */
import type { EventCandidate } from '../types/candidate';
import type {
  AmbiguousCase,
  CandidateMembership,
  CaseStatus,
  ChangeSet,
  EdgeKind,
  GraphEdge,
  TransientNode,
} from '../types/graph';

export interface NodeListFilter {
  /** Skip superseded nodes (default true) */
  canonicalOnly?: boolean;
  /** Keep nodes whose [firstSeen, lastSeen] span overlaps this window */
  timeRange?: { fromMs?: number; toMs?: number };
  classification?: string[];
  instrument?: string[];
  limit?: number;
}

export interface EdgeListFilter {
  /** Edges touching or scoped to this node, merge chains included */
  nodeId?: string;
  /** Edges touching this vertex id (`instrument:…`, `class:…`, `candidate:…`) */
  endpoint?: string;
  kinds?: EdgeKind[];
}

export interface CaseListFilter {
  status?: CaseStatus;
  /** Cases listing this node, or a node merged into it, as a competitor */
  nodeId?: string;
  candidateId?: string;
}

export interface GraphStats {
  nodes: number;
  supersededNodes: number;
  edges: number;
  candidates: number;
  openCases: number;
  resolvedCases: number;
  sequence: number;
}

export interface GraphRepository {
  /** Monotonic store sequence used to order node creation and updates */
  nextSequence(): number;

  /** Node by id exactly as stored; superseded nodes included */
  getNode(id: string): TransientNode | undefined;
  /** Follow the redirect map to the canonical id */
  resolveNodeId(id: string): string | undefined;
  /** `[id, …, canonical]` */
  mergeChain(id: string): string[];
  /** Ids of every node whose merge chain ends at `canonicalId` */
  listSuperseded(canonicalId: string): string[];
  listNodes(filter?: NodeListFilter): TransientNode[];

  listEdges(filter?: EdgeListFilter): GraphEdge[];

  getCandidate(candidateId: string): EventCandidate | undefined;
  findMembership(candidateId: string): CandidateMembership | undefined;

  getCase(caseId: string): AmbiguousCase | undefined;
  listCases(filter?: CaseListFilter): AmbiguousCase[];

  /**
   * Persist and apply a change set. Readers observe all of it or none of it.
   * @throws RevisionConflictError when a node snapshot is stale
   * @throws StorageUnavailableError when the change could not be persisted
   */
  commit(changes: ChangeSet): Promise<void>;

  stats(): GraphStats;
}
