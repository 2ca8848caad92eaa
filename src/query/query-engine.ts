/**
 * Query Engine - read-only access to the graph
 *
 * Every id a caller passes in is resolved through the merge chain first, and
 * only canonical nodes come back, except from `history`, which exists to
 * show the superseded ones.
 *
 * Traversal moves from node to node across the shared instrument and
 * classification vertices (two edges per hop). Candidate vertices and
 * temporal succession belong to a node's own history and are not crossed.
 */
import { setImmediate } from 'timers/promises';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import Config from '../config';
import { QueryLimitExceededError, UnknownNodeError } from '../utils/errors';
import { SchemaValidationError } from '../utils/schema-validator';
import { angularSeparation } from '../utils/sky';
import type { CaseListFilter, GraphRepository, NodeListFilter } from '../graph-store/repository';
import type { AmbiguousCase, EdgeKind, GraphEdge, TransientNode } from '../types/graph';
import { classificationVertex, isNodeId } from '../types/graph';
import type {
  EdgeSummary,
  HistoryResult,
  NodeFilter,
  NodeSummary,
  QueryRequest,
  QueryResult,
} from '../types/query';

export interface QueryLimits {
  maxDepth: number;
  maxResults: number;
}

export interface TraversalOptions {
  edgeKinds?: EdgeKind[];
  depth?: number;
  limit?: number;
  filter?: NodeFilter;
  signal?: AbortSignal;
}

// Edge kinds that link a node to a shared entity vertex
const CROSSABLE_KINDS: readonly EdgeKind[] = ['CO_DETECTED_BY', 'CLASSIFIED_AS'];

export class QueryEngine {
  constructor(
    private readonly store: GraphRepository,
    private readonly limits: QueryLimits = Config.query
  ) {}

  /**
   * Run a validated query request
   */
  async execute(request: QueryRequest, signal?: AbortSignal): Promise<QueryResult> {
    const endTimer = metrics.queryDuration.startTimer({ traversal: request.traversal });
    try {
      switch (request.traversal) {
        case 'lookup': {
          const node = this.getNode(this.requireRoot(request));
          return { nodes: [node], edges: [], truncated: false };
        }
        case 'neighbors':
          return await this.neighbors(this.requireRoot(request), {
            edgeKinds: request.edgeKinds,
            limit: request.limit,
            filter: request.filter,
            signal,
          });
        case 'traverse':
          return await this.traverse(this.requireRoot(request), {
            edgeKinds: request.edgeKinds,
            depth: request.depth,
            limit: request.limit,
            filter: request.filter,
            signal,
          });
        case 'search':
          return this.search(request.filter ?? {}, request.limit);
        case 'nearest': {
          if (!request.position) {
            throw new SchemaValidationError('Invalid query request', [
              { path: '/position', message: 'is required for nearest' },
            ]);
          }
          return this.nearest(request.position, request.limit, request.filter);
        }
      }
    } catch (err) {
      if (err instanceof QueryLimitExceededError) {
        metrics.queryTruncationsTotal.inc({ limit: err.limit });
      }
      throw err;
    } finally {
      endTimer();
    }
  }

  /**
   * The canonical node an id resolves to
   * @throws UnknownNodeError
   */
  getNode(id: string): NodeSummary {
    return toNodeSummary(this.requireCanonicalNode(id));
  }

  /**
   * Merge chain, superseded nodes, candidates and edges of a node
   */
  history(id: string): HistoryResult {
    const node = this.requireCanonicalNode(id);

    const superseded: HistoryResult['superseded'] = [];
    for (const supersededId of this.store.listSuperseded(node.id)) {
      const old = this.store.getNode(supersededId);
      if (old?.mergedInto !== undefined) {
        superseded.push({ ...toNodeSummary(old), mergedInto: old.mergedInto });
      }
    }

    const candidates = node.candidateIds.flatMap(candidateId => {
      const candidate = this.store.getCandidate(candidateId);
      return candidate ? [candidate] : [];
    });

    return {
      nodeId: node.id,
      chain: this.store.mergeChain(id),
      node: toNodeSummary(node),
      superseded,
      candidates,
      edges: this.store.listEdges({ nodeId: node.id }).map(edge => this.toEdgeSummary(edge)),
    };
  }

  /**
   * Nodes one hop away
   * @throws QueryLimitExceededError when more neighbors exist than `limit`
   */
  async neighbors(id: string, options: Omit<TraversalOptions, 'depth'> = {}): Promise<QueryResult> {
    return this.walk(id, { ...options, depth: 1 });
  }

  /**
   * Breadth-first walk from a node, up to `depth` hops
   * @throws QueryLimitExceededError when the configured depth cap or the
   * result limit cut the walk short
   */
  async traverse(id: string, options: TraversalOptions = {}): Promise<QueryResult> {
    return this.walk(id, options);
  }

  /**
   * Canonical nodes matching a filter, earliest first
   * @throws QueryLimitExceededError when more than `limit` nodes match
   */
  search(filter: NodeFilter, limit?: number): QueryResult {
    const cap = this.resultCap(limit);
    const matched = this.store
      .listNodes(this.storeFilter(filter))
      .filter(node => this.matchesFilter(node, filter))
      .sort((a, b) => a.firstSeenMs - b.firstSeenMs || a.id.localeCompare(b.id));

    const nodes = matched.slice(0, cap).map(node => toNodeSummary(node));
    if (matched.length > cap) {
      throw new QueryLimitExceededError('results', { nodes, edges: [], truncated: true, truncatedBy: 'results' });
    }
    return { nodes, edges: [], truncated: false };
  }

  /**
   * Canonical nodes closest to a position; `distance` is the separation in degrees
   */
  nearest(position: { ra: number; dec: number }, limit?: number, filter: NodeFilter = {}): QueryResult {
    const cap = this.resultCap(limit);
    const ranked = this.store
      .listNodes(this.storeFilter(filter))
      .filter(node => this.matchesFilter(node, filter))
      .map(node => ({ node, distance: angularSeparation(position, node.position) }))
      .sort((a, b) => a.distance - b.distance || a.node.id.localeCompare(b.node.id));

    return {
      nodes: ranked.slice(0, cap).map(({ node, distance }) => toNodeSummary(node, distance)),
      edges: [],
      truncated: false,
    };
  }

  /**
   * Ambiguous cases, oldest first
   */
  listCases(filter: CaseListFilter = {}): AmbiguousCase[] {
    return this.store.listCases(filter);
  }

  /**
   * Yields to the event loop between levels, so an abort raised while the
   * walk is under way stops it at the next level.
   */
  private async walk(id: string, options: TraversalOptions): Promise<QueryResult> {
    const kinds = crossableKinds(options.edgeKinds);
    const root = this.requireCanonicalNode(id);
    const maxDepth = Math.min(options.depth ?? this.limits.maxDepth, this.limits.maxDepth);
    // Stopping at a depth the caller asked for is completion; stopping at the cap is not
    const depthCapped = options.depth === undefined || options.depth > this.limits.maxDepth;
    const cap = this.resultCap(options.limit);
    const filter = options.filter ?? {};

    const visited = new Set<string>([root.id]);
    const crossed = new Set<string>();
    const edges = new Map<string, GraphEdge>();
    const nodes: NodeSummary[] = [];

    let frontier: TransientNode[] = [root];
    let depth = 0;

    while (frontier.length > 0 && (depth < maxDepth || depthCapped)) {
      if (depth > 0) await setImmediate();
      options.signal?.throwIfAborted();

      const next: TransientNode[] = [];
      for (const from of frontier) {
        for (const hop of this.hops(from, kinds, crossed)) {
          if (visited.has(hop.node.id)) continue;

          if (depth >= maxDepth) {
            return this.truncate('depth', nodes, edges);
          }

          visited.add(hop.node.id);
          for (const edge of hop.edges) edges.set(edge.id, edge);
          next.push(hop.node);

          if (this.matchesFilter(hop.node, filter)) {
            if (nodes.length >= cap) {
              return this.truncate('results', nodes, edges);
            }
            nodes.push(toNodeSummary(hop.node, depth + 1));
          }
        }
      }

      frontier = next;
      depth += 1;
    }

    logger.debug({ root: root.id, depth, nodes: nodes.length }, 'Traversal finished');
    return { nodes, edges: [...edges.values()].map(edge => this.toEdgeSummary(edge)), truncated: false };
  }

  /**
   * Nodes reachable from `from` through one shared entity vertex
   */
  private hops(
    from: TransientNode,
    kinds: EdgeKind[],
    crossed: Set<string>
  ): Array<{ node: TransientNode; edges: GraphEdge[] }> {
    const hops: Array<{ node: TransientNode; edges: GraphEdge[] }> = [];

    for (const outbound of this.store.listEdges({ nodeId: from.id, kinds })) {
      const vertex = outbound.to;
      if (isNodeId(vertex) || crossed.has(vertex)) continue;
      if (!this.currentlyLinked(from, outbound)) continue;
      crossed.add(vertex);

      for (const inbound of this.store.listEdges({ endpoint: vertex, kinds: [outbound.kind] })) {
        const nodeId = this.store.resolveNodeId(inbound.from);
        if (nodeId === undefined || nodeId === from.id) continue;

        const node = this.store.getNode(nodeId);
        if (!node || !this.currentlyLinked(node, inbound)) continue;
        hops.push({ node, edges: [outbound, inbound] });
      }
    }

    return hops;
  }

  /**
   * Classification edges are history; only the node's current label links it
   */
  private currentlyLinked(node: TransientNode, edge: GraphEdge): boolean {
    return edge.kind !== 'CLASSIFIED_AS' || edge.to === classificationVertex(node.classification);
  }

  private truncate(limit: 'depth' | 'results', nodes: NodeSummary[], edges: Map<string, GraphEdge>): never {
    throw new QueryLimitExceededError(limit, {
      nodes,
      edges: [...edges.values()].map(edge => this.toEdgeSummary(edge)),
      truncated: true,
      truncatedBy: limit,
    });
  }

  private storeFilter(filter: NodeFilter): NodeListFilter {
    return {
      classification: toList(filter.classification),
      instrument: toList(filter.instrument),
      timeRange: filter.timeRange
        ? {
            fromMs: parseBound(filter.timeRange.from, '/filter/timeRange/from'),
            toMs: parseBound(filter.timeRange.to, '/filter/timeRange/to'),
          }
        : undefined,
    };
  }

  private matchesFilter(node: TransientNode, filter: NodeFilter): boolean {
    const classifications = toList(filter.classification);
    if (classifications && !classifications.includes(node.classification)) return false;

    const instruments = toList(filter.instrument);
    if (instruments && !node.instruments.some(tag => instruments.includes(tag))) return false;

    if (filter.timeRange) {
      const fromMs = parseBound(filter.timeRange.from, '/filter/timeRange/from') ?? -Infinity;
      const toMs = parseBound(filter.timeRange.to, '/filter/timeRange/to') ?? Infinity;
      if (node.lastSeenMs < fromMs || node.firstSeenMs > toMs) return false;
    }

    if (filter.cone && angularSeparation(filter.cone, node.position) > filter.cone.radiusDeg) return false;
    if (filter.name !== undefined && !node.names.some(name => name.toLowerCase() === filter.name?.toLowerCase())) {
      return false;
    }
    if (filter.confirmedOnly && !node.classificationConfirmed) return false;

    return true;
  }

  private resultCap(limit?: number): number {
    return Math.min(limit ?? this.limits.maxResults, this.limits.maxResults);
  }

  private requireRoot(request: QueryRequest): string {
    if (!request.root) {
      throw new SchemaValidationError('Invalid query request', [
        { path: '/root', message: `is required for ${request.traversal}` },
      ]);
    }
    return request.root;
  }

  private requireCanonicalNode(id: string): TransientNode {
    const canonical = this.store.resolveNodeId(id);
    const node = canonical !== undefined ? this.store.getNode(canonical) : undefined;
    if (!node) throw new UnknownNodeError(id);
    return node;
  }

  private toEdgeSummary(edge: GraphEdge): EdgeSummary {
    const resolve = (vertex: string): string =>
      isNodeId(vertex) ? this.store.resolveNodeId(vertex) ?? vertex : vertex;
    return { id: edge.id, kind: edge.kind, from: resolve(edge.from), to: resolve(edge.to), createdAt: edge.createdAt };
  }
}

export function toNodeSummary(node: TransientNode, distance?: number): NodeSummary {
  return {
    id: node.id,
    classification: node.classification,
    classificationConfirmed: node.classificationConfirmed,
    position: { ...node.position },
    firstSeen: node.firstSeen,
    lastSeen: node.lastSeen,
    candidateCount: node.candidateIds.length,
    instruments: [...node.instruments],
    names: [...node.names],
    revision: node.revision,
    ...(distance !== undefined ? { distance } : {}),
  };
}

/**
 * @throws SchemaValidationError for a kind that does not lead to a shared vertex
 */
function crossableKinds(requested: EdgeKind[] | undefined): EdgeKind[] {
  if (requested === undefined) return [...CROSSABLE_KINDS];

  const issues = requested.flatMap((kind, index) =>
    CROSSABLE_KINDS.includes(kind)
      ? []
      : [{ path: `/edgeKinds/${index}`, message: `must be one of ${CROSSABLE_KINDS.join(', ')}` }]
  );
  if (issues.length > 0) {
    throw new SchemaValidationError('Invalid query request', issues);
  }
  return requested;
}

function toList(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
}

function parseBound(value: string | undefined, path: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new SchemaValidationError('Invalid query request', [{ path, message: 'must be a date-time' }]);
  }
  return ms;
}
