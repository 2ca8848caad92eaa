/**
 * Graph Store - In-process implementation of the storage boundary
 *
 * Nodes live in an arena keyed by stable id and are never removed; a merge
 * adds an entry to the redirect map from the superseded id to the canonical
 * one. Edges are append-only and indexed by the canonical id of each node
 * they touch, so the index follows merges without rewriting edges.
 *
 * Every commit is appended to a JSON-lines journal as a single line before it
 * is applied in memory; the journal is replayed on start and compacted once
 * it grows past the compactor's thresholds. An empty journal path keeps the
 * graph in memory only.
 */
import { dirname } from 'path';
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import Config from '../config';
import { Compactor, DefaultCompactor, isErrnoException } from './compactor';
import { GraphIntegrityError, RevisionConflictError, StorageUnavailableError } from '../utils/errors';
import type { EventCandidate } from '../types/candidate';
import type {
  AmbiguousCase,
  CandidateMembership,
  ChangeSet,
  GraphEdge,
  TransientNode,
} from '../types/graph';
import { isNodeId } from '../types/graph';
import type {
  CaseListFilter,
  EdgeListFilter,
  GraphRepository,
  GraphStats,
  NodeListFilter,
} from './repository';

export interface Redirect {
  from: string;
  to: string;
}

export type JournalRecord =
  | { type: 'candidate'; data: EventCandidate }
  | { type: 'node'; data: TransientNode }
  | { type: 'edge'; data: GraphEdge }
  | { type: 'case'; data: AmbiguousCase }
  | { type: 'redirect'; data: Redirect };

/** One line of the journal: a whole commit, or a single record written by compaction */
type JournalEntry = JournalRecord | { type: 'commit'; records: JournalRecord[] };

const RECORD_TYPES: ReadonlySet<string> = new Set(['candidate', 'node', 'edge', 'case', 'redirect']);

export interface GraphStoreOptions {
  /** Journal file; `null` or empty keeps the graph in memory only */
  journalPath?: string | null;
  fsync?: boolean;
  compactor?: Compactor;
}

export class GraphStore implements GraphRepository {
  // Arena of every node ever created, superseded ones included
  private nodes: Map<string, TransientNode> = new Map();
  // superseded id -> the node it was merged into
  private redirects: Map<string, string> = new Map();

  private edges: Map<string, GraphEdge> = new Map();
  private edgeOrder: Map<string, number> = new Map();
  // vertex id (canonical for nodes) -> ids of edges touching or scoped to it
  private edgeIndex: Map<string, Set<string>> = new Map();

  private candidates: Map<string, EventCandidate> = new Map();
  // candidate id -> node whose evidence list it was attached to
  private membership: Map<string, string> = new Map();

  private cases: Map<string, AmbiguousCase> = new Map();
  private openCaseByCandidate: Map<string, string> = new Map();

  private sequence = 0;
  private edgeSequence = 0;

  // Commits are applied one at a time, in call order
  private commitChain: Promise<void> = Promise.resolve();
  private commitsSinceCompaction = 0;

  private readonly journalPath: string | null;
  private readonly fsync: boolean;
  private readonly compactor: Compactor;

  constructor(options: GraphStoreOptions = {}) {
    const path = options.journalPath === undefined ? Config.storage.journalPath : options.journalPath;
    this.journalPath = path ? path : null;
    this.fsync = options.fsync ?? Config.storage.fsync;
    this.compactor = options.compactor ?? new DefaultCompactor();
  }

  get persistent(): boolean {
    return this.journalPath !== null;
  }

  /**
   * Replay the journal into memory. A missing journal starts an empty graph.
   */
  async init(): Promise<void> {
    if (!this.journalPath) {
      logger.info('Graph store running in memory only');
      this.updateMetrics();
      return;
    }

    logger.info({ path: this.journalPath }, 'Initializing graph store');

    let data: string;
    try {
      data = await fs.readFile(this.journalPath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        logger.info({ path: this.journalPath }, 'No journal found, starting with an empty graph');
        this.updateMetrics();
        return;
      }
      logger.error({ error: err, path: this.journalPath }, 'Error reading graph journal');
      throw new StorageUnavailableError('Failed to read graph journal', err);
    }

    let replayed = 0;
    let skipped = 0;
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        // A torn final line is what a crash mid-append leaves behind
        skipped++;
        logger.warn({ error: err, line }, 'Error parsing journal line, skipping');
        continue;
      }

      if (!isJournalEntry(parsed)) {
        skipped++;
        logger.warn({ line }, 'Unrecognised journal line, skipping');
        continue;
      }

      const records = parsed.type === 'commit' ? parsed.records : [parsed];
      for (const record of records) {
        this.applyRecord(record);
      }
      replayed++;
    }

    this.updateMetrics();
    metrics.journalFileBytes.set(await this.compactor.getFileBytes(this.journalPath));
    logger.info({ lines: replayed, skipped, ...this.stats() }, 'Graph store initialized');
  }

  /**
   * Wait for in-flight commits to settle
   */
  async close(): Promise<void> {
    await this.commitChain;
    logger.info(this.stats(), 'Graph store closed');
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  getNode(id: string): TransientNode | undefined {
    const node = this.nodes.get(id);
    return node ? structuredClone(node) : undefined;
  }

  resolveNodeId(id: string): string | undefined {
    if (!this.nodes.has(id)) return undefined;

    let current = id;
    // Redirects are validated acyclic; the bound guards a corrupted journal
    for (let hops = 0; hops <= this.redirects.size; hops++) {
      const next = this.redirects.get(current);
      if (next === undefined) return current;
      current = next;
    }
    throw new GraphIntegrityError(`Redirect cycle reached from ${id}`);
  }

  mergeChain(id: string): string[] {
    const canonical = this.resolveNodeId(id);
    if (canonical === undefined) return [];

    const chain = [id];
    let current = id;
    while (current !== canonical) {
      const next = this.redirects.get(current);
      if (next === undefined) break;
      chain.push(next);
      current = next;
    }
    return chain;
  }

  listSuperseded(canonicalId: string): string[] {
    const superseded: string[] = [];
    for (const from of this.redirects.keys()) {
      if (from !== canonicalId && this.resolveNodeId(from) === canonicalId) {
        superseded.push(from);
      }
    }
    return superseded.sort((a, b) => this.seqOf(a) - this.seqOf(b));
  }

  listNodes(filter: NodeListFilter = {}): TransientNode[] {
    const canonicalOnly = filter.canonicalOnly ?? true;
    const fromMs = filter.timeRange?.fromMs ?? -Infinity;
    const toMs = filter.timeRange?.toMs ?? Infinity;

    const result: TransientNode[] = [];
    for (const node of this.nodes.values()) {
      if (canonicalOnly && node.mergedInto !== undefined) continue;
      if (node.lastSeenMs < fromMs || node.firstSeenMs > toMs) continue;
      if (filter.classification && !filter.classification.includes(node.classification)) continue;
      if (filter.instrument && !node.instruments.some(tag => filter.instrument?.includes(tag))) continue;
      result.push(node);
    }

    result.sort((a, b) => a.createdSeq - b.createdSeq || a.id.localeCompare(b.id));
    const limited = filter.limit !== undefined ? result.slice(0, filter.limit) : result;
    return limited.map(node => structuredClone(node));
  }

  listEdges(filter: EdgeListFilter = {}): GraphEdge[] {
    let ids: Iterable<string>;
    const vertex = filter.nodeId ?? filter.endpoint;

    if (vertex !== undefined) {
      const key = isNodeId(vertex) ? this.resolveNodeId(vertex) : vertex;
      ids = key !== undefined ? this.edgeIndex.get(key) ?? [] : [];
    } else {
      ids = this.edges.keys();
    }

    const result: GraphEdge[] = [];
    for (const id of ids) {
      const edge = this.edges.get(id);
      if (!edge) continue;
      if (filter.kinds && !filter.kinds.includes(edge.kind)) continue;
      result.push(edge);
    }

    result.sort((a, b) => (this.edgeOrder.get(a.id) ?? 0) - (this.edgeOrder.get(b.id) ?? 0));
    return result.map(edge => structuredClone(edge));
  }

  getCandidate(candidateId: string): EventCandidate | undefined {
    // Stored candidates are frozen
    return this.candidates.get(candidateId);
  }

  findMembership(candidateId: string): CandidateMembership | undefined {
    const caseId = this.openCaseByCandidate.get(candidateId);
    if (caseId !== undefined) {
      return { kind: 'case', caseId };
    }

    const directNodeId = this.membership.get(candidateId);
    if (directNodeId === undefined) return undefined;

    return {
      kind: 'node',
      nodeId: this.resolveNodeId(directNodeId) ?? directNodeId,
      directNodeId,
    };
  }

  getCase(caseId: string): AmbiguousCase | undefined {
    const found = this.cases.get(caseId);
    return found ? structuredClone(found) : undefined;
  }

  listCases(filter: CaseListFilter = {}): AmbiguousCase[] {
    const nodeId = filter.nodeId !== undefined ? this.resolveNodeId(filter.nodeId) : undefined;
    if (filter.nodeId !== undefined && nodeId === undefined) return [];

    const result: AmbiguousCase[] = [];
    for (const entry of this.cases.values()) {
      if (filter.status && entry.status !== filter.status) continue;
      if (filter.candidateId && entry.candidateId !== filter.candidateId) continue;
      if (nodeId !== undefined && !entry.competingNodeIds.some(id => this.resolveNodeId(id) === nodeId)) {
        continue;
      }
      result.push(entry);
    }

    result.sort((a, b) => a.openedAt.localeCompare(b.openedAt) || a.id.localeCompare(b.id));
    return result.map(entry => structuredClone(entry));
  }

  commit(changes: ChangeSet): Promise<void> {
    const run = this.commitChain.then(() => this.commitNow(changes));
    // The committer observes the failure through `run`; the chain moves on
    this.commitChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Rewrite the journal now, regardless of thresholds
   */
  compact(): Promise<boolean> {
    const run = this.commitChain.then(() => this.maybeCompact(true));
    this.commitChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  stats(): GraphStats {
    let openCases = 0;
    for (const entry of this.cases.values()) {
      if (entry.status === 'open') openCases++;
    }

    return {
      nodes: this.nodes.size - this.redirects.size,
      supersededNodes: this.redirects.size,
      edges: this.edges.size,
      candidates: this.candidates.size,
      openCases,
      resolvedCases: this.cases.size - openCases,
      sequence: this.sequence,
    };
  }

  getLastCompactionTimestamp(): string | null {
    return this.compactor.getLastCompactionTimestamp();
  }

  async journalBytes(): Promise<number> {
    return this.journalPath ? this.compactor.getFileBytes(this.journalPath) : 0;
  }

  private async commitNow(changes: ChangeSet): Promise<void> {
    const records = this.validate(changes);
    if (records.length === 0) return;

    if (this.journalPath) {
      await this.append(this.journalPath, [{ type: 'commit', records }]);
    }

    for (const record of records) {
      this.applyRecord(record);
    }
    this.updateMetrics();
    this.commitsSinceCompaction++;

    logger.debug(
      {
        candidates: changes.candidates?.length ?? 0,
        nodes: changes.nodes?.length ?? 0,
        edges: changes.edges?.length ?? 0,
        cases: changes.cases?.length ?? 0,
        redirects: changes.redirects?.length ?? 0,
      },
      'Committed change set'
    );

    if (this.journalPath) {
      await this.maybeCompact(false);
    }
  }

  /**
   * Check a change set against the current state and flatten it into
   * journal records, in the order they must be applied.
   */
  private validate(changes: ChangeSet): JournalRecord[] {
    const records: JournalRecord[] = [];

    const newCandidates = new Set<string>();
    for (const candidate of changes.candidates ?? []) {
      if (this.candidates.has(candidate.candidateId) || newCandidates.has(candidate.candidateId)) {
        throw new GraphIntegrityError(`Candidate ${candidate.candidateId} is already stored`);
      }
      newCandidates.add(candidate.candidateId);
      records.push({ type: 'candidate', data: candidate });
    }

    const touchedNodes = new Set<string>();
    for (const node of changes.nodes ?? []) {
      if (touchedNodes.has(node.id)) {
        throw new GraphIntegrityError(`Node ${node.id} appears twice in one change set`);
      }
      touchedNodes.add(node.id);

      const stored = this.nodes.get(node.id);
      const current = stored ? stored.revision : 0;
      if (node.revision !== current + 1) {
        throw new RevisionConflictError(node.id, node.revision - 1, current);
      }
      records.push({ type: 'node', data: node });
    }

    for (const edge of changes.edges ?? []) {
      if (this.edges.has(edge.id)) {
        throw new GraphIntegrityError(`Edge ${edge.id} is already stored`);
      }
      records.push({ type: 'edge', data: edge });
    }

    for (const entry of changes.cases ?? []) {
      const stored = this.cases.get(entry.id);
      const current = stored ? stored.revision : 0;
      if (entry.revision !== current + 1) {
        throw new RevisionConflictError(entry.id, entry.revision - 1, current);
      }
      records.push({ type: 'case', data: entry });
    }

    const redirected = new Set<string>();
    for (const redirect of changes.redirects ?? []) {
      const { from, to } = redirect;
      if (from === to) {
        throw new GraphIntegrityError(`Node ${from} cannot be merged into itself`);
      }
      if (!this.nodeExists(from, touchedNodes) || !this.nodeExists(to, touchedNodes)) {
        throw new GraphIntegrityError(`Redirect ${from} -> ${to} names an unknown node`);
      }
      if (this.redirects.has(from) || redirected.has(from)) {
        throw new GraphIntegrityError(`Node ${from} is already merged`);
      }
      if (this.redirects.has(to) || redirected.has(to)) {
        throw new GraphIntegrityError(`Redirect target ${to} is itself merged`);
      }
      redirected.add(from);
      records.push({ type: 'redirect', data: { from, to } });
    }

    return records;
  }

  private nodeExists(id: string, touched: Set<string>): boolean {
    return this.nodes.has(id) || touched.has(id);
  }

  private applyRecord(record: JournalRecord): void {
    switch (record.type) {
      case 'candidate': {
        const candidate = record.data;
        this.candidates.set(
          candidate.candidateId,
          Object.freeze({ ...candidate, position: Object.freeze({ ...candidate.position }) })
        );
        break;
      }

      case 'node': {
        const node = structuredClone(record.data);
        this.nodes.set(node.id, node);
        this.sequence = Math.max(this.sequence, node.createdSeq, node.updatedSeq);
        if (node.mergedInto === undefined) {
          for (const candidateId of node.candidateIds) {
            this.membership.set(candidateId, node.id);
          }
        }
        break;
      }

      case 'edge': {
        const edge = structuredClone(record.data);
        this.edges.set(edge.id, edge);
        this.edgeSequence += 1;
        this.edgeOrder.set(edge.id, this.edgeSequence);
        for (const vertex of [edge.from, edge.to, edge.scope]) {
          if (vertex !== undefined) this.indexEdge(vertex, edge.id);
        }
        break;
      }

      case 'case': {
        const entry = structuredClone(record.data);
        this.cases.set(entry.id, entry);
        if (entry.status === 'open') {
          this.openCaseByCandidate.set(entry.candidateId, entry.id);
        } else if (this.openCaseByCandidate.get(entry.candidateId) === entry.id) {
          this.openCaseByCandidate.delete(entry.candidateId);
        }
        break;
      }

      case 'redirect': {
        const { from, to } = record.data;
        this.redirects.set(from, to);

        // Move the superseded node's edge index under its new canonical id
        const moved = this.edgeIndex.get(from);
        const target = this.resolveNodeId(to) ?? to;
        if (moved) {
          const bucket = this.edgeIndex.get(target) ?? new Set<string>();
          for (const id of moved) bucket.add(id);
          this.edgeIndex.set(target, bucket);
          this.edgeIndex.delete(from);
        }
        break;
      }
    }
  }

  private indexEdge(vertex: string, edgeId: string): void {
    const key = isNodeId(vertex) ? this.resolveNodeId(vertex) ?? vertex : vertex;
    const bucket = this.edgeIndex.get(key);
    if (bucket) {
      bucket.add(edgeId);
    } else {
      this.edgeIndex.set(key, new Set([edgeId]));
    }
  }

  private seqOf(id: string): number {
    return this.nodes.get(id)?.createdSeq ?? 0;
  }

  /**
   * Append entries to the journal
   */
  private async append(path: string, entries: JournalEntry[]): Promise<void> {
    try {
      await fs.mkdir(dirname(path), { recursive: true });

      const fd = await fs.open(path, 'a');
      try {
        await fd.appendFile(entries.map(entry => JSON.stringify(entry) + '\n').join(''));

        // Sync to disk only if FSYNC=true for performance
        if (this.fsync) {
          await fd.sync();
        }
      } finally {
        await fd.close();
      }
    } catch (err) {
      logger.error({ error: err, path }, 'Error appending to graph journal');
      throw new StorageUnavailableError('Failed to append to graph journal', err);
    }
  }

  /**
   * Write every live record to a fresh journal and swap it in
   */
  private async rewriteJournal(path: string): Promise<void> {
    const lines: string[] = [];
    const push = (record: JournalRecord): void => {
      lines.push(JSON.stringify(record) + '\n');
    };

    for (const candidate of this.candidates.values()) push({ type: 'candidate', data: candidate });
    for (const node of this.nodes.values()) push({ type: 'node', data: node });
    for (const edge of this.listEdges()) push({ type: 'edge', data: edge });
    for (const entry of this.cases.values()) push({ type: 'case', data: entry });
    for (const [from, to] of this.redirects) push({ type: 'redirect', data: { from, to } });

    const tempPath = `${path}.new`;
    try {
      await fs.mkdir(dirname(path), { recursive: true });
      await fs.writeFile(tempPath, lines.join(''), 'utf8');
      // Atomically replace the old file with the new one
      await fs.rename(tempPath, path);
    } catch (err) {
      throw new StorageUnavailableError('Failed to rewrite graph journal', err);
    }
  }

  private async maybeCompact(force: boolean): Promise<boolean> {
    const path = this.journalPath;
    if (!path) return false;

    try {
      const compacted = await this.compactor.maybeCompact(
        path,
        () => this.rewriteJournal(path),
        this.commitsSinceCompaction,
        force
      );
      if (compacted) {
        this.commitsSinceCompaction = 0;
      } else {
        metrics.journalFileBytes.set(await this.compactor.getFileBytes(path));
      }
      return compacted;
    } catch (err) {
      // The commit that triggered compaction is already durable
      logger.error({ error: err, path }, 'Error during journal compaction');
      return false;
    }
  }

  private updateMetrics(): void {
    const stats = this.stats();
    metrics.graphNodesTotal.set(stats.nodes);
    metrics.supersededNodesTotal.set(stats.supersededNodes);
    metrics.graphEdgesTotal.set(stats.edges);
    metrics.openCasesTotal.set(stats.openCases);
  }
}

function isJournalEntry(value: unknown): value is JournalEntry {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;

  if (value.type === 'commit') {
    return 'records' in value && Array.isArray(value.records) && value.records.every(isJournalRecord);
  }
  return isJournalRecord(value);
}

function isJournalRecord(value: unknown): value is JournalRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    'data' in value &&
    typeof value.type === 'string' &&
    RECORD_TYPES.has(value.type) &&
    typeof value.data === 'object' &&
    value.data !== null
  );
}

export type { GraphRepository } from './repository';
