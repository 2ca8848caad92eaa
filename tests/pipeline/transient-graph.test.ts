/**
 * Scenario tests for the transient graph: creation, attachment, ambiguity
 * and re-evaluation on corroboration
 */
import { CaseStateError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';
import {
  betweenCandidate,
  makeCandidate,
  makeConfig,
  makeGraph,
  seedTwoNodes,
  T0,
  TWO_NODE_CONFIG,
} from '../helpers/candidates';
import type { TransientGraph } from '../../src/pipeline/transient-graph';

function recordEvents(graph: TransientGraph): string[] {
  const events: string[] = [];
  for (const name of ['node-created', 'candidate-attached', 'case-opened', 'case-resolved', 'nodes-merged', 'node-corroborated']) {
    graph.on(name, () => events.push(name));
  }
  return events;
}

function requireCaseId(outcome: { status: string; caseId?: string }): string {
  if (outcome.status !== 'ambiguous' || outcome.caseId === undefined) {
    throw new Error(`Expected an ambiguous outcome, got ${outcome.status}`);
  }
  return outcome.caseId;
}

describe('TransientGraph', () => {
  describe('single detections', () => {
    it('creates a node, merges a nearby detection and separates a distant one', async () => {
      const { graph, store } = makeGraph();
      const events = recordEvents(graph);

      const first = await graph.process(makeCandidate('a'));
      const second = await graph.process(makeCandidate('b', { ra: 10.01, dec: 20.01, timestampMs: T0 + 60 * 1000 }));
      const third = await graph.process(makeCandidate('c', { ra: 80, dec: -40, instrument: 'y' }));

      expect(first.status).toBe('created');
      if (first.status !== 'created') return;
      expect(second).toEqual({ status: 'merged', candidateId: 'b', nodeId: first.nodeId, score: 1 });
      expect(third.status).toBe('created');

      const node = store.getNode(first.nodeId);
      expect(node?.candidateIds).toEqual(['a', 'b']);
      expect(node?.position.ra).toBeCloseTo(10.005, 4);
      expect(node?.position.dec).toBeCloseTo(20.005, 4);
      expect(node?.position.errorRadius).toBeCloseTo(0.05 / Math.SQRT2, 6);
      expect(node?.firstSeen).toBe('2024-03-01T00:00:00.000Z');
      expect(node?.lastSeen).toBe('2024-03-01T00:01:00.000Z');
      expect(events).toEqual(['node-created', 'candidate-attached', 'node-created']);
    });

    it('reports a resubmitted candidate as a duplicate', async () => {
      const { graph, store } = makeGraph();

      const first = await graph.process(makeCandidate('a'));
      const again = await graph.process(makeCandidate('a'));

      if (first.status !== 'created') throw new Error('expected a new node');
      expect(again).toEqual({ status: 'duplicate', candidateId: 'a', nodeId: first.nodeId });
      expect(store.getNode(first.nodeId)?.revision).toBe(1);
    });

    it('logs the resolution state each decision settles in', async () => {
      const { graph } = makeGraph();

      await graph.process(makeCandidate('a'));

      expect(logger.debug).toHaveBeenCalledWith(
        { candidateId: 'a', action: 'create', state: 'UNMATCHED', settled: 'RESOLVED' },
        'Candidate resolved against the graph'
      );
    });

    it('rechecks a new node against nodes created concurrently', async () => {
      const { graph, store } = makeGraph();

      const outcomes = await Promise.all([
        graph.process(makeCandidate('a')),
        graph.process(makeCandidate('b', { instrument: 'y' })),
      ]);

      expect(outcomes.map(outcome => outcome.status)).toEqual(['created', 'merged']);
      expect(store.stats().nodes).toBe(1);
    });

    it('handles the same candidate submitted concurrently once', async () => {
      const { graph, store } = makeGraph();

      const outcomes = await Promise.all([graph.process(makeCandidate('a')), graph.process(makeCandidate('a'))]);

      expect(outcomes.map(outcome => outcome.status).sort()).toEqual(['created', 'duplicate']);
      expect(store.stats().nodes).toBe(1);
    });
  });

  describe('arrival order', () => {
    const detections = [
      makeCandidate('p'),
      makeCandidate('q', { ra: 10.01, dec: 20.01, timestampMs: T0 + 60 * 1000 }),
      makeCandidate('r', { ra: 10.02, dec: 20, timestampMs: T0 + 120 * 1000 }),
    ];

    it.each([
      ['forward', [0, 1, 2]],
      ['reversed', [2, 1, 0]],
      ['shuffled', [1, 2, 0]],
    ])('gathers one transient into one node (%s)', async (_label, order) => {
      const { graph, store } = makeGraph();

      for (const index of order) {
        await graph.process(detections[index]);
      }

      const nodes = store.listNodes();
      expect(nodes).toHaveLength(1);
      expect([...nodes[0].candidateIds].sort()).toEqual(['p', 'q', 'r']);
      expect(nodes[0].firstSeen).toBe('2024-03-01T00:00:00.000Z');
      expect(nodes[0].lastSeen).toBe('2024-03-01T00:02:00.000Z');
    });
  });

  describe('ambiguous candidates', () => {
    it('opens a case between two equally good nodes and leaves them unchanged', async () => {
      const { graph, store } = makeGraph(makeConfig(TWO_NODE_CONFIG));
      const { n1, n2 } = await seedTwoNodes(graph);
      const events = recordEvents(graph);

      const outcome = await graph.process(betweenCandidate('z'));

      expect(outcome).toMatchObject({ status: 'ambiguous', candidateId: 'z', competingNodeIds: [n2, n1] });
      const caseId = requireCaseId(outcome);
      expect(store.getCase(caseId)?.status).toBe('open');
      expect(store.getNode(n1)?.revision).toBe(1);
      expect(store.getNode(n2)?.revision).toBe(1);
      expect(store.getNode(n1)?.candidateIds).toEqual(['a']);
      expect(store.findMembership('z')).toEqual({ kind: 'case', caseId });
      expect(events).toEqual(['case-opened']);

      await expect(graph.process(betweenCandidate('z'))).resolves.toEqual({
        status: 'duplicate',
        candidateId: 'z',
        caseId,
      });
    });

    it('merges the competing nodes once corroboration shows they are one transient', async () => {
      const { graph, store } = makeGraph(makeConfig(TWO_NODE_CONFIG));
      const { n1, n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z')));
      const events = recordEvents(graph);

      const outcome = await graph.process(
        makeCandidate('w', {
          ra: 100,
          dec: 10,
          errorRadius: 0.05,
          instrument: 'x',
          eventType: 'GRB',
          typeConfirmed: true,
          timestampMs: T0 + 300 * 1000,
        })
      );

      expect(outcome).toEqual({ status: 'merged', candidateId: 'w', nodeId: n1, score: 1 });
      expect(store.resolveNodeId(n2)).toBe(n1);
      expect(store.getNode(n1)?.candidateIds).toEqual(['a', 'w', 'b', 'z']);
      expect(store.getCase(caseId)).toMatchObject({
        status: 'resolved',
        resolution: { action: 'attached', nodeId: n1, reason: 'reevaluation', mergedNodeIds: [n2] },
        revision: 2,
      });
      expect(store.findMembership('z')).toEqual({ kind: 'node', nodeId: n1, directNodeId: n1 });
      expect(events).toEqual([
        'candidate-attached',
        'node-corroborated',
        'nodes-merged',
        'candidate-attached',
        'case-resolved',
      ]);
    });

    it('attaches the candidate to the remaining node when corroboration rules the other out', async () => {
      const { graph, store } = makeGraph(makeConfig({ ...TWO_NODE_CONFIG, resolver: { nodeMergeThreshold: 0.99 } }));
      const { n1, n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z', { eventType: 'GW', typeConfirmed: true })));

      await graph.process(
        makeCandidate('w', {
          ra: 100.2,
          dec: 10,
          errorRadius: 0.05,
          instrument: 'y',
          eventType: 'ASTEROID',
          typeConfirmed: true,
          timestampMs: T0 + 1000 * 1000,
        })
      );

      expect(store.resolveNodeId(n2)).toBe(n2);
      expect(store.getNode(n2)?.classification).toBe('ASTEROID');
      expect(store.getCase(caseId)?.resolution).toEqual({ action: 'attached', nodeId: n1, reason: 'reevaluation' });
      expect(store.getNode(n1)?.candidateIds).toEqual(['a', 'z']);
      expect(store.getNode(n1)?.classification).toBe('GW');
    });

    it('keeps a case open and records fresh scores when nothing decides it', async () => {
      const { graph, store } = makeGraph(makeConfig({ ...TWO_NODE_CONFIG, resolver: { nodeMergeThreshold: 0.99 } }));
      const { n1, n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z')));

      const result = await graph.corroborate(n1, 'GRB');

      expect(result.changed).toBe(true);
      expect(result.node.classificationConfirmed).toBe(true);
      expect(result.reevaluation).toEqual({
        trigger: n1,
        casesExamined: 1,
        resolved: [],
        merges: [],
        truncated: false,
      });
      expect(store.getCase(caseId)).toMatchObject({ status: 'open', revision: 2, competingNodeIds: [n1, n2] });
    });

    it('examines a bounded number of cases per corroboration', async () => {
      const config = makeConfig({ ...TWO_NODE_CONFIG, resolver: { nodeMergeThreshold: 0.99, maxCasesPerReevaluation: 1 } });
      const { graph, store } = makeGraph(config);
      const { n1 } = await seedTwoNodes(graph);
      await graph.process(betweenCandidate('z1'));
      await graph.process(betweenCandidate('z2'));

      const { reevaluation } = await graph.corroborate(n1, 'GRB');

      expect(reevaluation.casesExamined).toBe(1);
      expect(reevaluation.truncated).toBe(true);
      expect(store.listCases({ status: 'open' })).toHaveLength(2);
    });
  });

  describe('manual resolution', () => {
    it('attaches the candidate to the chosen node', async () => {
      const { graph, store } = makeGraph(makeConfig(TWO_NODE_CONFIG));
      const { n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z')));

      const entry = await graph.resolveCaseManually(caseId, { action: 'attach', nodeId: n2 });

      expect(entry.status).toBe('resolved');
      expect(entry.resolution).toEqual({ action: 'attached', nodeId: n2, reason: 'manual' });
      expect(store.getNode(n2)?.candidateIds).toEqual(['b', 'z']);
      await expect(graph.resolveCaseManually(caseId, { action: 'create' })).rejects.toBeInstanceOf(CaseStateError);
    });

    it('starts a new node for the candidate', async () => {
      const { graph, store } = makeGraph(makeConfig(TWO_NODE_CONFIG));
      const { n1, n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z')));

      const entry = await graph.resolveCaseManually(caseId, { action: 'create' });

      expect(entry.resolution?.action).toBe('created');
      expect([n1, n2]).not.toContain(entry.resolution?.nodeId);
      expect(store.stats().nodes).toBe(3);
    });

    it('folds the competing nodes into the earliest one', async () => {
      const { graph, store } = makeGraph(makeConfig(TWO_NODE_CONFIG));
      const { n1, n2 } = await seedTwoNodes(graph);
      const caseId = requireCaseId(await graph.process(betweenCandidate('z')));

      const entry = await graph.resolveCaseManually(caseId, { action: 'merge-nodes' });

      expect(entry.resolution).toEqual({ action: 'attached', nodeId: n1, reason: 'manual', mergedNodeIds: [n2] });
      expect(store.resolveNodeId(n2)).toBe(n1);
      expect(store.getNode(n1)?.candidateIds).toEqual(['a', 'b', 'z']);
      expect(store.listEdges({ nodeId: n1, kinds: ['MERGED_WITH'] })[0].attributes).toEqual({ reason: 'manual' });
    });
  });
});
