/**
 * Unit tests for the graph updater
 */
import { GraphStore } from '../../src/graph-store';
import { GraphUpdater } from '../../src/updater/graph-updater';
import type { MatchResult } from '../../src/matcher/spatiotemporal-matcher';
import { CaseStateError, GraphIntegrityError, UnknownCaseError, UnknownNodeError } from '../../src/utils/errors';
import { makeCandidate, makeConfig, MINUTE, T0 } from '../helpers/candidates';

function match(nodeId: string, score: number): MatchResult {
  return { nodeId, score, spatialScore: score, separationDeg: 0, sigmaDeg: 0.1, bonus: 0 };
}

describe('GraphUpdater', () => {
  let store: GraphStore;
  let updater: GraphUpdater;

  beforeEach(async () => {
    store = new GraphStore({ journalPath: null });
    await store.init();
    updater = new GraphUpdater(store, makeConfig());
  });

  it('creates a node holding the candidate', async () => {
    const node = await updater.createNode(makeCandidate('a'));

    expect(node.id).toMatch(/^tn-/);
    expect(store.getNode(node.id)).toEqual(node);
    expect(store.getCandidate('a')?.candidateId).toBe('a');
    expect(store.findMembership('a')).toEqual({ kind: 'node', nodeId: node.id, directNodeId: node.id });
  });

  it('attaches a candidate and reports corroboration', async () => {
    const node = await updater.createNode(makeCandidate('a'));

    const result = await updater.attachCandidate(
      makeCandidate('b', { eventType: 'GRB', typeConfirmed: true, timestampMs: T0 + MINUTE }),
      node.id
    );

    expect(result.corroborated).toBe(true);
    expect(result.node.revision).toBe(2);
    expect(store.getNode(node.id)?.candidateIds).toEqual(['a', 'b']);
  });

  it('serializes concurrent attachments to one node', async () => {
    const node = await updater.createNode(makeCandidate('a'));

    await Promise.all([
      updater.attachCandidate(makeCandidate('b'), node.id),
      updater.attachCandidate(makeCandidate('c'), node.id),
    ]);

    const stored = store.getNode(node.id);
    expect(stored?.revision).toBe(3);
    expect(stored?.candidateIds).toEqual(['a', 'b', 'c']);
  });

  it('refuses an unknown node', async () => {
    await expect(updater.attachCandidate(makeCandidate('b'), 'tn-missing')).rejects.toBeInstanceOf(UnknownNodeError);
    expect(store.getCandidate('b')).toBeUndefined();
  });

  it('merges nodes into the earlier one and follows the redirect afterwards', async () => {
    const first = await updater.createNode(makeCandidate('a'));
    const second = await updater.createNode(makeCandidate('b', { instrument: 'y' }));

    const merged = await updater.mergeNodes(second.id, first.id, 'manual', 0.93);

    expect(merged.canonical.id).toBe(first.id);
    expect(merged.supersededId).toBe(second.id);
    expect(store.resolveNodeId(second.id)).toBe(first.id);
    const mergeEdge = store.listEdges({ nodeId: first.id, kinds: ['MERGED_WITH'] });
    expect(mergeEdge.map(edge => edge.attributes)).toEqual([{ reason: 'manual', score: 0.93 }]);

    const attached = await updater.attachCandidate(makeCandidate('c'), second.id);
    expect(attached.node.id).toBe(first.id);
    expect(attached.node.candidateIds).toEqual(['a', 'b', 'c']);

    await expect(updater.mergeNodes(first.id, second.id, 'manual')).rejects.toThrow(
      `Nodes ${first.id} and ${second.id} are already one node`
    );
  });

  describe('cases', () => {
    it('opens a case without touching the competitors', async () => {
      const first = await updater.createNode(makeCandidate('a'));
      const second = await updater.createNode(makeCandidate('b'));

      const entry = await updater.openCase(makeCandidate('z'), [match(first.id, 0.8), match(second.id, 0.75)]);

      expect(entry).toMatchObject({
        candidateId: 'z',
        competingNodeIds: [first.id, second.id],
        scores: { [first.id]: 0.8, [second.id]: 0.75 },
        status: 'open',
        revision: 1,
      });
      expect(store.findMembership('z')).toEqual({ kind: 'case', caseId: entry.id });
      expect(store.getNode(first.id)?.revision).toBe(1);
      expect(store.getNode(second.id)?.revision).toBe(1);
    });

    it('rescores an open case', async () => {
      const first = await updater.createNode(makeCandidate('a'));
      const entry = await updater.openCase(makeCandidate('z'), [match(first.id, 0.8)]);

      const rescored = await updater.rescoreCase(entry.id, [match(first.id, 0.6)]);

      expect(rescored.revision).toBe(2);
      expect(rescored.scores).toEqual({ [first.id]: 0.6 });
    });

    it('resolves a case by attaching its candidate', async () => {
      const first = await updater.createNode(makeCandidate('a'));
      const entry = await updater.openCase(makeCandidate('z'), [match(first.id, 0.8)]);

      const result = await updater.resolveCase(entry.id, { action: 'attach', nodeId: first.id }, 'manual');

      expect(result.entry.status).toBe('resolved');
      expect(result.entry.resolution).toEqual({ action: 'attached', nodeId: first.id, reason: 'manual' });
      expect(result.node.candidateIds).toEqual(['a', 'z']);
      expect(store.findMembership('z')).toEqual({ kind: 'node', nodeId: first.id, directNodeId: first.id });

      await expect(updater.resolveCase(entry.id, { action: 'create' }, 'manual')).rejects.toBeInstanceOf(CaseStateError);
    });

    it('resolves a case by starting a new node', async () => {
      const first = await updater.createNode(makeCandidate('a'));
      const entry = await updater.openCase(makeCandidate('z'), [match(first.id, 0.8)]);

      const result = await updater.resolveCase(entry.id, { action: 'create' }, 'reevaluation', [first.id]);

      expect(result.node.id).not.toBe(first.id);
      expect(result.node.candidateIds).toEqual(['z']);
      expect(result.entry.resolution).toEqual({
        action: 'created',
        nodeId: result.node.id,
        reason: 'reevaluation',
        mergedNodeIds: [first.id],
      });
      expect(result.corroborated).toBe(false);
    });

    it('refuses an unknown case', async () => {
      await expect(updater.resolveCase('case-missing', { action: 'create' }, 'manual')).rejects.toBeInstanceOf(
        UnknownCaseError
      );
      await expect(updater.rescoreCase('case-missing', [])).rejects.toBeInstanceOf(UnknownCaseError);
    });
  });

  describe('corroborate', () => {
    it('confirms an aliased label once', async () => {
      const node = await updater.createNode(makeCandidate('a'));

      const first = await updater.corroborate(node.id, 'BNS');
      const again = await updater.corroborate(node.id, 'GW');

      expect(first.changed).toBe(true);
      expect(first.node.classification).toBe('GW');
      expect(first.node.classificationConfirmed).toBe(true);
      expect(again.changed).toBe(false);
      expect(store.getNode(node.id)?.revision).toBe(2);
    });

    it('needs a label for an unclassified node', async () => {
      const node = await updater.createNode(makeCandidate('a'));

      await expect(updater.corroborate(node.id)).rejects.toBeInstanceOf(GraphIntegrityError);
    });
  });
});
