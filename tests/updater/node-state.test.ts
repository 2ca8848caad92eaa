/**
 * Unit tests for pure node transitions
 */
import {
  absorbCandidate,
  centroid,
  combineNodes,
  confirmClassification,
  leadingLabel,
  seedNode,
} from '../../src/updater/node-state';
import type { Stamp } from '../../src/updater/node-state';
import { makeCandidate, MINUTE, T0 } from '../helpers/candidates';

const NOW = '2024-03-01T12:00:00.000Z';

function stamp(seq: number): Stamp {
  return { seq, now: NOW, floorDeg: 1 / 3600 };
}

describe('node state', () => {
  describe('seedNode', () => {
    it('builds a node from its first candidate', () => {
      const { node, edges, corroborated } = seedNode('tn-1', makeCandidate('a'), stamp(7));

      expect(node).toMatchObject({
        id: 'tn-1',
        candidateIds: ['a'],
        instruments: ['x'],
        classification: 'UNKNOWN',
        classificationConfirmed: false,
        classificationEvidence: {},
        revision: 1,
        createdSeq: 7,
        updatedSeq: 7,
        firstSeen: '2024-03-01T00:00:00.000Z',
        lastSeen: '2024-03-01T00:00:00.000Z',
      });
      expect(node.position.ra).toBeCloseTo(10, 9);
      expect(node.position.dec).toBeCloseTo(20, 9);
      expect(node.position.errorRadius).toBeCloseTo(0.05, 12);
      expect(edges.map(edge => [edge.kind, edge.from, edge.to])).toEqual([['CO_DETECTED_BY', 'tn-1', 'instrument:x']]);
      expect(corroborated).toBe(false);
    });

    it('classifies from a confirmed candidate', () => {
      const { node, edges, corroborated } = seedNode(
        'tn-1',
        makeCandidate('a', { eventType: 'GRB', typeConfirmed: true }),
        stamp(1)
      );

      expect(node.classification).toBe('GRB');
      expect(node.classificationConfirmed).toBe(true);
      expect(node.classificationEvidence).toEqual({ GRB: 0.7 });
      expect(edges[1]).toMatchObject({ kind: 'CLASSIFIED_AS', from: 'tn-1', to: 'class:GRB', attributes: { confirmed: true } });
      expect(corroborated).toBe(true);
    });
  });

  describe('absorbCandidate', () => {
    const seeded = seedNode('tn-1', makeCandidate('a'), stamp(1)).node;

    it('moves the centroid by inverse-variance weight', () => {
      const { node } = absorbCandidate(seeded, makeCandidate('b', { dec: 20.1, errorRadius: 0.1 }), stamp(2));

      expect(node.position.ra).toBeCloseTo(10, 9);
      expect(node.position.dec).toBeCloseTo(20.02, 5);
      expect(node.position.errorRadius).toBeCloseTo(1 / Math.sqrt(500), 9);
      expect(node.weightSum).toBeCloseTo(500, 6);
      expect(node.revision).toBe(2);
      expect(node.updatedSeq).toBe(2);
      expect(node.createdSeq).toBe(1);
    });

    it('links the candidate to the previous evidence', () => {
      const { node, edges } = absorbCandidate(seeded, makeCandidate('b', { instrument: 'y' }), stamp(2));

      expect(node.candidateIds).toEqual(['a', 'b']);
      expect(node.instruments).toEqual(['x', 'y']);
      expect(edges.map(edge => [edge.kind, edge.from, edge.to, edge.scope])).toEqual([
        ['TEMPORAL_SUCCESSOR', 'candidate:a', 'candidate:b', 'tn-1'],
        ['CO_DETECTED_BY', 'tn-1', 'instrument:y', undefined],
      ]);
    });

    it('extends the time span both ways', () => {
      const later = absorbCandidate(seeded, makeCandidate('b', { timestampMs: T0 + 5 * MINUTE }), stamp(2)).node;
      const earlier = absorbCandidate(later, makeCandidate('c', { timestampMs: T0 - MINUTE }), stamp(3)).node;

      expect(earlier.firstSeen).toBe('2024-02-29T23:59:00.000Z');
      expect(earlier.lastSeen).toBe('2024-03-01T00:05:00.000Z');
      expect(earlier.lastSeenMs - earlier.firstSeenMs).toBe(6 * MINUTE);
    });

    it('collects designations once', () => {
      const first = absorbCandidate(seeded, makeCandidate('b', { eventName: 'GRB 240301A' }), stamp(2)).node;
      const second = absorbCandidate(first, makeCandidate('c', { eventName: 'GRB 240301A' }), stamp(3)).node;

      expect(second.names).toEqual(['GRB 240301A']);
    });

    it('follows the leading unconfirmed label', () => {
      const grb = absorbCandidate(seeded, makeCandidate('b', { eventType: 'GRB', confidence: 0.4 }), stamp(2));
      const fxt = absorbCandidate(grb.node, makeCandidate('c', { eventType: 'FXT', confidence: 0.6 }), stamp(3));

      expect(grb.node.classification).toBe('GRB');
      expect(grb.edges.map(edge => edge.to)).toEqual(['candidate:b', 'class:GRB']);
      expect(fxt.node.classification).toBe('FXT');
      expect(fxt.node.classificationConfirmed).toBe(false);
      expect(fxt.corroborated).toBe(false);
    });

    it('keeps the first confirmed label', () => {
      const grb = absorbCandidate(seeded, makeCandidate('b', { eventType: 'GRB', typeConfirmed: true }), stamp(2));
      const gw = absorbCandidate(grb.node, makeCandidate('c', { eventType: 'GW', typeConfirmed: true, confidence: 0.99 }), stamp(3));

      expect(grb.corroborated).toBe(true);
      expect(gw.node.classification).toBe('GRB');
      expect(gw.node.classificationEvidence).toEqual({ GRB: 0.7, GW: 0.99 });
      expect(gw.corroborated).toBe(false);
      expect(gw.edges.map(edge => edge.kind)).toEqual(['TEMPORAL_SUCCESSOR']);
    });
  });

  describe('combineNodes', () => {
    it('folds the superseded node into the canonical one', () => {
      const canonical = seedNode('tn-1', makeCandidate('a'), stamp(1)).node;
      const superseded = seedNode(
        'tn-2',
        makeCandidate('b', { instrument: 'y', eventType: 'GRB', typeConfirmed: true, timestampMs: T0 + MINUTE }),
        stamp(2)
      ).node;

      const merged = combineNodes(canonical, superseded, stamp(3), { reason: 'reevaluation', score: 0.95 });

      expect(merged.canonical.node).toMatchObject({
        id: 'tn-1',
        candidateIds: ['a', 'b'],
        instruments: ['x', 'y'],
        classification: 'GRB',
        classificationConfirmed: true,
        lastSeen: '2024-03-01T00:01:00.000Z',
        revision: 2,
      });
      expect(merged.canonical.node.weightSum).toBeCloseTo(800, 6);
      expect(merged.canonical.corroborated).toBe(true);
      expect(merged.superseded).toMatchObject({ id: 'tn-2', mergedInto: 'tn-1', revision: 2, updatedSeq: 3 });
      expect(merged.canonical.edges.map(edge => [edge.kind, edge.from, edge.to])).toEqual([
        ['TEMPORAL_SUCCESSOR', 'candidate:a', 'candidate:b'],
        ['MERGED_WITH', 'tn-1', 'tn-2'],
        ['CLASSIFIED_AS', 'tn-1', 'class:GRB'],
      ]);
      expect(merged.canonical.edges[1].attributes).toEqual({ reason: 'reevaluation', score: 0.95 });
    });
  });

  describe('confirmClassification', () => {
    it('confirms and relabels a node', () => {
      const node = seedNode('tn-1', makeCandidate('a', { eventType: 'GRB' }), stamp(1)).node;

      const { node: confirmed, edges, corroborated } = confirmClassification(node, 'FRB', stamp(2));

      expect(confirmed.classification).toBe('FRB');
      expect(confirmed.classificationConfirmed).toBe(true);
      expect(confirmed.revision).toBe(2);
      expect(edges).toHaveLength(1);
      expect(edges[0]).toMatchObject({ kind: 'CLASSIFIED_AS', to: 'class:FRB', attributes: { reason: 'manual', confirmed: true } });
      expect(corroborated).toBe(true);
    });
  });

  describe('leadingLabel', () => {
    it('keeps the current label on a tie', () => {
      expect(leadingLabel({ GRB: 0.5, FXT: 0.5 }, 'GRB')).toBe('GRB');
      expect(leadingLabel({ GRB: 0.5, FXT: 0.5 }, 'UNKNOWN')).toBe('FXT');
    });
  });

  describe('centroid', () => {
    it('has no uncertainty without weight', () => {
      expect(centroid([0, 0, 0], 0)).toEqual({ ra: 0, dec: 0, errorRadius: 0 });
    });
  });
});
