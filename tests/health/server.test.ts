/**
 * Unit tests for the HTTP server
 */
import request from 'supertest';
import express from 'express';
import { createHealthApp } from '../../src/health/server';
import { createServiceContext } from '../../src/worker/context';
import type { ServiceContext } from '../../src/worker/context';
import { GraphStore } from '../../src/graph-store';
import { StorageUnavailableError } from '../../src/utils/errors';
import type { ChangeSet } from '../../src/types/graph';
import { betweenCandidate, makeConfig, seedTwoNodes, TWO_NODE_CONFIG } from '../helpers/candidates';

class SwitchableStore extends GraphStore {
  offline = false;

  constructor() {
    super({ journalPath: null });
  }

  async commit(changes: ChangeSet): Promise<void> {
    if (this.offline) {
      throw new StorageUnavailableError('journal offline');
    }
    return super.commit(changes);
  }
}

describe('HTTP server', () => {
  let store: SwitchableStore;
  let context: ServiceContext;
  let app: express.Express;
  let n1: string;
  let n2: string;
  let caseId: string;

  beforeEach(async () => {
    store = new SwitchableStore();
    context = await createServiceContext({ store, config: makeConfig(TWO_NODE_CONFIG) });
    app = createHealthApp(context);

    ({ n1, n2 } = await seedTwoNodes(context.graph));
    const outcome = await context.graph.process(betweenCandidate('z'));
    if (outcome.status !== 'ambiguous') {
      throw new Error(`Expected an ambiguous case, got ${outcome.status}`);
    }
    caseId = outcome.caseId;
  });

  describe('GET /healthz', () => {
    it('reports the service as up', async () => {
      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'ok', service: 'transient-graph' });
      expect(typeof response.body.uptime).toBe('number');
    });
  });

  describe('GET /graph', () => {
    it('returns store statistics for an in-memory graph', async () => {
      const response = await request(app).get('/graph');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        ok: true,
        status: 'normal',
        persistent: false,
        nodes: 2,
        supersededNodes: 0,
        edges: 2,
        candidates: 3,
        openCases: 1,
        resolvedCases: 0,
        sequence: 2,
        journalMB: 0,
        lastCompaction: null,
        partitions: [],
      });
    });
  });

  describe('GET /metrics', () => {
    it('serves the prometheus exposition format', async () => {
      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
    });
  });

  describe('POST /query', () => {
    it('looks up a node', async () => {
      const response = await request(app).post('/query').send({ traversal: 'lookup', root: n1 });

      expect(response.status).toBe(200);
      expect(response.body.nodes.map((node: { id: string }) => node.id)).toEqual([n1]);
      expect(response.body.truncated).toBe(false);
    });

    it('returns a truncated search as partial content', async () => {
      const response = await request(app).post('/query').send({ traversal: 'search', limit: 1 });

      expect(response.status).toBe(206);
      expect(response.body.nodes.map((node: { id: string }) => node.id)).toEqual([n1]);
      expect(response.body).toMatchObject({ edges: [], truncated: true, truncatedBy: 'results' });
    });

    it('rejects an invalid request', async () => {
      const response = await request(app).post('/query').send({ traversal: 'walk' });

      expect(response.status).toBe(400);
      expect(response.body.status).toBe('error');
      expect(response.body.message).toBe('Invalid query request');
      expect(response.body.errors.length).toBeGreaterThan(0);
    });

    it('requires a root for lookups', async () => {
      const response = await request(app).post('/query').send({ traversal: 'lookup' });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual([{ path: '/root', message: 'is required for lookup' }]);
    });

    it('returns 404 for an unknown root', async () => {
      const response = await request(app).post('/query').send({ traversal: 'neighbors', root: 'tn-missing' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ status: 'error', message: 'Unknown transient node: tn-missing' });
    });
  });

  describe('nodes', () => {
    it('returns a node summary', async () => {
      const response = await request(app).get(`/nodes/${n2}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: n2, candidateCount: 1, classification: 'UNKNOWN', revision: 1 });
    });

    it('returns node history', async () => {
      const response = await request(app).get(`/nodes/${n1}/history`);

      expect(response.status).toBe(200);
      expect(response.body.nodeId).toBe(n1);
    });

    it('corroborates a node', async () => {
      const response = await request(app).post(`/nodes/${n1}/corroborate`).send({ label: 'GRB' });

      expect(response.status).toBe(200);
      expect(response.body.changed).toBe(true);
      expect(response.body.node).toMatchObject({ id: n1, classification: 'GRB', classificationConfirmed: true });
    });

    it('maps unavailable storage to 503', async () => {
      store.offline = true;

      const response = await request(app).post(`/nodes/${n1}/corroborate`).send({ label: 'GRB' });

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ status: 'error', message: 'journal offline' });
    });
  });

  describe('cases', () => {
    it('lists open cases', async () => {
      const response = await request(app).get('/cases').query({ status: 'open' });

      expect(response.status).toBe(200);
      expect(response.body.cases.map((entry: { id: string }) => entry.id)).toEqual([caseId]);
    });

    it('rejects an unknown status filter', async () => {
      const response = await request(app).get('/cases').query({ status: 'pending' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'error',
        message: 'Invalid case filter',
        errors: [{ path: '/status', message: 'must be open or resolved' }],
      });
    });

    it('returns a case by id', async () => {
      const response = await request(app).get(`/cases/${caseId}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: caseId, candidateId: 'z', status: 'open' });
    });

    it('returns 404 for an unknown case', async () => {
      const response = await request(app).get('/cases/case-missing');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ status: 'error', message: 'Unknown ambiguous case: case-missing' });
    });

    it('resolves a case once', async () => {
      const first = await request(app).post(`/cases/${caseId}/resolve`).send({ action: 'attach', nodeId: n2 });
      const second = await request(app).post(`/cases/${caseId}/resolve`).send({ action: 'attach', nodeId: n2 });

      expect(first.status).toBe(200);
      expect(first.body.status).toBe('resolved');
      expect(first.body.resolution.nodeId).toBe(n2);
      expect(second.status).toBe(409);
      expect(second.body.status).toBe('error');
    });

    it('validates the resolution body', async () => {
      const response = await request(app).post(`/cases/${caseId}/resolve`).send({ action: 'attach' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Invalid case resolution');
    });
  });

  describe('GET /rejections', () => {
    it('lists rejected notices', async () => {
      await context.pipeline.submit({ source: 'pigeon', payload: {}, ref: 'r1' });

      const response = await request(app).get('/rejections');

      expect(response.status).toBe(200);
      expect(response.body.rejections).toHaveLength(1);
      expect(response.body.rejections[0]).toMatchObject({
        noticeRef: 'r1',
        source: 'pigeon',
        reason: 'Unrecognised notice source: pigeon',
      });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ status: 'error', message: 'Not found' });
  });
});
