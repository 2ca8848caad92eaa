/**
 * HTTP server: health, metrics, graph status and the query boundary
 */
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger';
import Config from '../config';
import MetricsService, { getMetrics } from '../metrics/metrics';
import { COMPACT_MB_LIMIT } from '../graph-store/compactor';
import {
  CaseStateError,
  GraphIntegrityError,
  QueryLimitExceededError,
  StorageUnavailableError,
  UnknownCaseError,
  UnknownNodeError,
} from '../utils/errors';
import {
  SchemaValidationError,
  validateCaseResolution,
  validateCorroboration,
  validateQueryRequest,
} from '../utils/schema-validator';
import type { ServiceContext } from '../worker/context';
import type { CaseStatus } from '../types/graph';

let server: Server | null = null;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function parseCaseStatus(value: unknown): CaseStatus | undefined {
  if (value === undefined) return undefined;
  if (value === 'open' || value === 'resolved') return value;
  throw new SchemaValidationError('Invalid case filter', [{ path: '/status', message: 'must be open or resolved' }]);
}

/**
 * Build the express app over a service context
 */
export function createHealthApp(context: ServiceContext): express.Express {
  const { store, graph, pipeline, queryEngine } = context;
  const app = express();

  app.use(express.json({ limit: '256kb' }));

  app.use((req, res, next) => {
    logger.debug({ method: req.method, url: req.url }, 'HTTP request received');
    next();
  });

  app.get('/healthz', (req, res) => {
    const memoryUsage = process.memoryUsage();

    res.json({
      status: 'ok',
      service: Config.service.name,
      version: Config.service.version,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        rss: Math.round(memoryUsage.rss / 1024 / 1024), // MB
        heapUsed: Math.round(memoryUsage.heapUsed / 1024 / 1024), // MB
      },
    });
  });

  app.get(
    '/graph',
    route(async (req, res) => {
      const stats = store.stats();
      const journalMB = (await store.journalBytes()) / (1024 * 1024);

      let status = 'normal';
      if (journalMB > COMPACT_MB_LIMIT * 2) {
        status = 'critical';
      } else if (journalMB > COMPACT_MB_LIMIT) {
        status = 'degraded';
      }

      res.status(status === 'critical' ? 503 : 200).json({
        ok: status !== 'critical',
        status,
        persistent: store.persistent,
        ...stats,
        journalMB: Math.round(journalMB * 10) / 10,
        lastCompaction: store.getLastCompactionTimestamp(),
        partitions: pipeline.activePartitions,
      });
    })
  );

  app.get(
    '/metrics',
    route(async (req, res) => {
      const body = await getMetrics();
      res.set('Content-Type', MetricsService.register.contentType);
      res.end(body);
    })
  );

  app.post(
    '/query',
    route(async (req, res) => {
      const request = validateQueryRequest(req.body);

      // Stop walking once the client has gone
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });

      const result = await queryEngine.execute(request, controller.signal);
      res.json(result);
    })
  );

  app.get('/nodes/:id', (req, res) => {
    res.json(queryEngine.getNode(req.params.id));
  });

  app.get('/nodes/:id/history', (req, res) => {
    res.json(queryEngine.history(req.params.id));
  });

  app.post(
    '/nodes/:id/corroborate',
    route(async (req, res) => {
      const { label } = validateCorroboration(req.body ?? {});
      const result = await graph.corroborate(req.params.id, label);
      res.json({ node: queryEngine.getNode(result.node.id), changed: result.changed, reevaluation: result.reevaluation });
    })
  );

  app.get('/cases', (req, res) => {
    const status = parseCaseStatus(req.query.status);
    const nodeId = typeof req.query.nodeId === 'string' ? req.query.nodeId : undefined;
    res.json({ cases: queryEngine.listCases({ status, nodeId }) });
  });

  app.get('/cases/:id', (req, res) => {
    const entry = store.getCase(req.params.id);
    if (!entry) throw new UnknownCaseError(req.params.id);
    res.json(entry);
  });

  app.post(
    '/cases/:id/resolve',
    route(async (req, res) => {
      const action = validateCaseResolution(req.body);
      const entry = await graph.resolveCaseManually(req.params.id, action);
      res.json(entry);
    })
  );

  app.get('/rejections', (req, res) => {
    res.json({ rejections: pipeline.rejectionLog });
  });

  app.use((req, res) => {
    logger.info({ method: req.method, url: req.url }, 'Unknown route');
    res.status(404).json({ status: 'error', message: 'Not found' });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof QueryLimitExceededError) {
      res.status(206).json(err.partial);
      return;
    }
    if (err instanceof SchemaValidationError) {
      res.status(400).json({ status: 'error', message: err.message, errors: err.errors });
      return;
    }
    if (err instanceof UnknownNodeError || err instanceof UnknownCaseError) {
      res.status(404).json({ status: 'error', message: err.message });
      return;
    }
    if (err instanceof CaseStateError || err instanceof GraphIntegrityError) {
      res.status(409).json({ status: 'error', message: err.message });
      return;
    }
    if (err instanceof StorageUnavailableError) {
      logger.error({ error: err, method: req.method, url: req.url }, 'Storage unavailable');
      res.status(503).json({ status: 'error', message: err.message });
      return;
    }

    logger.error({ error: err, method: req.method, url: req.url }, 'Server error');
    res.status(500).json({ status: 'error', message: 'Internal server error' });
  });

  return app;
}

/**
 * Start the HTTP server
 */
export function startHealthServer(context: ServiceContext): void {
  const app = createHealthApp(context);
  const port = Config.http.port;
  const host = Config.http.host;

  server = app.listen(port, host, () => {
    logger.info({ port, host }, 'HTTP server started');
  });

  server.on('error', (error: Error) => {
    logger.error({ error }, 'HTTP server error');
  });
}

/**
 * Stop the HTTP server
 */
export function stopHealthServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      return resolve();
    }

    logger.info('Stopping HTTP server');

    server.close((err: Error | undefined) => {
      if (err) {
        logger.error({ error: err }, 'Error closing HTTP server');
        return reject(err);
      }

      logger.info('HTTP server stopped');
      server = null;
      resolve();
    });
  });
}

export default { startHealthServer, stopHealthServer, createHealthApp };
