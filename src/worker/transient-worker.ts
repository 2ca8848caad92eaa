/**
 * Transient worker - main service loop
 *
 * Subscribes to raw notices, feeds them through the ingestion pipeline,
 * publishes one outcome per notice and one event per graph change.
 */
import { v4 as uuidv4 } from 'uuid';
import { BrokerAdapter } from '../broker/adapter';
import { logger } from '../utils/logger';
import Config from '../config';
import { metrics } from '../metrics/metrics';
import { SchemaValidationError, validateNoticeEnvelope } from '../utils/schema-validator';
import { startHealthServer, stopHealthServer } from '../health/server';
import type { IngestionPipeline } from '../pipeline/ingestion-pipeline';
import type { TransientGraph } from '../pipeline/transient-graph';
import type { AmbiguousCase, TransientNode } from '../types/graph';
import type { GraphEventType, GraphUpdated, NoticeProcessed } from '../types/events';
import type { ProcessOutcome } from '../types/outcome';
import { closeServiceContext, createServiceContext } from './context';
import type { ServiceContext } from './context';

export interface Publisher {
  publish(subject: string, data: unknown): Promise<void>;
}

/**
 * Validate one envelope, run it through the pipeline and publish its outcome.
 * An invalid envelope is reported as a rejected notice; storage failures
 * propagate to the caller.
 */
export async function handleNotice(
  data: unknown,
  pipeline: IngestionPipeline,
  publisher: Publisher
): Promise<ProcessOutcome> {
  let outcome: ProcessOutcome;
  let correlationId = refOf(data);

  try {
    const notice = validateNoticeEnvelope(data);
    correlationId = notice.ref;
    outcome = await pipeline.submit(notice);
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }

    metrics.noticesProcessed.inc({ status: 'rejected' });
    logger.warn({ noticeRef: correlationId, issues: error.errors }, 'Rejected invalid notice envelope');
    outcome = {
      status: 'rejected',
      noticeRef: correlationId ?? uuidv4(),
      source: sourceOf(data),
      reason: error.message,
      issues: error.errors,
    };
  }

  const message: NoticeProcessed = {
    event_id: uuidv4(),
    ...(correlationId !== undefined ? { correlation_id: correlationId } : {}),
    outcome,
    version: Config.service.version,
    timestamp: new Date().toISOString(),
  };
  await publisher.publish(Config.topics.out.noticeProcessed, message);

  logger.info({ correlationId, status: outcome.status }, 'Published notice outcome');
  return outcome;
}

/**
 * Forward graph events to the broker
 * @returns a function that detaches the listeners
 */
export function bindGraphEvents(graph: TransientGraph, publisher: Publisher): () => void {
  const send = (type: GraphEventType, fields: Omit<GraphUpdated, 'event_id' | 'type' | 'timestamp'>): void => {
    const message: GraphUpdated = { event_id: uuidv4(), type, ...fields, timestamp: new Date().toISOString() };
    publisher.publish(Config.topics.out.graphUpdated, message).catch(error => {
      logger.error({ error, type }, 'Failed to publish graph event');
    });
  };

  const listeners = {
    'node-created': (node: TransientNode) =>
      send('node-created', { nodeId: node.id, candidateId: node.candidateIds[0] }),
    'candidate-attached': (node: TransientNode, candidateId: string) =>
      send('candidate-attached', { nodeId: node.id, candidateId }),
    'case-opened': (entry: AmbiguousCase) =>
      send('case-opened', { caseId: entry.id, candidateId: entry.candidateId }),
    'case-resolved': (entry: AmbiguousCase) =>
      send('case-resolved', { caseId: entry.id, candidateId: entry.candidateId, nodeId: entry.resolution?.nodeId }),
    'nodes-merged': (merge: { canonicalId: string; supersededId: string }) =>
      send('nodes-merged', { nodeId: merge.canonicalId, supersededId: merge.supersededId }),
    'node-corroborated': (nodeId: string) => send('node-corroborated', { nodeId }),
  };

  for (const [event, listener] of Object.entries(listeners)) {
    graph.on(event, listener);
  }
  return () => {
    for (const [event, listener] of Object.entries(listeners)) {
      graph.off(event, listener);
    }
  };
}

export async function main(): Promise<void> {
  try {
    logger.info('Starting transient worker...');

    const context = await createServiceContext();

    const broker = await BrokerAdapter.connect(Config.broker.url);
    logger.info('Connected to broker');

    bindGraphEvents(context.graph, broker);

    await broker.subscribe(Config.topics.in.notices, async data => {
      await handleNotice(data, context.pipeline, broker);
    });
    logger.info({ topic: Config.topics.in.notices }, 'Transient worker listening for notices');

    startHealthServer(context);

    setupGracefulShutdown(context, broker);
  } catch (error) {
    logger.fatal({ error }, 'Failed to start transient worker');
    process.exit(1);
  }
}

function setupGracefulShutdown(context: ServiceContext, broker: BrokerAdapter): void {
  let stopping = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopHealthServer();

      // Stop taking notices before the queues drain
      await broker.close();
      logger.info('Broker connection closed');

      await closeServiceContext(context);
      logger.info('Graph store flushed');

      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', error => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', reason => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}

function refOf(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('ref' in data)) return undefined;
  return typeof data.ref === 'string' ? data.ref : undefined;
}

function sourceOf(data: unknown): string {
  if (typeof data !== 'object' || data === null || !('source' in data)) return 'unknown';
  return typeof data.source === 'string' && data.source ? data.source : 'unknown';
}

// Start the worker if this is the main module
if (require.main === module) {
  main().catch(error => {
    logger.fatal({ error }, 'Fatal error in transient worker');
    process.exit(1);
  });
}

export default main;
