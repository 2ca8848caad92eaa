/**
 * Wires one graph store handle through every component of the service
 */
import { logger } from '../utils/logger';
import Config from '../config';
import { loadResolutionConfig } from '../config/resolution';
import type { ResolutionConfig } from '../config/resolution';
import { GraphStore } from '../graph-store';
import { NoticeNormalizer } from '../normalizer';
import { TransientGraph } from '../pipeline/transient-graph';
import { IngestionPipeline } from '../pipeline/ingestion-pipeline';
import { QueryEngine } from '../query/query-engine';

export interface ServiceContext {
  store: GraphStore;
  config: ResolutionConfig;
  graph: TransientGraph;
  normalizer: NoticeNormalizer;
  pipeline: IngestionPipeline;
  queryEngine: QueryEngine;
}

export interface ServiceContextOptions {
  store?: GraphStore;
  config?: ResolutionConfig;
}

/**
 * Build the components and replay the store
 */
export async function createServiceContext(options: ServiceContextOptions = {}): Promise<ServiceContext> {
  const config = options.config ?? loadResolutionConfig(Config.resolution.configPath || undefined);
  const store = options.store ?? new GraphStore();
  await store.init();

  const graph = new TransientGraph({ store, config });
  const normalizer = new NoticeNormalizer(config);
  const pipeline = new IngestionPipeline({ graph, normalizer, config });
  const queryEngine = new QueryEngine(store);

  logger.info({ sources: normalizer.sources, persistent: store.persistent, ...store.stats() }, 'Service context ready');
  return { store, config, graph, normalizer, pipeline, queryEngine };
}

/**
 * Let queued notices finish, then flush the store
 */
export async function closeServiceContext(context: ServiceContext): Promise<void> {
  await context.pipeline.drain();
  if (context.store.persistent) {
    await context.store.compact();
  }
  await context.store.close();
}
