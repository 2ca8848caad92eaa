/**
 * Metrics module for the transient graph service using Prometheus client
 */
import client from 'prom-client';
import { logger } from '../utils/logger';
import Config from '../config';

// Initialize Prometheus registry
const register = new client.Registry();

// Add default metrics (CPU, memory, event loop, etc.)
if (Config.metrics.collectDefaults) {
  client.collectDefaultMetrics({ register });
}

// Application-specific metrics
export const metrics = {
  // Counter for notices by outcome (created, merged, ambiguous, duplicate, rejected, failed)
  noticesProcessed: new client.Counter({
    name: 'transient_graph_notices_processed_total',
    help: 'Total number of notices processed, by outcome',
    labelNames: ['status'] as const,
    registers: [register],
  }),

  // Histogram for end-to-end processing time of one notice
  processingTime: new client.Histogram({
    name: 'transient_graph_processing_time_seconds',
    help: 'Time taken to normalize, match, resolve and apply one notice',
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    registers: [register],
  }),

  matchDuration: new client.Histogram({
    name: 'transient_graph_match_duration_seconds',
    help: 'Time taken to score one candidate against the graph',
    buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
    registers: [register],
  }),

  // --- Graph shape ---

  graphNodesTotal: new client.Gauge({
    name: 'transient_graph_nodes_total',
    help: 'Canonical transient nodes in the graph',
    registers: [register],
  }),

  supersededNodesTotal: new client.Gauge({
    name: 'transient_graph_superseded_nodes_total',
    help: 'Nodes retained after being merged into another node',
    registers: [register],
  }),

  graphEdgesTotal: new client.Gauge({
    name: 'transient_graph_edges_total',
    help: 'Edges in the graph',
    registers: [register],
  }),

  openCasesTotal: new client.Gauge({
    name: 'transient_graph_open_cases_total',
    help: 'Ambiguous cases waiting for resolution',
    registers: [register],
  }),

  // --- Resolution ---

  nodeMergesTotal: new client.Counter({
    name: 'transient_graph_node_merges_total',
    help: 'Node-to-node merges performed',
    labelNames: ['reason'] as const,
    registers: [register],
  }),

  casesResolvedTotal: new client.Counter({
    name: 'transient_graph_cases_resolved_total',
    help: 'Ambiguous cases resolved',
    labelNames: ['reason'] as const,
    registers: [register],
  }),

  reevaluationsTotal: new client.Counter({
    name: 'transient_graph_reevaluations_total',
    help: 'Corroboration events that triggered case re-evaluation',
    registers: [register],
  }),

  // --- Queries ---

  queryDuration: new client.Histogram({
    name: 'transient_graph_query_duration_seconds',
    help: 'Time taken to answer a query',
    labelNames: ['traversal'] as const,
    buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
    registers: [register],
  }),

  queryTruncationsTotal: new client.Counter({
    name: 'transient_graph_query_truncations_total',
    help: 'Queries cut short by their depth or result limit',
    labelNames: ['limit'] as const,
    registers: [register],
  }),

  // --- Storage ---

  storageRetriesTotal: new client.Counter({
    name: 'transient_graph_storage_retries_total',
    help: 'Retries after a storage failure',
    registers: [register],
  }),

  journalFileBytes: new client.Gauge({
    name: 'transient_graph_journal_file_bytes',
    help: 'Size of the graph journal on disk',
    registers: [register],
  }),

  graphCompactionsTotal: new client.Counter({
    name: 'transient_graph_compactions_total',
    help: 'Total number of journal compactions performed',
    registers: [register],
  }),

  graphCompactionTimeSeconds: new client.Histogram({
    name: 'transient_graph_compaction_time_seconds',
    help: 'Time taken to compact the journal',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export { register };

export default {
  metrics,
  getMetrics,
  register,
};
