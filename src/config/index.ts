/**
 * Configuration settings for the transient graph service
 */
import { config } from 'dotenv';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS = {
  development: 'debug',
  test: 'debug',
  production: 'info',
} as const;

// Get the current node environment or default to development
const nodeEnv = (process.env.NODE_ENV || 'development') as keyof typeof LOG_LEVELS;

/**
 * Configuration object for the transient graph service
 */
export const Config = {
  // Service info
  service: {
    name: 'transient-graph',
    version: process.env.npm_package_version || '0.1.0',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || LOG_LEVELS[nodeEnv] || 'info',
    prettyPrint: nodeEnv !== 'production',
  },

  // NATS broker configuration
  broker: {
    url: process.env.BROKER_URL || 'nats://localhost:4222',
    timeout: parseInt(process.env.BROKER_TIMEOUT || '5000', 10),
    reconnectAttempts: parseInt(process.env.BROKER_RECONNECT_ATTEMPTS || '10', 10),
    reconnectTimeWait: parseInt(process.env.BROKER_RECONNECT_TIME_WAIT || '1000', 10), // ms
    queueGroup: process.env.BROKER_QUEUE_GROUP || 'transient-graph',
  },

  // Topic definitions
  topics: {
    // Input topics (subscribe)
    in: {
      notices: process.env.TOPIC_IN_NOTICES || 'gcn.notices.raw.v1',
    },
    // Output topics (publish)
    out: {
      noticeProcessed: process.env.TOPIC_OUT_NOTICE_PROCESSED || 'events.transients.notice.processed.v1',
      graphUpdated: process.env.TOPIC_OUT_GRAPH_UPDATED || 'events.transients.graph.updated.v1',
    },
  },

  // HTTP server configuration (health, metrics, queries)
  http: {
    port: parseInt(process.env.HTTP_PORT || '3000', 10),
    host: process.env.HTTP_HOST || '0.0.0.0',
  },

  // Graph storage
  storage: {
    // Empty string keeps the graph in memory only
    journalPath: process.env.GRAPH_JOURNAL_PATH ?? 'data/transients/graph.jsonl',
    fsync: process.env.FSYNC === 'true',
    retryAttempts: parseInt(process.env.STORAGE_RETRY_ATTEMPTS || '3', 10),
    retryDelayMs: parseInt(process.env.STORAGE_RETRY_DELAY_MS || '100', 10),
  },

  // Domain tuning document; falls back to the bundled defaults
  resolution: {
    configPath: process.env.RESOLUTION_CONFIG_PATH || '',
  },

  // Hard caps for query requests
  query: {
    maxDepth: parseInt(process.env.QUERY_MAX_DEPTH || '6', 10),
    maxResults: parseInt(process.env.QUERY_MAX_RESULTS || '500', 10),
  },

  ingestion: {
    maxRejections: parseInt(process.env.INGEST_MAX_REJECTIONS || '1000', 10),
  },

  metrics: {
    collectDefaults: process.env.METRICS_COLLECT_DEFAULTS !== 'false',
  },
};

export type ServiceConfig = typeof Config;

// Export configuration as default
export default Config;
