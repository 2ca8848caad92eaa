/**
 * Environment for every test file, applied before any module loads
 */
process.env.NODE_ENV = 'test';
process.env.METRICS_COLLECT_DEFAULTS = 'false';
// In-memory graph unless a test passes its own journal path
process.env.GRAPH_JOURNAL_PATH = '';
process.env.STORAGE_RETRY_DELAY_MS = '1';
