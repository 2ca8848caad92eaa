/**
 * Main entry point for the transient graph service
 */
import { main } from './worker/transient-worker';
import { logger } from './utils/logger';
import Config from './config';

logger.info({
  name: Config.service.name,
  version: Config.service.version,
  environment: process.env.NODE_ENV || 'development',
  broker: Config.broker.url,
  topics: {
    in: Config.topics.in,
    out: Config.topics.out,
  },
  journal: Config.storage.journalPath || '(memory)',
}, 'Starting transient graph service');

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in transient graph service');
  process.exit(1);
});
