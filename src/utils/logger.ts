/**
 * Logger configuration for the transient graph service
 */
import pino from 'pino';
import Config from '../config';

export const logger = pino({
  level: Config.logging.level,
  name: Config.service.name,

  // Use pretty printing outside production
  transport: Config.logging.prettyPrint
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  // Call sites log failures under `error`, not pino's default `err`
  serializers: {
    error: pino.stdSerializers.err,
  },

  // Raw notice bodies can run to kilobytes of text
  redact: {
    paths: ['notice.payload', 'data.payload'],
    censor: '[payload]',
  },

  base: {
    app: Config.service.name,
    version: Config.service.version,
    env: process.env.NODE_ENV || 'development',
  },
});

export default logger;
