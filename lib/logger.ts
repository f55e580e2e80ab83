import pino from 'pino';

/**
 * Shared pino logger.
 * Logs go to stderr so the operator-facing report on stdout is not interleaved with JSON lines.
 */
const logger = pino(
  {
    name: 'dns-scavenger',
    level: process.env.LOG_LEVEL || 'info',
  },
  pino.destination(2),
);

export default logger;
