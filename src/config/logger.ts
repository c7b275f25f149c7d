import pino, { Logger } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/**
 * Root logger. Fastify uses it as its request logger; engine components
 * take a child of it.
 */
export const logger: Logger = pino({
  name: 'zip-tier-router',
  level: LOG_LEVEL,
});

export type { Logger };
