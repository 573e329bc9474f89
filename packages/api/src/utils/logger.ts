import pino, { type Logger } from 'pino';

/**
 * Process-wide structured logger.
 *
 * Components take a child of this logger so every line carries the
 * component name; Fastify uses the same instance for request logs.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  base: { service: 'eduflow-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: ['req.headers.authorization', 'config.openai.apiKey', 'config.groq.apiKey'],
});

export type { Logger };
