import { pino, type LoggerOptions } from 'pino';

// shared with Fastify so request logs and process logs agree on level and redaction
export const loggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  redact: ['req.headers.authorization', 'secret'],
} satisfies LoggerOptions;

export const logger = pino(loggerOptions);
