/**
 * Shared pino logger for the engine and its batch scripts. The LLM key and
 * request authorization headers are redacted; tests log nothing unless
 * LOG_LEVEL says otherwise.
 */

import pino, { type Logger } from 'pino';

const redactPaths = [
  'llmApiKey',
  'apiKey',
  'authorization',
  'Authorization',
  'headers.Authorization',
  '*.llmApiKey',
  '*.apiKey',
];

const nodeEnv = process.env.NODE_ENV || 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/** Child logger tagged with the emitting module. */
export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
