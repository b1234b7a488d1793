/**
 * Structured logger using Pino.
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info({ lobbyCode: 'ABCD-1234' }, 'Lobby created');
 *   const log = logger.child({ module: 'capture' });
 */

import pino, { type Logger } from 'pino';
import { loadConfig, type ServerConfig } from './config';

export function createLogger(config: Pick<ServerConfig, 'logLevel' | 'env'>): Logger {
  return pino({
    level: config.logLevel,
    transport:
      config.env === 'development'
        ? { target: 'pino/file', options: { destination: 1 } } // stdout in dev
        : undefined,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    base: {
      service: 'holdfast',
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger = createLogger(loadConfig());

export type { Logger } from 'pino';
