import pino, { type Logger } from 'pino';
import type { AppConfig } from '../config.js';

/** Standalone pino logger for code that runs outside a Fastify request. */
export function createLogger(config: Pick<AppConfig, 'logLevel'>): Logger {
  return pino({ level: config.logLevel });
}
