/**
 * Logger
 *
 * Thin wrapper around pino so resources can take a logger without
 * depending on how it is built. Resources bind their kind and id
 * through child loggers.
 */

import pino from 'pino';
import { resolveConfig, type DatalinkConfig } from './config';

export type Logger = pino.Logger;

let rootLogger: Logger | undefined;

export function createLogger(config: DatalinkConfig = resolveConfig(), bindings: Record<string, unknown> = {}): Logger {
  return pino({
    name: 'datalink',
    level: config.logLevel,
    base: bindings,
  });
}

/** Process-wide default logger, created on first use. */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}
