/**
 * Runtime configuration read from the environment.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface DatalinkConfig {
  readonly logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve configuration from an environment map.
 *
 * - `DATALINK_LOG_LEVEL`: one of the pino levels; unknown values fall back to the default.
 * - The default level is `silent` under `NODE_ENV=test`, `info` otherwise.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): DatalinkConfig {
  const fallback: LogLevel = env.NODE_ENV === 'test' ? 'silent' : 'info';
  const requested = env.DATALINK_LOG_LEVEL?.trim().toLowerCase();
  return {
    logLevel: requested && isLogLevel(requested) ? requested : fallback,
  };
}
