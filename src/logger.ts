import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const KNOWN_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LevelWithSilent {
  return KNOWN_LEVELS.has(value);
}

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Library logger. Silent unless a level is given or LOG_LEVEL is set,
 * so that embedding applications opt in to the output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const level = options.level ?? (envLevel !== undefined && isLogLevel(envLevel) ? envLevel : 'silent');
  return pino({ name: options.name ?? 'mongo-filter-dsl', level });
}

export const logger: Logger = createLogger();
