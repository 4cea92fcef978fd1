/**
 * Shared pino logger. Level comes from VITE_LOG_LEVEL; in the browser pino
 * writes through console.
 */
import pino from 'pino';
import type { Level, Logger } from 'pino';

const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

export function resolveLogLevel(raw: string | undefined): Level {
  const v = (raw ?? '').trim().toLowerCase();
  return isLevel(v) ? v : 'info';
}

export const logger: Logger = pino({
  level: resolveLogLevel(import.meta.env.VITE_LOG_LEVEL),
  base: { app: 'plant-ops-dashboard' },
  browser: { asObject: false },
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
