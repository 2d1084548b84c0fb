import { LogLevel } from '@nestjs/common';

export const DEFAULT_LOG_LEVEL = 'warn';

const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Turns a LOG_LEVEL threshold into the list of levels Nest should print.
 * `info` is accepted as an alias of `log`; unknown values fall back to `warn`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? DEFAULT_LOG_LEVEL).trim().toLowerCase();
  const threshold = normalized === 'info' ? 'log' : normalized;
  const index = ORDERED_LEVELS.findIndex((candidate) => candidate === threshold);
  const cutoff = index === -1 ? ORDERED_LEVELS.indexOf(DEFAULT_LOG_LEVEL) : index;
  return ORDERED_LEVELS.slice(0, cutoff + 1);
}
