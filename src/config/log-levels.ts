import { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Every level up to and including `level`; unknown values fall back to `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = ORDERED_LEVELS.findIndex((candidate) => candidate === level);
  return ORDERED_LEVELS.slice(0, (index === -1 ? ORDERED_LEVELS.indexOf('log') : index) + 1);
}
