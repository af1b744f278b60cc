import { LogLevel } from '@nestjs/common';

const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expand a minimum level ("warn") into the list Nest expects
 * (["fatal", "error", "warn"]). Unknown or missing values mean "log".
 */
export function resolveLogLevels(level?: string): LogLevel[] {
  const index = LEVELS.findIndex((candidate) => candidate === level?.trim().toLowerCase());
  return LEVELS.slice(0, (index === -1 ? LEVELS.indexOf('log') : index) + 1);
}
