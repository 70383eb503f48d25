// src/core/logger.ts
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

/**
 * JSON logger on stderr; stdout is reserved for command output.
 */
export function createLogger(level?: LevelWithSilent): Logger {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return pino(
    {
      name: 'booru-decensor',
      level: level ?? (envLevel ? envLevel : 'info'),
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
