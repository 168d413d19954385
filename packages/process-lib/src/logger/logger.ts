import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

/** Service logger. LOG_LEVEL wins over the default when no level is passed. */
export function createLogger(name: string, level?: LevelWithSilent): Logger {
  return pino({ name, level: level ?? process.env.LOG_LEVEL ?? 'info' });
}
