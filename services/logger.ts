import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Normalize and validate a log level string for pino.
 */
export function normalizeLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== 'string') return undefined;
  const level = raw.trim().toLowerCase();
  return LEVELS.find((allowed) => allowed === level);
}

const defaultLevel: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

export const logger = pino({
  level: normalizeLogLevel(process.env.JOB_ASSISTANT_LOG_LEVEL) ?? defaultLevel,
  base: { service: 'job-assistant' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// pino children copy the parent's level once, at creation.
const scoped: pino.Logger[] = [];

/**
 * Scoped child logger. Each module creates one:
 *   const log = createLogger('ModelResolver');
 *   log.info({ model }, 'Model passed liveness probe');
 */
export function createLogger(scope: string): pino.Logger {
  const child = logger.child({ scope });
  scoped.push(child);
  return child;
}

/** Apply the configured level to the root and every scoped logger. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of scoped) child.level = level;
}
