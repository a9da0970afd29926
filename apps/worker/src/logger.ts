import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'tracksync-worker' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let rootLogger: Logger | null = null;

/** Process-wide logger; LOG_LEVEL applies on first use unless `configureLogger` ran first. */
export function getLogger(): Logger {
  if (!rootLogger) {
    const level = process.env.LOG_LEVEL;
    rootLogger = createLogger(isLevel(level) ? level : 'info');
  }
  return rootLogger;
}

export function configureLogger(level: LevelWithSilent): Logger {
  rootLogger = createLogger(level);
  return rootLogger;
}

export function componentLogger(component: string, parent: Logger = getLogger()): Logger {
  return parent.child({ component });
}

/** Logger that drops everything; for tests and library callers that pass none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}
