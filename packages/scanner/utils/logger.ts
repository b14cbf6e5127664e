import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Structured JSON logger. Writes to stderr so stdout stays free for reports
 * and `--json` output.
 */
const baseOptions: LoggerOptions = {
  level: 'info',
  base: { service: 'fund-scanner' },
  redact: {
    paths: ['apiKey', '*.apiKey', 'token', '*.token', 'headers.authorization'],
    remove: true,
  },
  messageKey: 'message',
  timestamp: pino.stdTimeFunctions.isoTime,
};

const rootLogger: Logger = pino(baseOptions, pino.destination(2));

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

/** Logger that discards everything; used by tests and `--json` runs. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export default rootLogger;
