import type { Logger, LogLevel } from './types';

const logLevelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger and threshold pair threaded through resolution and export.
 */
export interface Diagnostics {
  logger: Logger;
  logLevel: LogLevel;
}

export const defaultDiagnostics: Diagnostics = {
  logger: console,
  logLevel: 'warn',
};

export function logWithLevel(
  logger: Logger,
  level: LogLevel,
  threshold: LogLevel,
  message: string,
  fields?: Record<string, unknown>,
): void {
  if (logLevelOrder[level] < logLevelOrder[threshold]) {
    return;
  }

  const fn = logger[level] ?? logger.warn ?? logger.info ?? logger.debug ?? logger.error;
  if (typeof fn !== 'function') {
    return;
  }

  try {
    fn.call(logger, message, fields);
  } catch {
    // A failing logger must not break configuration or export.
  }
}

export function log(
  diagnostics: Diagnostics,
  level: LogLevel,
  message: string,
  fields?: Record<string, unknown>,
): void {
  logWithLevel(diagnostics.logger, level, diagnostics.logLevel, message, fields);
}
