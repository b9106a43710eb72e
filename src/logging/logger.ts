/**
 * Diagnostic logger interface.
 *
 * Components take a Logger rather than writing to the console directly; the
 * run wires in StructuredLogger.forModule() so diagnostics land in the
 * application log with the run's correlation id.
 *
 * @module logging/logger
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
