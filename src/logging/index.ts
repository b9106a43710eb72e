/**
 * Structured logging
 *
 * @module logging
 */

export { JsonlSink, DEFAULT_MAX_FILE_BYTES, DEFAULT_MAX_FILES, type JsonlSinkConfig } from './jsonl-sink.js';
export { silentLogger, type LogFields, type Logger } from './logger.js';
export {
  collectScanSummaries,
  parseLogEntry,
  readLogEntries,
  type ReadResult,
  type ScanSummary,
} from './log-reader.js';
export {
  APP_LOG_FILE,
  EVENTS,
  STREAM_PREFIXES,
  StructuredLogger,
  formatDate,
  recordRef,
  siteRef,
  streamFileName,
  tallyVerdicts,
  type EmitInput,
  type StructuredLoggerConfig,
  type VerdictTally,
} from './structured-logger.js';
