/**
 * Access record sources: the record contract, log line parsing, an in-memory
 * source, a file-backed reader and simulated log data.
 */

export type {
  AccessRecord,
  LogEntry,
  LineSink,
  RecordSource,
} from './types.js';

export {
  ErrorCode,
  WeblogError,
  LogfileNotFoundError,
  LogfileReadError,
  ConfigError,
  isWeblogError,
} from './errors.js';

export {
  hourSchema,
  monthSchema,
  MAX_YEAR,
  logEntrySchema,
} from './validation.js';

export { parseLogLine, formatLogEntry, compareLogEntries } from './entry.js';

export { ArrayRecordSource, recordsFromHours } from './arraySource.js';

export type { CreateLogOptions } from './creator.js';
export {
  DEFAULT_SEED,
  DEFAULT_YEAR,
  MAX_SEED,
  seededRandom,
  createLogEntries,
  createLogfile,
} from './creator.js';

export type { MissingLogfilePolicy, LogfileReaderOptions } from './reader.js';
export {
  DEFAULT_LOGFILE,
  DEFAULT_SIMULATED_ENTRIES,
  LogfileReader,
} from './reader.js';
