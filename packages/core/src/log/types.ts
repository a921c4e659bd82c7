/**
 * Record types consumed by the log analyzer.
 */

/**
 * A single access, reduced to the two time fields the analyzer counts.
 */
export interface AccessRecord {
  /** Hour of day, range [0, 23] */
  readonly hour: number;
  /** Month of year, range [1, 12] */
  readonly month: number;
}

/**
 * An access parsed from one line of a web server log file.
 */
export interface LogEntry extends AccessRecord {
  readonly year: number;
  /** Day of month, range [1, 31] */
  readonly day: number;
  /** Minute of hour, range [0, 59] */
  readonly minute: number;
  /** HTTP status code, when the log line carries one */
  readonly status?: number;
}

/**
 * Consumer of rendered output lines.
 */
export type LineSink = (line: string) => void;

/**
 * A finite, restartable sequence of access records.
 *
 * Every traversal after `reset()` yields the same records in the same order.
 */
export interface RecordSource<T extends AccessRecord = AccessRecord> {
  /** Rewind to the first record. */
  reset(): void;
  /** Whether another record remains in the current traversal. */
  hasNext(): boolean;
  /**
   * Returns the next record and advances.
   * Calling this when `hasNext()` is false is a caller error.
   */
  next(): T;
  /** Print every record, one per line, when the source knows how. */
  printData?(sink: LineSink): void;
}
