import { logEntrySchema } from './validation.js';
import type { LogEntry } from './types.js';

const DIGITS = /^\d+$/;

/**
 * Parses one log line into a LogEntry.
 *
 * Lines hold whitespace-separated integers: `year month day hour minute`,
 * optionally followed by an HTTP status code.
 *
 * @param line - Raw line from a log file
 * @returns The parsed entry, or undefined if the line is blank or malformed
 *
 * @example
 * parseLogLine('2024 06 01 23 45 200')
 * // { year: 2024, month: 6, day: 1, hour: 23, minute: 45, status: 200 }
 */
export function parseLogLine(line: string): LogEntry | undefined {
  const fields = line.trim().split(/\s+/);
  if (fields.length < 5 || fields.length > 6) {
    return undefined;
  }
  if (!fields.every((field) => DIGITS.test(field))) {
    return undefined;
  }

  const [year, month, day, hour, minute, status] = fields.map((field) =>
    parseInt(field, 10),
  );
  const result = logEntrySchema.safeParse({
    year,
    month,
    day,
    hour,
    minute,
    ...(fields.length === 6 ? { status } : {}),
  });
  return result.success ? result.data : undefined;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Renders a LogEntry as a canonical log line.
 *
 * @example
 * formatLogEntry({ year: 2024, month: 6, day: 1, hour: 9, minute: 5 })
 * // '2024 06 01 09 05'
 */
export function formatLogEntry(entry: LogEntry): string {
  const line = [
    entry.year,
    pad2(entry.month),
    pad2(entry.day),
    pad2(entry.hour),
    pad2(entry.minute),
  ].join(' ');
  return entry.status === undefined ? line : `${line} ${entry.status}`;
}

/**
 * Chronological ordering of two entries.
 */
export function compareLogEntries(a: LogEntry, b: LogEntry): number {
  return (
    a.year - b.year ||
    a.month - b.month ||
    a.day - b.day ||
    a.hour - b.hour ||
    a.minute - b.minute
  );
}
