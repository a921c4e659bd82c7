import { readFileSync } from 'node:fs';
import { createLogEntries, DEFAULT_SEED } from './creator.js';
import { formatLogEntry, parseLogLine } from './entry.js';
import { LogfileNotFoundError, LogfileReadError } from './errors.js';
import type { LineSink, LogEntry, RecordSource } from './types.js';

/**
 * Log file read when none is named.
 */
export const DEFAULT_LOGFILE = 'demo.log';

/**
 * Number of simulated entries used when falling back to generated data.
 */
export const DEFAULT_SIMULATED_ENTRIES = 100;

/**
 * What to do when the log file does not exist.
 * - `throw`: raise LogfileNotFoundError
 * - `simulate`: warn and replay generated entries instead
 */
export type MissingLogfilePolicy = 'throw' | 'simulate';

export interface LogfileReaderOptions {
  onMissing?: MissingLogfilePolicy;
  /** Entry count for simulated data */
  simulatedEntries?: number;
  /** Seed for simulated data */
  seed?: number;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

interface LoadedEntries {
  entries: LogEntry[];
  simulated: boolean;
  skippedLines: number;
}

function loadEntries(path: string, options: LogfileReaderOptions): LoadedEntries {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (!isMissingFileError(error)) {
      throw new LogfileReadError(path, { cause });
    }
    if (options.onMissing !== 'simulate') {
      throw new LogfileNotFoundError(path, { cause });
    }
    const count = options.simulatedEntries ?? DEFAULT_SIMULATED_ENTRIES;
    console.warn(`Cannot find ${path}; using ${count} simulated entries`);
    return {
      entries: createLogEntries(count, { seed: options.seed ?? DEFAULT_SEED }),
      simulated: true,
      skippedLines: 0,
    };
  }

  const entries: LogEntry[] = [];
  let skippedLines = 0;
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    const entry = parseLogLine(line);
    if (entry === undefined) {
      skippedLines++;
      console.warn(`${path}:${index + 1}: skipping malformed line "${line}"`);
      return;
    }
    entries.push(entry);
  });

  return { entries, simulated: false, skippedLines };
}

/**
 * Record source backed by a log file.
 *
 * The file is read and parsed once, at construction. Blank lines are ignored;
 * malformed lines are skipped with a warning and counted in `skippedLines`.
 * Every traversal replays the parsed entries in file order.
 */
export class LogfileReader implements RecordSource<LogEntry> {
  readonly path: string;
  /** True when the entries were generated because the file was missing */
  readonly simulated: boolean;
  readonly skippedLines: number;
  private readonly entries: LogEntry[];
  private cursor = 0;

  constructor(path: string = DEFAULT_LOGFILE, options: LogfileReaderOptions = {}) {
    this.path = path;
    const loaded = loadEntries(path, options);
    this.entries = loaded.entries;
    this.simulated = loaded.simulated;
    this.skippedLines = loaded.skippedLines;
  }

  /** Number of entries in one full traversal. */
  get size(): number {
    return this.entries.length;
  }

  reset(): void {
    this.cursor = 0;
  }

  hasNext(): boolean {
    return this.cursor < this.entries.length;
  }

  next(): LogEntry {
    if (!this.hasNext()) {
      throw new Error(`No entry left in ${this.path}`);
    }
    return this.entries[this.cursor++];
  }

  /**
   * Print every entry as a canonical log line.
   * Does not move the traversal cursor.
   */
  printData(sink: LineSink): void {
    for (const entry of this.entries) {
      sink(formatLogEntry(entry));
    }
  }
}
