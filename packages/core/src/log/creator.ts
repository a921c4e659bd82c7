/**
 * Simulated log data.
 *
 * Produces plausible access logs for demos and for running a report when no
 * real log file is available. Output is deterministic for a given seed.
 */

import { writeFileSync } from 'node:fs';
import { compareLogEntries, formatLogEntry } from './entry.js';
import type { LogEntry } from './types.js';

export interface CreateLogOptions {
  /** Seed for the pseudo-random generator (default 42) */
  seed?: number;
  /** Year stamped on every entry (default 2024) */
  year?: number;
  /** Status code stamped on every entry (default 200) */
  status?: number;
}

export const DEFAULT_SEED = 42;

/**
 * Largest seed; seeds are unsigned 32-bit integers.
 */
export const MAX_SEED = 0xffffffff;
export const DEFAULT_YEAR = 2024;

/**
 * Returns a generator of floats in [0, 1) (mulberry32).
 *
 * @throws Error if seed is not an integer in [0, MAX_SEED]
 */
export function seededRandom(seed: number): () => number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new Error(
      `seed must be an integer in range [0, ${MAX_SEED}], got ${seed}`,
    );
  }
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Creates `count` random log entries sorted chronologically.
 *
 * Days are drawn from 1-28 so every month is valid.
 */
export function createLogEntries(
  count: number,
  options: CreateLogOptions = {},
): LogEntry[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`count must be a non-negative integer, got ${count}`);
  }

  const random = seededRandom(options.seed ?? DEFAULT_SEED);
  const between = (low: number, high: number): number =>
    low + Math.floor(random() * (high - low + 1));
  const year = options.year ?? DEFAULT_YEAR;
  const status = options.status ?? 200;

  const entries: LogEntry[] = [];
  for (let i = 0; i < count; i++) {
    entries.push({
      year,
      month: between(1, 12),
      day: between(1, 28),
      hour: between(0, 23),
      minute: between(0, 59),
      status,
    });
  }
  return entries.sort(compareLogEntries);
}

/**
 * Writes `count` simulated entries to a log file, one per line.
 *
 * @returns The entries written
 */
export function createLogfile(
  path: string,
  count: number,
  options: CreateLogOptions = {},
): LogEntry[] {
  const entries = createLogEntries(count, options);
  const body = entries.map((entry) => `${formatLogEntry(entry)}\n`).join('');
  writeFileSync(path, body, 'utf-8');
  return entries;
}
