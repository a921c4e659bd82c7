/**
 * Zod validation schemas for log records.
 */

import { z } from 'zod';
import type { LogEntry } from './types.js';
import { MAX_HOUR, MAX_MONTH, MIN_HOUR, MIN_MONTH } from '../time/constants.js';

/**
 * Schema for an hour of day, [0, 23].
 */
export const hourSchema = z.number().int().min(MIN_HOUR).max(MAX_HOUR);

/**
 * Schema for a one-based month, [1, 12].
 */
export const monthSchema = z.number().int().min(MIN_MONTH).max(MAX_MONTH);

/**
 * Latest year a log line may carry.
 */
export const MAX_YEAR = 9999;

/**
 * Schema for a LogEntry.
 * The day is only checked against 31; calendar validity is not enforced.
 */
export const logEntrySchema: z.ZodType<LogEntry> = z.object({
  year: z.number().int().min(0).max(MAX_YEAR),
  month: monthSchema,
  day: z.number().int().min(1).max(31),
  hour: hourSchema,
  minute: z.number().int().min(0).max(59),
  status: z.number().int().min(100).max(599).optional(),
});
