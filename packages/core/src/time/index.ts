/**
 * Hour-of-day and month-of-year bucket indexing utilities.
 *
 * This module provides:
 * - Constants for bucket counts and value ranges
 * - Conversion between hours/months and bucket indices
 * - Cyclic hour succession (for the 23:00 -> 00:00 wrap)
 */

export * from './constants.js';
export * from './bucket.js';
