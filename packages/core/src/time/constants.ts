/**
 * Time bucket constants.
 *
 * Accesses are counted in two independent dimensions:
 * - hour of day, 24 buckets indexed by the hour itself (0-23)
 * - month of year, 12 buckets indexed by month - 1 (January = 0)
 */

/**
 * Number of hour-of-day buckets.
 */
export const HOURS_PER_DAY = 24;

/**
 * Number of month-of-year buckets.
 */
export const MONTHS_PER_YEAR = 12;

/**
 * Earliest valid hour (midnight).
 */
export const MIN_HOUR = 0;

/**
 * Latest valid hour (23:00).
 */
export const MAX_HOUR = 23;

/**
 * First month, one-based (January).
 */
export const MIN_MONTH = 1;

/**
 * Last month, one-based (December).
 */
export const MAX_MONTH = 12;
