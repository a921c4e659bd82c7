import {
  HOURS_PER_DAY,
  MAX_HOUR,
  MAX_MONTH,
  MIN_HOUR,
  MIN_MONTH,
} from './constants.js';

/**
 * Checks whether a value is a valid hour of day.
 */
export function isHour(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_HOUR && value <= MAX_HOUR;
}

/**
 * Checks whether a value is a valid one-based month.
 */
export function isMonth(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_MONTH && value <= MAX_MONTH;
}

/**
 * Converts an hour of day to its bucket index.
 *
 * Hours are stored at their own index, so this only validates.
 *
 * @param hour - Hour in range [0, 23]
 * @returns Bucket index in range [0, 23]
 * @throws Error if hour is out of range
 */
export function hourToBucket(hour: number): number {
  if (!isHour(hour)) {
    throw new Error(
      `hour must be an integer in range [${MIN_HOUR}, ${MAX_HOUR}], got ${hour}`,
    );
  }
  return hour;
}

/**
 * Converts a one-based month to its zero-based bucket index.
 *
 * @param month - Month in range [1, 12]
 * @returns Bucket index in range [0, 11]
 * @throws Error if month is out of range
 *
 * @example
 * monthToBucket(1) // 0 (January)
 * monthToBucket(12) // 11 (December)
 */
export function monthToBucket(month: number): number {
  if (!isMonth(month)) {
    throw new Error(
      `month must be an integer in range [${MIN_MONTH}, ${MAX_MONTH}], got ${month}`,
    );
  }
  return month - 1;
}

/**
 * Converts a zero-based month bucket index back to a one-based month.
 *
 * @param bucket - Bucket index in range [0, 11]
 * @returns Month in range [1, 12]
 * @throws Error if bucket is out of range
 */
export function bucketToMonth(bucket: number): number {
  if (!Number.isInteger(bucket) || bucket < 0 || bucket > MAX_MONTH - 1) {
    throw new Error(
      `month bucket must be an integer in range [0, ${MAX_MONTH - 1}], got ${bucket}`,
    );
  }
  return bucket + 1;
}

/**
 * Returns the hour that follows the given one on a 24-hour clock face.
 * 23:00 is followed by 00:00.
 *
 * @example
 * nextHour(9) // 10
 * nextHour(23) // 0
 */
export function nextHour(hour: number): number {
  return (hourToBucket(hour) + 1) % HOURS_PER_DAY;
}
