import type { AccessSummary } from '../analyzer/types.js';
import type { Counts } from '../analytics/counters/index.js';
import { nextHour } from '../time/bucket.js';

const NOT_AVAILABLE = 'n/a';

/**
 * Renders hourly counts: a header, then `<hour>: <count>` for each hour.
 *
 * @example
 * formatHourlyCounts([2, 1, ...]) // ['Hr: Count', '0: 2', '1: 1', ...]
 */
export function formatHourlyCounts(counts: Counts): string[] {
  return ['Hr: Count', ...counts.map((count, hour) => `${hour}: ${count}`)];
}

/**
 * Renders monthly counts: a header, then `<month>: <count>` with one-based
 * month numbers.
 */
export function formatMonthlyCounts(counts: Counts): string[] {
  return [
    'Month: Count',
    ...counts.map((count, bucket) => `${bucket + 1}: ${count}`),
  ];
}

const monthFormatter = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  timeZone: 'UTC',
});

/**
 * English name of a one-based month.
 *
 * @example
 * monthName(1) // 'January'
 */
export function monthName(month: number): string {
  return monthFormatter.format(new Date(Date.UTC(2000, month - 1, 1)));
}

function formatHour(hour: number | undefined): string {
  return hour === undefined ? NOT_AVAILABLE : `${hour}`;
}

function formatMonth(month: number | undefined): string {
  return month === undefined ? NOT_AVAILABLE : `${monthName(month)} (${month})`;
}

/**
 * Renders a labelled line per statistic. Absent values print as `n/a`.
 */
export function formatSummary(summary: AccessSummary): string[] {
  const twoHour =
    summary.busiestTwoHour === undefined
      ? NOT_AVAILABLE
      : `${summary.busiestTwoHour}-${nextHour(summary.busiestTwoHour)}`;

  return [
    `Total accesses: ${summary.totalAccesses}`,
    `Busiest hour: ${formatHour(summary.busiestHour)}`,
    `Quietest hour: ${formatHour(summary.quietestHour)}`,
    `Busiest two hours: ${twoHour}`,
    `Busiest month: ${formatMonth(summary.busiestMonth)}`,
    `Quietest month: ${formatMonth(summary.quietestMonth)}`,
    `Average accesses per month: ${summary.averageAccessesPerMonth}`,
  ];
}
