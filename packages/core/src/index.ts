/**
 * Web server access log statistics.
 * Counts accesses by hour of day and month of year and derives busiest and
 * quietest periods from the counts.
 */

/**
 * Re-export hour and month bucket indexing utilities.
 */
export * from './time/index.js';

/**
 * Re-export count scanning utilities.
 */
export * from './analytics/counters/index.js';

/**
 * Re-export record sources, log parsing and simulated data.
 */
export * from './log/index.js';

/**
 * Re-export the analyzer.
 */
export * from './analyzer/index.js';

/**
 * Re-export report formatting.
 */
export * from './report/index.js';

/**
 * Re-export configuration loading.
 */
export * from './config/index.js';
