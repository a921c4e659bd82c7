import {
  averageCount,
  createCounters,
  indexOfBusiestWindow,
  indexOfMax,
  indexOfMinNonZero,
  resetCounters,
  sumCounts,
  type Counts,
} from '../analytics/counters/index.js';
import {
  DEFAULT_LOGFILE,
  LogfileReader,
  type LogfileReaderOptions,
} from '../log/reader.js';
import type {
  AccessRecord,
  LineSink,
  LogEntry,
  RecordSource,
} from '../log/types.js';
import { formatHourlyCounts, formatMonthlyCounts } from '../report/format.js';
import { bucketToMonth, hourToBucket, monthToBucket } from '../time/bucket.js';
import { HOURS_PER_DAY, MONTHS_PER_YEAR } from '../time/constants.js';
import type { AccessSummary } from './types.js';

/**
 * Hours spanned by the window of {@link LogAnalyzer.busiestTwoHour}.
 */
const TWO_HOURS = 2;

const consoleSink: LineSink = (line) => console.log(line);

/**
 * Counts accesses by hour of day and by month of year.
 *
 * Each population pass rewinds the record source, zeroes its own bucket
 * array and consumes one full traversal. The statistic methods only read
 * the buckets, so they can be called at any time; before a pass has run they
 * see all-zero buckets.
 *
 * @example
 * const analyzer = new LogAnalyzer(new ArrayRecordSource(records));
 * analyzer.populateHourly();
 * analyzer.busiestHour(); // e.g. 23
 */
export class LogAnalyzer<T extends AccessRecord = AccessRecord> {
  private readonly hourCounts: number[] = createCounters(HOURS_PER_DAY);
  private readonly monthCounts: number[] = createCounters(MONTHS_PER_YEAR);

  constructor(private readonly source: RecordSource<T>) {}

  /**
   * Analyzer over a log file, `demo.log` unless another path is given.
   */
  static fromLogfile(
    path: string = DEFAULT_LOGFILE,
    options?: LogfileReaderOptions,
  ): LogAnalyzer<LogEntry> {
    return new LogAnalyzer(new LogfileReader(path, options));
  }

  /**
   * Count one full traversal of the source by hour of day.
   */
  populateHourly(): void {
    this.source.reset();
    resetCounters(this.hourCounts);
    while (this.source.hasNext()) {
      this.hourCounts[hourToBucket(this.source.next().hour)]++;
    }
  }

  /**
   * Count one full traversal of the source by month. January is bucket 0.
   */
  populateMonthly(): void {
    this.source.reset();
    resetCounters(this.monthCounts);
    while (this.source.hasNext()) {
      this.monthCounts[monthToBucket(this.source.next().month)]++;
    }
  }

  /**
   * Fill both bucket arrays from a single traversal.
   * Leaves the analyzer in the same state as `populateHourly()` followed by
   * `populateMonthly()`.
   */
  populateAll(): void {
    this.source.reset();
    resetCounters(this.hourCounts);
    resetCounters(this.monthCounts);
    while (this.source.hasNext()) {
      const record = this.source.next();
      this.hourCounts[hourToBucket(record.hour)]++;
      this.monthCounts[monthToBucket(record.month)]++;
    }
  }

  /** Copy of the 24 hourly buckets. */
  hourlyCounts(): number[] {
    return [...this.hourCounts];
  }

  /** Copy of the 12 monthly buckets, January first. */
  monthlyCounts(): number[] {
    return [...this.monthCounts];
  }

  /**
   * Number of accesses, summed over the hourly buckets only.
   */
  totalAccesses(): number {
    return sumCounts(this.hourCounts);
  }

  /**
   * Hour with the most accesses; the earliest wins a tie.
   * Returns 0 when there is no hourly data.
   */
  busiestHour(): number {
    return indexOfMax(this.hourCounts);
  }

  /**
   * Hour with the fewest accesses, ignoring hours without any.
   * Returns -1 when there is no hourly data.
   */
  quietestHour(): number {
    return indexOfMinNonZero(this.hourCounts);
  }

  /**
   * Start of the busiest pair of consecutive hours. The pair starting at 23
   * is (23, 0).
   */
  busiestTwoHour(): number {
    return indexOfBusiestWindow(this.hourCounts, TWO_HOURS);
  }

  /**
   * Month [1, 12] with the most accesses; returns 1 when there is no data.
   */
  busiestMonth(): number {
    return bucketToMonth(indexOfMax(this.monthCounts));
  }

  /**
   * Month [1, 12] with the fewest non-zero accesses.
   *
   * Returns 0 when there is no monthly data: the scan's -1 goes through the
   * same one-based shift as a real result.
   */
  quietestMonth(): number {
    return indexOfMinNonZero(this.monthCounts) + 1;
  }

  /**
   * Sum of the monthly buckets over 12, truncated. Independent of
   * {@link totalAccesses}, which reads the hourly buckets.
   */
  averageAccessesPerMonth(): number {
    return averageCount(this.monthCounts);
  }

  /**
   * All derived statistics, with `undefined` in place of sentinels.
   */
  summarize(): AccessSummary {
    const hasHours = hasData(this.hourCounts);
    const hasMonths = hasData(this.monthCounts);

    return {
      totalAccesses: this.totalAccesses(),
      busiestHour: hasHours ? this.busiestHour() : undefined,
      quietestHour: hasHours ? this.quietestHour() : undefined,
      busiestTwoHour: hasHours ? this.busiestTwoHour() : undefined,
      busiestMonth: hasMonths ? this.busiestMonth() : undefined,
      quietestMonth: hasMonths ? this.quietestMonth() : undefined,
      averageAccessesPerMonth: this.averageAccessesPerMonth(),
    };
  }

  /**
   * Print the hourly counts. Run `populateHourly()` first.
   */
  printHourlyCounts(sink: LineSink = consoleSink): void {
    formatHourlyCounts(this.hourCounts).forEach((line) => sink(line));
  }

  /**
   * Print the monthly counts. Run `populateMonthly()` first.
   */
  printMonthlyCounts(sink: LineSink = consoleSink): void {
    formatMonthlyCounts(this.monthCounts).forEach((line) => sink(line));
  }

  /**
   * Print the records of the source.
   *
   * Sources that print themselves are delegated to; any other source is
   * replayed and each record printed as JSON.
   */
  printData(sink: LineSink = consoleSink): void {
    if (this.source.printData) {
      this.source.printData(sink);
      return;
    }
    this.source.reset();
    while (this.source.hasNext()) {
      sink(JSON.stringify(this.source.next()));
    }
  }
}

function hasData(counts: Counts): boolean {
  return counts.some((count) => count > 0);
}
