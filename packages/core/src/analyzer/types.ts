/**
 * Every derived statistic of a populated analyzer in one object.
 *
 * Unlike the individual analyzer methods, which return sentinel integers,
 * a field is undefined here whenever its bucket array holds no data.
 */
export interface AccessSummary {
  /** Sum of the hourly buckets */
  readonly totalAccesses: number;
  /** Hour [0, 23] with the most accesses */
  readonly busiestHour: number | undefined;
  /** Hour [0, 23] with the fewest non-zero accesses */
  readonly quietestHour: number | undefined;
  /** Start hour [0, 23] of the busiest two consecutive hours */
  readonly busiestTwoHour: number | undefined;
  /** Month [1, 12] with the most accesses */
  readonly busiestMonth: number | undefined;
  /** Month [1, 12] with the fewest non-zero accesses */
  readonly quietestMonth: number | undefined;
  /** Sum of the monthly buckets divided by 12, truncated */
  readonly averageAccessesPerMonth: number;
}
