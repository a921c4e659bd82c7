import type { AccessRecord, RecordSource } from './types.js';

/**
 * Record source that replays a fixed in-memory list.
 */
export class ArrayRecordSource<T extends AccessRecord = AccessRecord>
  implements RecordSource<T>
{
  private cursor = 0;

  constructor(private readonly records: readonly T[]) {}

  /** Number of records in one full traversal. */
  get size(): number {
    return this.records.length;
  }

  reset(): void {
    this.cursor = 0;
  }

  hasNext(): boolean {
    return this.cursor < this.records.length;
  }

  next(): T {
    if (!this.hasNext()) {
      throw new Error(
        `No record left: all ${this.records.length} records have been read`,
      );
    }
    return this.records[this.cursor++];
  }
}

/**
 * Builds access records from parallel hour and month lists.
 * Missing months default to January.
 *
 * @example
 * recordsFromHours([0, 0, 23]) // [{ hour: 0, month: 1 }, { hour: 0, month: 1 }, { hour: 23, month: 1 }]
 */
export function recordsFromHours(
  hours: readonly number[],
  months: readonly number[] = [],
): AccessRecord[] {
  return hours.map((hour, i) => ({ hour, month: months[i] ?? 1 }));
}
