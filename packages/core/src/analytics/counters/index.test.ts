import { describe, it, expect } from 'vitest';
import {
  NO_BUCKET,
  averageCount,
  createCounters,
  indexOfBusiestWindow,
  indexOfMax,
  indexOfMinNonZero,
  resetCounters,
  sumCounts,
  windowSum,
} from './index.js';

describe('createCounters / resetCounters', () => {
  it('should create a zero-filled array of the given size', () => {
    const counts = createCounters(24);
    expect(counts).toHaveLength(24);
    expect(counts.every((c) => c === 0)).toBe(true);
  });

  it('should zero an array in place', () => {
    const counts = [3, 1, 4];
    resetCounters(counts);
    expect(counts).toEqual([0, 0, 0]);
  });
});

describe('sumCounts', () => {
  it('should add every bucket', () => {
    expect(sumCounts([2, 1, 0, 3])).toBe(6);
  });

  it('should return 0 for an empty array', () => {
    expect(sumCounts([])).toBe(0);
  });
});

describe('indexOfMax', () => {
  it('should find the largest bucket', () => {
    expect(indexOfMax([1, 7, 3])).toBe(1);
  });

  it('should prefer the lowest index on ties', () => {
    expect(indexOfMax([2, 5, 1, 5])).toBe(1);
  });

  it('should return 0 when every bucket is zero', () => {
    expect(indexOfMax([0, 0, 0])).toBe(0);
  });
});

describe('indexOfMinNonZero', () => {
  it('should skip empty buckets', () => {
    expect(indexOfMinNonZero([0, 4, 0, 2, 9])).toBe(3);
  });

  it('should prefer the lowest index on ties', () => {
    expect(indexOfMinNonZero([0, 3, 1, 1])).toBe(2);
  });

  it('should return NO_BUCKET when every bucket is zero', () => {
    expect(indexOfMinNonZero([0, 0])).toBe(NO_BUCKET);
    expect(NO_BUCKET).toBe(-1);
  });
});

describe('windowSum', () => {
  it('should sum consecutive buckets', () => {
    expect(windowSum([1, 2, 3, 4], 1, 2)).toBe(5);
  });

  it('should wrap past the last bucket', () => {
    expect(windowSum([1, 2, 3, 4], 3, 2)).toBe(5);
    expect(windowSum([1, 2, 3, 4], 2, 4)).toBe(10);
  });
});

describe('indexOfBusiestWindow', () => {
  it('should find the busiest adjacent pair', () => {
    expect(indexOfBusiestWindow([0, 1, 4, 4, 0, 2], 2)).toBe(2);
  });

  it('should pick the wrapping window when it is busiest', () => {
    const counts = createCounters(24);
    counts[0] = 5;
    counts[23] = 5;
    expect(indexOfBusiestWindow(counts, 2)).toBe(23);
  });

  it('should prefer the lowest start on ties', () => {
    // windows: (0,1)=3, (1,2)=3, (2,3)=3, (3,0)=3
    expect(indexOfBusiestWindow([1, 2, 1, 2], 2)).toBe(0);
  });

  it('should return 0 when every bucket is zero', () => {
    expect(indexOfBusiestWindow(createCounters(24), 2)).toBe(0);
  });

  it('should reduce to indexOfMax for width 1', () => {
    expect(indexOfBusiestWindow([2, 5, 1, 5], 1)).toBe(1);
  });

  it('should throw for a width outside the array', () => {
    expect(() => indexOfBusiestWindow([1, 2, 3], 0)).toThrow(
      'width must be an integer in range [1, 3], got 0',
    );
    expect(() => indexOfBusiestWindow([1, 2, 3], 4)).toThrow();
  });
});

describe('averageCount', () => {
  it('should truncate the mean', () => {
    const counts = createCounters(12);
    counts[0] = 20;
    counts[5] = 5;
    expect(averageCount(counts)).toBe(2);
  });

  it('should return 0 for an empty array', () => {
    expect(averageCount([])).toBe(0);
  });
});
