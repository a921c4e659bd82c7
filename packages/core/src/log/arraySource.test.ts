import { describe, it, expect } from 'vitest';
import { ArrayRecordSource, recordsFromHours } from './arraySource.js';

describe('ArrayRecordSource', () => {
  const records = [
    { hour: 1, month: 2 },
    { hour: 3, month: 4 },
  ];

  it('should yield records in order', () => {
    const source = new ArrayRecordSource(records);
    expect(source.hasNext()).toBe(true);
    expect(source.next()).toEqual({ hour: 1, month: 2 });
    expect(source.next()).toEqual({ hour: 3, month: 4 });
    expect(source.hasNext()).toBe(false);
  });

  it('should replay from the start after reset', () => {
    const source = new ArrayRecordSource(records);
    source.next();
    source.next();
    source.reset();
    expect(source.next()).toEqual({ hour: 1, month: 2 });
  });

  it('should throw when read past the end', () => {
    const source = new ArrayRecordSource(records);
    source.next();
    source.next();
    expect(() => source.next()).toThrow(
      'No record left: all 2 records have been read',
    );
  });

  it('should report its size', () => {
    expect(new ArrayRecordSource(records).size).toBe(2);
    expect(new ArrayRecordSource([]).hasNext()).toBe(false);
  });
});

describe('recordsFromHours', () => {
  it('should default months to January', () => {
    expect(recordsFromHours([0, 23])).toEqual([
      { hour: 0, month: 1 },
      { hour: 23, month: 1 },
    ]);
  });

  it('should pair hours with months by position', () => {
    expect(recordsFromHours([5, 6, 7], [3, 12])).toEqual([
      { hour: 5, month: 3 },
      { hour: 6, month: 12 },
      { hour: 7, month: 1 },
    ]);
  });
});
