import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  MAX_SEED,
  createLogEntries,
  createLogfile,
  seededRandom,
} from './creator.js';
import { compareLogEntries, formatLogEntry } from './entry.js';

describe('seededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = seededRandom(7);
    const b = seededRandom(7);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should reject seeds outside the unsigned 32-bit range', () => {
    expect(() => seededRandom(2 ** 32)).toThrow(
      'seed must be an integer in range [0, 4294967295], got 4294967296',
    );
    expect(() => seededRandom(-1)).toThrow();
    expect(() => seededRandom(1.5)).toThrow();
    expect(() => seededRandom(MAX_SEED)).not.toThrow();
  });

  it('should stay within [0, 1)', () => {
    const random = seededRandom(123);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('createLogEntries', () => {
  it('should create the requested number of entries', () => {
    expect(createLogEntries(50)).toHaveLength(50);
    expect(createLogEntries(0)).toEqual([]);
  });

  it('should keep every field in range', () => {
    for (const entry of createLogEntries(500, { seed: 3 })) {
      expect(entry.month).toBeGreaterThanOrEqual(1);
      expect(entry.month).toBeLessThanOrEqual(12);
      expect(entry.day).toBeGreaterThanOrEqual(1);
      expect(entry.day).toBeLessThanOrEqual(28);
      expect(entry.hour).toBeGreaterThanOrEqual(0);
      expect(entry.hour).toBeLessThanOrEqual(23);
      expect(entry.minute).toBeGreaterThanOrEqual(0);
      expect(entry.minute).toBeLessThanOrEqual(59);
    }
  });

  it('should stamp year and status from options', () => {
    const [entry] = createLogEntries(1, { year: 2019, status: 503 });
    expect(entry.year).toBe(2019);
    expect(entry.status).toBe(503);
  });

  it('should sort entries chronologically', () => {
    const entries = createLogEntries(200, { seed: 11 });
    for (let i = 1; i < entries.length; i++) {
      expect(compareLogEntries(entries[i - 1], entries[i])).toBeLessThanOrEqual(0);
    }
  });

  it('should be deterministic for a seed', () => {
    expect(createLogEntries(20, { seed: 5 })).toEqual(
      createLogEntries(20, { seed: 5 }),
    );
    expect(createLogEntries(20, { seed: 5 })).not.toEqual(
      createLogEntries(20, { seed: 6 }),
    );
  });

  it('should throw for a negative count', () => {
    expect(() => createLogEntries(-1)).toThrow(
      'count must be a non-negative integer, got -1',
    );
  });
});

describe('createLogfile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'weblog-creator-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write one canonical line per entry', () => {
    const path = join(dir, 'demo.log');
    const entries = createLogfile(path, 3, { seed: 9 });
    const expected = entries.map((entry) => `${formatLogEntry(entry)}\n`).join('');
    expect(readFileSync(path, 'utf-8')).toBe(expected);
    expect(expected.split('\n')).toHaveLength(4);
  });
});
