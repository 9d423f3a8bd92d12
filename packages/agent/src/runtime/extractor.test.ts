import type { LogEntry } from '@ringwatch/shared';
import { describe, expect, it } from 'vitest';
import { extractNewEntries } from './extractor.js';

function line(timestamp: number, message: string): LogEntry {
  return { timestamp, text: `[${timestamp.toFixed(6).padStart(12)}] ${message}` };
}

const continuation: LogEntry = { text: '  continuation line' };

describe('extractNewEntries', () => {
  it('emits only entries strictly newer than the watermark', () => {
    const batch = [
      line(5.0, 'early'),
      line(10.0, 'at watermark'),
      line(10.5, 'new one'),
      line(11.2, 'new two'),
      continuation,
    ];

    const result = extractNewEntries(batch, 10.0);

    expect(result.entries.map((e) => e.timestamp)).toEqual([10.5, 11.2]);
    expect(result.entries[1]?.text).toBe('[   11.200000] new two');
    expect(result.offset).toBe(11.2);
  });

  it('returns nothing and keeps the offset for an empty buffer', () => {
    expect(extractNewEntries([], 42.5)).toEqual({ entries: [], offset: 42.5 });
  });

  it('treats everything as new from a zero watermark', () => {
    const batch = [line(0.5, 'a'), continuation, line(1.25, 'b')];

    const result = extractNewEntries(batch, 0);

    expect(result.entries).toEqual([batch[0], batch[2]]);
    expect(result.offset).toBe(1.25);
  });

  it('excludes a line whose timestamp ties the watermark', () => {
    const result = extractNewEntries([line(7.123456, 'last seen')], 7.123456);
    expect(result.entries).toEqual([]);
    expect(result.offset).toBe(7.123456);
  });

  it('never emits untimestamped lines or moves the offset for them', () => {
    const result = extractNewEntries([continuation, { text: 'another' }], 3);
    expect(result).toEqual({ entries: [], offset: 3 });
  });

  it('judges out-of-order entries against the pre-cycle watermark only', () => {
    const batch = [line(20.0, 'later'), line(15.0, 'earlier'), line(9.0, 'old')];

    const result = extractNewEntries(batch, 10.0);

    expect(result.entries.map((e) => e.timestamp)).toEqual([20.0, 15.0]);
    expect(result.offset).toBe(20.0);
  });

  it('yields nothing while a rotated buffer stays below a stale watermark', () => {
    const result = extractNewEntries([line(3.0, 'a'), line(4.0, 'b')], 500.0);
    expect(result).toEqual({ entries: [], offset: 500.0 });
  });

  it('distinguishes microsecond neighbours', () => {
    const result = extractNewEntries([line(86400.000001, 'next')], 86400.0);
    expect(result.entries).toHaveLength(1);
    expect(result.offset).toBe(86400.000001);
  });

  it('is empty when re-run with its own offset over the same buffer', () => {
    const batch = [line(1.5, 'a'), line(2.5, 'b'), continuation, line(2.0, 'c')];

    const first = extractNewEntries(batch, 1.0);
    const second = extractNewEntries(batch, first.offset);

    expect(first.entries).toHaveLength(3);
    expect(second).toEqual({ entries: [], offset: 2.5 });
  });

  it('holds the filter properties across watermarks', () => {
    const batch = [
      line(0.1, 'a'),
      continuation,
      line(3.3, 'b'),
      line(2.2, 'c'),
      line(3.3, 'd'),
      line(8.8, 'e'),
    ];

    for (const watermark of [0, 0.1, 1, 2.2, 3.3, 5, 8.8, 100]) {
      const { entries, offset } = extractNewEntries(batch, watermark);
      const expected = batch.filter((e) => e.timestamp !== undefined && e.timestamp > watermark);

      expect(offset).toBeGreaterThanOrEqual(watermark);
      expect(entries).toEqual(expected);
      expect(entries.every((e) => e.timestamp !== undefined)).toBe(true);
    }
  });
});
