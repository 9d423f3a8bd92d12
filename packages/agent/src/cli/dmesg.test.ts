import type { LogBatch } from '@ringwatch/shared';
import { describe, expect, it } from 'vitest';
import { selectKernelLines } from './dmesg.js';

const batch: LogBatch = [
  { timestamp: 0, text: '[    0.000000] Linux version 6.1.0' },
  { timestamp: 4.39692, text: '[    4.396920] EXT4-fs (sda1): mounted filesystem' },
  { text: '  continuation' },
  { timestamp: 12.5, text: '[   12.500000] usb 1-1: new device' },
];

describe('selectKernelLines', () => {
  it('returns lines newer than since', () => {
    expect(selectKernelLines(batch, 4.5)).toEqual({
      lines: ['[   12.500000] usb 1-1: new device'],
      offset: 12.5,
    });
  });

  it('returns the whole buffer without since', () => {
    const result = selectKernelLines(batch);

    expect(result.lines).toHaveLength(4);
    expect(result.lines[2]).toBe('  continuation');
    expect(result.offset).toBe(12.5);
  });

  it('has no offset for a buffer without timestamps', () => {
    expect(selectKernelLines([{ text: 'foreign format' }])).toEqual({
      lines: ['foreign format'],
      offset: undefined,
    });
  });

  it('keeps since as the offset when nothing is newer', () => {
    expect(selectKernelLines(batch, 100)).toEqual({ lines: [], offset: 100 });
  });
});
