import { describe, expect, it } from 'vitest';
import type { ExecFn } from '../types.js';
import { parseDmesgOutput, parseLogLine, parseLogTimestamp, readKernelLog } from './logs-dmesg.js';

const DMESG_OUTPUT = `[    0.000000] Linux version 6.1.0-18-amd64
[    4.396920] EXT4-fs (sda1): mounted filesystem
[   12.500001] usb 1-1: new high-speed USB device
  continuation of the previous message
[  123.456789] e1000: eth0 NIC Link is Up
`;

describe('parseLogTimestamp', () => {
  it('parses padded timestamps', () => {
    expect(parseLogTimestamp('[    4.396920] EXT4-fs (sda1): mounted filesystem')).toBe(4.39692);
  });

  it('parses unpadded timestamps', () => {
    expect(parseLogTimestamp('[123456.000001] oom-kill')).toBe(123456.000001);
  });

  it('returns undefined for continuation lines', () => {
    expect(parseLogTimestamp('  continuation of the previous message')).toBeUndefined();
  });

  it('returns undefined for non-relative timestamps', () => {
    expect(parseLogTimestamp('[2024-01-15T10:00:01+0000] audit: type=1400')).toBeUndefined();
  });

  it('requires a fractional part', () => {
    expect(parseLogTimestamp('[   42] odd line')).toBeUndefined();
  });
});

describe('parseLogLine', () => {
  it('omits the timestamp for untimestamped lines', () => {
    expect(parseLogLine('plain text')).toEqual({ text: 'plain text' });
  });
});

describe('parseDmesgOutput', () => {
  it('keeps every non-empty line in order', () => {
    const batch = parseDmesgOutput(DMESG_OUTPUT);

    expect(batch).toHaveLength(5);
    expect(batch[0]).toEqual({ timestamp: 0, text: '[    0.000000] Linux version 6.1.0-18-amd64' });
    expect(batch[3]).toEqual({ text: '  continuation of the previous message' });
    expect(batch[4]?.timestamp).toBe(123.456789);
  });

  it('handles empty output', () => {
    expect(parseDmesgOutput('')).toEqual([]);
  });
});

describe('readKernelLog', () => {
  it('calls dmesg without color codes', async () => {
    const calls: Array<{ cmd: string; args: string[] }> = [];
    const mockExec: ExecFn = async (cmd, args) => {
      calls.push({ cmd, args });
      return DMESG_OUTPUT;
    };

    const batch = await readKernelLog(mockExec);

    expect(calls).toEqual([{ cmd: 'dmesg', args: ['--color=never'] }]);
    expect(batch).toHaveLength(5);
  });

  it('propagates exec failures', async () => {
    const mockExec: ExecFn = async () => {
      throw new Error('dmesg: read kernel buffer failed: Operation not permitted');
    };

    await expect(readKernelLog(mockExec)).rejects.toThrow('Operation not permitted');
  });
});
