import { describe, expect, it } from 'vitest';
import type { ExecFn } from '../types.js';
import { collectTopSummary, parseTopOutput } from './top-summary.js';

const TOP_OUTPUT = `top - 10:00:01 up 2 days,  3:04,  1 user,  load average: 0.15, 0.10, 0.05
Tasks: 201 total,   1 running, 200 sleeping,   0 stopped,   0 zombie
%Cpu(s):  2.3 us,  0.8 sy,  0.0 ni, 96.7 id,  0.1 wa,  0.0 hi,  0.1 si,  0.0 st
MiB Mem :  15826.4 total,   1021.3 free,   7852.6 used,   6952.5 buff/cache
MiB Swap:   8192.0 total,   7168.0 free,   1024.0 used.   7412.9 avail Mem

    PID USER      PR  NI    VIRT    RES    SHR S  %CPU  %MEM     TIME+ COMMAND
      1 root      20   0  167744  13036   8400 S   0.0   0.1   0:04.12 systemd
`;

describe('parseTopOutput', () => {
  it('extracts the cpu, memory and swap lines verbatim', () => {
    const result = parseTopOutput(TOP_OUTPUT);

    expect(result.cpuInfo).toBe(
      '%Cpu(s):  2.3 us,  0.8 sy,  0.0 ni, 96.7 id,  0.1 wa,  0.0 hi,  0.1 si,  0.0 st',
    );
    expect(result.memoryInfo).toBe(
      'MiB Mem :  15826.4 total,   1021.3 free,   7852.6 used,   6952.5 buff/cache',
    );
    expect(result.swapInfo).toBe(
      'MiB Swap:   8192.0 total,   7168.0 free,   1024.0 used.   7412.9 avail Mem',
    );
  });

  it('returns empty strings for missing lines', () => {
    expect(parseTopOutput('')).toEqual({ cpuInfo: '', memoryInfo: '', swapInfo: '' });
  });

  it('ignores matches below the header block', () => {
    const output = `${'\n'.repeat(10)}%Cpu(s): 99.0 us`;
    expect(parseTopOutput(output).cpuInfo).toBe('');
  });
});

describe('collectTopSummary', () => {
  it('runs top in batch mode for a single iteration', async () => {
    const mockExec: ExecFn = async (cmd, args) => {
      expect(cmd).toBe('top');
      expect(args).toEqual(['-b', '-n', '1']);
      return TOP_OUTPUT;
    };

    const result = await collectTopSummary(mockExec);
    expect(result.cpuInfo.startsWith('%Cpu(s):')).toBe(true);
  });
});
