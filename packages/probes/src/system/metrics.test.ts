import { describe, expect, it } from 'vitest';
import type { ExecFn, ReadFileFn } from '../types.js';
import { collectHostMetrics } from './metrics.js';

const FILES: Record<string, string[]> = {
  '/proc/stat': ['cpu  100 0 100 800 0 0 0 0 0 0\n', 'cpu  150 0 150 900 0 0 0 0 0 0\n'],
  '/proc/net/dev': [
    'Inter-|   Receive |  Transmit\n  eth0: 1000000 800 0 0 0 0 0 0 200000 600 0 0 0 0 0 0\n',
    'Inter-|   Receive |  Transmit\n  eth0: 1020480 820 0 0 0 0 0 0 210240 610 0 0 0 0 0 0\n',
  ],
  '/proc/diskstats': ['   8       0 sda 1000 0 204800 500 2000 0 409600 800 0 900 1300\n'],
};

const COMMANDS: Record<string, string> = {
  free: `               total        used        free      shared  buff/cache   available
Mem:     16594800640  8234496000  1070923776   512000000  7289380864  7843090432
`,
  df: `Filesystem     1024-blocks      Used Available Capacity Mounted on
/dev/sda1        102626232  57178660  40231112      59% /
/dev/sda15          524032      5256    518776       2% /boot/efi
`,
};

function fakeHost() {
  const remaining = Object.fromEntries(Object.entries(FILES).map(([path, reads]) => [path, [...reads]]));
  const readFile: ReadFileFn = async (path) => {
    const next = remaining[path]?.shift();
    if (next === undefined) throw new Error(`Unexpected read: ${path}`);
    return next;
  };
  const exec: ExecFn = async (cmd) => {
    const stdout = COMMANDS[cmd];
    if (stdout === undefined) throw new Error(`Unexpected command: ${cmd}`);
    return stdout;
  };
  return { readFile, exec };
}

describe('collectHostMetrics', () => {
  it('combines both samples with memory, disk and io figures', async () => {
    const waits: number[] = [];
    const { readFile, exec } = fakeHost();

    const metrics = await collectHostMetrics({
      exec,
      readFile,
      serverId: 'web-01-3f2a9c1e',
      now: () => 1705305601000,
      wait: async (ms) => {
        waits.push(ms);
      },
    });

    expect(waits).toEqual([200]);
    expect(metrics).toEqual({
      serverId: 'web-01-3f2a9c1e',
      timestamp: 1705305601000,
      cpuUsage: 50,
      memoryUsage: 52.7,
      diskUsage: 60.5,
      ioRead: 100,
      ioWrite: 200,
      networkIn: 100,
      networkOut: 50,
    });
  });

  it('scales network rates to the sample window', async () => {
    const { readFile, exec } = fakeHost();

    const metrics = await collectHostMetrics({
      exec,
      readFile,
      serverId: 'web-01-3f2a9c1e',
      now: () => 0,
      wait: async () => {},
      sampleWindowMs: 1000,
    });

    expect(metrics.networkIn).toBe(20);
    expect(metrics.networkOut).toBe(10);
  });

  it('fails when a command is missing', async () => {
    const { readFile } = fakeHost();
    const exec: ExecFn = async () => {
      throw new Error('spawn free ENOENT');
    };

    await expect(
      collectHostMetrics({ exec, readFile, serverId: 'x', wait: async () => {} }),
    ).rejects.toThrow('spawn free ENOENT');
  });
});
