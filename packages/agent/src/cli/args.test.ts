import { describe, expect, it } from 'vitest';
import { ConfigError } from '../config.js';
import { getArg, parseIntervalMs, parseMonitorOverrides, parseSince } from './args.js';

describe('getArg', () => {
  it('returns the value after a flag', () => {
    expect(getArg(['monitor', '--sec', '10'], '--sec')).toBe('10');
  });

  it('returns undefined for a trailing flag', () => {
    expect(getArg(['monitor', '--sec'], '--sec')).toBeUndefined();
  });
});

describe('parseIntervalMs', () => {
  it('sums minutes and seconds', () => {
    expect(parseIntervalMs(['--min', '1', '--sec', '30'])).toBe(90_000);
  });

  it('accepts fractional seconds', () => {
    expect(parseIntervalMs(['--sec', '2.5'])).toBe(2_500);
  });

  it('is undefined when no interval flag is given', () => {
    expect(parseIntervalMs(['--once'])).toBeUndefined();
  });

  it('rejects a zero interval', () => {
    expect(() => parseIntervalMs(['--sec', '0'])).toThrow(
      'Please specify a positive interval using --min or --sec',
    );
  });

  it('rejects non-numeric values', () => {
    expect(() => parseIntervalMs(['--sec', 'five'])).toThrow(ConfigError);
  });

  it('rejects intervals a timer cannot hold', () => {
    expect(() => parseIntervalMs(['--min', '36000'])).toThrow(
      'Interval too long: at most 2147483 seconds',
    );
  });

  it('accepts the longest whole-second interval', () => {
    expect(parseIntervalMs(['--sec', '2147483'])).toBe(2_147_483_000);
  });
});

describe('parseSince', () => {
  it('parses fractional seconds since boot', () => {
    expect(parseSince(['dmesg', '--since', '4.5'])).toBe(4.5);
  });

  it('rejects negative values', () => {
    expect(() => parseSince(['--since', '-1'])).toThrow('--since must not be negative');
  });
});

describe('parseMonitorOverrides', () => {
  it('maps every monitor flag', () => {
    const overrides = parseMonitorOverrides([
      'monitor',
      '--state-dir',
      '/var/lib/ringwatch',
      '--output',
      '/tmp/out.json',
      '--sec',
      '10',
      '--server',
      '8080',
    ]);

    expect(overrides).toEqual({
      stateDir: '/var/lib/ringwatch',
      outputFile: '/tmp/out.json',
      intervalMs: 10_000,
      serverPort: 8080,
    });
  });

  it('returns no overrides without flags', () => {
    expect(parseMonitorOverrides(['monitor'])).toEqual({});
  });
});
