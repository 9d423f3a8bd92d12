import { describe, expect, it } from 'vitest';
import { detectReboot } from './reboot-detector.js';

describe('detectReboot', () => {
  it('resets the offset when the boot id changes', () => {
    const result = detectReboot('xyz', { bootId: 'abc', lastLogOffset: 500.0 });

    expect(result.rebooted).toBe(true);
    expect(result.checkpoint).toEqual({ bootId: 'xyz', lastLogOffset: 0 });
  });

  it('returns the same checkpoint when the boot id matches', () => {
    const checkpoint = { bootId: 'abc', lastLogOffset: 12.5 };

    const result = detectReboot('abc', checkpoint);

    expect(result.rebooted).toBe(false);
    expect(result.checkpoint).toBe(checkpoint);
  });

  it('treats the first run as a reset', () => {
    const result = detectReboot('abc', { bootId: '', lastLogOffset: 0 });
    expect(result).toEqual({ checkpoint: { bootId: 'abc', lastLogOffset: 0 }, rebooted: true });
  });

  it('substitutes the unknown sentinel for an empty boot id', () => {
    const result = detectReboot('  ', { bootId: 'abc', lastLogOffset: 9 });
    expect(result.checkpoint).toEqual({ bootId: 'unknown', lastLogOffset: 0 });
  });

  it('matches a previously stored unknown sentinel', () => {
    const result = detectReboot('', { bootId: 'unknown', lastLogOffset: 9 });
    expect(result.rebooted).toBe(false);
    expect(result.checkpoint.lastLogOffset).toBe(9);
  });
});
