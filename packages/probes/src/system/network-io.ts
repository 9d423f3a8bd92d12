import { roundTenths } from '../format.js';

export const NET_DEV_PATH = '/proc/net/dev';

export interface NetworkCounters {
  rxBytes: number;
  txBytes: number;
}

export interface NetworkRates {
  inKbPerSec: number;
  outKbPerSec: number;
}

/**
 * Byte counters summed over every interface in /proc/net/dev.
 * Each data line is `iface: rx_bytes rx_packets ... (8 receive columns) tx_bytes ...`.
 */
export function parseNetDev(raw: string): NetworkCounters {
  let rxBytes = 0;
  let txBytes = 0;

  for (const line of raw.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const fields = line.slice(colon + 1).trim().split(/\s+/);
    const rx = Number(fields[0]);
    const tx = Number(fields[8]);
    if (Number.isNaN(rx) || Number.isNaN(tx)) continue;

    rxBytes += rx;
    txBytes += tx;
  }

  return { rxBytes, txBytes };
}

/** KB/s between two counter samples taken `windowMs` apart. Counter resets read as 0. */
export function networkRates(
  before: NetworkCounters,
  after: NetworkCounters,
  windowMs: number,
): NetworkRates {
  const seconds = windowMs / 1000;
  const rate = (delta: number) => (seconds > 0 ? roundTenths(Math.max(0, delta) / 1024 / seconds) : 0);

  return {
    inKbPerSec: rate(after.rxBytes - before.rxBytes),
    outKbPerSec: rate(after.txBytes - before.txBytes),
  };
}
