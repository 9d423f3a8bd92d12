import os from 'node:os';
import type { HostIdentity } from '@ringwatch/shared';
import type { ExecFn } from '../types.js';

/**
 * Hostname from the OS, primary IP from `hostname -I` with `ip route get 1` as fallback.
 * An address that cannot be determined is reported as an empty string.
 */
export async function collectHostIdentity(
  exec: ExecFn,
  getHostname: () => string = os.hostname,
): Promise<HostIdentity> {
  const hostname = getHostname();

  let ipAddress = parseHostnameIOutput(await execOrEmpty(exec, 'hostname', ['-I']));
  if (!ipAddress) {
    ipAddress = parseIpRouteOutput(await execOrEmpty(exec, 'ip', ['route', 'get', '1']));
  }

  return { hostname, ipAddress };
}

/** First address printed by `hostname -I` */
export function parseHostnameIOutput(stdout: string): string {
  return stdout.trim().split(/\s+/)[0] ?? '';
}

/** Source address from `ip route get 1`, e.g. `1.0.0.0 via 10.0.0.1 dev eth0 src 10.0.0.5 uid 1000` */
export function parseIpRouteOutput(stdout: string): string {
  const firstLine = stdout.trim().split('\n')[0] ?? '';
  const parts = firstLine.trim().split(/\s+/);
  const srcIdx = parts.indexOf('src');
  if (srcIdx === -1) return '';
  return parts[srcIdx + 1] ?? '';
}

async function execOrEmpty(exec: ExecFn, command: string, args: string[]): Promise<string> {
  try {
    return await exec(command, args);
  } catch {
    return '';
  }
}
