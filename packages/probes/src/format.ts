/** Round to one decimal place */
export function roundTenths(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Share of `part` in `whole` as a percentage with one decimal, 0 when `whole` is empty */
export function percentOf(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.min(100, Math.max(0, roundTenths((part / whole) * 100)));
}

/** Human-readable size from kilobytes, truncated to whole K, M or G */
export function formatMemory(kb: number): string {
  if (kb >= 1024 * 1024) return `${Math.floor(kb / (1024 * 1024))}G`;
  if (kb >= 1024) return `${Math.floor(kb / 1024)}M`;
  return `${kb}K`;
}
