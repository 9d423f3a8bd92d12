import { z } from 'zod';

export const SystemMetrics = z.object({
  cpu_info: z.string(),
  memory_info: z.string(),
  swap_info: z.string(),
  threadinfo: z.string(),
});
export type SystemMetrics = z.infer<typeof SystemMetrics>;

/**
 * Published snapshot document. Field names are the wire format read by the collector.
 * `timestamp` is ISO-8601 with a `±HH:MM` offset and second precision.
 */
export const Snapshot = z.object({
  hostname: z.string(),
  ip_address: z.string(),
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}[+-]\d{2}:\d{2}$/),
  system_metrics: SystemMetrics,
  logs: z.object({
    dmesg: z.string(),
  }),
});
export type Snapshot = z.infer<typeof Snapshot>;
