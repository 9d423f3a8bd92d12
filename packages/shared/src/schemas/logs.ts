import { z } from 'zod';

/**
 * One kernel ring-buffer line. `timestamp` is the relative time in seconds since boot,
 * present only when the line starts with a bracketed timestamp.
 */
export const LogEntry = z.object({
  timestamp: z.number().nonnegative().optional(),
  text: z.string(),
});
export type LogEntry = z.infer<typeof LogEntry>;

/** The whole retained buffer as returned by one read, in source order */
export const LogBatch = z.array(LogEntry);
export type LogBatch = z.infer<typeof LogBatch>;
