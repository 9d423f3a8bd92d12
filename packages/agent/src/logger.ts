import { pino } from 'pino';

export const logger = pino({
  name: 'ringwatch',
  level: process.env.RINGWATCH_LOG_LEVEL ?? 'info',
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
