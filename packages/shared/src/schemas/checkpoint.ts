import { z } from 'zod';

/** Durable progress marker: boot epoch plus the highest kernel log timestamp already reported. */
export const Checkpoint = z.object({
  bootId: z.string(),
  lastLogOffset: z.number().finite().nonnegative(),
});
export type Checkpoint = z.infer<typeof Checkpoint>;

export const EMPTY_CHECKPOINT: Readonly<Checkpoint> = Object.freeze({
  bootId: '',
  lastLogOffset: 0,
});
