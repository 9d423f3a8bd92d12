import { type Checkpoint, UNKNOWN_BOOT_ID } from '@ringwatch/shared';

export interface RebootCheck {
  checkpoint: Checkpoint;
  /** True when the stored boot id differs, including the very first run */
  rebooted: boolean;
}

/**
 * Compare the current boot id with the checkpoint's. A different id starts a new
 * epoch: the offset goes back to 0 so the whole current buffer counts as new.
 */
export function detectReboot(currentBootId: string, checkpoint: Checkpoint): RebootCheck {
  const bootId = currentBootId.trim() || UNKNOWN_BOOT_ID;
  if (bootId === checkpoint.bootId) {
    return { checkpoint, rebooted: false };
  }
  return { checkpoint: { bootId, lastLogOffset: 0 }, rebooted: true };
}
