import type { ClipRecord, Issue } from '@edit-assist/core';

/**
 * Clips shorter than `threshold` frames.
 */
export function findFlashFrames(clips: readonly ClipRecord[], threshold: number): Issue[] {
  return clips
    .filter((clip) => clip.duration < threshold)
    .map((clip) => ({
      type: 'FLASH_FRAME',
      severity: 'WARNING',
      start: clip.start,
      end: clip.end,
      duration: clip.duration,
      track: clip.track,
      clip: clip.name,
      message: `Flash frame on ${clip.track}: "${clip.name}" (${clip.duration} frames)`,
    }));
}
