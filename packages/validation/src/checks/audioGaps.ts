import type { ClipRecord, Issue } from '@edit-assist/core';
import { sortByStart } from '@edit-assist/timeline';

/**
 * Silences of at least `minGapFrames` between consecutive clips on a track.
 */
export function findAudioGaps(
  track: string,
  clips: readonly ClipRecord[],
  minGapFrames: number
): Issue[] {
  const sorted = sortByStart(clips);
  const issues: Issue[] = [];

  for (let i = 0; i + 1 < sorted.length; i += 1) {
    const current = sorted[i];
    const next = sorted[i + 1];
    if (!current || !next) continue;

    const gap = next.start - current.end;
    if (gap < minGapFrames) continue;

    issues.push({
      type: 'AUDIO_GAP',
      severity: 'INFO',
      start: current.end,
      end: next.start,
      duration: gap,
      track,
      message: `Audio gap on ${track}: ${gap} frames between clips`,
    });
  }

  return issues;
}
