/**
 * Audio Overlap Checks
 */

import type { ClipRecord, Issue } from '@edit-assist/core';
import { intersection, sortByStart } from '@edit-assist/timeline';

/**
 * Adjacent clips on one track where the earlier one runs into the next.
 */
export function findSameTrackOverlaps(track: string, clips: readonly ClipRecord[]): Issue[] {
  const sorted = sortByStart(clips);
  const issues: Issue[] = [];

  for (let i = 0; i + 1 < sorted.length; i += 1) {
    const current = sorted[i];
    const next = sorted[i + 1];
    if (!current || !next || current.end <= next.start) continue;

    const overlap = current.end - next.start;
    issues.push({
      type: 'AUDIO_OVERLAP',
      severity: 'ERROR',
      start: next.start,
      end: current.end,
      duration: overlap,
      track,
      message: `Audio overlap on ${track}: "${current.name}" and "${next.name}" (${overlap} frames)`,
    });
  }

  return issues;
}

/**
 * Clips on different tracks sounding at the same time. Each overlapping
 * region is reported once per track pair.
 */
export function findCrossTrackOverlaps(clips: readonly ClipRecord[]): Issue[] {
  // The early exit below is only valid on a list sorted by start across all tracks.
  const sorted = sortByStart(clips);
  const seen = new Set<string>();
  const issues: Issue[] = [];

  for (let i = 0; i < sorted.length; i += 1) {
    const a = sorted[i];
    if (!a) continue;

    for (let j = i + 1; j < sorted.length; j += 1) {
      const b = sorted[j];
      if (!b || b.start >= a.end) break;
      if (b.track === a.track) continue;

      const shared = intersection(a, b);
      if (!shared) continue;
      const { start, end } = shared;

      const [first, second] = a.trackIndex <= b.trackIndex ? [a, b] : [b, a];
      const key = `${start}|${first.track}|${second.track}`;
      if (seen.has(key)) continue;
      seen.add(key);

      issues.push({
        type: 'AUDIO_OVERLAP',
        severity: 'WARNING',
        start,
        end,
        duration: end - start,
        track: `${first.track}/${second.track}`,
        clip: first.name,
        message:
          `Audio overlap between ${first.track} and ${second.track}: ` +
          `"${first.name}" and "${second.name}" (${end - start} frames)`,
      });
    }
  }

  return issues;
}
