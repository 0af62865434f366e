import type { FrameRange, Issue } from '@edit-assist/core';
import { mergeRanges } from '@edit-assist/timeline';

/**
 * Frames of the timeline not covered by any video clip. Gaps at the start
 * or between clips are errors; a gap at the end is a warning.
 */
export function findVideoGaps(clips: readonly FrameRange[], bounds: FrameRange): Issue[] {
  if (clips.length === 0) {
    return [
      {
        type: 'VIDEO_GAP',
        severity: 'ERROR',
        start: bounds.start,
        end: bounds.end,
        duration: bounds.end - bounds.start,
        message: 'No video clips on timeline',
      },
    ];
  }

  const merged = mergeRanges(clips);
  const issues: Issue[] = [];

  const first = merged[0];
  if (first && first.start > bounds.start) {
    const duration = first.start - bounds.start;
    issues.push({
      type: 'VIDEO_GAP',
      severity: 'ERROR',
      start: bounds.start,
      end: first.start,
      duration,
      message: `Gap at timeline start (${duration} frames)`,
    });
  }

  for (let i = 1; i < merged.length; i += 1) {
    const previous = merged[i - 1];
    const next = merged[i];
    if (!previous || !next || previous.end >= next.start) continue;

    const duration = next.start - previous.end;
    issues.push({
      type: 'VIDEO_GAP',
      severity: 'ERROR',
      start: previous.end,
      end: next.start,
      duration,
      message: `Video gap (${duration} frames)`,
    });
  }

  const last = merged[merged.length - 1];
  if (last && last.end < bounds.end) {
    const duration = bounds.end - last.end;
    issues.push({
      type: 'VIDEO_GAP',
      severity: 'WARNING',
      start: last.end,
      end: bounds.end,
      duration,
      message: `Gap at timeline end (${duration} frames)`,
    });
  }

  return issues;
}
