/**
 * Interval Index
 *
 * Helpers over frame ranges. Containment is inclusive on both bounds;
 * overlap and merge treat `end` as exclusive.
 */

import type { FrameRange } from '@edit-assist/core';

/**
 * First interval, in input order, whose [start, end] contains the point.
 * Earlier entries win when intervals overlap.
 */
export function findContaining<T extends FrameRange>(
  point: number,
  intervals: readonly T[]
): T | null {
  for (const interval of intervals) {
    if (interval.start <= point && point <= interval.end) {
      return interval;
    }
  }
  return null;
}

/**
 * Stable sort by start frame; equal starts keep their input order.
 */
export function sortByStart<T extends FrameRange>(intervals: readonly T[]): T[] {
  return [...intervals].sort((a, b) => a.start - b.start);
}

export function overlaps(a: FrameRange, b: FrameRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function intersection(a: FrameRange, b: FrameRange): FrameRange | null {
  if (!overlaps(a, b)) {
    return null;
  }
  return {
    start: Math.max(a.start, b.start),
    end: Math.min(a.end, b.end),
  };
}

/**
 * Sort then merge overlapping or touching ranges.
 */
export function mergeRanges(ranges: readonly FrameRange[]): FrameRange[] {
  const sorted = sortByStart(ranges);
  const merged: FrameRange[] = [];

  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ start: range.start, end: range.end });
    }
  }

  return merged;
}
