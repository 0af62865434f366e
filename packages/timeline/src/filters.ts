/**
 * Clip Filters
 *
 * Composable keep-predicates applied to snapshot clips before a check or
 * a match runs. Each check picks its own subset.
 */

import { probeIs, type ClipRecord } from '@edit-assist/core';
import { isNonEmptyString } from '@edit-assist/utils';
import { sortByStart } from './intervals.js';

export type ClipFilter = (clip: ClipRecord) => boolean;

/** Name fragment hosts give to adjustment clips */
export const ADJUSTMENT_CLIP_MARKER = 'Adjustment Clip';

/** Name hosts report for transition pseudo-items */
export const TRANSITION_CLIP_NAME = 'Transition';

export function hasIgnoredPrefix(name: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => name.startsWith(prefix));
}

export function isAdjustmentClip(clip: Pick<ClipRecord, 'name' | 'hasMedia'>): boolean {
  return !clip.hasMedia || clip.name.includes(ADJUSTMENT_CLIP_MARKER);
}

export function excludeNamePrefixes(prefixes: readonly string[]): ClipFilter {
  return (clip) => !hasIgnoredPrefix(clip.name, prefixes);
}

export function excludeAdjustmentClips(): ClipFilter {
  return (clip) => !isAdjustmentClip(clip);
}

export function excludeBlankNames(): ClipFilter {
  return (clip) => isNonEmptyString(clip.name);
}

export function excludeTransitions(): ClipFilter {
  return (clip) => clip.name !== TRANSITION_CLIP_NAME;
}

/** Drops clips known to be switched off; unknown state is kept. */
export function excludeDisabledClips(): ClipFilter {
  return (clip) => !probeIs(clip.enabled, (enabled) => !enabled);
}

export function allOf(...filters: ClipFilter[]): ClipFilter {
  return (clip) => filters.every((filter) => filter(clip));
}

export const keepAll: ClipFilter = () => true;

/**
 * Filtered copy of the clips, sorted by start.
 */
export function applyFilters(clips: readonly ClipRecord[], filter: ClipFilter): ClipRecord[] {
  return sortByStart(clips.filter(filter));
}
