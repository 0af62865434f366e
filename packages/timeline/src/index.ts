/**
 * @edit-assist/timeline
 *
 * Timecode codec, interval helpers and host track snapshots.
 */

export {
  parseTimecode,
  formatTimecode,
  nleRate,
  ZERO_TIMECODE,
} from './timecode.js';

export {
  findContaining,
  sortByStart,
  mergeRanges,
  overlaps,
  intersection,
} from './intervals.js';

export {
  ADJUSTMENT_CLIP_MARKER,
  TRANSITION_CLIP_NAME,
  hasIgnoredPrefix,
  isAdjustmentClip,
  excludeNamePrefixes,
  excludeAdjustmentClips,
  excludeBlankNames,
  excludeTransitions,
  excludeDisabledClips,
  allOf,
  keepAll,
  applyFilters,
  type ClipFilter,
} from './filters.js';

export {
  snapshotClip,
  snapshotTrack,
  snapshotTimeline,
  trackLabel,
} from './snapshot.js';
