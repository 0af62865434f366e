/**
 * @edit-assist/conform
 *
 * Multitrack conform: places long-form multitrack recordings on a video
 * track so they line up with an imported edit's audio.
 */

export {
  collectBins,
  describeBin,
  findBinByName,
  selectMultitrackBin,
  type BinEntry,
  type BinChooser,
  type BinSelectionOptions,
} from './bins.js';

export {
  readMultitrackClips,
  readReferenceClips,
  type MultitrackClip,
  type MultitrackReadResult,
  type AudioReferenceClip,
} from './sources.js';

export {
  matchReferenceClips,
  type MatchOutcome,
  type MatchOptions,
  type MatchResult,
  type MatchSummary,
  type PlacementDirective,
} from './matcher.js';

export {
  ensureVideoTrack,
  prepareTargetTimeline,
  placeDirectives,
  type PlacementTally,
  type PlaceOptions,
  type TargetTimelineOptions,
} from './placement.js';

export {
  runAlign,
  requireCurrentTimeline,
  type AlignRequest,
  type AlignResult,
} from './aligner.js';
