/**
 * Check Scope
 *
 * Which tracks and clips each family of checks looks at.
 */

import {
  probeIs,
  type ClipRecord,
  type Settings,
  type TimelineSnapshot,
  type TrackSnapshot,
} from '@edit-assist/core';
import {
  allOf,
  excludeAdjustmentClips,
  excludeBlankNames,
  excludeDisabledClips,
  excludeNamePrefixes,
  excludeTransitions,
  keepAll,
  type ClipFilter,
} from '@edit-assist/timeline';

export function isTrackDisabled(track: TrackSnapshot): boolean {
  return probeIs(track.enabled, (enabled) => !enabled);
}

/**
 * Video clips that count as picture: enabled tracks only, transitions
 * dropped, adjustment clips dropped when configured.
 */
export function videoFilter(settings: Pick<Settings, 'ignoreAdjustmentClips'>): ClipFilter {
  return allOf(
    excludeTransitions(),
    settings.ignoreAdjustmentClips ? excludeAdjustmentClips() : keepAll
  );
}

export function videoClips(
  snapshot: TimelineSnapshot,
  settings: Pick<Settings, 'ignoreAdjustmentClips'>
): ClipRecord[] {
  const keep = videoFilter(settings);
  return snapshot.video
    .filter((track) => !isTrackDisabled(track))
    .flatMap((track) => track.clips.filter(keep));
}

export function audioFilter(settings: Pick<Settings, 'ignorePrefixes'>): ClipFilter {
  return allOf(
    excludeNamePrefixes(settings.ignorePrefixes),
    excludeBlankNames(),
    excludeTransitions()
  );
}

/**
 * Audio tracks the structural audio checks look at, each with its clips
 * filtered. Disabled tracks and tracks named in ignore_track_names are
 * left out.
 */
export function audioTracks(
  snapshot: TimelineSnapshot,
  settings: Pick<Settings, 'ignorePrefixes' | 'ignoreTrackNames'>
): TrackSnapshot[] {
  const keep = audioFilter(settings);
  return snapshot.audio
    .filter((track) => !isTrackDisabled(track))
    .filter((track) => !settings.ignoreTrackNames.includes(track.name))
    .map((track) => ({ ...track, clips: track.clips.filter(keep) }));
}

/**
 * Audio tracks for the overlap checks: as audioTracks, without clips that
 * are known to be disabled.
 */
export function soundingAudioTracks(
  snapshot: TimelineSnapshot,
  settings: Pick<Settings, 'ignorePrefixes' | 'ignoreTrackNames'>
): TrackSnapshot[] {
  const sounding = excludeDisabledClips();
  return audioTracks(snapshot, settings).map((track) => ({
    ...track,
    clips: track.clips.filter(sounding),
  }));
}
