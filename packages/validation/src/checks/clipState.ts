/**
 * Clip State Checks
 *
 * Disabled clips, muted tracks, offline media and clips trimmed to the
 * last frames of their source. A clip whose property is unknown is left
 * out of that check.
 */

import { probeIs, type ClipRecord, type Issue, type TrackSnapshot } from '@edit-assist/core';
import { isTrackDisabled } from './scope.js';

/** Right trims at or below this many frames count as "at source end" */
export const SOURCE_END_TOLERANCE_FRAMES = 2;

export function findDisabledClips(clips: readonly ClipRecord[]): Issue[] {
  return clips
    .filter((clip) => probeIs(clip.enabled, (enabled) => !enabled))
    .map((clip) => ({
      type: 'DISABLED_CLIP',
      severity: 'INFO',
      start: clip.start,
      end: clip.end,
      duration: clip.duration,
      track: clip.track,
      clip: clip.name,
      message: `Disabled clip on ${clip.track}: "${clip.name}"`,
    }));
}

export function findMutedTracks(tracks: readonly TrackSnapshot[]): Issue[] {
  return tracks.filter(isTrackDisabled).map((track) => ({
    type: 'MUTED_TRACK',
    severity: 'WARNING',
    start: 0,
    end: 0,
    duration: 0,
    track: track.label,
    message: `Audio track ${track.label} is muted/disabled`,
  }));
}

function isOffline(clip: ClipRecord, fileExists: (path: string) => boolean): boolean {
  if (probeIs(clip.offline, (offline) => offline)) {
    return true;
  }
  return probeIs(clip.mediaPath, (path) => path.trim() === '' || !fileExists(path));
}

export function findOfflineMedia(
  clips: readonly ClipRecord[],
  fileExists: (path: string) => boolean
): Issue[] {
  return clips
    .filter((clip) => clip.hasMedia && isOffline(clip, fileExists))
    .map((clip) => ({
      type: 'OFFLINE_MEDIA',
      severity: 'ERROR',
      start: clip.start,
      end: clip.end,
      duration: clip.duration,
      track: clip.track,
      clip: clip.name,
      message: `Offline media on ${clip.track}: "${clip.name}"`,
    }));
}

export function findSourceEndClips(clips: readonly ClipRecord[]): Issue[] {
  const issues: Issue[] = [];
  for (const clip of clips) {
    if (!probeIs(clip.sourceFrames, (frames) => frames !== undefined && frames > 0)) continue;
    if (!clip.rightOffset.known || clip.rightOffset.value > SOURCE_END_TOLERANCE_FRAMES) continue;

    issues.push({
      type: 'SOURCE_END',
      severity: 'INFO',
      start: clip.start,
      end: clip.end,
      duration: clip.duration,
      track: clip.track,
      clip: clip.name,
      message:
        `Clip at source end on ${clip.track}: "${clip.name}" ` +
        `(right offset: ${clip.rightOffset.value} frames)`,
    });
  }
  return issues;
}
