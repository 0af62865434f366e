/**
 * Track Snapshot Builder
 *
 * Reads host tracks into plain records once per run. Optional properties
 * go through probe() so an unsupported read marks that one value unknown
 * instead of aborting the read.
 */

import {
  known,
  probe,
  unknown,
  type ClipRecord,
  type HostMediaItem,
  type HostTimeline,
  type HostTimelineItem,
  type Probe,
  type TimelineSnapshot,
  type TrackKind,
  type TrackSnapshot,
} from '@edit-assist/core';
import { createLogger, isDigitString } from '@edit-assist/utils';
import { sortByStart } from './intervals.js';

const log = createLogger({ module: 'snapshot' });

const TRUE_FLAGS = new Set(['true', 'yes', '1']);

export function trackLabel(kind: TrackKind, index: number): string {
  return `${kind === 'video' ? 'V' : 'A'}${index}`;
}

function parseFrameCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return isDigitString(trimmed) ? Number(trimmed) : undefined;
}

function mediaProbe<T>(
  media: HostMediaItem | null,
  read: (media: HostMediaItem) => T
): Probe<T> {
  if (!media) {
    return unknown('no media item linked');
  }
  return probe(() => read(media));
}

/** A property the media item does not carry is unknown; a present empty value is known. */
function presentProperty(media: HostMediaItem | null, key: string): Probe<string> {
  const result = mediaProbe(media, (m) => m.getClipProperty(key));
  if (!result.known) return result;
  return result.value === undefined ? unknown(`no ${key} property`) : known(result.value);
}

export function snapshotClip(
  item: HostTimelineItem,
  kind: TrackKind,
  trackIndex: number
): ClipRecord {
  const media = item.getMediaItem();

  return {
    name: item.getName(),
    start: item.getStart(),
    end: item.getEnd(),
    duration: item.getDuration(),
    leftOffset: item.getLeftOffset(),
    kind,
    trackIndex,
    track: trackLabel(kind, trackIndex),
    hasMedia: media !== null,
    enabled: probe(() => item.isEnabled()),
    rightOffset: probe(() => item.getRightOffset()),
    mediaPath: presentProperty(media, 'File Path'),
    offline: mediaProbe(media, (m) =>
      TRUE_FLAGS.has((m.getClipProperty('Offline') ?? '').trim().toLowerCase())
    ),
    sourceFrames: mediaProbe(media, (m) => parseFrameCount(m.getClipProperty('Frames'))),
  };
}

export function snapshotTrack(
  timeline: HostTimeline,
  kind: TrackKind,
  index: number
): TrackSnapshot {
  const clips = timeline
    .getItems(kind, index)
    .map((item) => snapshotClip(item, kind, index));

  return {
    kind,
    index,
    label: trackLabel(kind, index),
    name: timeline.getTrackName(kind, index),
    enabled: probe(() => timeline.isTrackEnabled(kind, index)),
    clips: sortByStart(clips),
  };
}

function snapshotTracks(timeline: HostTimeline, kind: TrackKind): TrackSnapshot[] {
  const count = timeline.getTrackCount(kind);
  const tracks: TrackSnapshot[] = [];
  for (let index = 1; index <= count; index += 1) {
    tracks.push(snapshotTrack(timeline, kind, index));
  }
  return tracks;
}

export function snapshotTimeline(timeline: HostTimeline): TimelineSnapshot {
  const snapshot: TimelineSnapshot = {
    name: timeline.getName(),
    frameRate: timeline.getFrameRate(),
    startFrame: timeline.getStartFrame(),
    endFrame: timeline.getEndFrame(),
    video: snapshotTracks(timeline, 'video'),
    audio: snapshotTracks(timeline, 'audio'),
  };

  log.debug(
    {
      timeline: snapshot.name,
      videoTracks: snapshot.video.length,
      audioTracks: snapshot.audio.length,
    },
    'Timeline snapshot taken'
  );

  return snapshot;
}
