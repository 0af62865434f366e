import {
  known,
  unknown,
  type ClipRecord,
  type TimelineSnapshot,
  type TrackKind,
  type TrackSnapshot,
} from '@edit-assist/core';

export interface ClipInit {
  name?: string;
  start: number;
  end: number;
  trackIndex?: number;
  kind?: TrackKind;
  hasMedia?: boolean;
  enabled?: boolean;
  rightOffset?: number;
  mediaPath?: string;
  offline?: boolean;
  sourceFrames?: number;
}

export function clip(init: ClipInit): ClipRecord {
  const kind = init.kind ?? 'audio';
  const trackIndex = init.trackIndex ?? 1;
  const hasMedia = init.hasMedia ?? true;
  const noMedia = unknown<never>('no media item linked');
  return {
    name: init.name ?? `clip@${init.start}`,
    start: init.start,
    end: init.end,
    duration: init.end - init.start,
    leftOffset: 0,
    kind,
    trackIndex,
    track: `${kind === 'video' ? 'V' : 'A'}${trackIndex}`,
    hasMedia,
    enabled: init.enabled === undefined ? unknown('not supported') : known(init.enabled),
    rightOffset: init.rightOffset === undefined ? unknown('not supported') : known(init.rightOffset),
    mediaPath: hasMedia ? known(init.mediaPath ?? `/media/${init.name ?? 'clip'}.mov`) : noMedia,
    offline: hasMedia ? known(init.offline ?? false) : noMedia,
    sourceFrames: hasMedia ? known(init.sourceFrames) : noMedia,
  };
}

export function track(
  kind: TrackKind,
  index: number,
  clips: ClipInit[],
  options: { name?: string; enabled?: boolean } = {}
): TrackSnapshot {
  const label = `${kind === 'video' ? 'V' : 'A'}${index}`;
  return {
    kind,
    index,
    label,
    name: options.name ?? `${kind === 'video' ? 'Video' : 'Audio'} ${index}`,
    enabled: known(options.enabled ?? true),
    clips: clips.map((init) => clip({ ...init, kind, trackIndex: index })),
  };
}

export function timeline(
  video: TrackSnapshot[],
  audio: TrackSnapshot[],
  range: { start: number; end: number } = { start: 0, end: 500 }
): TimelineSnapshot {
  return {
    name: 'Edit v3',
    frameRate: 24,
    startFrame: range.start,
    endFrame: range.end,
    video,
    audio,
  };
}
