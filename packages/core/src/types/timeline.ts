/**
 * Timeline Types
 *
 * Plain snapshot values read from the host once per run. Frame counts are
 * absolute integer frames on the timeline; `end` is exclusive.
 */

import type { Probe } from '../probe.js';

export type TrackKind = 'video' | 'audio';

export interface FrameRange {
  start: number;
  end: number;
}

export interface TimeInterval<TPayload = unknown> extends FrameRange {
  name: string;
  track: string;
  payload: TPayload;
}

export interface ClipRecord extends FrameRange {
  name: string;
  duration: number;
  leftOffset: number;
  kind: TrackKind;
  trackIndex: number;
  /** Track label such as "V1" or "A3" */
  track: string;
  /** False for generators, titles and adjustment clips */
  hasMedia: boolean;
  enabled: Probe<boolean>;
  rightOffset: Probe<number>;
  mediaPath: Probe<string>;
  offline: Probe<boolean>;
  /** Source media length in frames, when the media item reports one */
  sourceFrames: Probe<number | undefined>;
}

export interface TrackSnapshot {
  kind: TrackKind;
  index: number;
  label: string;
  name: string;
  enabled: Probe<boolean>;
  clips: ClipRecord[];
}

export interface TimelineSnapshot {
  name: string;
  frameRate: number;
  startFrame: number;
  endFrame: number;
  video: TrackSnapshot[];
  audio: TrackSnapshot[];
}
