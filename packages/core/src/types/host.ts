/**
 * Host Application Surface
 *
 * The capabilities the tools need from a video-editing application.
 * Calls are synchronous. A read that a given object does not support
 * throws HostPropertyError.
 */

import type { TrackKind } from './timeline.js';

export interface HostApplication {
  getCurrentProject(): HostProject | null;
}

export interface HostProject {
  getName(): string;
  getMediaPool(): HostMediaPool;
  getCurrentTimeline(): HostTimeline | null;
  setCurrentTimeline(timeline: HostTimeline): boolean;
  /** Create an empty timeline; null when the host refuses the name */
  createTimeline(name: string, options: NewTimelineOptions): HostTimeline | null;
}

export interface NewTimelineOptions {
  frameRate: number;
  startTimecode: string;
}

export interface HostMediaPool {
  getRootFolder(): HostFolder;
  /** Returns false when the host rejects the placement */
  appendToTimeline(timeline: HostTimeline, placement: HostPlacement): boolean;
}

export interface HostPlacement {
  mediaItem: HostMediaItem;
  /** Source in-point, frames from the start of the media */
  startFrame: number;
  /** Source out-point (exclusive) */
  endFrame: number;
  kind: TrackKind;
  trackIndex: number;
  /** Timeline frame the placed item starts at */
  recordFrame: number;
}

export interface HostFolder {
  getName(): string;
  getClips(): HostMediaItem[];
  getSubFolders(): HostFolder[];
}

export interface HostMediaItem {
  getName(): string;
  /** Clip property such as "Start TC", "End TC", "File Path" or "Frames" */
  getClipProperty(key: string): string | undefined;
}

export interface HostTimeline {
  getName(): string;
  getFrameRate(): number;
  getStartFrame(): number;
  getEndFrame(): number;
  getStartTimecode(): string;
  getTrackCount(kind: TrackKind): number;
  getTrackName(kind: TrackKind, index: number): string;
  isTrackEnabled(kind: TrackKind, index: number): boolean;
  /** Appends a track and returns its 1-based index */
  addTrack(kind: TrackKind): number;
  getItems(kind: TrackKind, index: number): HostTimelineItem[];
  getCurrentTimecode(): string;
  setCurrentTimecode(timecode: string): boolean;
}

export interface HostTimelineItem {
  getName(): string;
  getStart(): number;
  getEnd(): number;
  getDuration(): number;
  getLeftOffset(): number;
  getRightOffset(): number;
  isEnabled(): boolean;
  getMediaItem(): HostMediaItem | null;
}
