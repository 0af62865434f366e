/**
 * Project Document Host
 *
 * In-memory implementation of the host application surface over a parsed
 * project document. Mutations (new tracks, new timelines, placements,
 * playhead moves) edit the document in place so it can be saved back.
 */

import {
  HostPropertyError,
  type HostApplication,
  type HostFolder,
  type HostMediaItem,
  type HostMediaPool,
  type HostPlacement,
  type HostProject,
  type HostTimeline,
  type HostTimelineItem,
  type NewTimelineOptions,
  type TrackKind,
} from '@edit-assist/core';
import { formatTimecode, parseTimecode } from '@edit-assist/timeline';
import { createLogger, isDefined } from '@edit-assist/utils';
import type {
  BinDocument,
  MediaClipDocument,
  ProjectDocument,
  TimelineDocument,
  TimelineItemDocument,
  TrackDocument,
} from './schema.js';

const log = createLogger({ module: 'document-host' });

type MediaIndex = Map<string, DocumentMediaItem>;

export class DocumentMediaItem implements HostMediaItem {
  constructor(readonly clip: MediaClipDocument) {}

  getName(): string {
    return this.clip.name;
  }

  getClipProperty(key: string): string | undefined {
    return this.clip.properties[key];
  }

  /** Source length in frames, when the clip records one */
  sourceFrames(): number | undefined {
    const frames = Number(this.clip.properties['Frames']);
    return Number.isInteger(frames) && frames > 0 ? frames : undefined;
  }
}

export class DocumentFolder implements HostFolder {
  constructor(
    private readonly bin: BinDocument,
    private readonly media: MediaIndex
  ) {}

  getName(): string {
    return this.bin.name;
  }

  getClips(): HostMediaItem[] {
    return this.bin.clips
      .map((clip) => this.media.get(clip.id))
      .filter(isDefined);
  }

  getSubFolders(): HostFolder[] {
    return this.bin.bins.map((bin) => new DocumentFolder(bin, this.media));
  }
}

export class DocumentTimelineItem implements HostTimelineItem {
  constructor(
    private readonly item: TimelineItemDocument,
    private readonly media: MediaIndex
  ) {}

  getName(): string {
    return this.item.name;
  }

  getStart(): number {
    return this.item.start;
  }

  getEnd(): number {
    return this.item.start + this.item.duration;
  }

  getDuration(): number {
    return this.item.duration;
  }

  getLeftOffset(): number {
    return this.item.leftOffset;
  }

  getRightOffset(): number {
    if (this.item.rightOffset === undefined) {
      throw new HostPropertyError(this.item.name, 'rightOffset');
    }
    return this.item.rightOffset;
  }

  isEnabled(): boolean {
    if (this.item.enabled === undefined) {
      throw new HostPropertyError(this.item.name, 'enabled');
    }
    return this.item.enabled;
  }

  getMediaItem(): HostMediaItem | null {
    if (!this.item.mediaId) return null;
    return this.media.get(this.item.mediaId) ?? null;
  }
}

export class DocumentTimeline implements HostTimeline {
  constructor(
    readonly timeline: TimelineDocument,
    private readonly media: MediaIndex
  ) {}

  private tracks(kind: TrackKind): TrackDocument[] {
    return kind === 'video' ? this.timeline.video : this.timeline.audio;
  }

  track(kind: TrackKind, index: number): TrackDocument | undefined {
    return this.tracks(kind)[index - 1];
  }

  getName(): string {
    return this.timeline.name;
  }

  getFrameRate(): number {
    return this.timeline.frameRate;
  }

  getStartTimecode(): string {
    return this.timeline.startTimecode;
  }

  getStartFrame(): number {
    return parseTimecode(this.timeline.startTimecode, this.timeline.frameRate) ?? 0;
  }

  getEndFrame(): number {
    if (this.timeline.endFrame !== undefined) {
      return this.timeline.endFrame;
    }
    let end = this.getStartFrame();
    for (const track of [...this.timeline.video, ...this.timeline.audio]) {
      for (const item of track.items) {
        end = Math.max(end, item.start + item.duration);
      }
    }
    return end;
  }

  getTrackCount(kind: TrackKind): number {
    return this.tracks(kind).length;
  }

  getTrackName(kind: TrackKind, index: number): string {
    const track = this.track(kind, index);
    if (!track) {
      throw new HostPropertyError(this.timeline.name, `${kind} track ${index}`);
    }
    return track.name ?? `${kind === 'video' ? 'Video' : 'Audio'} ${index}`;
  }

  isTrackEnabled(kind: TrackKind, index: number): boolean {
    const track = this.track(kind, index);
    if (!track) {
      throw new HostPropertyError(this.timeline.name, `${kind} track ${index}`);
    }
    return track.enabled;
  }

  addTrack(kind: TrackKind): number {
    const tracks = this.tracks(kind);
    tracks.push({ enabled: true, items: [] });
    return tracks.length;
  }

  getItems(kind: TrackKind, index: number): HostTimelineItem[] {
    const track = this.track(kind, index);
    if (!track) return [];
    return track.items.map((item) => new DocumentTimelineItem(item, this.media));
  }

  getCurrentTimecode(): string {
    return this.timeline.currentTimecode ?? this.timeline.startTimecode;
  }

  setCurrentTimecode(timecode: string): boolean {
    const frame = parseTimecode(timecode, this.timeline.frameRate);
    if (frame === null) {
      return false;
    }
    this.timeline.currentTimecode = formatTimecode(frame, this.timeline.frameRate);
    return true;
  }
}

export class DocumentMediaPool implements HostMediaPool {
  constructor(
    private readonly root: BinDocument,
    private readonly media: MediaIndex
  ) {}

  getRootFolder(): HostFolder {
    return new DocumentFolder(this.root, this.media);
  }

  appendToTimeline(timeline: HostTimeline, placement: HostPlacement): boolean {
    if (!(timeline instanceof DocumentTimeline)) {
      return false;
    }
    const media = placement.mediaItem;
    if (!(media instanceof DocumentMediaItem) || this.media.get(media.clip.id) !== media) {
      return false;
    }
    const track = timeline.track(placement.kind, placement.trackIndex);
    if (!track) {
      return false;
    }

    const { startFrame, endFrame, recordFrame } = placement;
    const sourceFrames = media.sourceFrames();
    if (
      startFrame < 0 ||
      endFrame <= startFrame ||
      recordFrame < 0 ||
      (sourceFrames !== undefined && endFrame > sourceFrames)
    ) {
      log.debug({ clip: media.getName(), startFrame, endFrame, sourceFrames }, 'Placement rejected');
      return false;
    }

    track.items.push({
      name: media.getName(),
      start: recordFrame,
      duration: endFrame - startFrame,
      mediaId: media.clip.id,
      leftOffset: startFrame,
      rightOffset: sourceFrames !== undefined ? sourceFrames - endFrame : 0,
      enabled: true,
    });
    return true;
  }
}

function indexMedia(bin: BinDocument, index: MediaIndex = new Map()): MediaIndex {
  for (const clip of bin.clips) {
    index.set(clip.id, new DocumentMediaItem(clip));
  }
  for (const child of bin.bins) {
    indexMedia(child, index);
  }
  return index;
}

export class DocumentProject implements HostProject {
  private readonly media: MediaIndex;
  private readonly timelines = new Map<string, DocumentTimeline>();

  constructor(readonly document: ProjectDocument) {
    this.media = indexMedia(document.mediaPool);
    for (const timeline of document.timelines) {
      this.timelines.set(timeline.name, new DocumentTimeline(timeline, this.media));
    }
  }

  getName(): string {
    return this.document.name;
  }

  getMediaPool(): HostMediaPool {
    return new DocumentMediaPool(this.document.mediaPool, this.media);
  }

  getTimeline(name: string): DocumentTimeline | null {
    return this.timelines.get(name) ?? null;
  }

  getCurrentTimeline(): HostTimeline | null {
    const name = this.document.currentTimeline;
    return name === undefined ? null : this.getTimeline(name);
  }

  setCurrentTimeline(timeline: HostTimeline): boolean {
    if (this.timelines.get(timeline.getName()) !== timeline) {
      return false;
    }
    this.document.currentTimeline = timeline.getName();
    return true;
  }

  createTimeline(name: string, options: NewTimelineOptions): HostTimeline | null {
    if (this.timelines.has(name)) {
      return null;
    }
    const document: TimelineDocument = {
      name,
      frameRate: options.frameRate,
      startTimecode: options.startTimecode,
      video: [{ enabled: true, items: [] }],
      audio: [{ enabled: true, items: [] }],
    };
    this.document.timelines.push(document);
    const timeline = new DocumentTimeline(document, this.media);
    this.timelines.set(name, timeline);
    return timeline;
  }
}

export class DocumentApplication implements HostApplication {
  constructor(private readonly project: DocumentProject | null) {}

  getCurrentProject(): DocumentProject | null {
    return this.project;
  }
}
