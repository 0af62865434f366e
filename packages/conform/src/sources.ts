/**
 * Source Readers
 *
 * Turns host media items and reference-timeline items into the plain
 * values the matcher works on.
 */

import {
  DataError,
  type HostFolder,
  type HostMediaItem,
  type HostTimeline,
  type TimeInterval,
} from '@edit-assist/core';
import { parseTimecode } from '@edit-assist/timeline';
import { createLogger } from '@edit-assist/utils';

const log = createLogger({ module: 'sources' });

/**
 * A long-form multitrack recording. `start`/`end` are the absolute source
 * timecode frames of its "Start TC" and "End TC".
 */
export type MultitrackClip = TimeInterval<HostMediaItem>;

export interface MultitrackReadResult {
  clips: MultitrackClip[];
  /** Names of clips without usable timecode */
  skipped: string[];
}

export function readMultitrackClips(bin: HostFolder, frameRate: number): MultitrackReadResult {
  const clips: MultitrackClip[] = [];
  const skipped: string[] = [];

  for (const item of bin.getClips()) {
    const name = item.getName();
    const startTc = item.getClipProperty('Start TC');
    const endTc = item.getClipProperty('End TC');
    if (!startTc || !endTc) {
      skipped.push(name);
      continue;
    }

    const start = parseTimecode(startTc, frameRate);
    const end = parseTimecode(endTc, frameRate);
    if (start === null || end === null) {
      const error = new DataError(name, `unreadable timecode range ${startTc} - ${endTc}`);
      log.warn({ err: error }, error.message);
      skipped.push(name);
      continue;
    }

    clips.push({ name, start, end, track: bin.getName(), payload: item });
  }

  return { clips, skipped };
}

/**
 * One item of the reference (imported edit) audio track.
 */
export interface AudioReferenceClip {
  name: string;
  timelineStart: number;
  timelineEnd: number;
  duration: number;
  leftOffset: number;
  hasMediaLink: boolean;
  /** "Start TC" of the linked media, null when absent */
  sourceStartTc: string | null;
}

export function readReferenceClips(timeline: HostTimeline, trackIndex: number): AudioReferenceClip[] {
  return timeline.getItems('audio', trackIndex).map((item) => {
    const media = item.getMediaItem();
    return {
      name: item.getName(),
      timelineStart: item.getStart(),
      timelineEnd: item.getEnd(),
      duration: item.getDuration(),
      leftOffset: item.getLeftOffset(),
      hasMediaLink: media !== null,
      sourceStartTc: media?.getClipProperty('Start TC') || null,
    };
  });
}
