/**
 * Placement
 *
 * Hands placement directives to the host. Every directive is attempted;
 * rejections are collected into the tally instead of stopping the run.
 */

import {
  PlacementError,
  PreconditionError,
  type HostMediaPool,
  type HostProject,
  type HostTimeline,
} from '@edit-assist/core';
import { formatTimecode } from '@edit-assist/timeline';
import { createLogger } from '@edit-assist/utils';
import type { PlacementDirective } from './matcher.js';

const log = createLogger({ module: 'placement' });

export interface PlacementTally {
  attempted: number;
  placed: number;
  failed: number;
  failures: PlacementError[];
}

/**
 * Add video tracks until `trackIndex` exists. Returns how many were added.
 */
export function ensureVideoTrack(timeline: HostTimeline, trackIndex: number): number {
  let added = 0;
  while (timeline.getTrackCount('video') < trackIndex) {
    timeline.addTrack('video');
    added += 1;
  }
  return added;
}

export interface TargetTimelineOptions {
  createNewTimeline: boolean;
  newTimelineSuffix: string;
}

/**
 * The timeline clips are placed on: the reference timeline itself, or a
 * new empty one with the same rate and start timecode, made current.
 */
export function prepareTargetTimeline(
  project: HostProject,
  reference: HostTimeline,
  options: TargetTimelineOptions
): HostTimeline {
  if (!options.createNewTimeline) {
    return reference;
  }

  const name = `${reference.getName()}${options.newTimelineSuffix}`;
  const created = project.createTimeline(name, {
    frameRate: reference.getFrameRate(),
    startTimecode: reference.getStartTimecode(),
  });
  if (!created) {
    throw new PreconditionError(`Could not create timeline "${name}"`, { name });
  }
  project.setCurrentTimeline(created);
  log.info({ timeline: name }, 'Created target timeline');
  return created;
}

export interface PlaceOptions {
  trackIndex: number;
  onProgress?: (line: string) => void;
}

export function placeDirectives(
  mediaPool: HostMediaPool,
  timeline: HostTimeline,
  directives: readonly PlacementDirective[],
  options: PlaceOptions
): PlacementTally {
  const { trackIndex, onProgress } = options;
  const frameRate = timeline.getFrameRate();
  const tally: PlacementTally = { attempted: 0, placed: 0, failed: 0, failures: [] };

  for (const directive of directives) {
    tally.attempted += 1;
    const clip = directive.multitrackClip;

    let accepted: boolean;
    let reason = 'host rejected the append';
    try {
      accepted = mediaPool.appendToTimeline(timeline, {
        mediaItem: clip.payload,
        startFrame: directive.offsetIntoSource,
        endFrame: directive.offsetIntoSource + directive.duration,
        kind: 'video',
        trackIndex,
        recordFrame: directive.timelineStart,
      });
    } catch (error) {
      accepted = false;
      reason = error instanceof Error ? error.message : String(error);
    }

    if (accepted) {
      tally.placed += 1;
      onProgress?.(`  Placed: ${clip.name} @ ${formatTimecode(directive.timelineStart, frameRate)}`);
      continue;
    }

    const failure = new PlacementError(directive.referenceName, directive.timelineStart, reason);
    log.warn({ err: failure }, failure.message);
    tally.failed += 1;
    tally.failures.push(failure);
    onProgress?.(`  FAILED: ${directive.referenceName}`);
  }

  return tally;
}
