/**
 * Multitrack Aligner
 *
 * One conform run: read the multitrack bin and the reference audio track,
 * match them, then place the matched recordings on the video track.
 */

import {
  PreconditionError,
  type HostProject,
  type HostTimeline,
  type Settings,
} from '@edit-assist/core';
import { formatTimecode } from '@edit-assist/timeline';
import { createLogger } from '@edit-assist/utils';
import type { BinEntry } from './bins.js';
import { matchReferenceClips, type MatchResult } from './matcher.js';
import {
  ensureVideoTrack,
  placeDirectives,
  prepareTargetTimeline,
  type PlacementTally,
} from './placement.js';
import {
  readMultitrackClips,
  readReferenceClips,
  type MultitrackClip,
} from './sources.js';

const log = createLogger({ module: 'aligner' });

export interface AlignRequest {
  project: HostProject;
  settings: Settings;
  bin: BinEntry;
  /** Match only; leave the project untouched */
  dryRun?: boolean;
  onProgress?: (line: string) => void;
}

export interface AlignResult {
  referenceTimeline: string;
  targetTimeline: string;
  frameRate: number;
  multitrackClips: MultitrackClip[];
  match: MatchResult;
  /** Null when nothing was placed (dry run or no matches) */
  placement: PlacementTally | null;
}

/**
 * The open timeline holding the imported edit.
 */
export function requireCurrentTimeline(project: HostProject): HostTimeline {
  const timeline = project.getCurrentTimeline();
  if (!timeline) {
    throw new PreconditionError('No timeline open. Please open your reference timeline first.');
  }
  return timeline;
}

export function runAlign(request: AlignRequest): AlignResult {
  const { project, settings, bin, dryRun = false, onProgress } = request;
  const reference = requireCurrentTimeline(project);
  const frameRate = reference.getFrameRate();

  onProgress?.(`Selected bin: ${bin.name}`);
  const multitrack = readMultitrackClips(bin.folder, frameRate);
  onProgress?.('Multitrack clips found:');
  for (const clip of multitrack.clips) {
    onProgress?.(
      `  - ${clip.name}: ${formatTimecode(clip.start, frameRate)} - ${formatTimecode(clip.end, frameRate)}`
    );
  }
  for (const name of multitrack.skipped) {
    onProgress?.(`  - ${name}: (no timecode - skipping)`);
  }
  if (multitrack.clips.length === 0) {
    throw new PreconditionError('No clips with valid timecode found in bin', { bin: bin.path });
  }

  const trackIndex = settings.referenceAudioTrack;
  onProgress?.(`Analyzing audio track ${trackIndex}...`);
  const references = readReferenceClips(reference, trackIndex);
  onProgress?.(`Found ${references.length} audio clips`);
  if (references.length === 0) {
    throw new PreconditionError(
      `No audio clips on track ${trackIndex}. Is this the reference timeline?`,
      { timeline: reference.getName(), trackIndex }
    );
  }

  const match = matchReferenceClips(references, multitrack.clips, {
    frameRate,
    ignorePrefixes: settings.ignorePrefixes,
    onProgress,
  });

  const result: AlignResult = {
    referenceTimeline: reference.getName(),
    targetTimeline: reference.getName(),
    frameRate,
    multitrackClips: multitrack.clips,
    match,
    placement: null,
  };

  if (dryRun || match.directives.length === 0) {
    return result;
  }

  const target = prepareTargetTimeline(project, reference, settings);
  const added = ensureVideoTrack(target, settings.videoTrackIndex);
  if (added > 0) {
    log.info({ added, timeline: target.getName() }, 'Added video tracks');
  }

  onProgress?.(`Placing ${match.directives.length} clips on V${settings.videoTrackIndex}...`);
  const placement = placeDirectives(project.getMediaPool(), target, match.directives, {
    trackIndex: settings.videoTrackIndex,
    onProgress,
  });

  return { ...result, targetTimeline: target.getName(), placement };
}
