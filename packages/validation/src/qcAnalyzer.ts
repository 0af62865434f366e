/**
 * QC Analyzer
 *
 * Runs the timeline checks over a snapshot and concatenates their issues
 * in a fixed order. Each check is a descriptor the analyzer can list,
 * enable from settings and run independently of the others.
 */

import { existsSync } from 'node:fs';
import type { Issue, Settings, TimelineSnapshot } from '@edit-assist/core';
import { createLogger } from '@edit-assist/utils';
import { findAudioGaps } from './checks/audioGaps.js';
import { findCrossTrackOverlaps, findSameTrackOverlaps } from './checks/audioOverlaps.js';
import {
  findDisabledClips,
  findMutedTracks,
  findOfflineMedia,
  findSourceEndClips,
} from './checks/clipState.js';
import { findFlashFrames } from './checks/flashFrames.js';
import { audioTracks, soundingAudioTracks, videoClips } from './checks/scope.js';
import { findVideoGaps } from './checks/videoGaps.js';

const log = createLogger({ module: 'qc-analyzer' });

export interface QcContext {
  snapshot: TimelineSnapshot;
  settings: Settings;
  fileExists: (path: string) => boolean;
}

export interface QcCheck {
  id: string;
  name: string;
  description: string;
  /** Progress line printed before the check runs */
  progress: string;
  enabled: (settings: Settings) => boolean;
  run: (context: QcContext) => Issue[];
}

const always = (): boolean => true;

export const qcChecks: readonly QcCheck[] = [
  {
    id: 'video-gaps',
    name: 'Video Gaps',
    description: 'Frames of the timeline with no picture on any enabled video track',
    progress: 'Checking for video gaps...',
    enabled: always,
    run: ({ snapshot, settings }) =>
      findVideoGaps(videoClips(snapshot, settings), {
        start: snapshot.startFrame,
        end: snapshot.endFrame,
      }),
  },
  {
    id: 'flash-frames',
    name: 'Flash Frames',
    description: 'Clips shorter than the flash frame threshold',
    progress: 'Checking for flash frames...',
    enabled: always,
    run: ({ snapshot, settings }) => {
      const audio = audioTracks(snapshot, settings).flatMap((track) => track.clips);
      return findFlashFrames(
        [...videoClips(snapshot, settings), ...audio],
        settings.flashFrameThreshold
      );
    },
  },
  {
    id: 'audio-overlaps',
    name: 'Audio Overlaps',
    description: 'Clips overlapping on one audio track, or sounding together across tracks',
    progress: 'Checking for audio overlaps...',
    enabled: (settings) => settings.checkAudioOverlap,
    run: ({ snapshot, settings }) => {
      const tracks = soundingAudioTracks(snapshot, settings);
      return [
        ...tracks.flatMap((track) => findSameTrackOverlaps(track.label, track.clips)),
        ...findCrossTrackOverlaps(tracks.flatMap((track) => track.clips)),
      ];
    },
  },
  {
    id: 'audio-gaps',
    name: 'Audio Gaps',
    description: 'Silences between consecutive clips on an audio track',
    progress: 'Checking for audio gaps...',
    enabled: (settings) => settings.checkAudioGaps,
    run: ({ snapshot, settings }) =>
      audioTracks(snapshot, settings).flatMap((track) =>
        findAudioGaps(track.label, track.clips, settings.minAudioGapFrames)
      ),
  },
  {
    id: 'disabled-clips',
    name: 'Disabled Clips and Muted Tracks',
    description: 'Video clips switched off and audio tracks muted',
    progress: 'Checking for disabled/muted clips...',
    enabled: (settings) => settings.checkDisabledClips,
    run: ({ snapshot }) => [
      ...findDisabledClips(snapshot.video.flatMap((track) => track.clips)),
      ...findMutedTracks(snapshot.audio),
    ],
  },
  {
    id: 'offline-media',
    name: 'Offline Media',
    description: 'Video clips whose media is flagged offline or missing on disk',
    progress: 'Checking for offline media...',
    enabled: (settings) => settings.checkOfflineMedia,
    run: ({ snapshot, fileExists }) =>
      findOfflineMedia(
        snapshot.video.flatMap((track) => track.clips),
        fileExists
      ),
  },
  {
    id: 'source-end',
    name: 'Clips at Source End',
    description: 'Video clips trimmed to the last frames of their source media',
    progress: 'Checking for clips at source end...',
    enabled: (settings) => settings.checkSourceEnd,
    run: ({ snapshot }) => findSourceEndClips(snapshot.video.flatMap((track) => track.clips)),
  },
];

export interface AnalyzeOptions {
  fileExists?: (path: string) => boolean;
  onProgress?: (line: string) => void;
}

export interface QcResult {
  issues: Issue[];
  checksRun: string[];
}

export function analyzeTimeline(
  snapshot: TimelineSnapshot,
  settings: Settings,
  options: AnalyzeOptions = {}
): QcResult {
  const context: QcContext = {
    snapshot,
    settings,
    fileExists: options.fileExists ?? existsSync,
  };

  log.info(
    { timeline: snapshot.name, frameRate: snapshot.frameRate },
    'Running timeline QC'
  );

  const issues: Issue[] = [];
  const checksRun: string[] = [];

  for (const check of qcChecks) {
    if (!check.enabled(settings)) {
      log.debug({ check: check.id }, 'Check disabled');
      continue;
    }
    options.onProgress?.(check.progress);
    const found = check.run(context);
    log.debug({ check: check.id, issues: found.length }, 'Check complete');
    issues.push(...found);
    checksRun.push(check.id);
  }

  return { issues, checksRun };
}
