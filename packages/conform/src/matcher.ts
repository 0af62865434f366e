/**
 * Multitrack Matcher
 *
 * For every reference audio clip, resolves the source timecode the editor
 * actually used (media "Start TC" + left trim) and finds the multitrack
 * recording covering it. Each matched clip becomes a placement directive.
 *
 * Every reference clip lands in exactly one outcome bucket, so the summary
 * counts always add up to the number of clips read.
 */

import { DataError } from '@edit-assist/core';
import {
  findContaining,
  formatTimecode,
  hasIgnoredPrefix,
  parseTimecode,
} from '@edit-assist/timeline';
import { createLogger } from '@edit-assist/utils';
import type { AudioReferenceClip, MultitrackClip } from './sources.js';

const log = createLogger({ module: 'matcher' });

export type MatchOutcome =
  | 'matched'
  | 'skippedByFilter'
  | 'skippedNoMediaLink'
  | 'skippedNoTimecode'
  | 'unmatched';

export interface PlacementDirective {
  multitrackClip: MultitrackClip;
  /** Timeline frame of the reference clip; the placed clip starts here */
  timelineStart: number;
  duration: number;
  /** Frames from the multitrack clip's first frame to the matched source frame */
  offsetIntoSource: number;
  referenceName: string;
  sourceTimecode: string;
}

export type MatchSummary = Record<MatchOutcome, number> & { total: number };

export interface MatchResult {
  directives: PlacementDirective[];
  summary: MatchSummary;
  outcomes: Array<{ clip: string; outcome: MatchOutcome }>;
}

export interface MatchOptions {
  frameRate: number;
  ignorePrefixes: readonly string[];
  onProgress?: (line: string) => void;
}

function emptySummary(): MatchSummary {
  return {
    matched: 0,
    skippedByFilter: 0,
    skippedNoMediaLink: 0,
    skippedNoTimecode: 0,
    unmatched: 0,
    total: 0,
  };
}

export function matchReferenceClips(
  references: readonly AudioReferenceClip[],
  multitrackClips: readonly MultitrackClip[],
  options: MatchOptions
): MatchResult {
  const { frameRate, ignorePrefixes, onProgress } = options;
  const directives: PlacementDirective[] = [];
  const outcomes: MatchResult['outcomes'] = [];
  const summary = emptySummary();

  const record = (clip: string, outcome: MatchOutcome): void => {
    outcomes.push({ clip, outcome });
    summary[outcome] += 1;
    summary.total += 1;
  };

  for (const reference of references) {
    const { name } = reference;

    if (hasIgnoredPrefix(name, ignorePrefixes)) {
      onProgress?.(`SKIP: ${name}`);
      record(name, 'skippedByFilter');
      continue;
    }

    if (!reference.hasMediaLink) {
      record(name, 'skippedNoMediaLink');
      continue;
    }

    if (reference.sourceStartTc === null) {
      record(name, 'skippedNoTimecode');
      continue;
    }

    const clipStart = parseTimecode(reference.sourceStartTc, frameRate);
    if (clipStart === null) {
      const error = new DataError(name, `unreadable Start TC "${reference.sourceStartTc}"`);
      log.warn({ err: error }, error.message);
      record(name, 'skippedNoTimecode');
      continue;
    }

    const sourceFrame = clipStart + reference.leftOffset;
    const sourceTimecode = formatTimecode(sourceFrame, frameRate);
    const match = findContaining(sourceFrame, multitrackClips);

    if (!match) {
      onProgress?.(`NO MATCH: ${name} (TC: ${sourceTimecode})`);
      record(name, 'unmatched');
      continue;
    }

    directives.push({
      multitrackClip: match,
      timelineStart: reference.timelineStart,
      duration: reference.duration,
      offsetIntoSource: sourceFrame - match.start,
      referenceName: name,
      sourceTimecode,
    });
    onProgress?.(`MATCH: ${name} -> ${match.name}`);
    record(name, 'matched');
  }

  directives.sort((a, b) => a.timelineStart - b.timelineStart);

  log.debug({ ...summary }, 'Reference clips matched');

  return { directives, summary, outcomes };
}
