import { describe, expect, it } from 'vitest';
import { SelectionError, type HostTimeline, type Issue } from '@edit-assist/core';
import { issueAt, navigateToIssue } from '../src/navigation.js';

const issues: Issue[] = [
  { type: 'AUDIO_GAP', severity: 'INFO', start: 86460, end: 86470, duration: 10, message: 'later' },
  { type: 'VIDEO_GAP', severity: 'ERROR', start: 86400, end: 86424, duration: 24, message: 'earlier' },
];

function playheadTimeline(accept = true): HostTimeline & { moves: string[] } {
  const moves: string[] = [];
  return {
    moves,
    getName: () => 'Edit v3',
    getFrameRate: () => 24,
    getStartFrame: () => 86400,
    getEndFrame: () => 87000,
    getStartTimecode: () => '01:00:00:00',
    getTrackCount: () => 1,
    getTrackName: () => 'Video 1',
    isTrackEnabled: () => true,
    addTrack: () => 2,
    getItems: () => [],
    getCurrentTimecode: () => moves[moves.length - 1] ?? '01:00:00:00',
    setCurrentTimecode: (timecode) => {
      if (!accept) return false;
      moves.push(timecode);
      return true;
    },
  };
}

describe('issueAt', () => {
  it('numbers issues in report order', () => {
    expect(issueAt(issues, 1).message).toBe('earlier');
    expect(issueAt(issues, 2).message).toBe('later');
  });

  it('rejects numbers outside the report', () => {
    expect(() => issueAt(issues, 3)).toThrow('Issue #3 does not exist (1-2)');
    expect(() => issueAt(issues, 0)).toThrow(SelectionError);
    expect(() => issueAt([], 1)).toThrow('There are no issues to go to');
  });
});

describe('navigateToIssue', () => {
  it('moves the playhead to the start of the issue', () => {
    const timeline = playheadTimeline();

    const result = navigateToIssue(timeline, issues, 2, 24);

    expect(result.timecode).toBe('01:00:02:12');
    expect(timeline.moves).toEqual(['01:00:02:12']);
  });

  it('keeps track-wide issues inside the timeline', () => {
    const timeline = playheadTimeline();
    const muted: Issue = {
      type: 'MUTED_TRACK',
      severity: 'WARNING',
      start: 0,
      end: 0,
      duration: 0,
      track: 'A2',
      message: 'Audio track A2 is muted/disabled',
    };

    const result = navigateToIssue(timeline, [...issues, muted], 1, 24);

    expect(result.issue).toBe(muted);
    expect(result.timecode).toBe('01:00:00:00');
    expect(timeline.moves).toEqual(['01:00:00:00']);
  });

  it('fails when the host refuses the move', () => {
    expect(() => navigateToIssue(playheadTimeline(false), issues, 1, 24)).toThrow(SelectionError);
  });
});
