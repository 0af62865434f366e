import { describe, expect, it } from 'vitest';
import type { HostMediaPool, HostPlacement, HostTimeline, HostMediaItem } from '@edit-assist/core';
import type { PlacementDirective } from '../src/matcher.js';
import { ensureVideoTrack, placeDirectives } from '../src/placement.js';

function timelineWithTracks(count: number): HostTimeline & { trackCount: () => number } {
  let tracks = count;
  return {
    trackCount: () => tracks,
    getName: () => 'Edit',
    getFrameRate: () => 24,
    getStartFrame: () => 0,
    getEndFrame: () => 1000,
    getStartTimecode: () => '00:00:00:00',
    getTrackCount: () => tracks,
    getTrackName: (_kind, index) => `Video ${index}`,
    isTrackEnabled: () => true,
    addTrack: () => {
      tracks += 1;
      return tracks;
    },
    getItems: () => [],
    getCurrentTimecode: () => '00:00:00:00',
    setCurrentTimecode: () => true,
  };
}

function directive(referenceName: string, timelineStart: number): PlacementDirective {
  const media: HostMediaItem = { getName: () => 'MT_01', getClipProperty: () => undefined };
  return {
    multitrackClip: { name: 'MT_01', start: 0, end: 5000, track: 'TRACKS', payload: media },
    timelineStart,
    duration: 24,
    offsetIntoSource: timelineStart + 10,
    referenceName,
    sourceTimecode: '00:00:00:00',
  };
}

describe('ensureVideoTrack', () => {
  it('adds tracks up to the requested index', () => {
    const timeline = timelineWithTracks(1);

    expect(ensureVideoTrack(timeline, 3)).toBe(2);
    expect(timeline.trackCount()).toBe(3);
    expect(ensureVideoTrack(timeline, 2)).toBe(0);
  });
});

describe('placeDirectives', () => {
  it('attempts every directive and tallies rejections', () => {
    const received: HostPlacement[] = [];
    const pool: HostMediaPool = {
      getRootFolder: () => {
        throw new Error('not used');
      },
      appendToTimeline: (_timeline, placement) => {
        received.push(placement);
        if (placement.recordFrame === 48) {
          throw new Error('media offline');
        }
        return placement.recordFrame !== 96;
      },
    };
    const lines: string[] = [];

    const tally = placeDirectives(
      pool,
      timelineWithTracks(1),
      [directive('First', 0), directive('Second', 48), directive('Third', 96)],
      { trackIndex: 1, onProgress: (line) => lines.push(line) }
    );

    expect(received.map(({ startFrame, endFrame, recordFrame, kind, trackIndex }) => ({
      startFrame,
      endFrame,
      recordFrame,
      kind,
      trackIndex,
    }))).toEqual([
      { startFrame: 10, endFrame: 34, recordFrame: 0, kind: 'video', trackIndex: 1 },
      { startFrame: 58, endFrame: 82, recordFrame: 48, kind: 'video', trackIndex: 1 },
      { startFrame: 106, endFrame: 130, recordFrame: 96, kind: 'video', trackIndex: 1 },
    ]);
    expect(tally).toMatchObject({ attempted: 3, placed: 1, failed: 2 });
    expect(tally.failures.map((failure) => failure.message)).toEqual([
      'Could not place "Second" at frame 48: media offline',
      'Could not place "Third" at frame 96: host rejected the append',
    ]);
    expect(lines).toEqual(['  Placed: MT_01 @ 00:00:00:00', '  FAILED: Second', '  FAILED: Third']);
  });
});
