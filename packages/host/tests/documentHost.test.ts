import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConnectionError, HostPropertyError, type HostProject } from '@edit-assist/core';
import { createDocumentHost, openProjectDocument, saveProjectDocument } from '../src/loader.js';
import type { ProjectDocumentInput } from '../src/schema.js';

function sampleDocument(): ProjectDocumentInput {
  return {
    name: 'Short Film',
    currentTimeline: 'Edit v3',
    mediaPool: {
      name: 'Master',
      clips: [{ id: 'm1', name: 'Slate', properties: {} }],
      bins: [
        {
          name: 'TRACKS',
          clips: [
            {
              id: 'mt1',
              name: 'MT_Day1',
              properties: { 'Start TC': '10:00:00:00', 'End TC': '10:10:00:00', Frames: '14400' },
            },
          ],
        },
      ],
    },
    timelines: [
      {
        name: 'Edit v3',
        frameRate: 24,
        startTimecode: '01:00:00:00',
        video: [{ items: [] }],
        audio: [
          {
            name: 'Dialog',
            items: [
              { name: 'Take 1', start: 86400, duration: 48, mediaId: 'm1', enabled: true },
              { name: 'Take 2', start: 86500, duration: 24 },
            ],
          },
          { enabled: false, items: [] },
        ],
      },
    ],
  };
}

function openSample(): HostProject {
  const project = createDocumentHost(sampleDocument()).getCurrentProject();
  if (!project) throw new Error('sample project missing');
  return project;
}

describe('createDocumentHost', () => {
  it('rejects documents that fail the schema', () => {
    expect(() => createDocumentHost({ name: 'x' })).toThrow(ConnectionError);
  });

  it('rejects duplicate timeline names', () => {
    const document = sampleDocument();
    const [timeline] = document.timelines ?? [];
    if (!timeline) throw new Error('sample timeline missing');

    expect(() => createDocumentHost({ ...document, timelines: [timeline, timeline] })).toThrow(
      /timeline names must be unique/
    );
  });
});

describe('DocumentTimeline', () => {
  it('derives frames from the start timecode and items', () => {
    const timeline = openSample().getCurrentTimeline();

    expect(timeline?.getStartFrame()).toBe(86400);
    expect(timeline?.getEndFrame()).toBe(86524);
    expect(timeline?.getTrackCount('audio')).toBe(2);
  });

  it('names tracks and reports their enabled state', () => {
    const timeline = openSample().getCurrentTimeline();

    expect(timeline?.getTrackName('audio', 1)).toBe('Dialog');
    expect(timeline?.getTrackName('audio', 2)).toBe('Audio 2');
    expect(timeline?.isTrackEnabled('audio', 2)).toBe(false);
    expect(() => timeline?.getTrackName('video', 5)).toThrow(HostPropertyError);
  });

  it('throws HostPropertyError for properties an item leaves out', () => {
    const items = openSample().getCurrentTimeline()?.getItems('audio', 1) ?? [];
    const [first, second] = items;

    expect(first?.isEnabled()).toBe(true);
    expect(first?.getMediaItem()?.getName()).toBe('Slate');
    expect(() => second?.isEnabled()).toThrow(HostPropertyError);
    expect(() => second?.getRightOffset()).toThrow(HostPropertyError);
    expect(second?.getMediaItem()).toBeNull();
  });

  it('moves the playhead only to valid timecode', () => {
    const timeline = openSample().getCurrentTimeline();

    expect(timeline?.setCurrentTimecode('01:00:04:04')).toBe(true);
    expect(timeline?.getCurrentTimecode()).toBe('01:00:04:04');
    expect(timeline?.setCurrentTimecode('later')).toBe(false);
    expect(timeline?.getCurrentTimecode()).toBe('01:00:04:04');
  });

  it('adds tracks at the end', () => {
    const timeline = openSample().getCurrentTimeline();

    expect(timeline?.addTrack('video')).toBe(2);
    expect(timeline?.getItems('video', 2)).toEqual([]);
  });
});

describe('DocumentMediaPool', () => {
  it('walks bins and appends placements within the source', () => {
    const project = openSample();
    const pool = project.getMediaPool();
    const timeline = project.getCurrentTimeline();
    const [bin] = pool.getRootFolder().getSubFolders();
    const [recording] = bin?.getClips() ?? [];
    if (!timeline || !recording) throw new Error('sample incomplete');

    expect(
      pool.appendToTimeline(timeline, {
        mediaItem: recording,
        startFrame: 250,
        endFrame: 298,
        kind: 'video',
        trackIndex: 1,
        recordFrame: 86400,
      })
    ).toBe(true);

    const [placed] = timeline.getItems('video', 1);
    expect(placed?.getName()).toBe('MT_Day1');
    expect(placed?.getStart()).toBe(86400);
    expect(placed?.getDuration()).toBe(48);
    expect(placed?.getLeftOffset()).toBe(250);
    expect(placed?.getRightOffset()).toBe(14400 - 298);
  });

  it('rejects placements past the end of the source or on missing tracks', () => {
    const project = openSample();
    const pool = project.getMediaPool();
    const timeline = project.getCurrentTimeline();
    const [recording] = pool.getRootFolder().getSubFolders()[0]?.getClips() ?? [];
    if (!timeline || !recording) throw new Error('sample incomplete');

    const placement = {
      mediaItem: recording,
      startFrame: 14390,
      endFrame: 14410,
      kind: 'video' as const,
      trackIndex: 1,
      recordFrame: 86400,
    };

    expect(pool.appendToTimeline(timeline, placement)).toBe(false);
    expect(pool.appendToTimeline(timeline, { ...placement, startFrame: 0, endFrame: 10, trackIndex: 3 })).toBe(
      false
    );
    expect(timeline.getItems('video', 1)).toEqual([]);
  });
});

describe('DocumentProject', () => {
  it('creates a timeline once per name and makes it current', () => {
    const project = openSample();
    const created = project.createTimeline('Edit v3 - Multitrack', {
      frameRate: 24,
      startTimecode: '01:00:00:00',
    });
    if (!created) throw new Error('timeline not created');

    expect(project.setCurrentTimeline(created)).toBe(true);
    expect(project.getCurrentTimeline()?.getName()).toBe('Edit v3 - Multitrack');
    expect(created.getTrackCount('video')).toBe(1);
    expect(project.createTimeline('Edit v3', { frameRate: 24, startTimecode: '01:00:00:00' })).toBeNull();
  });
});

describe('project files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'edit-assist-project-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports missing and unreadable files', () => {
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{');

    expect(() => openProjectDocument(join(dir, 'missing.json'))).toThrow(/Project file not found/);
    expect(() => openProjectDocument(broken)).toThrow(ConnectionError);
  });

  it('writes mutations back to disk', () => {
    const filePath = join(dir, 'project.json');
    writeFileSync(filePath, JSON.stringify(sampleDocument()));

    const project = openProjectDocument(filePath).getCurrentProject();
    if (!project) throw new Error('project missing');
    project.getCurrentTimeline()?.setCurrentTimecode('01:00:01:00');
    saveProjectDocument(project.document, filePath);

    const saved = JSON.parse(readFileSync(filePath, 'utf-8'));
    expect(saved.timelines[0].currentTimecode).toBe('01:00:01:00');
  });
});
