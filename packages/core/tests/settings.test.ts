import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SettingsError } from '../src/errors/index.js';
import {
  defaultSettings,
  formatSettingValue,
  isSettingKey,
  parseSettings,
  parseSettingsFile,
  toSettings,
  toSettingsFile,
  withSettingValue,
} from '../src/config/settings.js';
import { SettingsStore } from '../src/config/store.js';

describe('settings defaults', () => {
  it('fills every key when the blob is empty', () => {
    expect(defaultSettings).toEqual({
      videoTrackIndex: 1,
      ignorePrefixes: ['Sample', 'Fade'],
      flashFrameThreshold: 3,
      checkAudioGaps: true,
      minAudioGapFrames: 2,
      ignoreTrackNames: [],
      ignoreAdjustmentClips: true,
      checkOfflineMedia: true,
      checkSourceEnd: false,
      checkAudioOverlap: true,
      checkDisabledClips: true,
      createNewTimeline: false,
      newTimelineSuffix: ' - Multitrack',
      multitrackBinName: 'TRACKS',
      referenceAudioTrack: 1,
    });
  });

  it('drops unknown keys and keeps the rest', () => {
    const file = parseSettingsFile({ flash_frame_threshold: 5, colour: 'blue' });

    expect(file.flash_frame_threshold).toBe(5);
    expect('colour' in file).toBe(false);
  });

  it('treats null as an empty blob', () => {
    expect(parseSettings(null)).toEqual(defaultSettings);
  });

  it('raises SettingsError naming the bad field', () => {
    expect(() => parseSettingsFile({ video_track_index: 0 })).toThrow(SettingsError);
    expect(() => parseSettingsFile({ check_audio_gaps: 'sometimes' })).toThrow(
      /^Invalid setting check_audio_gaps:/
    );
  });

  it('converts between file and value forms', () => {
    const settings = toSettings(parseSettingsFile({ ignore_track_names: ['Music'] }));
    expect(settings.ignoreTrackNames).toEqual(['Music']);
    expect(toSettingsFile(settings).ignore_track_names).toEqual(['Music']);
  });
});

describe('withSettingValue', () => {
  const base = parseSettingsFile({});

  it('parses integers', () => {
    expect(withSettingValue(base, 'flash_frame_threshold', '6').flash_frame_threshold).toBe(6);
  });

  it('accepts yes/no words for booleans', () => {
    expect(withSettingValue(base, 'check_source_end', 'yes').check_source_end).toBe(true);
    expect(withSettingValue(base, 'check_audio_gaps', 'OFF').check_audio_gaps).toBe(false);
  });

  it('splits lists on commas', () => {
    expect(withSettingValue(base, 'ignore_prefixes', ' Sample , Slate,,').ignore_prefixes).toEqual([
      'Sample',
      'Slate',
    ]);
  });

  it('keeps strings verbatim', () => {
    expect(withSettingValue(base, 'new_timeline_suffix', ' (MT)').new_timeline_suffix).toBe(' (MT)');
  });

  it('rejects values that do not fit the key', () => {
    expect(() => withSettingValue(base, 'min_audio_gap_frames', 'two')).toThrow(SettingsError);
    expect(() => withSettingValue(base, 'check_audio_gaps', 'maybe')).toThrow(SettingsError);
    expect(() => withSettingValue(base, 'reference_audio_track', '1.5')).toThrow(SettingsError);
  });

  it('does not modify the input', () => {
    withSettingValue(base, 'flash_frame_threshold', '9');
    expect(base.flash_frame_threshold).toBe(3);
  });
});

describe('formatSettingValue', () => {
  it('renders each kind of value', () => {
    expect(formatSettingValue(['Sample', 'Fade'])).toBe('Sample, Fade');
    expect(formatSettingValue(' - Multitrack')).toBe('" - Multitrack"');
    expect(formatSettingValue(true)).toBe('true');
    expect(formatSettingValue(3)).toBe('3');
  });
});

describe('isSettingKey', () => {
  it('recognises known keys only', () => {
    expect(isSettingKey('video_track_index')).toBe(true);
    expect(isSettingKey('videoTrackIndex')).toBe(false);
  });
});

describe('SettingsStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'edit-assist-settings-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults without creating a missing file', () => {
    const store = new SettingsStore(join(dir, 'settings.json'));

    expect(store.load()).toEqual(defaultSettings);
    expect(store.exists()).toBe(false);
  });

  it('saves into nested directories and reads the values back', () => {
    const store = new SettingsStore(join(dir, 'nested', 'settings.json'));
    store.save(withSettingValue(store.loadFile(), 'multitrack_bin_name', 'ISO'));

    expect(store.load().multitrackBinName).toBe('ISO');
    expect(JSON.parse(readFileSync(store.filePath, 'utf-8')).multitrack_bin_name).toBe('ISO');
  });

  it('reports a file that is not JSON', () => {
    const filePath = join(dir, 'settings.json');
    writeFileSync(filePath, '{ not json');

    expect(() => new SettingsStore(filePath).loadFile()).toThrow(SettingsError);
  });

  it('resets to defaults', () => {
    const store = new SettingsStore(join(dir, 'settings.json'));
    store.save(withSettingValue(store.loadFile(), 'check_source_end', 'true'));

    store.reset();

    expect(store.load().checkSourceEnd).toBe(false);
  });
});
