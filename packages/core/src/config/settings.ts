/**
 * Settings
 *
 * The flat key-value settings blob shared by the align and QC tools.
 * On disk the keys are snake_case; in code they are the camelCase
 * Settings value passed into every component.
 */

import { z } from 'zod';
import { SettingsError } from '../errors/index.js';

export const settingsFileSchema = z.object({
  video_track_index: z.number().int().min(1).default(1),
  ignore_prefixes: z.array(z.string()).default(['Sample', 'Fade']),
  flash_frame_threshold: z.number().int().min(0).default(3),
  check_audio_gaps: z.boolean().default(true),
  min_audio_gap_frames: z.number().int().min(0).default(2),
  ignore_track_names: z.array(z.string()).default([]),
  ignore_adjustment_clips: z.boolean().default(true),
  check_offline_media: z.boolean().default(true),
  check_source_end: z.boolean().default(false),
  check_audio_overlap: z.boolean().default(true),
  check_disabled_clips: z.boolean().default(true),
  create_new_timeline: z.boolean().default(false),
  new_timeline_suffix: z.string().default(' - Multitrack'),
  multitrack_bin_name: z.string().min(1).default('TRACKS'),
  reference_audio_track: z.number().int().min(1).default(1),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export type SettingKey = keyof SettingsFile;

export const settingKeys = settingsFileSchema.keyof().options;

export const settingsSchema = settingsFileSchema.transform((file) => ({
  videoTrackIndex: file.video_track_index,
  ignorePrefixes: file.ignore_prefixes,
  flashFrameThreshold: file.flash_frame_threshold,
  checkAudioGaps: file.check_audio_gaps,
  minAudioGapFrames: file.min_audio_gap_frames,
  ignoreTrackNames: file.ignore_track_names,
  ignoreAdjustmentClips: file.ignore_adjustment_clips,
  checkOfflineMedia: file.check_offline_media,
  checkSourceEnd: file.check_source_end,
  checkAudioOverlap: file.check_audio_overlap,
  checkDisabledClips: file.check_disabled_clips,
  createNewTimeline: file.create_new_timeline,
  newTimelineSuffix: file.new_timeline_suffix,
  multitrackBinName: file.multitrack_bin_name,
  referenceAudioTrack: file.reference_audio_track,
}));

export type Settings = z.output<typeof settingsSchema>;

type SettingKind = 'int' | 'bool' | 'list' | 'string';

const settingKinds: Record<SettingKey, SettingKind> = {
  video_track_index: 'int',
  ignore_prefixes: 'list',
  flash_frame_threshold: 'int',
  check_audio_gaps: 'bool',
  min_audio_gap_frames: 'int',
  ignore_track_names: 'list',
  ignore_adjustment_clips: 'bool',
  check_offline_media: 'bool',
  check_source_end: 'bool',
  check_audio_overlap: 'bool',
  check_disabled_clips: 'bool',
  create_new_timeline: 'bool',
  new_timeline_suffix: 'string',
  multitrack_bin_name: 'string',
  reference_audio_track: 'int',
};

export function isSettingKey(key: string): key is SettingKey {
  return settingKeys.some((candidate) => candidate === key);
}

function describeIssue(error: z.ZodError): { field: string; message: string } {
  const first = error.issues[0];
  return {
    field: first?.path.join('.') || 'settings',
    message: first?.message ?? 'invalid value',
  };
}

/**
 * Parse a raw settings blob, filling defaults. Unknown keys are dropped.
 */
export function parseSettingsFile(input: unknown): SettingsFile {
  const parsed = settingsFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const { field, message } = describeIssue(parsed.error);
    throw new SettingsError(field, message);
  }
  return parsed.data;
}

export function parseSettings(input: unknown): Settings {
  return settingsSchema.parse(parseSettingsFile(input));
}

export function toSettings(file: SettingsFile): Settings {
  return settingsSchema.parse(file);
}

export function toSettingsFile(settings: Settings): SettingsFile {
  return {
    video_track_index: settings.videoTrackIndex,
    ignore_prefixes: settings.ignorePrefixes,
    flash_frame_threshold: settings.flashFrameThreshold,
    check_audio_gaps: settings.checkAudioGaps,
    min_audio_gap_frames: settings.minAudioGapFrames,
    ignore_track_names: settings.ignoreTrackNames,
    ignore_adjustment_clips: settings.ignoreAdjustmentClips,
    check_offline_media: settings.checkOfflineMedia,
    check_source_end: settings.checkSourceEnd,
    check_audio_overlap: settings.checkAudioOverlap,
    check_disabled_clips: settings.checkDisabledClips,
    create_new_timeline: settings.createNewTimeline,
    new_timeline_suffix: settings.newTimelineSuffix,
    multitrack_bin_name: settings.multitrackBinName,
    reference_audio_track: settings.referenceAudioTrack,
  };
}

export const defaultSettingsFile: SettingsFile = parseSettingsFile({});

export const defaultSettings: Settings = toSettings(defaultSettingsFile);

const TRUE_WORDS = new Set(['true', 'yes', 'y', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'n', 'off', '0']);

function coerceSettingValue(key: SettingKey, raw: string): unknown {
  const trimmed = raw.trim();
  switch (settingKinds[key]) {
    case 'int':
      return trimmed === '' ? raw : Number(trimmed);
    case 'bool': {
      const word = trimmed.toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      return raw;
    }
    case 'list':
      return trimmed
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    case 'string':
      return raw;
  }
}

/**
 * Return a copy of `file` with one key set from its textual form
 * ("3", "yes", "Sample, Fade"). Throws SettingsError when the value
 * does not fit the key.
 */
export function withSettingValue(file: SettingsFile, key: SettingKey, raw: string): SettingsFile {
  const parsed = settingsFileSchema.safeParse({
    ...file,
    [key]: coerceSettingValue(key, raw),
  });
  if (!parsed.success) {
    throw new SettingsError(key, describeIssue(parsed.error).message);
  }
  return parsed.data;
}

export function formatSettingValue(value: SettingsFile[SettingKey]): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}
