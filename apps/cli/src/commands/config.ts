/**
 * Config Command
 * 
 * View and manage the settings shared by align and qc.
 */

import chalk from 'chalk';
import {
  SettingsError,
  formatSettingValue,
  isSettingKey,
  settingKeys,
  withSettingValue,
  type SettingKey,
  type SettingsStore,
} from '@edit-assist/core';
import { openSettingsStore } from '../config/index.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  list?: boolean;
  reset?: boolean;
}

type ConfigAction = 'get' | 'set' | 'list' | 'reset';

export const settingDescriptions: Record<SettingKey, string> = {
  video_track_index: 'Video track multitrack clips are placed on',
  ignore_prefixes: 'Clip name prefixes skipped by align and the audio checks',
  flash_frame_threshold: 'Clips shorter than this many frames are flash frames',
  check_audio_gaps: 'Report silences between audio clips',
  min_audio_gap_frames: 'Shortest audio gap worth reporting, in frames',
  ignore_track_names: 'Audio tracks left out of the audio checks',
  ignore_adjustment_clips: 'Leave adjustment clips out of the video checks',
  check_offline_media: 'Report clips whose media is offline or missing',
  check_source_end: 'Report clips trimmed to the end of their source',
  check_audio_overlap: 'Report overlapping audio clips',
  check_disabled_clips: 'Report disabled clips and muted tracks',
  create_new_timeline: 'Place clips on a new timeline instead of the reference',
  new_timeline_suffix: 'Name suffix for the new timeline',
  multitrack_bin_name: 'Bin auto-detected as the multitrack bin',
  reference_audio_track: 'Audio track read from the reference timeline',
};

export async function configCommand(
  key?: string,
  value?: string,
  options: ConfigOptions = {}
): Promise<void> {
  const store = openSettingsStore();

  try {
    switch (determineAction(key, value, options)) {
      case 'list':
        listSettings(store);
        break;
      case 'get':
        getSetting(store, requireKey(key));
        break;
      case 'set':
        setSetting(store, requireKey(key), value ?? '');
        break;
      case 'reset':
        store.reset();
        printSuccess('Settings reset to defaults');
        printKeyValue('File', store.filePath);
        break;
    }
  } catch (error) {
    if (error instanceof SettingsError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

function determineAction(key: string | undefined, value: string | undefined, options: ConfigOptions): ConfigAction {
  if (options.reset) return 'reset';
  if (options.list || !key) return 'list';
  if (value !== undefined) return 'set';
  return 'get';
}

function requireKey(key: string | undefined): SettingKey {
  if (key === undefined || !isSettingKey(key)) {
    console.log(chalk.gray(`Valid keys: ${settingKeys.join(', ')}`));
    throw new SettingsError(key ?? 'key', 'unknown setting');
  }
  return key;
}

function listSettings(store: SettingsStore): void {
  const file = store.loadFile();

  printHeader('Settings');
  printKeyValue('File', store.exists() ? store.filePath : `${store.filePath} (not created yet)`);
  console.log();

  for (const key of settingKeys) {
    console.log(`${chalk.cyan(key)}: ${formatSettingValue(file[key])}`);
    console.log(`  ${chalk.gray(settingDescriptions[key])}`);
  }

  console.log();
  console.log(chalk.gray('Use "edit-assist config <key> <value>" to set a value'));
}

function getSetting(store: SettingsStore, key: SettingKey): void {
  printKeyValue(key, formatSettingValue(store.loadFile()[key]));
}

function setSetting(store: SettingsStore, key: SettingKey, value: string): void {
  const updated = withSettingValue(store.loadFile(), key, value);
  store.save(updated);
  printSuccess(`Set ${key} = ${formatSettingValue(updated[key])}`);
}
