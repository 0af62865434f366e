/**
 * Interactive Prompts
 *
 * Line prompts for the settings step and bin selection. Only used when
 * stdin is a terminal.
 */

import { createInterface } from 'node:readline';
import chalk from 'chalk';
import {
  SettingsError,
  formatSettingValue,
  toSettings,
  withSettingValue,
  type SettingKey,
  type SettingsFile,
  type SettingsOutcome,
  type SettingsStore,
} from '@edit-assist/core';
import { describeBin, type BinChooser } from '@edit-assist/conform';
import { isDigitString } from '@edit-assist/utils';
import { printWarning } from './output.js';

const CANCEL_WORD = 'q';

export function isInteractiveTerminal(): boolean {
  return Boolean(process.stdin.isTTY);
}

/**
 * Prompt for input
 */
export async function prompt(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

export const alignSettingKeys: readonly SettingKey[] = [
  'multitrack_bin_name',
  'reference_audio_track',
  'video_track_index',
  'ignore_prefixes',
  'create_new_timeline',
  'new_timeline_suffix',
];

export const qcSettingKeys: readonly SettingKey[] = [
  'flash_frame_threshold',
  'ignore_prefixes',
  'ignore_adjustment_clips',
  'check_audio_overlap',
  'check_audio_gaps',
  'min_audio_gap_frames',
  'ignore_track_names',
  'check_disabled_clips',
  'check_offline_media',
  'check_source_end',
];

/**
 * Walk the given keys, one prompt each. A blank answer keeps the current
 * value; "q" cancels the run. Completed answers are committed to the store.
 */
export async function promptSettings(
  store: SettingsStore,
  keys: readonly SettingKey[]
): Promise<SettingsOutcome> {
  let file: SettingsFile = store.loadFile();

  console.log(chalk.gray(`Press Enter to keep a value, "${CANCEL_WORD}" to cancel.`));

  for (const key of keys) {
    for (;;) {
      const answer = (
        await prompt(`  ${chalk.cyan(key)} [${formatSettingValue(file[key])}]: `)
      ).trim();

      if (answer.toLowerCase() === CANCEL_WORD) {
        return { status: 'cancelled', reason: 'Cancelled by user' };
      }
      if (answer === '') {
        break;
      }

      try {
        file = withSettingValue(file, key, answer);
        break;
      } catch (error) {
        if (!(error instanceof SettingsError)) throw error;
        printWarning(error.message);
      }
    }
  }

  store.save(file);
  return { status: 'committed', settings: toSettings(file) };
}

/**
 * Numbered bin list. Enter falls back to auto-detect by name.
 */
export const promptBinChoice: BinChooser = async (bins) => {
  console.log();
  console.log(chalk.bold('Bins with clips:'));
  bins.forEach((bin, index) => {
    console.log(`  ${chalk.cyan(String(index + 1))}. ${describeBin(bin)}`);
  });

  const answer = (await prompt('Select multitrack bin number (Enter to auto-detect): ')).trim();
  if (!isDigitString(answer)) {
    return null;
  }
  return Number(answer) - 1;
};
