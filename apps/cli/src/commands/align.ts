/**
 * Align Command
 * 
 * Place multitrack recordings on a video track, lined up with the
 * reference timeline's audio.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  EditAssistError,
  PreconditionError,
  runPipeline,
  type SettingsOutcome,
} from '@edit-assist/core';
import {
  collectBins,
  runAlign,
  selectMultitrackBin,
  type AlignResult,
  type BinEntry,
} from '@edit-assist/conform';
import { openSettingsStore } from '../config/index.js';
import { openProject } from '../lib/project.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printProgress,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import {
  alignSettingKeys,
  isInteractiveTerminal,
  promptBinChoice,
  promptSettings,
} from '../lib/prompt.js';

interface AlignOptions {
  project: string;
  interactive?: boolean;
  dryRun?: boolean;
}

export async function alignCommand(options: AlignOptions): Promise<void> {
  printHeader('Multitrack Align');

  const spinner = ora('Opening project...').start();

  try {
    const opened = openProject(options.project);
    spinner.succeed(`Project: ${opened.project.getName()}`);

    const store = openSettingsStore();
    const interactive = Boolean(options.interactive) && isInteractiveTerminal();
    const dryRun = Boolean(options.dryRun);
    let bin: BinEntry | null = null;

    const outcome = await runPipeline<AlignResult>(`align-${Date.now()}`, {
      settings: async () => {
        const settingsOutcome: SettingsOutcome = interactive
          ? await promptSettings(store, alignSettingKeys)
          : { status: 'committed', settings: store.load() };

        if (settingsOutcome.status === 'committed') {
          const bins = collectBins(opened.project.getMediaPool().getRootFolder());
          bin = await selectMultitrackBin(bins, {
            binName: settingsOutcome.settings.multitrackBinName,
            choose: interactive ? promptBinChoice : undefined,
          });
        }
        return settingsOutcome;
      },
      analyze: (settings) => {
        const selected = bin;
        if (!selected) {
          throw new PreconditionError('No multitrack bin selected');
        }
        return runAlign({
          project: opened.project,
          settings,
          bin: selected,
          dryRun,
          onProgress: printProgress,
        });
      },
      present: (result) => {
        presentAlignResult(result, dryRun);
        if (result.placement) {
          opened.save();
          printSuccess(`Saved ${opened.filePath}`);
        }
      },
    });

    if (outcome.status === 'cancelled') {
      printWarning(`Align cancelled: ${outcome.reason}`);
    }
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Failed to open project');
    }
    if (error instanceof EditAssistError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

function presentAlignResult(result: AlignResult, dryRun: boolean): void {
  const { summary } = result.match;

  printHeader('Summary');
  printKeyValue('Reference timeline', result.referenceTimeline);
  printKeyValue('Multitrack clips', result.multitrackClips.length);
  printKeyValue('Clips to place', summary.matched);
  printKeyValue('Skipped (filtered)', summary.skippedByFilter);
  printKeyValue('Skipped (no media link)', summary.skippedNoMediaLink);
  printKeyValue('Skipped (no timecode)', summary.skippedNoTimecode);
  printKeyValue('No TC match', summary.unmatched);
  console.log();

  if (summary.matched === 0) {
    printWarning('No clips matched any multitrack recording - nothing to place');
    return;
  }

  if (dryRun || !result.placement) {
    printInfo('Dry run - project not modified');
    return;
  }

  const { placement } = result;
  if (placement.failed === 0) {
    printSuccess(
      `Placed ${placement.placed} clips on ${chalk.cyan(result.targetTimeline)}`
    );
    return;
  }

  printWarning(
    `Placed ${placement.placed} of ${placement.attempted} clips on ${result.targetTimeline}; ` +
      `${placement.failed} failed`
  );
  for (const failure of placement.failures) {
    console.log(chalk.gray(`  ${failure.message}`));
  }
}
