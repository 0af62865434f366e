/**
 * QC Command
 * 
 * Scan the open timeline for structural problems and print the report.
 */

import ora from 'ora';
import {
  EditAssistError,
  PreconditionError,
  SelectionError,
  runPipeline,
  type Issue,
  type TimelineSnapshot,
} from '@edit-assist/core';
import { snapshotTimeline } from '@edit-assist/timeline';
import {
  analyzeTimeline,
  navigateToIssue,
  renderReport,
  verdictLine,
  type QcResult,
} from '@edit-assist/validation';
import { isDigitString } from '@edit-assist/utils';
import { openSettingsStore } from '../config/index.js';
import { openProject, type OpenedProject } from '../lib/project.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printReport,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { isInteractiveTerminal, promptSettings, qcSettingKeys } from '../lib/prompt.js';

interface QcOptions {
  project: string;
  interactive?: boolean;
  goto?: string;
}

interface QcRun {
  snapshot: TimelineSnapshot;
  qc: QcResult;
}

function parseIssueNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  if (!isDigitString(raw) || Number(raw) < 1) {
    throw new SelectionError(`--goto expects an issue number, got "${raw}"`);
  }
  return Number(raw);
}

export async function qcCommand(options: QcOptions): Promise<void> {
  printHeader('Timeline Quality Control');

  try {
    const gotoNumber = parseIssueNumber(options.goto);
    const opened = openProject(options.project);
    const timeline = opened.project.getCurrentTimeline();
    if (!timeline) {
      throw new PreconditionError('No timeline open');
    }

    const store = openSettingsStore();
    const interactive = Boolean(options.interactive) && isInteractiveTerminal();

    const outcome = await runPipeline<QcRun>(`qc-${Date.now()}`, {
      settings: () =>
        interactive
          ? promptSettings(store, qcSettingKeys)
          : { status: 'committed', settings: store.load() },
      analyze: (settings) => {
        const snapshot = snapshotTimeline(timeline);
        printKeyValue('Analyzing timeline', snapshot.name);
        printKeyValue('Frame rate', `${snapshot.frameRate} fps`);
        console.log();

        const spinner = ora('Analyzing timeline...').start();
        try {
          const qc = analyzeTimeline(snapshot, settings, {
            onProgress: (line) => {
              spinner.text = line;
            },
          });
          spinner.succeed(`Ran ${qc.checksRun.length} checks`);
          return { snapshot, qc };
        } catch (error) {
          spinner.fail('Analysis failed');
          throw error;
        }
      },
      present: ({ snapshot, qc }) => {
        printReport(
          renderReport(qc.issues, {
            timelineName: snapshot.name,
            frameRate: snapshot.frameRate,
            startFrame: snapshot.startFrame,
            endFrame: snapshot.endFrame,
          })
        );
        printVerdict(qc.issues);
      },
    });

    if (outcome.status === 'cancelled') {
      printWarning(`QC cancelled: ${outcome.reason}`);
      return;
    }

    if (gotoNumber !== null) {
      goToIssue(opened, outcome.result, gotoNumber);
    }
  } catch (error) {
    if (error instanceof EditAssistError) {
      printError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

function printVerdict(issues: readonly Issue[]): void {
  const verdict = verdictLine(issues);
  if (verdict === null) return;
  if (issues.length === 0) {
    printSuccess(verdict);
  } else {
    printError(verdict);
    process.exitCode = 1;
  }
}

function goToIssue(opened: OpenedProject, run: QcRun, number: number): void {
  const timeline = opened.project.getTimeline(run.snapshot.name);
  if (!timeline) {
    throw new PreconditionError(`Timeline "${run.snapshot.name}" is no longer in the project`);
  }
  const { issue, timecode } = navigateToIssue(
    timeline,
    run.qc.issues,
    number,
    run.snapshot.frameRate
  );
  opened.save();
  printInfo(`Playhead moved to issue #${number} at ${timecode}: ${issue.message}`);
}
