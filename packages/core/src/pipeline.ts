/**
 * Run Pipeline
 *
 * Settings → Analyze → Present, with explicit hand-off between stages.
 * The settings stage may be interactive and may cancel; once analysis
 * starts the run always reaches PRESENTING or FAILED.
 */

import { createLogger } from '@edit-assist/utils';
import type { Settings } from './config/settings.js';
import { RunStateMachine, type RunStageTransition } from './stateMachine.js';

const log = createLogger({ module: 'pipeline' });

export type SettingsOutcome =
  | { status: 'committed'; settings: Settings }
  | { status: 'cancelled'; reason: string };

export interface PipelineStages<TResult> {
  settings: () => SettingsOutcome | Promise<SettingsOutcome>;
  analyze: (settings: Settings) => TResult;
  present: (result: TResult, settings: Settings) => void;
}

export type PipelineOutcome<TResult> =
  | {
      status: 'completed';
      settings: Settings;
      result: TResult;
      history: ReadonlyArray<RunStageTransition>;
    }
  | {
      status: 'cancelled';
      reason: string;
      history: ReadonlyArray<RunStageTransition>;
    };

export async function runPipeline<TResult>(
  runId: string,
  stages: PipelineStages<TResult>
): Promise<PipelineOutcome<TResult>> {
  const machine = new RunStateMachine(runId);

  const step = <T>(work: () => T): T => {
    try {
      return work();
    } catch (error) {
      machine.fail(error instanceof Error ? error.message : String(error));
      throw error;
    }
  };

  let outcome: SettingsOutcome;
  try {
    outcome = await stages.settings();
  } catch (error) {
    machine.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }

  if (outcome.status === 'cancelled') {
    machine.transitionTo('CANCELLED', outcome.reason);
    log.debug({ runId, reason: outcome.reason }, 'Run cancelled at settings step');
    return { status: 'cancelled', reason: outcome.reason, history: machine.getHistory() };
  }

  const { settings } = outcome;

  machine.transitionTo('ANALYZING');
  const result = step(() => stages.analyze(settings));

  machine.transitionTo('PRESENTING');
  step(() => stages.present(result, settings));

  machine.transitionTo('DONE');
  log.debug({ runId }, 'Run complete');

  return { status: 'completed', settings, result, history: machine.getHistory() };
}
