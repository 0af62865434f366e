/**
 * Run Stage Machine
 *
 * Lifecycle of one align or QC run.
 *
 * Stage Flow:
 * SETTINGS → ANALYZING → PRESENTING → DONE
 *     ↘ CANCELLED (settings step only)
 *     ↘ FAILED (from any non-terminal stage)
 *
 * Rules:
 * - Only the settings step can be cancelled; analysis always runs to completion
 * - Invalid transitions throw errors
 */

import { StageTransitionError } from './errors/index.js';

export const runStageValues = [
  'SETTINGS',
  'ANALYZING',
  'PRESENTING',
  'DONE',
  'CANCELLED',
  'FAILED',
] as const;

export type RunStage = (typeof runStageValues)[number];

/**
 * Represents a stage transition with metadata
 */
export interface RunStageTransition {
  from: RunStage;
  to: RunStage;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid stage transitions
 */
const validTransitions: Record<RunStage, ReadonlySet<RunStage>> = {
  SETTINGS: new Set<RunStage>(['ANALYZING', 'CANCELLED', 'FAILED']),
  ANALYZING: new Set<RunStage>(['PRESENTING', 'FAILED']),
  PRESENTING: new Set<RunStage>(['DONE', 'FAILED']),
  DONE: new Set<RunStage>([]),
  CANCELLED: new Set<RunStage>([]),
  FAILED: new Set<RunStage>([]),
};

/**
 * Check if a stage transition is valid
 */
export function isValidTransition(from: RunStage, to: RunStage): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next stages from the current stage
 */
export function getNextStages(current: RunStage): RunStage[] {
  return Array.from(validTransitions[current]);
}

export class RunStateMachine {
  private currentStage: RunStage = 'SETTINGS';
  private readonly history: RunStageTransition[] = [];

  constructor(private readonly runId: string) {}

  getStage(): RunStage {
    return this.currentStage;
  }

  getHistory(): ReadonlyArray<RunStageTransition> {
    return [...this.history];
  }

  canTransitionTo(target: RunStage): boolean {
    return isValidTransition(this.currentStage, target);
  }

  /**
   * Move to a new stage.
   * Throws StageTransitionError if the transition is invalid
   */
  transitionTo(target: RunStage, reason?: string): RunStageTransition {
    if (!this.canTransitionTo(target)) {
      throw new StageTransitionError(this.runId, this.currentStage, target);
    }

    const transition: RunStageTransition = {
      from: this.currentStage,
      to: target,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentStage = target;

    return transition;
  }

  isTerminal(): boolean {
    return getNextStages(this.currentStage).length === 0;
  }

  fail(reason: string): RunStageTransition {
    return this.transitionTo('FAILED', reason);
  }
}
