/**
 * Custom Error Classes
 *
 * Every failure the tools report is one of these. Commands catch
 * EditAssistError, print the message and return early.
 */

import type { RunStage } from '../stateMachine.js';

/**
 * Base error class for all edit-assist errors
 */
export class EditAssistError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EditAssistError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Host application or project could not be reached
 */
export class ConnectionError extends EditAssistError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'ConnectionError';
  }
}

/**
 * Something the run needs is missing (no timeline, no bins, no clips)
 */
export class PreconditionError extends EditAssistError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_ERROR', details);
    this.name = 'PreconditionError';
  }
}

/**
 * Bin selection was ambiguous, out of range or could not be resolved
 */
export class SelectionError extends EditAssistError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SELECTION_ERROR', details);
    this.name = 'SelectionError';
  }
}

/**
 * Malformed or missing timecode on an item
 */
export class DataError extends EditAssistError {
  constructor(item: string, message: string) {
    super(
      `Bad data on "${item}": ${message}`,
      'DATA_ERROR',
      { item, message }
    );
    this.name = 'DataError';
  }
}

/**
 * Host rejected an append operation
 */
export class PlacementError extends EditAssistError {
  constructor(clip: string, recordFrame: number, reason: string) {
    super(
      `Could not place "${clip}" at frame ${recordFrame}: ${reason}`,
      'PLACEMENT_ERROR',
      { clip, recordFrame, reason }
    );
    this.name = 'PlacementError';
  }
}

/**
 * A host object does not support the requested property
 */
export class HostPropertyError extends EditAssistError {
  constructor(owner: string, property: string) {
    super(
      `Property "${property}" is not available on "${owner}"`,
      'HOST_PROPERTY_ERROR',
      { owner, property }
    );
    this.name = 'HostPropertyError';
  }
}

/**
 * Settings file or override failed validation
 */
export class SettingsError extends EditAssistError {
  constructor(field: string, message: string) {
    super(
      `Invalid setting ${field}: ${message}`,
      'SETTINGS_ERROR',
      { field, message }
    );
    this.name = 'SettingsError';
  }
}

/**
 * State transition error for invalid run stage changes
 */
export class StageTransitionError extends EditAssistError {
  constructor(runId: string, fromStage: RunStage, toStage: RunStage) {
    super(
      `Invalid stage transition from ${fromStage} to ${toStage}`,
      'STAGE_TRANSITION_ERROR',
      { runId, fromStage, toStage }
    );
    this.name = 'StageTransitionError';
  }
}
