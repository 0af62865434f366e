/**
 * @edit-assist/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Domain types (intervals, snapshots, issues)
 * - Host application interfaces
 * - Settings schema
 * - Optional property accessor
 * - Run stage machine and pipeline
 */

// Run lifecycle
export {
  RunStateMachine,
  runStageValues,
  isValidTransition,
  getNextStages,
  type RunStage,
  type RunStageTransition,
} from './stateMachine.js';

export {
  runPipeline,
  type PipelineStages,
  type PipelineOutcome,
  type SettingsOutcome,
} from './pipeline.js';

// Types
export type {
  TrackKind,
  FrameRange,
  TimeInterval,
  ClipRecord,
  TrackSnapshot,
  TimelineSnapshot,
} from './types/timeline.js';

export {
  issueTypeValues,
  severityValues,
  type Issue,
  type IssueType,
  type Severity,
} from './types/issue.js';

export type {
  HostApplication,
  HostProject,
  HostMediaPool,
  HostPlacement,
  HostFolder,
  HostMediaItem,
  HostTimeline,
  HostTimelineItem,
  NewTimelineOptions,
} from './types/host.js';

// Optional accessor
export { probe, probeIs, known, unknown, type Probe } from './probe.js';

// Settings
export {
  settingsFileSchema,
  settingsSchema,
  settingKeys,
  isSettingKey,
  parseSettingsFile,
  parseSettings,
  toSettings,
  toSettingsFile,
  withSettingValue,
  formatSettingValue,
  defaultSettings,
  defaultSettingsFile,
  type Settings,
  type SettingsFile,
  type SettingKey,
} from './config/settings.js';

export { SettingsStore } from './config/store.js';

// Errors
export {
  EditAssistError,
  ConnectionError,
  PreconditionError,
  SelectionError,
  DataError,
  PlacementError,
  HostPropertyError,
  SettingsError,
  StageTransitionError,
} from './errors/index.js';
