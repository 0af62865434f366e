/**
 * @edit-assist/validation
 * 
 * Timeline quality control.
 * 
 * Responsibilities:
 * - Detect video gaps and flash frames
 * - Detect audio overlaps (same track and across tracks) and audio gaps
 * - Flag disabled clips, muted tracks, offline media and clips at source end
 * - Render the numbered QC report
 * - Move the playhead to a reported issue
 * 
 * Checks read snapshots only; nothing here touches a live host timeline
 * except navigation.
 */

// Analyzer
export {
  analyzeTimeline,
  qcChecks,
  type QcCheck,
  type QcContext,
  type QcResult,
  type AnalyzeOptions,
} from './qcAnalyzer.js';

// Individual checks
export { findVideoGaps } from './checks/videoGaps.js';
export { findFlashFrames } from './checks/flashFrames.js';
export { findSameTrackOverlaps, findCrossTrackOverlaps } from './checks/audioOverlaps.js';
export { findAudioGaps } from './checks/audioGaps.js';
export {
  findDisabledClips,
  findMutedTracks,
  findOfflineMedia,
  findSourceEndClips,
  SOURCE_END_TOLERANCE_FRAMES,
} from './checks/clipState.js';
export { audioTracks, soundingAudioTracks, videoClips, isTrackDisabled } from './checks/scope.js';

// Report
export {
  renderReport,
  sortIssues,
  groupIssues,
  summarizeSeverities,
  formatIssueLine,
  verdictLine,
  issueTypeLabels,
  severityMarkers,
  type IssueGroup,
  type NumberedIssue,
  type ReportContext,
  type SeveritySummary,
} from './report.js';

// Navigation
export { issueAt, navigateToIssue, type NavigationResult } from './navigation.js';
