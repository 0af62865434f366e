/**
 * Report Builder
 *
 * Plain-text QC report. Issues are numbered by their position in the
 * start-sorted list; those numbers are what `qc --goto` takes.
 */

import type { Issue, IssueType, Severity } from '@edit-assist/core';
import { formatTimecode } from '@edit-assist/timeline';

const RULE_WIDTH = 70;
const HEAVY_RULE = '='.repeat(RULE_WIDTH);
const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

export const issueTypeLabels: Record<IssueType, string> = {
  VIDEO_GAP: 'VIDEO GAPS',
  FLASH_FRAME: 'FLASH FRAMES',
  AUDIO_OVERLAP: 'AUDIO OVERLAPS',
  AUDIO_GAP: 'AUDIO GAPS',
  DISABLED_CLIP: 'DISABLED CLIPS',
  MUTED_TRACK: 'MUTED TRACKS',
  OFFLINE_MEDIA: 'OFFLINE MEDIA',
  SOURCE_END: 'CLIPS AT SOURCE END',
};

export const severityMarkers: Record<Severity, string> = {
  ERROR: '[!]',
  WARNING: '[?]',
  INFO: '[ ]',
};

export interface NumberedIssue {
  number: number;
  issue: Issue;
}

export interface IssueGroup {
  type: IssueType;
  label: string;
  issues: NumberedIssue[];
}

export type SeveritySummary = Record<Severity, number>;

export interface ReportContext {
  timelineName: string;
  frameRate: number;
  startFrame: number;
  endFrame: number;
}

/**
 * Stable sort by start frame.
 */
export function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort((a, b) => a.start - b.start);
}

/**
 * Groups in order of each type's first appearance in the sorted list.
 */
export function groupIssues(issues: readonly Issue[]): IssueGroup[] {
  const groups = new Map<IssueType, IssueGroup>();

  sortIssues(issues).forEach((issue, index) => {
    let group = groups.get(issue.type);
    if (!group) {
      group = { type: issue.type, label: issueTypeLabels[issue.type], issues: [] };
      groups.set(issue.type, group);
    }
    group.issues.push({ number: index + 1, issue });
  });

  return Array.from(groups.values());
}

export function summarizeSeverities(issues: readonly Issue[]): SeveritySummary {
  const summary: SeveritySummary = { ERROR: 0, WARNING: 0, INFO: 0 };
  for (const issue of issues) {
    summary[issue.severity] += 1;
  }
  return summary;
}

export function formatIssueLine(entry: NumberedIssue, frameRate: number): string {
  const { issue, number } = entry;
  const timecode = formatTimecode(issue.start, frameRate);
  return `  ${severityMarkers[issue.severity]} #${number} ${timecode} - ${issue.message}`;
}

export function renderReport(issues: readonly Issue[], context: ReportContext): string {
  const { timelineName, frameRate, startFrame, endFrame } = context;
  const lines: string[] = [
    '',
    HEAVY_RULE,
    '  TIMELINE QC REPORT',
    HEAVY_RULE,
    '',
    `Timeline: ${timelineName}`,
    `Frame Rate: ${frameRate} fps`,
    `Duration: ${formatTimecode(startFrame, frameRate)} - ${formatTimecode(endFrame, frameRate)}`,
    '',
  ];

  if (issues.length === 0) {
    lines.push('  *** NO ISSUES FOUND ***', '', HEAVY_RULE);
    return lines.join('\n');
  }

  const summary = summarizeSeverities(issues);
  lines.push(
    'SUMMARY:',
    `  Errors:   ${summary.ERROR}`,
    `  Warnings: ${summary.WARNING}`,
    `  Info:     ${summary.INFO}`,
    ''
  );

  for (const group of groupIssues(issues)) {
    lines.push(LIGHT_RULE, `${group.label} (${group.issues.length})`, LIGHT_RULE);
    for (const entry of group.issues) {
      lines.push(formatIssueLine(entry, frameRate));
    }
    lines.push('');
  }

  lines.push(HEAVY_RULE, '  END OF REPORT', HEAVY_RULE, '');
  return lines.join('\n');
}

/**
 * One-line outcome printed after the report.
 */
export function verdictLine(issues: readonly Issue[]): string | null {
  if (issues.length === 0) {
    return 'Timeline passed QC - no issues found!';
  }
  const errors = summarizeSeverities(issues).ERROR;
  return errors > 0 ? `ACTION REQUIRED: ${errors} error(s) found!` : null;
}
