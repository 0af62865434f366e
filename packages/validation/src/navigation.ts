/**
 * Issue Navigation
 *
 * Moves the host playhead to an issue from the report, addressed by its
 * report number.
 */

import { SelectionError, type HostTimeline, type Issue } from '@edit-assist/core';
import { formatTimecode } from '@edit-assist/timeline';
import { createLogger } from '@edit-assist/utils';
import { sortIssues } from './report.js';

const log = createLogger({ module: 'navigation' });

/**
 * The n-th issue (1-based) in report order.
 */
export function issueAt(issues: readonly Issue[], number: number): Issue {
  const sorted = sortIssues(issues);
  const issue = Number.isInteger(number) ? sorted[number - 1] : undefined;
  if (!issue) {
    throw new SelectionError(
      sorted.length === 0
        ? 'There are no issues to go to'
        : `Issue #${number} does not exist (1-${sorted.length})`,
      { number, count: sorted.length }
    );
  }
  return issue;
}

export interface NavigationResult {
  issue: Issue;
  timecode: string;
}

export function navigateToIssue(
  timeline: HostTimeline,
  issues: readonly Issue[],
  number: number,
  frameRate: number
): NavigationResult {
  const issue = issueAt(issues, number);
  // Track-wide issues sit at frame 0; never park the playhead before the timeline.
  const timecode = formatTimecode(Math.max(issue.start, timeline.getStartFrame()), frameRate);

  if (!timeline.setCurrentTimecode(timecode)) {
    throw new SelectionError(`Timeline "${timeline.getName()}" refused playhead move to ${timecode}`, {
      number,
      timecode,
    });
  }

  log.debug({ number, timecode }, 'Playhead moved to issue');
  return { issue, timecode };
}
