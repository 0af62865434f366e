/**
 * QC Issue Types
 */

export const issueTypeValues = [
  'VIDEO_GAP',
  'FLASH_FRAME',
  'AUDIO_OVERLAP',
  'AUDIO_GAP',
  'DISABLED_CLIP',
  'MUTED_TRACK',
  'OFFLINE_MEDIA',
  'SOURCE_END',
] as const;

export type IssueType = (typeof issueTypeValues)[number];

export const severityValues = ['ERROR', 'WARNING', 'INFO'] as const;

export type Severity = (typeof severityValues)[number];

export interface Issue {
  readonly type: IssueType;
  readonly severity: Severity;
  readonly start: number;
  readonly end: number;
  readonly duration: number;
  readonly track?: string;
  readonly clip?: string;
  readonly message: string;
}
