/**
 * Timecode Codec
 *
 * HH:MM:SS:FF <-> absolute frame count. All modulus arithmetic uses the
 * rate rounded to the nearest integer, matching how editing hosts display
 * timecode. Drop-frame strings (";" separator) are read like non-drop.
 */

import { isDigitString } from '@edit-assist/utils';

export const ZERO_TIMECODE = '00:00:00:00';

/**
 * Integer frame rate used for timecode arithmetic (29.97 → 30, 23.976 → 24)
 */
export function nleRate(rate: number): number {
  return Math.round(rate);
}

/**
 * Convert a 4-field timecode to frames. Returns null when the string is
 * not exactly four all-digit fields or the rate rounds to zero.
 */
export function parseTimecode(timecode: string, rate: number): number | null {
  const fps = nleRate(rate);
  if (!Number.isFinite(fps) || fps <= 0) {
    return null;
  }

  const fields = timecode.trim().split(/[:;]/);
  if (fields.length !== 4 || !fields.every(isDigitString)) {
    return null;
  }

  const [hours = 0, minutes = 0, seconds = 0, frames = 0] = fields.map(Number);
  return (hours * 3600 + minutes * 60 + seconds) * fps + frames;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Convert frames to HH:MM:SS:FF. Negative input is clamped to zero.
 */
export function formatTimecode(frames: number, rate: number): string {
  const fps = nleRate(rate);
  if (!Number.isFinite(fps) || fps <= 0) {
    return ZERO_TIMECODE;
  }

  const total = Number.isFinite(frames) ? Math.max(0, Math.floor(frames)) : 0;
  const f = total % fps;
  const s = Math.floor(total / fps) % 60;
  const m = Math.floor(total / (fps * 60)) % 60;
  const h = Math.floor(total / (fps * 3600));

  return `${pad2(h)}:${pad2(m)}:${pad2(s)}:${pad2(f)}`;
}
