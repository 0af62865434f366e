import { describe, expect, it } from 'vitest';
import { formatTimecode, nleRate, parseTimecode, ZERO_TIMECODE } from '../src/timecode.js';

describe('parseTimecode', () => {
  it('converts hours, minutes, seconds and frames at the rounded rate', () => {
    expect(parseTimecode('01:00:00:00', 24)).toBe(86400);
    expect(parseTimecode('00:00:01:05', 25)).toBe(30);
    expect(parseTimecode('00:01:00:00', 23.976)).toBe(1440);
  });

  it('treats semicolons like colons', () => {
    expect(parseTimecode('00:00:10;15', 29.97)).toBe(315);
  });

  it('ignores surrounding whitespace', () => {
    expect(parseTimecode('  00:00:00:12 ', 24)).toBe(12);
  });

  it('returns null without exactly four numeric fields', () => {
    expect(parseTimecode('00:00:10', 24)).toBeNull();
    expect(parseTimecode('00:00:00:00:00', 24)).toBeNull();
    expect(parseTimecode('00:0a:00:00', 24)).toBeNull();
    expect(parseTimecode('00:-1:00:00', 24)).toBeNull();
    expect(parseTimecode('', 24)).toBeNull();
  });

  it('returns null when the rate rounds to zero', () => {
    expect(parseTimecode('00:00:01:00', 0.4)).toBeNull();
  });
});

describe('formatTimecode', () => {
  it('pads every field to two digits', () => {
    expect(formatTimecode(86400 + 24 * 61 + 5, 24)).toBe('01:01:01:05');
  });

  it('does not wrap hours', () => {
    expect(formatTimecode(100 * 3600 * 25, 25)).toBe('100:00:00:00');
  });

  it('clamps negative frame counts to zero', () => {
    expect(formatTimecode(-10, 24)).toBe(ZERO_TIMECODE);
  });

  it('returns the zero timecode for a non-positive rate', () => {
    expect(formatTimecode(500, 0)).toBe('00:00:00:00');
  });

  it('round-trips through parseTimecode', () => {
    for (const rate of [24, 25, 30, 60]) {
      for (const frames of [0, 1, rate - 1, rate, 3599 * rate + 7, 90061 * rate]) {
        expect(parseTimecode(formatTimecode(frames, rate), rate)).toBe(frames);
      }
    }
  });
});

describe('nleRate', () => {
  it('rounds fractional rates', () => {
    expect(nleRate(23.976)).toBe(24);
    expect(nleRate(29.97)).toBe(30);
    expect(nleRate(59.94)).toBe(60);
  });
});
