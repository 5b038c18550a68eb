import { describe, expect, it } from 'vitest';

import {
  formatTimestamp,
  parseTimestamp,
  utcDateKey,
  utcDayStart,
  utcHourStart,
} from '../src/time';

const T = 1_792_317_600; // 2026-10-18T10:00:00Z

describe('time', () => {
  it('formats unix seconds as second-precision UTC', () => {
    expect(formatTimestamp(T)).toBe('2026-10-18T10:00:00Z');
    expect(formatTimestamp(T + 59.9)).toBe('2026-10-18T10:00:59Z');
  });

  it('parses only the canonical timestamp form', () => {
    expect(parseTimestamp('2026-10-18T10:00:00Z')).toBe(T);
    expect(() => parseTimestamp('2026-10-18T10:00:00.000Z')).toThrow('Invalid timestamp');
    expect(() => parseTimestamp('2026-10-18 10:00:00')).toThrow('Invalid timestamp');
    expect(() => parseTimestamp('2026-13-45T10:00:00Z')).toThrow('Invalid timestamp');
  });

  it('truncates to UTC hour and day boundaries', () => {
    const at = T + 25 * 60 + 7;
    expect(utcHourStart(at)).toBe(T);
    expect(utcDayStart(at)).toBe(1_792_281_600);
    expect(utcDateKey(at)).toBe('2026-10-18');
  });

  it('keys the last second of a day to that day', () => {
    expect(utcDateKey(1_792_281_600 - 1)).toBe('2026-10-17');
  });
});
