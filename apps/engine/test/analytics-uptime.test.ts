import { describe, expect, it } from 'vitest';

import type { BucketStatus } from '@pulsewatch/records';

import {
  classifyBucket,
  classifyStatuses,
  countStatuses,
  isSample,
  uptimePct,
  worstOf,
} from '../src/analytics/uptime';
import { T0, buildRecord } from './helpers/data-builders';

const RANK: Record<BucketStatus, number> = { nodata: -1, up: 0, degraded: 1, down: 2 };

describe('analytics/uptime', () => {
  it('classifies buckets by down ratio', () => {
    expect(classifyBucket({ total: 0, down: 0, degraded: 0 })).toBe('nodata');
    expect(classifyBucket({ total: 4, down: 0, degraded: 0 })).toBe('up');
    expect(classifyBucket({ total: 4, down: 0, degraded: 1 })).toBe('degraded');
    expect(classifyBucket({ total: 4, down: 1, degraded: 0 })).toBe('degraded');
    expect(classifyBucket({ total: 4, down: 2, degraded: 0 })).toBe('down');
    expect(classifyBucket({ total: 3, down: 3, degraded: 0 })).toBe('down');
  });

  it('never improves the classification as down samples increase', () => {
    for (let total = 1; total <= 12; total++) {
      let previous = RANK.up;
      for (let down = 0; down <= total; down++) {
        const rank = RANK[classifyBucket({ total, down, degraded: 0 })];
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    }
  });

  it('computes uptime to one decimal and omits it without samples', () => {
    expect(uptimePct({ total: 0, down: 0, degraded: 0 })).toBeUndefined();
    expect(uptimePct({ total: 24, down: 1, degraded: 0 })).toBe(95.8);
    expect(uptimePct({ total: 3, down: 1, degraded: 1 })).toBe(66.7);
    expect(uptimePct({ total: 5, down: 5, degraded: 0 })).toBe(0);

    for (let total = 1; total <= 10; total++) {
      for (let down = 0; down <= total; down++) {
        const pct = uptimePct({ total, down, degraded: 0 });
        expect(pct).toBeGreaterThanOrEqual(0);
        expect(pct).toBeLessThanOrEqual(100);
      }
    }
  });

  it('counts statuses', () => {
    expect(countStatuses(['up', 'down', 'degraded', 'down'])).toEqual({ total: 4, down: 2, degraded: 1 });
  });

  it('rolls up bucket statuses ignoring nodata', () => {
    const hours: BucketStatus[] = [...Array<BucketStatus>(23).fill('up'), 'down'];
    expect(classifyStatuses(hours)).toBe('degraded');
    expect(classifyStatuses(['nodata', 'nodata'])).toBe('nodata');
    expect(classifyStatuses(['nodata', 'down'])).toBe('down');
  });

  it('takes the worst status and ignores nodata unless nothing else exists', () => {
    expect(worstOf(['up', 'degraded', 'nodata'])).toBe('degraded');
    expect(worstOf(['up', 'down', 'degraded'])).toBe('down');
    expect(worstOf(['nodata', 'up'])).toBe('up');
    expect(worstOf(['nodata', 'nodata'])).toBe('nodata');
    expect(worstOf([])).toBe('nodata');
  });

  it('excludes successful start records from samples', () => {
    expect(isSample(buildRecord('kb', T0, 'up', { cycle_phase: 'start', pending_token: 'a' }))).toBe(false);
    expect(isSample(buildRecord('kb', T0, 'down', { cycle_phase: 'start' }))).toBe(true);
    expect(isSample(buildRecord('kb', T0, 'up', { cycle_phase: 'verify', pending_token: 'a' }))).toBe(true);
    expect(isSample(buildRecord('api', T0, 'up'))).toBe(true);
  });
});
