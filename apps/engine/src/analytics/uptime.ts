import type { BucketStatus, CheckResult, CheckStatus } from '@pulsewatch/records';

export type BucketCounts = {
  total: number;
  down: number;
  degraded: number;
};

const SEVERITY: Record<BucketStatus, number> = {
  nodata: 0,
  up: 1,
  degraded: 2,
  down: 3,
};

/** `start` bookkeeping records that succeeded are not availability samples. */
export function isSample(record: CheckResult): boolean {
  return !(record.cycle_phase === 'start' && record.status === 'up');
}

export function countStatuses(statuses: readonly CheckStatus[]): BucketCounts {
  const counts: BucketCounts = { total: 0, down: 0, degraded: 0 };
  for (const s of statuses) {
    counts.total += 1;
    if (s === 'down') counts.down += 1;
    else if (s === 'degraded') counts.degraded += 1;
  }
  return counts;
}

export function classifyBucket(counts: BucketCounts): BucketStatus {
  if (counts.total <= 0) return 'nodata';
  if (counts.down === 0) return counts.degraded > 0 ? 'degraded' : 'up';
  if (counts.down / counts.total >= 0.5) return 'down';
  return 'degraded';
}

/** Classification of already-bucketed statuses; `nodata` entries do not vote. */
export function classifyStatuses(statuses: readonly BucketStatus[]): BucketStatus {
  const definite: CheckStatus[] = [];
  for (const s of statuses) {
    if (s !== 'nodata') definite.push(s);
  }
  return classifyBucket(countStatuses(definite));
}

/** Percentage rounded to one decimal; undefined when there are no samples. */
export function uptimePct(counts: BucketCounts): number | undefined {
  if (counts.total <= 0) return undefined;
  const pct = ((counts.total - counts.down) / counts.total) * 100;
  return Math.round(pct * 10) / 10;
}

/** Worst status by `down > degraded > up > nodata`; `nodata` only when nothing else is present. */
export function worstOf(statuses: readonly BucketStatus[]): BucketStatus {
  let worst: BucketStatus = 'nodata';
  for (const s of statuses) {
    if (SEVERITY[s] > SEVERITY[worst]) worst = s;
  }
  return worst;
}
