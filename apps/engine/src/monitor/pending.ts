import {
  formatTimestamp,
  parseTimestamp,
  type CheckResult,
  type CheckStatus,
} from '@pulsewatch/records';

import type { ResultReader } from '../store/results';
import type { PendingEntry } from './types';

export type VerifyObservation = {
  state: 'completed' | 'failed' | 'in_progress';
  message: string;
};

export type VerifyDecision =
  | { action: 'resolve'; status: CheckStatus; responseTimeMs: number; message: string }
  | { action: 'wait' };

/**
 * Most recent `start` record whose token has no later `verify` record.
 * Records must be sorted by timestamp.
 */
export function pendingEntryFromRecords(records: readonly CheckResult[]): PendingEntry | null {
  const open = new Map<string, CheckResult>();

  for (const r of records) {
    if (r.pending_token === undefined) continue;
    if (r.cycle_phase === 'start') {
      open.set(r.pending_token, r);
    } else if (r.cycle_phase === 'verify') {
      open.delete(r.pending_token);
    }
  }

  let latest: CheckResult | null = null;
  for (const r of open.values()) {
    if (latest === null || r.timestamp >= latest.timestamp) latest = r;
  }
  if (latest === null || latest.pending_token === undefined) return null;

  const created_at = parseTimestamp(latest.timestamp);
  return {
    check_id: latest.check_id,
    token: latest.pending_token,
    created_at,
    deadline: latest.pending_deadline ? parseTimestamp(latest.pending_deadline) : created_at,
    context: latest.pending_context ?? {},
  };
}

export async function findPendingEntry(
  store: ResultReader,
  checkId: string,
  now: number,
  lookbackSec: number,
): Promise<PendingEntry | null> {
  const records = await store.readRange(checkId, now - lookbackSec, now + 1);
  return pendingEntryFromRecords(records);
}

export function decideVerify(
  entry: PendingEntry,
  observation: VerifyObservation,
  now: number,
): VerifyDecision {
  switch (observation.state) {
    case 'completed':
      return {
        action: 'resolve',
        status: 'up',
        responseTimeMs: Math.max(0, now - entry.created_at) * 1000,
        message: observation.message,
      };
    case 'failed':
      return { action: 'resolve', status: 'down', responseTimeMs: -1, message: observation.message };
    case 'in_progress':
      if (now < entry.deadline) return { action: 'wait' };
      return {
        action: 'resolve',
        status: 'down',
        responseTimeMs: -1,
        message: `Not completed before deadline ${formatTimestamp(entry.deadline)} (${observation.message})`,
      };
  }
}

export function isVerifyDue(entry: PendingEntry, now: number, verifyAfterMinutes: number): boolean {
  return now - entry.created_at >= verifyAfterMinutes * 60;
}
