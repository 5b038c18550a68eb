import {
  formatTimestamp,
  type BucketStatus,
  type CheckStatus,
  type TransitionEvent,
  type TransitionKind,
  type TransitionState,
} from '@pulsewatch/records';

export type TransitionInput = {
  overall: BucketStatus;
  checks: Record<string, BucketStatus>;
  // unix seconds
  now: number;
};

export type TransitionOutcome = {
  event: TransitionEvent | null;
  // null when the persisted state stays as it is.
  next: TransitionState | null;
};

function isHealthy(status: CheckStatus): boolean {
  return status === 'up';
}

function isUnhealthy(status: BucketStatus | undefined): boolean {
  return status === 'down' || status === 'degraded';
}

export function eventKey(kind: TransitionKind, timestamp: string): string {
  return `${kind}:${timestamp}`;
}

function sameStatuses(a: Record<string, BucketStatus>, b: Record<string, BucketStatus>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((id) => a[id] === b[id]);
}

function affectedChecks(
  kind: TransitionKind,
  prev: TransitionState,
  current: Record<string, BucketStatus>,
): string[] {
  const ids = Object.keys(current).filter((id) => {
    if (kind === 'incident') return isUnhealthy(current[id]);
    return isUnhealthy(prev.checks[id]) && current[id] === 'up';
  });
  return ids.sort();
}

/**
 * Edge detector over the overall status. Fires `incident` when leaving `up` and
 * `recovered` when returning to it; down <-> degraded moves the state without an event.
 * `nodata` never replaces a known status, and the first observation only seeds the state.
 * Per-check statuses are kept current even while the overall status holds, so a later
 * `recovered` names the checks that were failing just before it.
 */
export function detectTransition(prev: TransitionState | null, input: TransitionInput): TransitionOutcome {
  const overall = input.overall;
  if (overall === 'nodata') {
    return { event: null, next: null };
  }

  const updated_at = formatTimestamp(input.now);

  if (!prev) {
    return {
      event: null,
      next: { overall, checks: { ...input.checks }, updated_at, outbox: [] },
    };
  }

  if (prev.overall === overall) {
    if (sameStatuses(prev.checks, input.checks)) return { event: null, next: null };
    return { event: null, next: { ...prev, checks: { ...input.checks }, updated_at, outbox: [...prev.outbox] } };
  }

  let kind: TransitionKind | null = null;
  if (isHealthy(prev.overall) && !isHealthy(overall)) kind = 'incident';
  else if (!isHealthy(prev.overall) && isHealthy(overall)) kind = 'recovered';

  const event: TransitionEvent | null =
    kind === null
      ? null
      : {
          kind,
          key: eventKey(kind, updated_at),
          previous_status: prev.overall,
          status: overall,
          affected_checks: affectedChecks(kind, prev, input.checks),
          timestamp: updated_at,
        };

  return {
    event,
    next: {
      overall,
      checks: { ...input.checks },
      updated_at,
      outbox: event ? [...prev.outbox, event] : [...prev.outbox],
    },
  };
}
