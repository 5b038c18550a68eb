import { formatTimestamp, type CheckResult } from '@pulsewatch/records';

import { toErrorMessage } from '../errors';
import { decideVerify, isVerifyDue, type VerifyObservation } from './pending';
import { buildResult, dependencyFailedResult } from './result';
import type { ExecutionContext, PendingEntry } from './types';

export type StartOutcome =
  | {
      ok: true;
      token: string;
      context: Record<string, string>;
      responseTimeMs: number;
      message: string;
    }
  | { ok: false; responseTimeMs: number; message: string };

export type TwoPhaseHandlers = {
  verifyAfterMinutes: number;
  start(): Promise<StartOutcome>;
  verify(entry: PendingEntry): Promise<VerifyObservation>;
  // Called once an entry is resolved, e.g. to delete the uploaded probe document.
  cleanup?(entry: PendingEntry): Promise<void>;
};

/**
 * One invocation of a two-phase check:
 *
 *   pending entry?  -> verify (unless too early)  -> resolved? -> start a new claim
 *                                                 -> waiting?  -> nothing this cycle
 *   no entry        -> start a new claim
 *
 * A new claim is never started while the previous one is unresolved.
 */
export async function runTwoPhase(
  checkId: string,
  ctx: ExecutionContext,
  handlers: TwoPhaseHandlers,
): Promise<CheckResult[]> {
  if (ctx.dependencyFailed) {
    return [dependencyFailedResult(checkId, ctx)];
  }

  const results: CheckResult[] = [];
  const entry = ctx.pending;

  if (entry) {
    if (!isVerifyDue(entry, ctx.clock(), handlers.verifyAfterMinutes)) {
      return [];
    }

    let observation: VerifyObservation;
    try {
      observation = await handlers.verify(entry);
    } catch (err) {
      observation = { state: 'failed', message: `Verify failed: ${toErrorMessage(err)}` };
    }

    const decision = decideVerify(entry, observation, ctx.clock());
    if (decision.action === 'wait') {
      ctx.logger.debug({ check_id: checkId, token: entry.token }, 'two-phase: still pending');
      return [];
    }

    const verified = buildResult(
      checkId,
      ctx,
      { status: decision.status, responseTimeMs: decision.responseTimeMs, message: decision.message },
      { pending_token: entry.token, cycle_phase: 'verify' },
    );
    // The claim is closed in the store before anything else can stall this check.
    await ctx.persist(verified);
    results.push(verified);

    if (handlers.cleanup) {
      try {
        await handlers.cleanup(entry);
      } catch (err) {
        ctx.logger.warn(
          { check_id: checkId, token: entry.token, err: toErrorMessage(err) },
          'two-phase: cleanup failed',
        );
      }
    }
  }

  let started: StartOutcome;
  try {
    started = await handlers.start();
  } catch (err) {
    started = { ok: false, responseTimeMs: -1, message: `Start failed: ${toErrorMessage(err)}` };
  }

  if (started.ok) {
    const deadline = ctx.clock() + ctx.pendingDeadlineSec;
    results.push(
      buildResult(
        checkId,
        ctx,
        { status: 'up', responseTimeMs: started.responseTimeMs, message: started.message },
        {
          pending_token: started.token,
          cycle_phase: 'start',
          pending_deadline: formatTimestamp(deadline),
          pending_context: started.context,
        },
      ),
    );
  } else {
    results.push(
      buildResult(
        checkId,
        ctx,
        { status: 'down', responseTimeMs: started.responseTimeMs, message: started.message },
        { cycle_phase: 'start' },
      ),
    );
  }

  return results;
}
