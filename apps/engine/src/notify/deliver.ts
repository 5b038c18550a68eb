import type { TransitionState } from '@pulsewatch/records';

import { toErrorMessage } from '../errors';
import type { Logger } from '../logger';
import type { TransitionStateStore } from '../store/transition-state';
import type { Notifier } from './notifier';

export type DeliveryReport = {
  delivered: string[];
  failed: string[];
  state: TransitionState;
};

/**
 * Hands every outbox event to the notifier, oldest first, and persists the outbox
 * without the delivered ones. Failed events stay queued for the next invocation.
 */
export async function deliverOutbox(
  state: TransitionState,
  deps: { notifier: Notifier; stateStore: TransitionStateStore; logger: Logger },
): Promise<DeliveryReport> {
  const delivered: string[] = [];
  const failed: string[] = [];
  const remaining: TransitionState['outbox'] = [];

  for (const event of state.outbox) {
    try {
      await deps.notifier.notify(event);
      delivered.push(event.key);
    } catch (err) {
      deps.logger.error({ event_key: event.key, err: toErrorMessage(err) }, 'notify: delivery failed');
      failed.push(event.key);
      remaining.push(event);
    }
  }

  if (delivered.length === 0) {
    return { delivered, failed, state };
  }

  const next: TransitionState = { ...state, outbox: remaining };
  await deps.stateStore.write(next);
  return { delivered, failed, state: next };
}
