import type { TransitionEvent } from '@pulsewatch/records';

import type { Logger } from '../logger';
import { formatTransitionMessage } from './message';

export interface Notifier {
  /**
   * Delivers one event. May be called more than once for the same `event.key`;
   * implementations deduplicate on it.
   */
  notify(event: TransitionEvent): Promise<void>;
}

/** Default notifier: writes the rendered message to the log. Real delivery is external. */
export class LogNotifier implements Notifier {
  constructor(
    private readonly logger: Logger,
    private readonly names: ReadonlyMap<string, string> = new Map(),
  ) {}

  async notify(event: TransitionEvent): Promise<void> {
    this.logger.info(
      { event_key: event.key, kind: event.kind, message: formatTransitionMessage(event, this.names) },
      'notify: transition',
    );
  }
}
