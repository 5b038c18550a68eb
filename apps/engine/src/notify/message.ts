import type { TransitionEvent } from '@pulsewatch/records';

/** `2026-10-18T10:00:00Z` -> `2026-10-18 10:00:00 UTC` */
export function formatEventTime(timestamp: string): string {
  return `${timestamp.slice(0, 10)} ${timestamp.slice(11, 19)} UTC`;
}

/** Markdown body for a transition event; check ids are shown by name when known. */
export function formatTransitionMessage(
  event: TransitionEvent,
  names: ReadonlyMap<string, string> = new Map(),
): string {
  const time = formatEventTime(event.timestamp);
  const header =
    event.kind === 'incident'
      ? `🔴 **Incident detected** — ${time}`
      : `🟢 **Recovered** — ${time}`;

  const bullets = event.affected_checks.map((id) => `- **${names.get(id) ?? id}**`);
  if (event.kind === 'incident') {
    bullets.push('', `Overall status: ${event.status}`);
  }

  return bullets.length > 0 ? [header, '', ...bullets].join('\n') : header;
}
