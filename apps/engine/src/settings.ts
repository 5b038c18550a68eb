// Engine settings: the `settings` block of the config file with defaults applied.
//
// - Paths are absolute after resolution.
// - Timeouts are milliseconds, intervals minutes, retention days.

import path from 'node:path';

import type { SettingsInput } from './schemas/settings';

export type EngineSettings = {
  site_title: string;

  data_dir: string;
  summary_path: string;
  state_path: string;

  retention_days: number;

  interval_minutes: number;
  pending_deadline_multiplier: number;

  request_timeout_ms: number;
  check_timeout_ms: number;
  concurrency: number;
};

export const DEFAULT_SETTINGS: EngineSettings = {
  site_title: 'Status',

  data_dir: 'data',
  summary_path: 'site/data/summary.json',
  state_path: 'data/.transition_state.json',

  retention_days: 90,

  interval_minutes: 15,
  pending_deadline_multiplier: 3,

  request_timeout_ms: 30_000,
  check_timeout_ms: 60_000,
  concurrency: 8,
};

export function resolveSettings(input: SettingsInput, baseDir: string): EngineSettings {
  const resolvePath = (p: string) => path.resolve(baseDir, p);

  return {
    site_title: input.site_title ?? DEFAULT_SETTINGS.site_title,

    data_dir: resolvePath(input.data_dir ?? DEFAULT_SETTINGS.data_dir),
    summary_path: resolvePath(input.summary_path ?? DEFAULT_SETTINGS.summary_path),
    state_path: resolvePath(input.state_path ?? DEFAULT_SETTINGS.state_path),

    retention_days: input.retention_days ?? DEFAULT_SETTINGS.retention_days,

    interval_minutes: input.interval_minutes ?? DEFAULT_SETTINGS.interval_minutes,
    pending_deadline_multiplier:
      input.pending_deadline_multiplier ?? DEFAULT_SETTINGS.pending_deadline_multiplier,

    request_timeout_ms: input.request_timeout_ms ?? DEFAULT_SETTINGS.request_timeout_ms,
    check_timeout_ms: input.check_timeout_ms ?? DEFAULT_SETTINGS.check_timeout_ms,
    concurrency: input.concurrency ?? DEFAULT_SETTINGS.concurrency,
  };
}

/** How long a two-phase claim may stay unresolved before it counts as failed. */
export function pendingDeadlineSeconds(settings: EngineSettings): number {
  return settings.interval_minutes * 60 * settings.pending_deadline_multiplier;
}

/** How far back the correlator scans for unresolved claims. */
export function pendingLookbackSeconds(settings: EngineSettings): number {
  // One extra day so a claim created just before midnight is still in range.
  return pendingDeadlineSeconds(settings) + 86_400;
}
