import {
  formatTimestamp,
  parseTimestamp,
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  utcDateKey,
  utcDayStart,
  utcHourStart,
  type BucketStatus,
  type CheckResult,
} from '@pulsewatch/records';

import type { CheckDefinition } from '../schemas/checks';
import type { ResultReader } from '../store/results';
import { writeFileAtomic } from '../store/atomic';
import { avg, percentileFromValues } from './latency';
import { classifyBucket, classifyStatuses, countStatuses, isSample, uptimePct, worstOf } from './uptime';

export type BucketStats = {
  status: BucketStatus;
  // Omitted when the bucket has no samples.
  uptime_pct?: number;
  avg_response_ms: number | null;
  p95_response_ms: number | null;
  sample_count: number;
  down_count: number;
};

export type HourlyBucket = BucketStats & {
  // UTC hour start, `YYYY-MM-DDTHH:00:00Z`
  hour: string;
};

export type DailySummary = BucketStats & {
  date: string;
  // Hours with at least one sample.
  hours: HourlyBucket[];
};

export type CheckSummary = {
  id: string;
  name: string;
  type: CheckDefinition['type'];
  description: string;
  note: string;
  depends_on: string | null;
  uptime_pct?: number;
  days: DailySummary[];
  current_status: BucketStatus;
  latest_timestamp: string | null;
  latest_response_ms: number;
  latest_message: string;
};

export type OverallDay = {
  date: string;
  status: BucketStatus;
};

export type StatusSummary = {
  site_title: string;
  generated_at: string;
  retention_days: number;
  current_overall: string;
  current_overall_status: BucketStatus;
  last_checked: string | null;
  dates: string[];
  overall_days: OverallDay[];
  checks: CheckSummary[];
};

export const OVERALL_LABELS: Record<BucketStatus, string> = {
  up: 'All Components Operational',
  degraded: 'Degraded Performance',
  down: 'Partial Outage',
  nodata: 'No Data',
};

export type SummaryWindow = {
  fromSec: number;
  toSec: number;
  dayStarts: number[];
};

/** `retentionDays` whole UTC days ending with the day containing `now`. */
export function retentionWindow(now: number, retentionDays: number): SummaryWindow {
  const today = utcDayStart(now);
  const days = Math.max(1, Math.floor(retentionDays));
  const dayStarts: number[] = [];
  for (let i = days - 1; i >= 0; i--) {
    dayStarts.push(today - i * SECONDS_PER_DAY);
  }
  return { fromSec: today - (days - 1) * SECONDS_PER_DAY, toSec: today + SECONDS_PER_DAY, dayStarts };
}

function stats(samples: readonly CheckResult[], status?: BucketStatus): BucketStats {
  const counts = countStatuses(samples.map((s) => s.status));
  const latencies = samples.map((s) => s.response_time_ms);
  const out: BucketStats = {
    status: status ?? classifyBucket(counts),
    avg_response_ms: avg(latencies),
    p95_response_ms: percentileFromValues(latencies, 0.95),
    sample_count: counts.total,
    down_count: counts.down,
  };
  const pct = uptimePct(counts);
  if (pct !== undefined) out.uptime_pct = pct;
  return out;
}

function groupBy<K>(samples: readonly CheckResult[], keyOf: (at: number) => K): Map<K, CheckResult[]> {
  const out = new Map<K, CheckResult[]>();
  for (const s of samples) {
    const key = keyOf(parseTimestamp(s.timestamp));
    const list = out.get(key);
    if (list) list.push(s);
    else out.set(key, [s]);
  }
  return out;
}

/** Day status is classified from its hourly statuses; uptime and latency come from raw samples. */
export function summarizeDay(dayStart: number, samples: readonly CheckResult[]): DailySummary {
  const byHour = groupBy(samples, utcHourStart);
  const hours: HourlyBucket[] = [];
  for (let h = dayStart; h < dayStart + SECONDS_PER_DAY; h += SECONDS_PER_HOUR) {
    const hourSamples = byHour.get(h);
    if (!hourSamples) continue;
    hours.push({ hour: formatTimestamp(h), ...stats(hourSamples) });
  }

  const status = classifyStatuses(hours.map((h) => h.status));
  return { date: utcDateKey(dayStart), ...stats(samples, status), hours };
}

function summarizeCheck(
  definition: CheckDefinition,
  records: readonly CheckResult[],
  window: SummaryWindow,
): CheckSummary {
  const samples = records.filter((r) => {
    if (!isSample(r)) return false;
    const at = parseTimestamp(r.timestamp);
    return at >= window.fromSec && at < window.toSec;
  });
  const byDay = groupBy(samples, utcDayStart);
  const days = window.dayStarts.map((d) => summarizeDay(d, byDay.get(d) ?? []));

  const latest = samples.length > 0 ? samples[samples.length - 1] : undefined;
  const summary: CheckSummary = {
    id: definition.id,
    name: definition.name,
    type: definition.type,
    description: definition.description,
    note: definition.note ?? '',
    depends_on: definition.depends_on ?? null,
    days,
    current_status: latest?.status ?? 'nodata',
    latest_timestamp: latest?.timestamp ?? null,
    latest_response_ms: latest?.response_time_ms ?? -1,
    latest_message: latest?.message ?? '',
  };
  const pct = uptimePct(countStatuses(samples.map((s) => s.status)));
  if (pct !== undefined) summary.uptime_pct = pct;
  return summary;
}

export type SummaryInput = {
  checks: readonly CheckDefinition[];
  // Records per check id, oldest first.
  records: ReadonlyMap<string, readonly CheckResult[]>;
  now: number;
  retentionDays: number;
  siteTitle: string;
};

export function buildStatusSummary(input: SummaryInput): StatusSummary {
  const window = retentionWindow(input.now, input.retentionDays);
  const checks = input.checks.map((def) => summarizeCheck(def, input.records.get(def.id) ?? [], window));

  const overall_days = window.dayStarts.map((d, i) => ({
    date: utcDateKey(d),
    status: worstOf(checks.map((c) => c.days[i]?.status ?? 'nodata')),
  }));

  const currentStatus = worstOf(checks.map((c) => c.current_status));

  let lastChecked: string | null = null;
  for (const list of input.records.values()) {
    for (const r of list) {
      if (lastChecked === null || r.timestamp > lastChecked) lastChecked = r.timestamp;
    }
  }

  return {
    site_title: input.siteTitle,
    generated_at: formatTimestamp(input.now),
    retention_days: window.dayStarts.length,
    current_overall: OVERALL_LABELS[currentStatus],
    current_overall_status: currentStatus,
    last_checked: lastChecked,
    dates: window.dayStarts.map(utcDateKey),
    overall_days,
    checks,
  };
}

/** Reads the retention window of every check from the store. Always a full recompute. */
export async function loadWindowRecords(
  store: ResultReader,
  checks: readonly CheckDefinition[],
  now: number,
  retentionDays: number,
): Promise<Map<string, CheckResult[]>> {
  const window = retentionWindow(now, retentionDays);
  const out = new Map<string, CheckResult[]>();
  for (const def of checks) {
    out.set(def.id, await store.readRange(def.id, window.fromSec, window.toSec));
  }
  return out;
}

export async function writeStatusSummary(file: string, summary: StatusSummary): Promise<void> {
  await writeFileAtomic(file, JSON.stringify(summary));
}
