import type { CheckResult, CheckStatus } from '@pulsewatch/records';

import type { Logger } from '../logger';
import type { CheckDefinitionOf, CheckType } from '../schemas/checks';

export type PendingEntry = {
  check_id: string;
  token: string;
  // unix seconds
  created_at: number;
  deadline: number;
  context: Record<string, string>;
};

export type ExecutionContext = {
  // Current time in unix seconds; read when a record is produced.
  clock: () => number;
  signal: AbortSignal;
  dependencyFailed: boolean;
  dependsOn: string | null;
  requestTimeoutMs: number;
  env: Readonly<Record<string, string | undefined>>;
  // Outstanding claim for two-phase checks; always null for single-phase checks.
  pending: PendingEntry | null;
  pendingDeadlineSec: number;
  // Appends a record right away. The executor still returns it; it is not appended twice.
  persist: (record: CheckResult) => Promise<void>;
  logger: Logger;
};

export type CheckExecutor<T extends CheckType> = (
  definition: CheckDefinitionOf<T>,
  context: ExecutionContext,
) => Promise<CheckResult[]>;

export type ProbeOutcome = {
  status: CheckStatus;
  // -1 when not measured.
  responseTimeMs: number;
  message: string;
};
