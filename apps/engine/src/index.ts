export { buildStatusSummary, loadWindowRecords, writeStatusSummary } from './analytics/summary';
export type { CheckSummary, DailySummary, HourlyBucket, StatusSummary } from './analytics/summary';
export { classifyBucket, uptimePct, worstOf } from './analytics/uptime';
export { loadConfig, parseConfig } from './config';
export type { EngineConfig } from './config';
export * from './errors';
export { createLogger } from './logger';
export type { Logger } from './logger';
export { executeCheck } from './monitor/registry';
export type { CheckExecutor, ExecutionContext, PendingEntry } from './monitor/types';
export { deliverOutbox } from './notify/deliver';
export { formatTransitionMessage } from './notify/message';
export { LogNotifier } from './notify/notifier';
export type { Notifier } from './notify/notifier';
export { detectTransition } from './notify/transitions';
export { runInvocation } from './scheduler/invocation';
export type { InvocationDeps, InvocationReport } from './scheduler/invocation';
export { buildExecutionLevels } from './scheduler/plan';
export { runChecks } from './scheduler/run-checks';
export type { CheckDefinition, CheckType } from './schemas/checks';
export { FileResultStore } from './store/results';
export type { ResultReader, ResultStore } from './store/results';
export { FileTransitionStateStore } from './store/transition-state';
export type { TransitionStateStore } from './store/transition-state';
