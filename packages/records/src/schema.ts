import { z } from 'zod';

import { TIMESTAMP_PATTERN } from './time';

export const checkStatusSchema = z.enum(['up', 'degraded', 'down']);
export type CheckStatus = z.infer<typeof checkStatusSchema>;

export const bucketStatusSchema = z.enum(['up', 'degraded', 'down', 'nodata']);
export type BucketStatus = z.infer<typeof bucketStatusSchema>;

export const cyclePhaseSchema = z.enum(['start', 'verify']);
export type CyclePhase = z.infer<typeof cyclePhaseSchema>;

export const timestampSchema = z
  .string()
  .regex(TIMESTAMP_PATTERN, 'timestamp must be UTC YYYY-MM-DDTHH:MM:SSZ');

export const checkIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'id must be lowercase letters, digits, "-" or "_"');

// One line of a day partition.
export const checkResultSchema = z.object({
  check_id: checkIdSchema,
  timestamp: timestampSchema,
  status: checkStatusSchema,
  // -1 means "not measured" (transport failure, fail-fast).
  response_time_ms: z.number().int().min(-1),
  message: z.string().optional(),

  // Two-phase checks only.
  pending_token: z.string().min(1).optional(),
  cycle_phase: cyclePhaseSchema.optional(),
  pending_deadline: timestampSchema.optional(),
  pending_context: z.record(z.string()).optional(),
});
export type CheckResult = z.infer<typeof checkResultSchema>;

export const transitionKindSchema = z.enum(['incident', 'recovered']);
export type TransitionKind = z.infer<typeof transitionKindSchema>;

export const transitionEventSchema = z.object({
  kind: transitionKindSchema,
  // Deduplication key for the notifier; stable across redeliveries.
  key: z.string().min(1),
  previous_status: checkStatusSchema,
  status: checkStatusSchema,
  affected_checks: z.array(checkIdSchema),
  timestamp: timestampSchema,
});
export type TransitionEvent = z.infer<typeof transitionEventSchema>;

export const transitionStateSchema = z.object({
  overall: checkStatusSchema,
  checks: z.record(bucketStatusSchema),
  updated_at: timestampSchema,
  // Events written together with the state and not yet confirmed as delivered, oldest first.
  outbox: z.array(transitionEventSchema),
});
export type TransitionState = z.infer<typeof transitionStateSchema>;
