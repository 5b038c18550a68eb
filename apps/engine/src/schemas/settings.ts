import { z } from 'zod';

export const settingsInputSchema = z
  .object({
    site_title: z.string().min(1).max(100).optional(),

    // Relative paths resolve against the config file's directory.
    data_dir: z.string().min(1).optional(),
    summary_path: z.string().min(1).optional(),
    state_path: z.string().min(1).optional(),

    retention_days: z.number().int().min(1).max(365).optional(),

    // Cadence of the external trigger; used to size pending deadlines.
    interval_minutes: z.number().int().min(1).max(1440).optional(),
    pending_deadline_multiplier: z.number().int().min(1).max(10).optional(),

    request_timeout_ms: z.number().int().min(100).max(120_000).optional(),
    check_timeout_ms: z.number().int().min(100).max(600_000).optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
  })
  .strict();

export type SettingsInput = z.infer<typeof settingsInputSchema>;
