import { checkIdSchema } from '@pulsewatch/records';
import { z } from 'zod';

import { validateHttpTarget } from '../monitor/targets';

const httpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']);
const statusCodeSchema = z.number().int().min(100).max(599);
const envNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an environment variable name');
const timeoutSchema = z.number().int().min(100).max(120_000);

const urlSchema = z.string().superRefine((val, ctx) => {
  const err = validateHttpTarget(val);
  if (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `url ${err}` });
  }
});

export const httpParamsSchema = z
  .object({
    url: urlSchema,
    method: httpMethodSchema.default('GET'),
    headers: z.record(z.string()).optional(),
    body: z.string().optional(),
    // A single code or a list; any 2xx when omitted.
    expected_status: z
      .union([statusCodeSchema, z.array(statusCodeSchema).min(1)])
      .transform((v) => (Array.isArray(v) ? v : [v]))
      .optional(),
    expected_body: z.string().min(1).optional(),
    api_key_env: envNameSchema.optional(),
    timeout_ms: timeoutSchema.optional(),
    retries: z.number().int().min(0).max(2).default(0),
  })
  .strict()
  .superRefine((val, ctx) => {
    if (val.body !== undefined && (val.method === 'GET' || val.method === 'HEAD')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['body'],
        message: `body is not allowed for ${val.method} requests`,
      });
    }
  });
export type HttpParams = z.infer<typeof httpParamsSchema>;

export const retrieveParamsSchema = z
  .object({
    base_url: urlSchema,
    dataset_id_env: envNameSchema,
    api_key_env: envNameSchema,
    query: z.string().min(1).default('test'),
    // Dotted path that must be present in the JSON response; its value is not inspected.
    expected_field: z.string().min(1).default('records'),
    // Strings may reference {{query}}.
    payload_template: z.unknown().optional(),
    timeout_ms: timeoutSchema.optional(),
  })
  .strict();
export type RetrieveParams = z.infer<typeof retrieveParamsSchema>;

export const knowledgeParamsSchema = z
  .object({
    base_url: urlSchema,
    dataset_id_env: envNameSchema,
    api_key_env: envNameSchema,
    document_text: z.string().min(1).default('ping'),
    verify_after_minutes: z.number().int().min(0).max(1440).default(0),
    timeout_ms: timeoutSchema.optional(),
  })
  .strict();
export type KnowledgeParams = z.infer<typeof knowledgeParamsSchema>;

export const webhookParamsSchema = z
  .object({
    trigger_url: urlSchema,
    // Appended to trigger_url as the last path segment when set.
    trigger_token_env: envNameSchema.optional(),
    base_url: urlSchema,
    api_key_env: envNameSchema,
    verify_after_minutes: z.number().int().min(0).max(1440).default(0),
    timeout_ms: timeoutSchema.optional(),
  })
  .strict();
export type WebhookParams = z.infer<typeof webhookParamsSchema>;

const baseFields = {
  id: checkIdSchema,
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500).default(''),
  note: z.string().max(500).optional(),
  depends_on: checkIdSchema.optional(),
};

export const checkDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ ...baseFields, type: z.literal('http'), params: httpParamsSchema }).strict(),
  z.object({ ...baseFields, type: z.literal('retrieve'), params: retrieveParamsSchema }).strict(),
  z.object({ ...baseFields, type: z.literal('knowledge'), params: knowledgeParamsSchema }).strict(),
  z.object({ ...baseFields, type: z.literal('webhook'), params: webhookParamsSchema }).strict(),
]);

export type CheckDefinition = z.infer<typeof checkDefinitionSchema>;
export type CheckType = CheckDefinition['type'];
export type CheckDefinitionOf<T extends CheckType> = Extract<CheckDefinition, { type: T }>;

export const TWO_PHASE_TYPES = ['knowledge', 'webhook'] as const satisfies readonly CheckType[];

export function isTwoPhase(def: CheckDefinition): boolean {
  return TWO_PHASE_TYPES.some((t) => t === def.type);
}

export const checkListSchema = z
  .array(checkDefinitionSchema)
  .min(1)
  .superRefine((checks, ctx) => {
    const seen = new Set<string>();
    for (let i = 0; i < checks.length; i += 1) {
      const id = checks[i]?.id;
      if (id === undefined) continue;
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'id'],
          message: `Duplicate check id: ${id}`,
        });
      }
      seen.add(id);
    }
  });
