import {z} from 'zod'

const NonEmptyStringSchema = z.string().min(1)

export const LogEventSchema = z
  .object({
    ts: z.string().datetime({offset: true}),
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
    service: NonEmptyStringSchema,
    env: NonEmptyStringSchema,
    event: NonEmptyStringSchema,
    component: NonEmptyStringSchema,
    message: NonEmptyStringSchema.optional(),
    correlation_id: NonEmptyStringSchema.max(128),
    request_id: NonEmptyStringSchema.max(128),
    api_id: NonEmptyStringSchema.optional(),
    context_path: NonEmptyStringSchema.optional(),
    reason_code: NonEmptyStringSchema.optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: NonEmptyStringSchema.optional(),
    method: NonEmptyStringSchema.optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict()

export const ErrorPayloadSchema = z
  .object({
    error: NonEmptyStringSchema,
    message: NonEmptyStringSchema,
    correlation_id: NonEmptyStringSchema
  })
  .strict()

export const AccessRecordSchema = z
  .object({
    request_id: NonEmptyStringSchema,
    method: NonEmptyStringSchema,
    path: z.string(),
    host: NonEmptyStringSchema.optional(),
    api_id: NonEmptyStringSchema.optional(),
    status_code: z.number().int().gte(100).lte(599),
    elapsed_ms: z.number().gte(0)
  })
  .strict()

export type LogEvent = z.infer<typeof LogEventSchema>
export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>
export type AccessRecord = z.infer<typeof AccessRecordSchema>
