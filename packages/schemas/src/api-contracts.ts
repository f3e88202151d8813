import {z} from 'zod'

const NonEmptyStringSchema = z.string().trim().min(1)

export const ContextPathSchema = z
  .string()
  .trim()
  .min(1)
  .refine(value => value.startsWith('/'), {message: 'context_path must start with "/"'})
  .refine(value => !/[?#\s]/u.test(value), {message: 'context_path must not contain query, fragment or whitespace'})

export const VirtualHostSchema = z
  .string()
  .trim()
  .min(1)
  .max(253)
  .refine(value => !/:\d*$/u.test(value), {message: 'virtual_host must not include a port'})
  .transform(value => value.toLowerCase())

export const DeployableApiSchema = z.object({
  id: NonEmptyStringSchema,
  enabled: z.boolean().default(true),
  context_path: ContextPathSchema,
  virtual_host: VirtualHostSchema.optional()
})

export const ApiDefinitionSchema = DeployableApiSchema.extend({
  name: NonEmptyStringSchema.optional(),
  endpoint: z
    .string()
    .trim()
    .url()
    .refine(value => value.startsWith('http://') || value.startsWith('https://'), {
      message: 'endpoint must use http or https'
    }),
  strip_context_path: z.boolean().default(true)
}).strict()

export const ApiDefinitionListSchema = z.array(ApiDefinitionSchema).superRefine((apis, context) => {
  const seen = new Set<string>()
  for (const [index, api] of apis.entries()) {
    if (seen.has(api.id)) {
      context.addIssue({
        code: 'custom',
        message: `Duplicate API id ${api.id}`,
        path: [index, 'id']
      })
    }
    seen.add(api.id)
  }
})

export const DeploymentEventTypeSchema = z.enum(['deploy', 'update', 'undeploy', 'start', 'stop'])

export const DeploymentEventSchema = z
  .object({
    type: DeploymentEventTypeSchema,
    api: ApiDefinitionSchema
  })
  .strict()

export type DeployableApi = z.infer<typeof DeployableApiSchema>
export type ApiDefinition = z.infer<typeof ApiDefinitionSchema>
export type DeploymentEventType = z.infer<typeof DeploymentEventTypeSchema>
export type DeploymentEventContract = z.infer<typeof DeploymentEventSchema>
