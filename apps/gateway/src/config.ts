import {LogLevelSchema, type LogLevel} from '@gatehouse/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const INVALID_JSON = Symbol('invalid_json')

const optionalJson = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  try {
    return JSON.parse(trimmed) as unknown
  } catch {
    return INVALID_JSON
  }
}, z.unknown().optional())

const parseKeyList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    GATEWAY_HOST: z.string().default('0.0.0.0'),
    GATEWAY_PORT: numberFromEnv.default(8082),
    GATEWAY_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    GATEWAY_LOG_LEVEL: z.preprocess(
      value => (typeof value === 'string' && value.trim().length > 0 ? value.trim().toLowerCase() : undefined),
      LogLevelSchema.optional()
    ),
    GATEWAY_LOG_REDACT_EXTRA_KEYS: optionalString,
    GATEWAY_APIS_PATH: optionalString,
    GATEWAY_APIS_JSON: optionalJson,
    GATEWAY_APIS_RELOAD_INTERVAL_MS: z
      .preprocess(
        value => (typeof value === 'string' && value.trim().length > 0 ? Number.parseInt(value, 10) : value),
        z.number().int().gte(0)
      )
      .default(0),
    GATEWAY_UPSTREAM_TIMEOUT_MS: z
      .preprocess(
        value => (typeof value === 'string' && value.trim().length > 0 ? Number.parseInt(value, 10) : value),
        z.number().int().gte(100).lte(120_000)
      )
      .default(15_000)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  apis: {
    path?: string
    inline?: unknown
    reloadIntervalMs: number
  }
  upstream: {
    timeoutMs: number
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  GATEWAY_HOST: env.GATEWAY_HOST,
  GATEWAY_PORT: env.GATEWAY_PORT,
  GATEWAY_MAX_BODY_BYTES: env.GATEWAY_MAX_BODY_BYTES,
  GATEWAY_LOG_LEVEL: env.GATEWAY_LOG_LEVEL,
  GATEWAY_LOG_REDACT_EXTRA_KEYS: env.GATEWAY_LOG_REDACT_EXTRA_KEYS,
  GATEWAY_APIS_PATH: env.GATEWAY_APIS_PATH,
  GATEWAY_APIS_JSON: env.GATEWAY_APIS_JSON,
  GATEWAY_APIS_RELOAD_INTERVAL_MS: env.GATEWAY_APIS_RELOAD_INTERVAL_MS,
  GATEWAY_UPSTREAM_TIMEOUT_MS: env.GATEWAY_UPSTREAM_TIMEOUT_MS
})

const defaultLogLevel = (nodeEnv: ServiceConfig['nodeEnv']): LogLevel => {
  if (nodeEnv === 'test') {
    return 'silent'
  }

  return nodeEnv === 'production' ? 'info' : 'debug'
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))
  if (parsed.GATEWAY_APIS_JSON === INVALID_JSON) {
    throw new Error('GATEWAY_APIS_JSON must be valid JSON')
  }

  const apisPath = parsed.GATEWAY_APIS_PATH
  const inlineApis = parsed.GATEWAY_APIS_JSON
  if (parsed.NODE_ENV === 'production' && !apisPath && inlineApis === undefined) {
    throw new Error('Production requires GATEWAY_APIS_PATH or GATEWAY_APIS_JSON')
  }

  if (parsed.GATEWAY_APIS_RELOAD_INTERVAL_MS > 0 && !apisPath) {
    throw new Error('GATEWAY_APIS_RELOAD_INTERVAL_MS requires GATEWAY_APIS_PATH')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.GATEWAY_HOST,
    port: parsed.GATEWAY_PORT,
    maxBodyBytes: parsed.GATEWAY_MAX_BODY_BYTES,
    logging: {
      level: parsed.GATEWAY_LOG_LEVEL ?? defaultLogLevel(parsed.NODE_ENV),
      redactExtraKeys: parseKeyList(parsed.GATEWAY_LOG_REDACT_EXTRA_KEYS)
    },
    apis: {
      ...(apisPath ? {path: apisPath} : {}),
      ...(inlineApis !== undefined ? {inline: inlineApis} : {}),
      reloadIntervalMs: parsed.GATEWAY_APIS_RELOAD_INTERVAL_MS
    },
    upstream: {
      timeoutMs: parsed.GATEWAY_UPSTREAM_TIMEOUT_MS
    }
  }
}
