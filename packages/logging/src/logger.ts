import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@gatehouse/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {createRedactor, type Redactor} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = LogLevelSchema.exclude(['silent']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    api_id: z.string().min(1).optional(),
    context_path: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;
type LevelledInput = Omit<LogEventInput, 'level'>;
type ComponentInput = Omit<LogEventInput, 'level' | 'component'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Writable;
  stderr: Writable;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelledInput) => void;
  info: (input: LevelledInput) => void;
  warn: (input: LevelledInput) => void;
  error: (input: LevelledInput) => void;
  fatal: (input: LevelledInput) => void;
};

export type ComponentLogger = {
  readonly component: string;
  debug: (input: ComponentInput) => void;
  info: (input: ComponentInput) => void;
  warn: (input: ComponentInput) => void;
  error: (input: ComponentInput) => void;
  fatal: (input: ComponentInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const toMetadataRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? {...value} : {};

const buildEnvelope = ({
  input,
  service,
  env,
  now,
  redact,
  context
}: {
  input: LogEventInput;
  service: string;
  env: string;
  now: () => Date;
  redact: Redactor;
  context: LogContext | undefined;
}): LogEvent => {
  const apiId = input.api_id ?? context?.api_id;
  const contextPath = input.context_path ?? context?.context_path;
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;

  return LogEventSchema.parse({
    ts: now().toISOString(),
    level: input.level,
    service,
    env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...(apiId ? {api_id: apiId} : {}),
    ...(contextPath ? {context_path: contextPath} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    metadata: toMetadataRecord(redact(input.metadata ?? {}))
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const level = LogLevelSchema.parse(options.level);
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const writer = options.writer ?? defaultWriter;
  const now = options.now ?? (() => new Date());
  const redact = createRedactor({extraSensitiveKeys: options.extraSensitiveKeys ?? []});

  const log = (rawInput: LogEventInput) => {
    if (LEVEL_ORDER[rawInput.level] < LEVEL_ORDER[level]) {
      return;
    }

    try {
      const input = LogEventInputSchema.parse(rawInput);
      const envelope = buildEnvelope({
        input,
        service,
        env,
        now,
        redact,
        context: getLogContext()
      });
      const stream = input.level === 'error' || input.level === 'fatal' ? writer.stderr : writer.stdout;
      stream.write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break runtime behavior.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

/**
 * Binds a logger to one component name so call sites only carry the event.
 */
export const createComponentLogger = ({
  logger,
  component
}: {
  logger: StructuredLogger;
  component: string;
}): ComponentLogger => ({
  component,
  debug: input => logger.debug({...input, component}),
  info: input => logger.info({...input, component}),
  warn: input => logger.warn({...input, component}),
  error: input => logger.error({...input, component}),
  fatal: input => logger.fatal({...input, component})
});

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
