import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    api_id: z.string().min(1).optional(),
    context_path: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Runs `operation` with a log context layered over the enclosing one, so an
 * inner scope keeps the correlation id its caller established.
 */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T => {
  const parsedContext = LogContextSchema.parse(context);
  const parentContext = logContextStorage.getStore();
  return logContextStorage.run({...parentContext, ...parsedContext}, operation);
};

export const getLogContext = (): LogContext | undefined => logContextStorage.getStore();

export const setLogContextFields = (partialContext: Partial<LogContext>): LogContext | undefined => {
  const currentContext = logContextStorage.getStore();
  if (!currentContext) {
    return undefined;
  }

  Object.assign(currentContext, LogContextSchema.partial().parse(partialContext));
  return currentContext;
};
