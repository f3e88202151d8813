export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  setLogContextFields,
  type LogContext
} from './context';
export {
  createComponentLogger,
  createNoopLogger,
  createStructuredLogger,
  LogEventInputSchema,
  LogLevelSchema,
  type ComponentLogger,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {createRedactor, sanitizeForLog, type Redactor} from './redaction';
