export const reactorErrorCodes = [
  'duplicate_context_path',
  'handler_construction_failed',
  'handler_start_failed',
  'handler_stop_failed',
  'handler_invalid_state',
  'context_path_invalid',
  'deployment_event_invalid'
] as const;

export type ReactorErrorCode = (typeof reactorErrorCodes)[number];

export type ReactorFailureDetail = {
  code: ReactorErrorCode;
  message: string;
};

export type ReactorSuccess<T> = {ok: true; value: T};
export type ReactorFailure = {ok: false; error: ReactorFailureDetail};
export type ReactorResult<T> = ReactorSuccess<T> | ReactorFailure;

export const ok = <T>(value: T): ReactorSuccess<T> => ({ok: true, value});

export const err = (code: ReactorErrorCode, message: string): ReactorFailure => ({
  ok: false,
  error: {code, message}
});

export class ReactorError extends Error {
  public readonly code: ReactorErrorCode;

  public constructor({code, message}: ReactorFailureDetail) {
    super(message);
    this.name = 'ReactorError';
    this.code = code;
  }
}

export const isReactorError = (value: unknown): value is ReactorError => value instanceof ReactorError;

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unexpected error';
};
