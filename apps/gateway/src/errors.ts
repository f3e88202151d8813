export type ErrorStatus = 400 | 404 | 413 | 500 | 502 | 503 | 504

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: string; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const badRequest = (code: string, message: string) =>
  new AppError({code, message, status: 400})

export const notFound = (code: string, message: string) =>
  new AppError({code, message, status: 404})

export const payloadTooLarge = (code: string, message: string) =>
  new AppError({code, message, status: 413})

export const internal = (code: string, message: string) =>
  new AppError({code, message, status: 500})

export const badGateway = (code: string, message: string) =>
  new AppError({code, message, status: 502})

export const serviceUnavailable = (code: string, message: string) =>
  new AppError({code, message, status: 503})

export const gatewayTimeout = (code: string, message: string) =>
  new AppError({code, message, status: 504})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError
