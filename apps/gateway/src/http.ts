import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorPayloadSchema} from '@gatehouse/schemas'

import {badRequest, payloadTooLarge} from './errors'

export const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cache-control': 'no-store'
}

export const CORRELATION_ID_HEADER = 'x-correlation-id'

export const extractCorrelationId = (request: Pick<IncomingMessage, 'headers'>) => {
  const header = request.headers[CORRELATION_ID_HEADER]
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: AsyncIterable<unknown>
  maxBodyBytes: number
}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = serialize(payload)

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    [CORRELATION_ID_HEADER]: correlationId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  const payload = ErrorPayloadSchema.parse({
    error,
    message,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    payload,
    correlationId
  })
}
