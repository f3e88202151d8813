import type {IncomingMessage, ServerResponse} from 'node:http'

import {createComponentLogger, runWithLogContext, type StructuredLogger} from '@gatehouse/logging'
import {createGatewayResponse, type GatewayRequest, type GatewayResponse, type Reactor} from '@gatehouse/reactor'

import {isAppError} from './errors'
import {CORRELATION_ID_HEADER, extractCorrelationId, readBodyBuffer, sendError} from './http'

const ABSOLUTE_TARGET_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//iu

const stripQuery = (target: string) => {
  const queryIndex = target.search(/[?#]/u)
  return queryIndex === -1 ? target : target.slice(0, queryIndex)
}

const PATH_BASE = 'http://gateway.invalid'

/**
 * Resolves `.` and `..` segments (including their percent-encoded forms) so
 * routing and forwarding see the path the upstream would.
 */
export const normalizeRequestTargetPath = (path: string) => {
  const candidate = `${PATH_BASE}${path.startsWith('/') ? '' : '/'}${path}`
  return URL.canParse(candidate) ? new URL(candidate).pathname : '/'
}

/**
 * Splits the request target into the routed path and an absolute URI. An
 * origin-form target only becomes absolute when the Host header names a host.
 */
export const resolveRequestTarget = ({rawUrl, host}: {rawUrl: string; host: string | undefined}) => {
  if (ABSOLUTE_TARGET_PATTERN.test(rawUrl) && URL.canParse(rawUrl)) {
    return {path: new URL(rawUrl).pathname, uri: rawUrl}
  }

  const target = rawUrl.length === 0 ? '/' : rawUrl
  const path = stripQuery(target)
  const hostValue = host?.trim()
  return {
    path: normalizeRequestTargetPath(path),
    uri: hostValue ? `http://${hostValue}${target.startsWith('/') ? target : `/${target}`}` : target
  }
}

export const toGatewayRequest = ({
  request,
  id,
  body,
  receivedAt
}: {
  request: Pick<IncomingMessage, 'method' | 'url' | 'headers'> & {socket?: {remoteAddress?: string | undefined}}
  id: string
  body: Buffer
  receivedAt: number
}): GatewayRequest => {
  const {path, uri} = resolveRequestTarget({rawUrl: request.url ?? '/', host: request.headers.host})
  const remoteAddress = request.socket?.remoteAddress

  return {
    id,
    method: (request.method ?? 'GET').toUpperCase(),
    path,
    uri,
    headers: {...request.headers},
    ...(body.length > 0 ? {body} : {}),
    ...(remoteAddress ? {remoteAddress} : {}),
    receivedAt
  }
}

export const writeGatewayResponse = ({
  response,
  gatewayResponse,
  correlationId
}: {
  response: ServerResponse
  gatewayResponse: GatewayResponse
  correlationId: string
}) => {
  const body =
    typeof gatewayResponse.body === 'string' ? Buffer.from(gatewayResponse.body, 'utf8') : gatewayResponse.body

  response.writeHead(gatewayResponse.status, {
    ...gatewayResponse.headers,
    ...(body ? {'content-length': String(body.length)} : {}),
    [CORRELATION_ID_HEADER]: correlationId
  })

  if (body) {
    response.end(body)
    return
  }
  response.end()
}

export type ReactorRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

/**
 * Bridges Node's HTTP objects to the reactor. The returned promise settles
 * once the response has been written.
 */
export const createReactorRequestHandler = ({
  reactor,
  maxBodyBytes,
  logger,
  now = () => Date.now()
}: {
  reactor: Pick<Reactor, 'process'>
  maxBodyBytes: number
  logger: StructuredLogger
  now?: () => number
}): ReactorRequestHandler => {
  const transportLogger = createComponentLogger({logger, component: 'gateway.transport'})

  return async (request, response) => {
    const receivedAt = now()
    const correlationId = extractCorrelationId(request)

    await runWithLogContext({correlation_id: correlationId}, async () => {
      try {
        const body = await readBodyBuffer({request, maxBodyBytes})
        const gatewayRequest = toGatewayRequest({request, id: correlationId, body, receivedAt})

        await new Promise<void>((resolve, reject) => {
          reactor.process(gatewayRequest, createGatewayResponse(), gatewayResponse => {
            try {
              writeGatewayResponse({response, gatewayResponse, correlationId})
              resolve()
            } catch (error) {
              reject(error)
            }
          })
        })
      } catch (error) {
        if (isAppError(error)) {
          transportLogger.warn({
            event: 'gateway.request.rejected',
            message: `Request rejected: ${error.code}`,
            reason_code: error.code
          })
          sendError({response, status: error.status, error: error.code, message: error.message, correlationId})
          return
        }

        transportLogger.error({
          event: 'gateway.request.failed',
          message: 'Unexpected internal error',
          reason_code: 'internal_error',
          metadata: {error}
        })
        if (!response.headersSent) {
          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          })
        }
      }
    })
  }
}
