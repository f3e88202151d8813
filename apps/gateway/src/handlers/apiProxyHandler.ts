import {
  createComponentLogger,
  createNoopLogger,
  type ComponentLogger,
  type StructuredLogger
} from '@gatehouse/logging'
import {
  AbstractContextHandler,
  toErrorMessage,
  type GatewayRequest,
  type GatewayResponse,
  type HeaderValue,
  type ResponseCallback
} from '@gatehouse/reactor'
import {ErrorPayloadSchema, type ApiDefinition} from '@gatehouse/schemas'

import {AppError, badGateway, badRequest, gatewayTimeout, isAppError} from '../errors'

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>

export const HOP_BY_HOP_HEADER_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
])

// Recomputed by fetch on the way out and by the transport on the way back.
const REQUEST_HEADERS_DROPPED = new Set(['host', 'content-length'])
const RESPONSE_HEADERS_DROPPED = new Set(['content-length', 'content-encoding', 'set-cookie'])

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD'])

const toHeaderList = (value: HeaderValue) => {
  if (value === undefined) {
    return []
  }

  return Array.isArray(value) ? value : [value]
}

const connectionNominatedHeaders = (value: HeaderValue) =>
  new Set(
    toHeaderList(value)
      .flatMap(entry => entry.split(','))
      .map(token => token.trim().toLowerCase())
      .filter(token => token.length > 0)
  )

/**
 * Request headers for the upstream call: hop-by-hop headers, any header the
 * Connection header nominates, and `host` are removed; `x-forwarded-*` are
 * appended.
 */
export const buildUpstreamHeaders = ({
  request,
  contextPath,
  stripContextPath
}: {
  request: GatewayRequest
  contextPath: string
  stripContextPath: boolean
}) => {
  const headers = new Headers()
  const nominated = connectionNominatedHeaders(request.headers.connection)

  for (const [rawName, value] of Object.entries(request.headers)) {
    const name = rawName.toLowerCase()
    if (HOP_BY_HOP_HEADER_NAMES.has(name) || REQUEST_HEADERS_DROPPED.has(name) || nominated.has(name)) {
      continue
    }

    for (const entry of toHeaderList(value)) {
      headers.append(name, entry)
    }
  }

  if (request.remoteAddress) {
    const forwardedFor = headers.get('x-forwarded-for')
    headers.set('x-forwarded-for', forwardedFor ? `${forwardedFor}, ${request.remoteAddress}` : request.remoteAddress)
  }

  const [originalHost] = toHeaderList(request.headers.host)
  if (originalHost && !headers.has('x-forwarded-host')) {
    headers.set('x-forwarded-host', originalHost)
  }
  if (!headers.has('x-forwarded-proto')) {
    headers.set('x-forwarded-proto', 'http')
  }
  if (stripContextPath && contextPath !== '/') {
    headers.set('x-forwarded-prefix', contextPath.slice(0, -1))
  }
  headers.set('x-correlation-id', request.id)

  return headers
}

export const collectResponseHeaders = (upstreamHeaders: Headers) => {
  const headers: Record<string, string | string[]> = {}
  upstreamHeaders.forEach((value, name) => {
    if (HOP_BY_HOP_HEADER_NAMES.has(name) || RESPONSE_HEADERS_DROPPED.has(name)) {
      return
    }

    headers[name] = value
  })

  const cookies = upstreamHeaders.getSetCookie()
  if (cookies.length > 0) {
    headers['set-cookie'] = cookies
  }

  return headers
}

const searchOf = (uri: string) => {
  const queryIndex = uri.indexOf('?')
  if (queryIndex === -1) {
    return ''
  }

  const fragmentIndex = uri.indexOf('#', queryIndex)
  return uri.slice(queryIndex, fragmentIndex === -1 ? undefined : fragmentIndex)
}

/**
 * Upstream URL for a request path under the endpoint's base path. Throws a
 * 400 `AppError` when dot segments would lead outside that base path.
 */
export const buildUpstreamUrl = ({endpoint, path, uri}: {endpoint: URL; path: string; uri: string}) => {
  const target = new URL(endpoint.href)
  const basePath = target.pathname.endsWith('/') ? target.pathname.slice(0, -1) : target.pathname
  target.pathname = `${basePath}${path.startsWith('/') ? path : `/${path}`}`
  if (target.pathname !== basePath && !target.pathname.startsWith(`${basePath}/`)) {
    throw badRequest('request_path_invalid', 'Request path leaves the API endpoint base path')
  }

  target.search = searchOf(uri)
  target.hash = ''
  return target
}

const errorName = (error: unknown) =>
  typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined

const mapFetchError = (error: unknown): AppError => {
  const name = errorName(error)
  if (name === 'AbortError' || name === 'TimeoutError') {
    return gatewayTimeout('upstream_timeout', 'Upstream request timed out')
  }

  return badGateway('upstream_unavailable', 'Upstream endpoint is unavailable')
}

const writeFailure = ({
  response,
  failure,
  correlationId
}: {
  response: GatewayResponse
  failure: AppError
  correlationId: string
}) => {
  const body = JSON.stringify(
    ErrorPayloadSchema.parse({error: failure.code, message: failure.message, correlation_id: correlationId})
  )

  response.status = failure.status
  response.headers = {
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(Buffer.byteLength(body))
  }
  response.body = body
}

export type ApiProxyHandlerOptions = {
  api: ApiDefinition
  timeoutMs: number
  fetchImpl?: FetchLike
  logger?: StructuredLogger
}

/** Forwards every request under one API's context path to its endpoint. */
export class ApiProxyHandler extends AbstractContextHandler {
  private readonly api: ApiDefinition
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike
  private readonly logger: ComponentLogger
  private endpoint: URL | undefined

  public constructor({api, timeoutMs, fetchImpl, logger}: ApiProxyHandlerOptions) {
    super({
      apiId: api.id,
      contextPath: api.context_path,
      ...(api.virtual_host ? {virtualHost: api.virtual_host} : {})
    })
    this.api = api
    this.timeoutMs = timeoutMs
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init))
    this.logger = createComponentLogger({logger: logger ?? createNoopLogger(), component: 'gateway.proxy'})
  }

  protected override async doStart(): Promise<void> {
    if (!URL.canParse(this.api.endpoint)) {
      throw new Error(`Endpoint of API ${this.api.id} is not a valid URL`)
    }

    const endpoint = new URL(this.api.endpoint)
    if (endpoint.protocol !== 'http:' && endpoint.protocol !== 'https:') {
      throw new Error(`Endpoint of API ${this.api.id} must use http or https`)
    }

    this.endpoint = endpoint
    this.logger.debug({
      event: 'gateway.proxy.started',
      message: `Proxying ${this.contextPath} to ${endpoint.origin}`,
      api_id: this.apiId,
      context_path: this.contextPath
    })
  }

  protected override async doStop(): Promise<void> {
    this.logger.debug({
      event: 'gateway.proxy.stopped',
      api_id: this.apiId,
      context_path: this.contextPath
    })
  }

  protected doHandle(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void {
    void this.forward(request, response)
      .then(callback)
      .catch(error => {
        this.logger.error({
          event: 'gateway.proxy.callback_failed',
          message: toErrorMessage(error),
          request_id: request.id,
          metadata: {error}
        })
      })
  }

  private async forward(request: GatewayRequest, response: GatewayResponse): Promise<GatewayResponse> {
    if (!this.endpoint) {
      writeFailure({
        response,
        failure: badGateway('upstream_unavailable', `API ${this.apiId} has no active endpoint`),
        correlationId: request.id
      })
      return response
    }

    const path = this.api.strip_context_path ? this.relativePath(request.path) : request.path
    let target: URL
    try {
      target = buildUpstreamUrl({endpoint: this.endpoint, path, uri: request.uri})
    } catch (error) {
      const failure = isAppError(error) ? error : badRequest('request_path_invalid', toErrorMessage(error))
      this.logger.warn({
        event: 'gateway.proxy.request_rejected',
        message: failure.message,
        request_id: request.id,
        reason_code: failure.code
      })
      writeFailure({response, failure, correlationId: request.id})
      return response
    }
    const sendsBody = !METHODS_WITHOUT_BODY.has(request.method) && request.body !== undefined

    try {
      const upstream = await this.fetchImpl(target, {
        method: request.method,
        headers: buildUpstreamHeaders({
          request,
          contextPath: this.contextPath,
          stripContextPath: this.api.strip_context_path
        }),
        ...(sendsBody ? {body: request.body} : {}),
        redirect: 'manual',
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      const body = Buffer.from(await upstream.arrayBuffer())

      response.status = upstream.status
      response.headers = collectResponseHeaders(upstream.headers)
      if (body.length > 0) {
        response.body = body
      }
    } catch (error) {
      const failure = mapFetchError(error)
      this.logger.warn({
        event: 'gateway.proxy.upstream_failed',
        message: toErrorMessage(error),
        request_id: request.id,
        reason_code: failure.code,
        metadata: {upstream: target.origin}
      })
      writeFailure({response, failure, correlationId: request.id})
    }

    return response
  }
}
