import {
  createComponentLogger,
  createNoopLogger,
  type ComponentLogger,
  type StructuredLogger
} from '@gatehouse/logging';

import type {ContextReactorHandler, GatewayRequest, HeaderValue, ReactorHandler} from './contracts';

const firstHeaderValue = (value: HeaderValue) => (Array.isArray(value) ? value[0] : value);

const stripPort = (host: string) => {
  if (host.startsWith('[')) {
    const closing = host.indexOf(']');
    return closing === -1 ? host : host.slice(0, closing + 1);
  }

  const [name] = host.split(':', 1);
  return name ?? host;
};

/** Lower-cased host name without port; `undefined` for a blank value. */
export const normalizeHost = (host: string | undefined): string | undefined => {
  if (host === undefined) {
    return undefined;
  }

  const normalized = stripPort(host.trim()).toLowerCase();
  return normalized.length > 0 ? normalized : undefined;
};

/**
 * Host a request targets: the Host header when present and non-empty,
 * otherwise the host of the absolute request URI.
 */
export const resolveRequestHost = (request: Pick<GatewayRequest, 'headers' | 'uri'>): string | undefined => {
  const header = normalizeHost(firstHeaderValue(request.headers.host));
  if (header) {
    return header;
  }

  try {
    return normalizeHost(new URL(request.uri).hostname);
  } catch {
    return undefined;
  }
};

export const normalizeRequestPath = (path: string) => (path.endsWith('/') ? path : `${path}/`);

export type RoutingTableOptions = {
  fallbackHandler: ReactorHandler;
  logger?: StructuredLogger;
};

/**
 * Registry of live handlers keyed by context path, with a reverse index from
 * API id to context path.
 *
 * Every mutation rebuilds a frozen snapshot of the registered handlers;
 * lookups only ever read the current snapshot, so a lookup racing a
 * deployment sees either the old or the new registry, never a mix.
 */
export class RoutingTable<THandler extends ContextReactorHandler = ContextReactorHandler> {
  private readonly byContextPath = new Map<string, THandler>();
  private readonly contextPathByApi = new Map<string, string>();
  private snapshot: readonly THandler[] = Object.freeze([]);
  private readonly fallbackHandler: ReactorHandler;
  private readonly logger: ComponentLogger;

  public constructor({fallbackHandler, logger}: RoutingTableOptions) {
    this.fallbackHandler = fallbackHandler;
    this.logger = createComponentLogger({logger: logger ?? createNoopLogger(), component: 'reactor.routing'});
  }

  public get fallback(): ReactorHandler {
    return this.fallbackHandler;
  }

  public get size(): number {
    return this.snapshot.length;
  }

  public handlers(): readonly THandler[] {
    return this.snapshot;
  }

  public contextPathOf(apiId: string): string | undefined {
    return this.contextPathByApi.get(apiId);
  }

  public lookupRequest(request: Pick<GatewayRequest, 'path' | 'headers' | 'uri'>): ReactorHandler {
    return this.lookup({path: request.path, host: resolveRequestHost(request)});
  }

  /** Best handler for the path and host, or the fallback handler. Never fails. */
  public lookup({path, host}: {path: string; host?: string}): ReactorHandler {
    return this.match({path, host}) ?? this.fallbackHandler;
  }

  public matchRequest(request: Pick<GatewayRequest, 'path' | 'headers' | 'uri'>): THandler | undefined {
    return this.match({path: request.path, host: resolveRequestHost(request)});
  }

  public match({path, host}: {path: string; host?: string}): THandler | undefined {
    const requestPath = normalizeRequestPath(path);
    const requestHost = normalizeHost(host);

    // Host-bound candidates take precedence; the first host-less candidate
    // is kept as the wildcard answer.
    let wildcard: THandler | undefined;
    for (const handler of this.snapshot) {
      if (handler.state !== 'started' || !requestPath.startsWith(handler.contextPath)) {
        continue;
      }

      if (handler.virtualHost === undefined) {
        wildcard ??= handler;
      } else if (handler.virtualHost === requestHost) {
        return handler;
      }
    }

    return wildcard;
  }

  /**
   * Registers `handler` unless its context path is already served or its API
   * already owns an entry. Returns false without touching the registry in
   * either case.
   */
  public register(handler: THandler): boolean {
    if (this.byContextPath.has(handler.contextPath)) {
      this.logger.debug({
        event: 'reactor.routing.register_rejected',
        api_id: handler.apiId,
        context_path: handler.contextPath,
        reason_code: 'context_path_taken'
      });
      return false;
    }

    if (this.contextPathByApi.has(handler.apiId)) {
      this.logger.debug({
        event: 'reactor.routing.register_rejected',
        api_id: handler.apiId,
        context_path: handler.contextPath,
        reason_code: 'api_already_registered'
      });
      return false;
    }

    this.byContextPath.set(handler.contextPath, handler);
    this.contextPathByApi.set(handler.apiId, handler.contextPath);
    this.publishSnapshot();
    return true;
  }

  public unregisterByApi(apiId: string): THandler | undefined {
    const contextPath = this.contextPathByApi.get(apiId);
    if (contextPath === undefined) {
      return undefined;
    }

    this.contextPathByApi.delete(apiId);

    const handler = this.byContextPath.get(contextPath);
    if (!handler || handler.apiId !== apiId) {
      this.logger.warn({
        event: 'reactor.routing.dangling_index',
        message: 'Reverse index pointed at a context path this API no longer serves',
        api_id: apiId,
        context_path: contextPath
      });
      return undefined;
    }

    this.byContextPath.delete(contextPath);
    this.publishSnapshot();
    return handler;
  }

  public clear(): THandler[] {
    const removed = [...this.snapshot];
    this.byContextPath.clear();
    this.contextPathByApi.clear();
    this.publishSnapshot();
    return removed;
  }

  private publishSnapshot() {
    this.snapshot = Object.freeze([...this.byContextPath.values()]);
  }
}
