import type {
  ContextReactorHandler,
  GatewayRequest,
  GatewayResponse,
  HandlerLifecycleState,
  ResponseCallback
} from './contracts';
import {ReactorError} from './errors';
import {normalizeHost} from './routingTable';

export const normalizeContextPath = (contextPath: string): string => {
  const trimmed = contextPath.trim();
  if (trimmed.length === 0) {
    throw new ReactorError({code: 'context_path_invalid', message: 'Context path must not be empty'});
  }

  const withLeadingSlash = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return withLeadingSlash.endsWith('/') ? withLeadingSlash : `${withLeadingSlash}/`;
};

export type ContextHandlerOptions = {
  apiId: string;
  contextPath: string;
  virtualHost?: string;
};

/**
 * Lifecycle shell shared by every deployed API handler.
 *
 * `created -> started`, `created -> failed_to_start` and `started -> stopped`
 * are the only transitions; subclasses supply the work through `doStart`,
 * `doStop` and `doHandle`.
 */
export abstract class AbstractContextHandler implements ContextReactorHandler {
  public readonly apiId: string;
  public readonly contextPath: string;
  public readonly virtualHost: string | undefined;

  private lifecycleState: HandlerLifecycleState = 'created';

  protected constructor({apiId, contextPath, virtualHost}: ContextHandlerOptions) {
    this.apiId = apiId;
    this.contextPath = normalizeContextPath(contextPath);
    this.virtualHost = normalizeHost(virtualHost);
  }

  public get state(): HandlerLifecycleState {
    return this.lifecycleState;
  }

  public async start(): Promise<void> {
    if (this.lifecycleState !== 'created') {
      throw new ReactorError({
        code: 'handler_invalid_state',
        message: `Handler for ${this.contextPath} cannot start from state ${this.lifecycleState}`
      });
    }

    try {
      await this.doStart();
    } catch (error) {
      this.lifecycleState = 'failed_to_start';
      throw error;
    }

    this.lifecycleState = 'started';
  }

  public async stop(): Promise<void> {
    if (this.lifecycleState !== 'started') {
      return;
    }

    // Stopped even when doStop fails: a broken handler never returns to service.
    this.lifecycleState = 'stopped';
    await this.doStop();
  }

  public handle(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void {
    this.doHandle(request, response, callback);
  }

  /**
   * Path of the request relative to this handler's context path, always
   * starting with `/`.
   */
  protected relativePath(path: string): string {
    const base = this.contextPath.slice(0, -1);
    if (base.length > 0 && path.startsWith(base)) {
      const remainder = path.slice(base.length);
      return remainder.startsWith('/') ? remainder : `/${remainder}`;
    }
    return path.startsWith('/') ? path : `/${path}`;
  }

  protected async doStart(): Promise<void> {}

  protected async doStop(): Promise<void> {}

  protected abstract doHandle(
    request: GatewayRequest,
    response: GatewayResponse,
    callback: ResponseCallback
  ): void;

  public toString(): string {
    return `${this.constructor.name}{api=${this.apiId}, contextPath=${this.contextPath}${
      this.virtualHost ? `, virtualHost=${this.virtualHost}` : ''
    }}`;
  }
}
