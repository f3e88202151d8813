import {
  createComponentLogger,
  createNoopLogger,
  runWithLogContext,
  setLogContextFields,
  type ComponentLogger,
  type StructuredLogger
} from '@gatehouse/logging';
import {ErrorPayloadSchema, type DeployableApi} from '@gatehouse/schemas';

import type {
  ContextReactorHandler,
  DeploymentEvent,
  DeploymentSource,
  GatewayRequest,
  GatewayResponse,
  HandlerFactory,
  ReactorHandler,
  Reporter,
  ResponseCallback
} from './contracts';
import {err, ok, toErrorMessage, type ReactorResult} from './errors';
import {buildInstrumentedCallback, type ChainClock} from './instrumentation';
import {createNotFoundHandler} from './notFoundHandler';
import {RoutingTable} from './routingTable';

export type DeploymentAction = 'deployed' | 'redeployed' | 'undeployed' | 'skipped';

export type DeploymentOutcome = {
  action: DeploymentAction;
  api_id: string;
  context_path?: string;
  previous_context_path?: string;
  reason?: 'api_disabled' | 'not_deployed';
};

export type ReactorOptions<TApi extends DeployableApi> = {
  handlerFactory: HandlerFactory<TApi>;
  reporter: Reporter;
  fallbackHandler?: ReactorHandler;
  routingTable?: RoutingTable;
  deploymentSource?: DeploymentSource<TApi>;
  logger?: StructuredLogger;
  now?: ChainClock;
};

const writeInternalError = ({request, response}: {request: GatewayRequest; response: GatewayResponse}) => {
  const body = JSON.stringify(
    ErrorPayloadSchema.parse({
      error: 'handler_failed',
      message: 'The API handler failed to process the request',
      correlation_id: request.id
    })
  );

  response.status = 500;
  response.headers = {
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(Buffer.byteLength(body))
  };
  response.body = body;
};

export class Reactor<TApi extends DeployableApi = DeployableApi> {
  public readonly routingTable: RoutingTable;

  private readonly handlerFactory: HandlerFactory<TApi>;
  private readonly reporter: Reporter;
  private readonly deploymentSource: DeploymentSource<TApi> | undefined;
  private readonly logger: ComponentLogger;
  private readonly now: ChainClock;

  private eventQueue: Promise<unknown> = Promise.resolve();
  private unsubscribe: (() => void) | undefined;
  private running = false;

  public constructor(options: ReactorOptions<TApi>) {
    const baseLogger = options.logger ?? createNoopLogger();
    this.handlerFactory = options.handlerFactory;
    this.reporter = options.reporter;
    this.deploymentSource = options.deploymentSource;
    this.logger = createComponentLogger({logger: baseLogger, component: 'reactor'});
    this.now = options.now ?? (() => Date.now());
    this.routingTable =
      options.routingTable ??
      new RoutingTable({
        fallbackHandler: options.fallbackHandler ?? createNotFoundHandler(),
        logger: baseLogger
      });
  }

  public get isRunning(): boolean {
    return this.running;
  }

  /**
   * Dispatches one request to the best handler. Returns once the handler has
   * been invoked; the handler answers later through `callback`.
   */
  public process(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void {
    runWithLogContext(
      {
        ...(request.id.length > 0 ? {request_id: request.id.slice(0, 128)} : {}),
        route: request.path.length > 0 ? request.path : '/',
        method: request.method.length > 0 ? request.method : 'UNKNOWN'
      },
      () => {
        const matched = this.routingTable.matchRequest(request);
        const handler = matched ?? this.routingTable.fallback;
        if (matched) {
          response.metrics.api_id = matched.apiId;
          setLogContextFields({api_id: matched.apiId, context_path: matched.contextPath});
        }

        this.logger.debug({
          event: 'reactor.request.dispatched',
          message: matched ? `Dispatching to ${matched.contextPath}` : 'No API matched, using fallback handler'
        });

        const instrumented = buildInstrumentedCallback({
          request,
          callback,
          reporter: this.reporter,
          logger: this.logger,
          now: this.now
        });

        try {
          handler.handle(request, response, instrumented);
        } catch (error) {
          this.logger.error({
            event: 'reactor.request.handler_failed',
            message: toErrorMessage(error),
            reason_code: 'handler_failed',
            metadata: {error}
          });
          writeInternalError({request, response});
          instrumented(response);
        }
      }
    );
  }

  /**
   * Applies one deployment event. Events are applied one at a time in arrival
   * order; the returned promise never rejects.
   */
  public onDeploymentEvent(event: DeploymentEvent<TApi>): Promise<ReactorResult<DeploymentOutcome>> {
    const applied = this.eventQueue.then(() => this.applyEvent(event));
    this.eventQueue = applied;
    return applied;
  }

  public async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    if (this.deploymentSource) {
      this.unsubscribe = this.deploymentSource.subscribe(event => this.onDeploymentEvent(event));
    }

    this.logger.info({event: 'reactor.started', message: 'Reactor is accepting deployment events'});
  }

  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = undefined;

    await this.eventQueue;
    const stopped = await this.clearAll();
    this.logger.info({
      event: 'reactor.stopped',
      message: `Reactor stopped, ${stopped} handler(s) removed`
    });
  }

  /** Removes and stops every handler. Returns how many were removed. */
  public async clearAll(): Promise<number> {
    const handlers = this.routingTable.clear();
    await Promise.all(handlers.map(handler => this.stopQuietly(handler)));
    return handlers.length;
  }

  private async applyEvent(event: DeploymentEvent<TApi>): Promise<ReactorResult<DeploymentOutcome>> {
    try {
      switch (event.type) {
        case 'deploy':
        case 'start':
          return await this.deploy(event.api);
        case 'update':
          return await this.update(event.api);
        case 'undeploy':
        case 'stop':
          return await this.undeploy(event.api.id);
      }
    } catch (error) {
      this.logger.error({
        event: 'reactor.event.failed',
        message: toErrorMessage(error),
        api_id: event.api.id,
        metadata: {type: event.type, error}
      });
      return err('deployment_event_invalid', toErrorMessage(error));
    }
  }

  private async deploy(api: TApi): Promise<ReactorResult<DeploymentOutcome>> {
    if (!api.enabled) {
      this.logger.warn({
        event: 'reactor.api.disabled',
        message: `API ${api.id} is disabled, not deploying`,
        api_id: api.id,
        reason_code: 'api_disabled'
      });
      return ok({action: 'skipped', api_id: api.id, reason: 'api_disabled'});
    }

    let handler: ContextReactorHandler;
    try {
      handler = this.handlerFactory(api);
    } catch (error) {
      this.logger.error({
        event: 'reactor.handler.construction_failed',
        message: toErrorMessage(error),
        api_id: api.id,
        reason_code: 'handler_construction_failed',
        metadata: {error}
      });
      return err('handler_construction_failed', `Unable to build a handler for API ${api.id}: ${toErrorMessage(error)}`);
    }

    try {
      await handler.start();
    } catch (error) {
      this.logger.error({
        event: 'reactor.handler.start_failed',
        message: toErrorMessage(error),
        api_id: api.id,
        context_path: handler.contextPath,
        reason_code: 'handler_start_failed',
        metadata: {error}
      });
      return err('handler_start_failed', `Unable to start the handler for API ${api.id}: ${toErrorMessage(error)}`);
    }

    if (!this.routingTable.register(handler)) {
      const ownPath = this.routingTable.contextPathOf(api.id);
      const message =
        ownPath === undefined
          ? `Context path ${handler.contextPath} is already served by another API`
          : `API ${api.id} is already deployed on ${ownPath}`;
      this.logger.warn({
        event: 'reactor.handler.registration_rejected',
        message,
        api_id: api.id,
        context_path: handler.contextPath,
        reason_code: 'duplicate_context_path'
      });
      await this.stopQuietly(handler);
      return err('duplicate_context_path', message);
    }

    this.logger.info({
      event: 'reactor.api.deployed',
      message: `API ${api.id} has been deployed in reactor`,
      api_id: api.id,
      context_path: handler.contextPath
    });
    return ok({action: 'deployed', api_id: api.id, context_path: handler.contextPath});
  }

  private async update(api: TApi): Promise<ReactorResult<DeploymentOutcome>> {
    const previousContextPath = this.routingTable.contextPathOf(api.id);
    if (previousContextPath === undefined) {
      return this.deploy(api);
    }

    await this.undeploy(api.id);
    const deployed = await this.deploy(api);
    if (!deployed.ok || deployed.value.action !== 'deployed') {
      return deployed;
    }

    return ok({...deployed.value, action: 'redeployed', previous_context_path: previousContextPath});
  }

  private async undeploy(apiId: string): Promise<ReactorResult<DeploymentOutcome>> {
    const handler = this.routingTable.unregisterByApi(apiId);
    if (!handler) {
      this.logger.debug({
        event: 'reactor.api.not_deployed',
        message: `API ${apiId} is not deployed, nothing to remove`,
        api_id: apiId
      });
      return ok({action: 'skipped', api_id: apiId, reason: 'not_deployed'});
    }

    await this.stopQuietly(handler);
    this.logger.info({
      event: 'reactor.api.undeployed',
      message: `API ${apiId} has been removed from reactor`,
      api_id: apiId,
      context_path: handler.contextPath
    });
    return ok({action: 'undeployed', api_id: apiId, context_path: handler.contextPath});
  }

  private async stopQuietly(handler: ContextReactorHandler): Promise<boolean> {
    try {
      await handler.stop();
      return true;
    } catch (error) {
      this.logger.error({
        event: 'reactor.handler.stop_failed',
        message: toErrorMessage(error),
        api_id: handler.apiId,
        context_path: handler.contextPath,
        reason_code: 'handler_stop_failed',
        metadata: {error}
      });
      return false;
    }
  }
}
