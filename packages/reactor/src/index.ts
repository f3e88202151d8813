export {
  createGatewayResponse,
  type AccessReport,
  type ContextReactorHandler,
  type DeploymentEvent,
  type DeploymentListener,
  type DeploymentSource,
  type GatewayRequest,
  type GatewayResponse,
  type GatewayResponseMetrics,
  type HandlerFactory,
  type HandlerLifecycleState,
  type HeaderValue,
  type ReactorHandler,
  type Reporter,
  type ResponseCallback
} from './contracts';
export {DeploymentEventBus} from './deploymentEventBus';
export {
  err,
  isReactorError,
  ok,
  ReactorError,
  reactorErrorCodes,
  toErrorMessage,
  type ReactorErrorCode,
  type ReactorFailure,
  type ReactorFailureDetail,
  type ReactorResult,
  type ReactorSuccess
} from './errors';
export {AbstractContextHandler, normalizeContextPath, type ContextHandlerOptions} from './handler';
export {
  buildInstrumentedCallback,
  RESPONSE_TIME_HEADER,
  withReporting,
  withResponseTime,
  type ChainClock
} from './instrumentation';
export {createNotFoundHandler, NOT_FOUND_ERROR_CODE, NotFoundHandler} from './notFoundHandler';
export {
  Reactor,
  type DeploymentAction,
  type DeploymentOutcome,
  type ReactorOptions
} from './reactor';
export {ReporterService} from './reporterService';
export {normalizeHost, normalizeRequestPath, resolveRequestHost, RoutingTable, type RoutingTableOptions} from './routingTable';

export const packageName = 'reactor';
