import type {DeployableApi, DeploymentEventType} from '@gatehouse/schemas';

export type HeaderValue = string | string[] | undefined;

export type GatewayRequest = {
  id: string;
  method: string;
  /** Path component only, without query string. */
  path: string;
  /** Absolute request URI, used to resolve the host when no Host header is present. */
  uri: string;
  headers: Record<string, HeaderValue>;
  body?: Buffer;
  /** Address of the connected peer, when the transport knows it. */
  remoteAddress?: string;
  /** Epoch milliseconds at which the transport received the request. */
  receivedAt: number;
};

export type GatewayResponseMetrics = {
  elapsed_ms?: number;
  api_id?: string;
};

export type GatewayResponse = {
  status: number;
  headers: Record<string, string | string[]>;
  body?: Buffer | string;
  metrics: GatewayResponseMetrics;
};

export type ResponseCallback = (response: GatewayResponse) => void;

export const createGatewayResponse = (): GatewayResponse => ({
  status: 200,
  headers: {},
  metrics: {}
});

export type HandlerLifecycleState = 'created' | 'started' | 'stopped' | 'failed_to_start';

export interface ReactorHandler {
  handle(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void;
}

export interface ContextReactorHandler extends ReactorHandler {
  readonly apiId: string;
  /** Always ends with `/`. */
  readonly contextPath: string;
  readonly virtualHost: string | undefined;
  readonly state: HandlerLifecycleState;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export type HandlerFactory<TApi extends DeployableApi = DeployableApi> = (api: TApi) => ContextReactorHandler;

export type DeploymentEvent<TApi extends DeployableApi = DeployableApi> = {
  type: DeploymentEventType;
  api: TApi;
};

export type DeploymentListener<TApi extends DeployableApi = DeployableApi> = (
  event: DeploymentEvent<TApi>
) => void | Promise<unknown>;

export interface DeploymentSource<TApi extends DeployableApi = DeployableApi> {
  subscribe(listener: DeploymentListener<TApi>): () => void;
}

export type AccessReport = {
  request: GatewayRequest;
  response: GatewayResponse;
  elapsed_ms: number;
};

export interface Reporter {
  report(input: AccessReport): void | Promise<void>;
  start?(): Promise<void>;
  stop?(): Promise<void>;
}
