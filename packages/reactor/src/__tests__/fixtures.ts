import type {ApiDefinition} from '@gatehouse/schemas';

import type {GatewayRequest, GatewayResponse, ResponseCallback} from '../contracts';
import {AbstractContextHandler, type ContextHandlerOptions} from '../handler';

export type RecordingHandlerOptions = ContextHandlerOptions & {
  label?: string;
  startError?: Error;
  stopError?: Error;
  deferResponse?: boolean;
};

/** Handler double that records what it served and answers with its label. */
export class RecordingHandler extends AbstractContextHandler {
  public readonly label: string;
  public readonly served: GatewayRequest[] = [];
  public readonly pending: Array<() => void> = [];
  public doStopCalls = 0;

  private readonly startError: Error | undefined;
  private readonly stopError: Error | undefined;
  private readonly deferResponse: boolean;

  public constructor({label, startError, stopError, deferResponse, ...options}: RecordingHandlerOptions) {
    super(options);
    this.label = label ?? options.apiId;
    this.startError = startError;
    this.stopError = stopError;
    this.deferResponse = deferResponse ?? false;
  }

  public relative(path: string): string {
    return this.relativePath(path);
  }

  protected override async doStart(): Promise<void> {
    if (this.startError) {
      throw this.startError;
    }
  }

  protected override async doStop(): Promise<void> {
    this.doStopCalls += 1;
    if (this.stopError) {
      throw this.stopError;
    }
  }

  protected doHandle(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void {
    this.served.push(request);
    const respond = () => {
      response.status = 200;
      response.body = this.label;
      callback(response);
    };

    if (this.deferResponse) {
      this.pending.push(respond);
      return;
    }
    respond();
  }
}

export const startedHandler = async (options: RecordingHandlerOptions) => {
  const handler = new RecordingHandler(options);
  await handler.start();
  return handler;
};

export const makeRequest = (overrides: Partial<GatewayRequest> = {}): GatewayRequest => ({
  id: 'req-1',
  method: 'GET',
  path: '/',
  uri: 'http://gateway.local/',
  headers: {},
  receivedAt: 0,
  ...overrides
});

export const makeApi = (overrides: Partial<ApiDefinition> = {}): ApiDefinition => ({
  id: 'orders',
  enabled: true,
  context_path: '/orders',
  endpoint: 'http://127.0.0.1:9000',
  strip_context_path: true,
  ...overrides
});
