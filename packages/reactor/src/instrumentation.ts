import type {ComponentLogger} from '@gatehouse/logging';

import type {GatewayRequest, GatewayResponse, Reporter, ResponseCallback} from './contracts';
import {toErrorMessage} from './errors';

export const RESPONSE_TIME_HEADER = 'x-response-time';

export type ChainClock = () => number;

const reportBestEffort = ({
  reporter,
  request,
  response,
  logger
}: {
  reporter: Reporter;
  request: GatewayRequest;
  response: GatewayResponse;
  logger: ComponentLogger;
}) => {
  const onFailure = (error: unknown) => {
    logger.warn({
      event: 'reactor.report.failed',
      message: toErrorMessage(error),
      request_id: request.id,
      metadata: {error}
    });
  };

  try {
    const pending = reporter.report({
      request,
      response,
      elapsed_ms: response.metrics.elapsed_ms ?? 0
    });
    if (pending) {
      void pending.catch(onFailure);
    }
  } catch (error) {
    onFailure(error);
  }
};

export const withReporting =
  ({
    reporter,
    request,
    logger
  }: {
    reporter: Reporter;
    request: GatewayRequest;
    logger: ComponentLogger;
  }) =>
  (next: ResponseCallback): ResponseCallback =>
  response => {
    reportBestEffort({reporter, request, response, logger});
    next(response);
  };

export const withResponseTime =
  ({request, now}: {request: GatewayRequest; now: ChainClock}) =>
  (next: ResponseCallback): ResponseCallback =>
  response => {
    const elapsed = Math.max(0, now() - request.receivedAt);
    response.metrics.elapsed_ms = elapsed;
    response.headers[RESPONSE_TIME_HEADER] = String(elapsed);
    next(response);
  };

const once =
  ({request, logger}: {request: GatewayRequest; logger: ComponentLogger}) =>
  (next: ResponseCallback): ResponseCallback => {
    let invoked = false;
    return response => {
      if (invoked) {
        logger.warn({
          event: 'reactor.callback.duplicate',
          message: 'Response callback invoked more than once; ignoring',
          request_id: request.id
        });
        return;
      }
      invoked = true;
      next(response);
    };
  };

/**
 * Wraps the transport's terminal callback for one request:
 * `once(responseTime(reporting(terminal)))`.
 *
 * The response time is taken when the handler hands the response back and is
 * visible to reporters and to the terminal callback.
 */
export const buildInstrumentedCallback = ({
  request,
  callback,
  reporter,
  logger,
  now = () => Date.now()
}: {
  request: GatewayRequest;
  callback: ResponseCallback;
  reporter: Reporter;
  logger: ComponentLogger;
  now?: ChainClock;
}): ResponseCallback => {
  const layers = [
    once({request, logger}),
    withResponseTime({request, now}),
    withReporting({reporter, request, logger})
  ];

  return layers.reduceRight<ResponseCallback>((next, layer) => layer(next), callback);
};
