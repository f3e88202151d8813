import {ErrorPayloadSchema} from '@gatehouse/schemas';

import type {GatewayRequest, GatewayResponse, ReactorHandler, ResponseCallback} from './contracts';

export const NOT_FOUND_ERROR_CODE = 'api_not_found';

const pickCorrelationId = (request: GatewayRequest) => {
  const header = request.headers['x-correlation-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : request.id;
};

/**
 * Answers every request that matches no deployed API. Holds no state, so a
 * single instance serves the whole process.
 */
export class NotFoundHandler implements ReactorHandler {
  public handle(request: GatewayRequest, response: GatewayResponse, callback: ResponseCallback): void {
    const payload = ErrorPayloadSchema.parse({
      error: NOT_FOUND_ERROR_CODE,
      message: `No API deployed for ${request.method} ${request.path}`,
      correlation_id: pickCorrelationId(request)
    });
    const body = JSON.stringify(payload);

    response.status = 404;
    response.headers['content-type'] = 'application/json; charset=utf-8';
    response.headers['content-length'] = String(Buffer.byteLength(body));
    response.body = body;

    callback(response);
  }
}

export const createNotFoundHandler = (): ReactorHandler => Object.freeze(new NotFoundHandler());
