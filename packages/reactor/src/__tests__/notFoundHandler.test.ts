import {describe, expect, it, vi} from 'vitest';

import {createGatewayResponse} from '../contracts';
import {createNotFoundHandler} from '../notFoundHandler';
import {makeRequest} from './fixtures';

describe('NotFoundHandler', () => {
  it('answers 404 with the error payload and hands the response back', () => {
    const callback = vi.fn();
    const response = createGatewayResponse();

    createNotFoundHandler().handle(
      makeRequest({id: 'req-404', method: 'POST', path: '/unknown'}),
      response,
      callback
    );

    expect(callback).toHaveBeenCalledWith(response);
    expect(response.status).toBe(404);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(JSON.parse(String(response.body))).toEqual({
      error: 'api_not_found',
      message: 'No API deployed for POST /unknown',
      correlation_id: 'req-404'
    });
  });

  it('echoes the caller correlation id when one is supplied', () => {
    const response = createGatewayResponse();

    createNotFoundHandler().handle(
      makeRequest({path: '/unknown', headers: {'x-correlation-id': ' corr-7 '}}),
      response,
      () => undefined
    );

    expect(JSON.parse(String(response.body))).toMatchObject({correlation_id: 'corr-7'});
  });
});
