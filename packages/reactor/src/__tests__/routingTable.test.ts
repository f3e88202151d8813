import {describe, expect, it} from 'vitest';

import {NotFoundHandler} from '../notFoundHandler';
import {normalizeRequestPath, resolveRequestHost, RoutingTable} from '../routingTable';
import {makeRequest, RecordingHandler, startedHandler} from './fixtures';

const createTable = () => {
  const fallbackHandler = new NotFoundHandler();
  return {fallbackHandler, table: new RoutingTable<RecordingHandler>({fallbackHandler})};
};

describe('resolveRequestHost', () => {
  it('prefers the Host header and drops the port', () => {
    expect(
      resolveRequestHost({headers: {host: 'A.Example.com:8082'}, uri: 'http://other.example.com/'})
    ).toBe('a.example.com');
  });

  it('falls back to the request URI when the Host header is missing or empty', () => {
    expect(resolveRequestHost({headers: {}, uri: 'http://b.example.com:9000/api'})).toBe('b.example.com');
    expect(resolveRequestHost({headers: {host: '  '}, uri: 'http://c.example.com/'})).toBe('c.example.com');
  });

  it('keeps bracketed IPv6 hosts intact', () => {
    expect(resolveRequestHost({headers: {host: '[::1]:8082'}, uri: '/'})).toBe('[::1]');
  });

  it('returns undefined when neither source names a host', () => {
    expect(resolveRequestHost({headers: {}, uri: '/relative/path'})).toBeUndefined();
  });
});

describe('RoutingTable', () => {
  it('normalizes request paths with a trailing slash', () => {
    expect(normalizeRequestPath('/api')).toBe('/api/');
    expect(normalizeRequestPath('/api/')).toBe('/api/');
  });

  it('returns the fallback handler when nothing is registered', () => {
    const {table, fallbackHandler} = createTable();

    expect(table.lookup({path: '/unknown'})).toBe(fallbackHandler);
    expect(table.match({path: '/unknown'})).toBeUndefined();
  });

  it('matches context paths on segment boundaries only', async () => {
    const {table, fallbackHandler} = createTable();
    const api = await startedHandler({apiId: 'api', contextPath: '/api'});
    table.register(api);

    expect(table.lookup({path: '/api'})).toBe(api);
    expect(table.lookup({path: '/api/'})).toBe(api);
    expect(table.lookup({path: '/api/v1/items'})).toBe(api);
    expect(table.lookup({path: '/apix'})).toBe(fallbackHandler);
    expect(table.lookup({path: '/ap'})).toBe(fallbackHandler);
  });

  it('never routes to a handler that has not been started', async () => {
    const {table, fallbackHandler} = createTable();
    const notStarted = new RecordingHandler({apiId: 'not_started_api', contextPath: '/not_started_api'});

    expect(table.register(notStarted)).toBe(true);
    expect(table.lookup({path: '/not_started_api'})).toBe(fallbackHandler);

    await notStarted.start();
    expect(table.lookup({path: '/not_started_api'})).toBe(notStarted);

    await notStarted.stop();
    expect(table.lookup({path: '/not_started_api'})).toBe(fallbackHandler);
  });

  it('gives host-bound handlers precedence over host-less ones', async () => {
    const {table} = createTable();
    const hostless = await startedHandler({apiId: 'root', contextPath: '/'});
    const bound = await startedHandler({apiId: 'tenant-a', contextPath: '/api', virtualHost: 'a.example.com'});
    table.register(hostless);
    table.register(bound);

    expect(table.lookupRequest(makeRequest({path: '/api/items', headers: {host: 'a.example.com'}}))).toBe(bound);
    expect(table.lookupRequest(makeRequest({path: '/api/items', headers: {host: 'A.EXAMPLE.COM:8082'}}))).toBe(
      bound
    );
    expect(table.lookupRequest(makeRequest({path: '/api/items', headers: {host: 'b.example.com'}}))).toBe(
      hostless
    );
    expect(
      table.lookupRequest(makeRequest({path: '/api/items', headers: {}, uri: 'http://a.example.com/api/items'}))
    ).toBe(bound);
    expect(
      table.lookupRequest(makeRequest({path: '/api/items', headers: {}, uri: 'http://c.example.com/api/items'}))
    ).toBe(hostless);
  });

  it('routes to a host binding declared with a port', async () => {
    const {table} = createTable();
    const bound = await startedHandler({apiId: 'tenant-a', contextPath: '/api', virtualHost: 'a.example.com:8443'});
    table.register(bound);

    expect(table.lookup({path: '/api/x', host: 'a.example.com:8443'})).toBe(bound);
    expect(table.lookup({path: '/api/x', host: 'a.example.com'})).toBe(bound);
  });

  it('falls back when only host-bound handlers match and the host differs', async () => {
    const {table, fallbackHandler} = createTable();
    table.register(await startedHandler({apiId: 'tenant-a', contextPath: '/api', virtualHost: 'a.example.com'}));

    expect(table.lookup({path: '/api', host: 'b.example.com'})).toBe(fallbackHandler);
    expect(table.lookup({path: '/api'})).toBe(fallbackHandler);
  });

  it('keeps the first registered host-less candidate for overlapping prefixes', async () => {
    const {table} = createTable();
    const root = await startedHandler({apiId: 'root', contextPath: '/'});
    const nested = await startedHandler({apiId: 'nested', contextPath: '/api'});
    table.register(root);
    table.register(nested);

    const picks = Array.from({length: 5}, () => table.lookup({path: '/api/items'}));

    expect(new Set(picks)).toEqual(new Set([root]));
  });

  it('registers at most one handler per context path', async () => {
    const {table} = createTable();
    const first = await startedHandler({apiId: 'first', contextPath: '/orders'});
    const second = await startedHandler({apiId: 'second', contextPath: '/orders/'});

    expect(table.register(first)).toBe(true);
    expect(table.register(second)).toBe(false);
    expect(table.size).toBe(1);
    expect(table.lookup({path: '/orders/1'})).toBe(first);
    expect(table.contextPathOf('first')).toBe('/orders/');
    expect(table.contextPathOf('second')).toBeUndefined();
  });

  it('rejects a second registration for an API that already owns a path', async () => {
    const {table} = createTable();
    table.register(await startedHandler({apiId: 'orders', contextPath: '/orders'}));

    expect(table.register(await startedHandler({apiId: 'orders', contextPath: '/orders-v2'}))).toBe(false);
    expect(table.handlers().map(handler => handler.contextPath)).toEqual(['/orders/']);
  });

  it('lets exactly one of two concurrent registrations for a path win', async () => {
    const {table} = createTable();
    const deploy = async (apiId: string) => {
      const handler = await startedHandler({apiId, contextPath: '/race'});
      return table.register(handler);
    };

    const results = await Promise.all([deploy('left'), deploy('right')]);

    expect(results.filter(Boolean)).toHaveLength(1);
    expect(results.filter(result => !result)).toHaveLength(1);
    expect(table.size).toBe(1);
  });

  it('unregisters by API id and reports absence afterwards', async () => {
    const {table, fallbackHandler} = createTable();
    const orders = await startedHandler({apiId: 'orders', contextPath: '/orders'});
    table.register(orders);

    expect(table.unregisterByApi('orders')).toBe(orders);
    expect(table.unregisterByApi('orders')).toBeUndefined();
    expect(table.contextPathOf('orders')).toBeUndefined();
    expect(table.lookup({path: '/orders'})).toBe(fallbackHandler);
  });

  it('publishes immutable snapshots so readers never see a mutation in progress', async () => {
    const {table} = createTable();
    table.register(await startedHandler({apiId: 'a', contextPath: '/a'}));
    const before = table.handlers();

    table.register(await startedHandler({apiId: 'b', contextPath: '/b'}));

    expect(before.map(handler => handler.apiId)).toEqual(['a']);
    expect(Object.isFrozen(before)).toBe(true);
    expect(table.handlers().map(handler => handler.apiId)).toEqual(['a', 'b']);
  });

  it('clears every entry and returns the removed handlers', async () => {
    const {table} = createTable();
    table.register(await startedHandler({apiId: 'a', contextPath: '/a'}));
    table.register(await startedHandler({apiId: 'b', contextPath: '/b'}));

    const removed = table.clear();

    expect(removed.map(handler => handler.apiId)).toEqual(['a', 'b']);
    expect(table.size).toBe(0);
    expect(table.contextPathOf('a')).toBeUndefined();
  });
});
