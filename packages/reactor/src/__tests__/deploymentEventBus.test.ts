import {describe, expect, it, vi} from 'vitest';

import type {StructuredLogger} from '@gatehouse/logging';

import {DeploymentEventBus} from '../deploymentEventBus';
import {makeApi} from './fixtures';

const createSpyLogger = (): StructuredLogger => ({
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn()
});

describe('DeploymentEventBus', () => {
  it('validates events and delivers them to subscribers in order', async () => {
    const bus = new DeploymentEventBus();
    const seen: string[] = [];
    bus.subscribe(event => void seen.push(`first:${event.type}:${event.api.id}`));
    bus.subscribe(event => void seen.push(`second:${event.type}:${event.api.id}`));

    const result = await bus.publish({type: 'deploy', api: makeApi()});

    expect(result.ok).toBe(true);
    expect(seen).toEqual(['first:deploy:orders', 'second:deploy:orders']);
  });

  it('applies schema defaults before delivery', async () => {
    const bus = new DeploymentEventBus();
    const listener = vi.fn();
    bus.subscribe(listener);

    await bus.publish({
      type: 'deploy',
      api: {id: 'orders', context_path: '/orders', endpoint: 'http://127.0.0.1:9000', virtual_host: 'A.Example.com'}
    });

    expect(listener).toHaveBeenCalledWith({
      type: 'deploy',
      api: {
        id: 'orders',
        enabled: true,
        context_path: '/orders',
        endpoint: 'http://127.0.0.1:9000',
        virtual_host: 'a.example.com',
        strip_context_path: true
      }
    });
  });

  it('rejects malformed events without notifying subscribers', async () => {
    const logger = createSpyLogger();
    const bus = new DeploymentEventBus({logger});
    const listener = vi.fn();
    bus.subscribe(listener);

    const result = await bus.publish({type: 'redeploy', api: makeApi()});

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.code).toBe('deployment_event_invalid');
    expect(listener).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({event: 'reactor.events.rejected'}));
  });

  it('keeps delivering when a subscriber fails', async () => {
    const logger = createSpyLogger();
    const bus = new DeploymentEventBus({logger});
    const after = vi.fn();
    bus.subscribe(async () => {
      throw new Error('subscriber crashed');
    });
    bus.subscribe(after);

    await expect(bus.publish({type: 'undeploy', api: makeApi()})).resolves.toMatchObject({ok: true});

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({event: 'reactor.events.listener_failed', api_id: 'orders'})
    );
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new DeploymentEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    unsubscribe();
    await bus.publish({type: 'deploy', api: makeApi()});

    expect(bus.subscriberCount).toBe(0);
    expect(listener).not.toHaveBeenCalled();
  });
});
