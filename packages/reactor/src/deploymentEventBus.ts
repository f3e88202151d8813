import {
  createComponentLogger,
  createNoopLogger,
  type ComponentLogger,
  type StructuredLogger
} from '@gatehouse/logging';
import {DeploymentEventSchema, type ApiDefinition} from '@gatehouse/schemas';

import type {DeploymentEvent, DeploymentListener, DeploymentSource} from './contracts';
import {err, ok, toErrorMessage, type ReactorResult} from './errors';

/**
 * In-process deployment source. Publishing validates the event and awaits
 * every subscriber; subscriber failures are logged, never rethrown.
 */
export class DeploymentEventBus implements DeploymentSource<ApiDefinition> {
  private readonly listeners = new Set<DeploymentListener<ApiDefinition>>();
  private readonly logger: ComponentLogger;

  public constructor({logger}: {logger?: StructuredLogger} = {}) {
    this.logger = createComponentLogger({logger: logger ?? createNoopLogger(), component: 'reactor.events'});
  }

  public get subscriberCount(): number {
    return this.listeners.size;
  }

  public subscribe(listener: DeploymentListener<ApiDefinition>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public async publish(rawEvent: unknown): Promise<ReactorResult<DeploymentEvent<ApiDefinition>>> {
    const parsed = DeploymentEventSchema.safeParse(rawEvent);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => issue.message).join('; ');
      this.logger.warn({
        event: 'reactor.events.rejected',
        message,
        reason_code: 'deployment_event_invalid'
      });
      return err('deployment_event_invalid', message);
    }

    const event = parsed.data;
    for (const listener of [...this.listeners]) {
      try {
        await listener(event);
      } catch (error) {
        this.logger.error({
          event: 'reactor.events.listener_failed',
          message: toErrorMessage(error),
          api_id: event.api.id,
          metadata: {type: event.type, error}
        });
      }
    }

    return ok(event);
  }
}
