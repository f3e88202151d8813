import {
  createComponentLogger,
  createNoopLogger,
  type ComponentLogger,
  type StructuredLogger
} from '@gatehouse/logging';

import type {AccessReport, Reporter} from './contracts';
import {toErrorMessage} from './errors';

/**
 * Fans every access record out to the registered reporters. A reporter that
 * throws or rejects is logged and skipped; the others still receive the record.
 */
export class ReporterService implements Reporter {
  private readonly reporters: Reporter[] = [];
  private readonly logger: ComponentLogger;

  public constructor({reporters = [], logger}: {reporters?: Reporter[]; logger?: StructuredLogger} = {}) {
    this.logger = createComponentLogger({logger: logger ?? createNoopLogger(), component: 'reactor.reporter'});
    for (const reporter of reporters) {
      this.register(reporter);
    }
  }

  public register(reporter: Reporter): void {
    this.reporters.push(reporter);
  }

  public get size(): number {
    return this.reporters.length;
  }

  public async report(input: AccessReport): Promise<void> {
    await Promise.all(
      this.reporters.map(async reporter => {
        try {
          await reporter.report(input);
        } catch (error) {
          this.logger.warn({
            event: 'reactor.reporter.report_failed',
            message: toErrorMessage(error),
            request_id: input.request.id,
            metadata: {error}
          });
        }
      })
    );
  }

  public async start(): Promise<void> {
    for (const reporter of this.reporters) {
      await reporter.start?.();
    }
  }

  public async stop(): Promise<void> {
    const results = await Promise.allSettled(this.reporters.map(async reporter => reporter.stop?.()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error({
          event: 'reactor.reporter.stop_failed',
          message: toErrorMessage(result.reason),
          metadata: {error: result.reason}
        });
      }
    }
  }
}
