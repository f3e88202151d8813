import {createComponentLogger, type ComponentLogger, type StructuredLogger} from '@gatehouse/logging'
import {resolveRequestHost, type AccessReport, type Reporter} from '@gatehouse/reactor'
import {AccessRecordSchema, type AccessRecord} from '@gatehouse/schemas'

export const toAccessRecord = ({request, response, elapsed_ms}: AccessReport): AccessRecord => {
  const host = resolveRequestHost(request)
  return AccessRecordSchema.parse({
    request_id: request.id,
    method: request.method,
    path: request.path,
    ...(host ? {host} : {}),
    ...(response.metrics.api_id ? {api_id: response.metrics.api_id} : {}),
    status_code: response.status,
    elapsed_ms
  })
}

/** Writes one `gateway.access` line per answered request. */
export class AccessLogReporter implements Reporter {
  private readonly logger: ComponentLogger

  public constructor({logger}: {logger: StructuredLogger}) {
    this.logger = createComponentLogger({logger, component: 'gateway.access'})
  }

  public report(input: AccessReport): void {
    const record = toAccessRecord(input)
    const line = {
      event: 'gateway.access',
      message: `${record.method} ${record.path} ${record.status_code}`,
      request_id: record.request_id,
      route: record.path.length > 0 ? record.path : '/',
      method: record.method,
      status_code: record.status_code,
      duration_ms: Math.round(record.elapsed_ms),
      ...(record.api_id ? {api_id: record.api_id} : {}),
      metadata: record.host ? {host: record.host} : {}
    }

    if (record.status_code >= 500) {
      this.logger.error(line)
    } else if (record.status_code >= 400) {
      this.logger.warn(line)
    } else {
      this.logger.info(line)
    }
  }
}
