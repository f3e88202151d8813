import {readFile} from 'node:fs/promises'
import {isDeepStrictEqual} from 'node:util'

import {createComponentLogger, type ComponentLogger, type StructuredLogger} from '@gatehouse/logging'
import {toErrorMessage, type DeploymentEventBus} from '@gatehouse/reactor'
import {ApiDefinitionListSchema, type ApiDefinition, type DeploymentEventContract} from '@gatehouse/schemas'

export type ApiSource = {
  path?: string
  inline?: unknown
}

const parseDefinitions = ({raw, origin}: {raw: unknown; origin: string}): ApiDefinition[] => {
  const candidate = typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'apis' in raw ? raw.apis : raw
  const parsed = ApiDefinitionListSchema.safeParse(candidate)
  if (!parsed.success) {
    const reasons = parsed.error.issues.map(issue => issue.message).join('; ')
    throw new Error(`${origin} contains invalid API definitions: ${reasons}`)
  }

  return parsed.data
}

/**
 * Reads API definitions from a JSON file or inline JSON. Either source may
 * hold a bare array or an object with an `apis` array. No source means no APIs.
 */
export const loadApiDefinitions = async ({path, inline}: ApiSource): Promise<ApiDefinition[]> => {
  if (path) {
    const contents = await readFile(path, 'utf8')
    let raw: unknown
    try {
      raw = JSON.parse(contents) as unknown
    } catch {
      throw new Error(`${path} is not valid JSON`)
    }

    return parseDefinitions({raw, origin: path})
  }

  if (inline !== undefined) {
    return parseDefinitions({raw: inline, origin: 'GATEWAY_APIS_JSON'})
  }

  return []
}

/**
 * Events that move a deployed set of definitions to `next`. Removals come
 * first so a context path freed by one API is available to another.
 */
export const diffApiDefinitions = (
  current: ReadonlyMap<string, ApiDefinition>,
  next: readonly ApiDefinition[]
): DeploymentEventContract[] => {
  const nextIds = new Set(next.map(api => api.id))
  const removed = [...current.values()]
    .filter(api => !nextIds.has(api.id))
    .map((api): DeploymentEventContract => ({type: 'undeploy', api}))

  const changed: DeploymentEventContract[] = []
  const added: DeploymentEventContract[] = []
  for (const api of next) {
    const previous = current.get(api.id)
    if (!previous) {
      added.push({type: 'deploy', api})
    } else if (!isDeepStrictEqual(previous, api)) {
      changed.push({type: 'update', api})
    }
  }

  return [...removed, ...changed, ...added]
}

export type ApiRegistryOptions = {
  bus: Pick<DeploymentEventBus, 'publish'>
  source: ApiSource
  logger: StructuredLogger
  reloadIntervalMs?: number
}

/**
 * Last known set of API definitions. Every change to the set is published on
 * the deployment bus as deploy, update or undeploy events.
 */
export class ApiRegistry {
  private readonly bus: Pick<DeploymentEventBus, 'publish'>
  private readonly source: ApiSource
  private readonly logger: ComponentLogger
  private readonly reloadIntervalMs: number
  private readonly current = new Map<string, ApiDefinition>()
  private reloadTimer: NodeJS.Timeout | undefined
  private reloading: Promise<unknown> = Promise.resolve()

  public constructor({bus, source, logger, reloadIntervalMs = 0}: ApiRegistryOptions) {
    this.bus = bus
    this.source = source
    this.logger = createComponentLogger({logger, component: 'gateway.registry'})
    this.reloadIntervalMs = reloadIntervalMs
  }

  public definitions(): ApiDefinition[] {
    return [...this.current.values()]
  }

  public async apply(next: readonly ApiDefinition[]): Promise<DeploymentEventContract[]> {
    const events = diffApiDefinitions(this.current, next)
    for (const event of events) {
      if (event.type === 'undeploy') {
        this.current.delete(event.api.id)
      } else {
        this.current.set(event.api.id, event.api)
      }

      const published = await this.bus.publish(event)
      if (!published.ok) {
        this.logger.warn({
          event: 'gateway.registry.publish_rejected',
          message: published.error.message,
          api_id: event.api.id,
          reason_code: published.error.code
        })
      }
    }

    if (events.length > 0) {
      this.logger.info({
        event: 'gateway.registry.applied',
        message: `Applied ${events.length} API change(s)`,
        metadata: {changes: events.map(event => ({type: event.type, api_id: event.api.id}))}
      })
    }

    return events
  }

  /** Loads the source and applies it. Failures propagate to the caller. */
  public async load(): Promise<DeploymentEventContract[]> {
    return this.apply(await loadApiDefinitions(this.source))
  }

  /** Like `load`, but keeps the current definitions when the source is unreadable. */
  public async reload(): Promise<DeploymentEventContract[]> {
    const run = this.reloading.then(async () => {
      try {
        return await this.load()
      } catch (error) {
        this.logger.error({
          event: 'gateway.registry.reload_failed',
          message: toErrorMessage(error),
          reason_code: 'api_source_invalid',
          metadata: {error}
        })
        return []
      }
    })
    this.reloading = run
    return run
  }

  public async start(): Promise<void> {
    await this.load()
    if (this.reloadIntervalMs > 0 && !this.reloadTimer) {
      this.reloadTimer = setInterval(() => {
        void this.reload()
      }, this.reloadIntervalMs)
      this.reloadTimer.unref()
    }
  }

  public async stop(): Promise<void> {
    if (this.reloadTimer) {
      clearInterval(this.reloadTimer)
      this.reloadTimer = undefined
    }

    await this.reloading
  }
}
