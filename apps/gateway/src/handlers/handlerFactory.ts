import type {StructuredLogger} from '@gatehouse/logging'
import type {HandlerFactory} from '@gatehouse/reactor'
import type {ApiDefinition} from '@gatehouse/schemas'

import {ApiProxyHandler, type FetchLike} from './apiProxyHandler'

export const createApiHandlerFactory = ({
  timeoutMs,
  logger,
  fetchImpl
}: {
  timeoutMs: number
  logger: StructuredLogger
  fetchImpl?: FetchLike
}): HandlerFactory<ApiDefinition> =>
  api =>
    new ApiProxyHandler({
      api,
      timeoutMs,
      logger,
      ...(fetchImpl ? {fetchImpl} : {})
    })
