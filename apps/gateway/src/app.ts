import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import {createStructuredLogger, type StructuredLogger} from '@gatehouse/logging'
import {DeploymentEventBus, Reactor, ReporterService} from '@gatehouse/reactor'
import type {ApiDefinition} from '@gatehouse/schemas'

import {ApiRegistry} from './apiRegistry'
import type {ServiceConfig} from './config'
import type {FetchLike} from './handlers/apiProxyHandler'
import {createApiHandlerFactory} from './handlers/handlerFactory'
import {GatewayNestModule} from './nest/gatewayNestModule'
import {AccessLogReporter} from './reporters/accessLogReporter'

export const createGatewayApp = async ({
  config,
  logger: providedLogger,
  fetchImpl
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
}) => {
  const logger =
    providedLogger ??
    createStructuredLogger({
      service: 'gateway',
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })

  const reporterService = new ReporterService({
    reporters: [new AccessLogReporter({logger})],
    logger
  })
  const bus = new DeploymentEventBus({logger})
  const reactor = new Reactor<ApiDefinition>({
    handlerFactory: createApiHandlerFactory({
      timeoutMs: config.upstream.timeoutMs,
      logger,
      ...(fetchImpl ? {fetchImpl} : {})
    }),
    reporter: reporterService,
    deploymentSource: bus,
    logger
  })
  const registry = new ApiRegistry({
    bus,
    source: {
      ...(config.apis.path ? {path: config.apis.path} : {}),
      ...(config.apis.inline !== undefined ? {inline: config.apis.inline} : {})
    },
    reloadIntervalMs: config.apis.reloadIntervalMs,
    logger
  })

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )

  const nestApp = await NestFactory.create(
    GatewayNestModule.register({
      reactor,
      logger,
      maxBodyBytes: config.maxBodyBytes
    }),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
    }
  )

  await nestApp.init()

  const server: Server = nestApp.getHttpServer()

  const start = async () => {
    await reporterService.start()
    await reactor.start()
    await registry.start()
    await nestApp.listen(config.port, config.host)
    logger.info({
      event: 'gateway.started',
      component: 'gateway.app',
      message: `Gateway listening on ${config.host}:${config.port}`,
      metadata: {apis: registry.definitions().length}
    })
  }

  const stop = async () => {
    await registry.stop()
    await Promise.allSettled([nestApp.close(), reactor.stop()])
    await reporterService.stop()
    logger.info({
      event: 'gateway.stopped',
      component: 'gateway.app',
      message: 'Gateway stopped'
    })
  }

  return {
    server,
    start,
    stop,
    reactor,
    registry,
    bus,
    reporterService
  }
}

export type GatewayApp = Awaited<ReturnType<typeof createGatewayApp>>
