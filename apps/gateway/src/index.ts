import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@gatehouse/logging'

import {createGatewayApp} from './app'
import {loadConfig} from './config'

export const appName = 'gateway'

export * from './apiRegistry'
export * from './app'
export * from './config'
export * from './errors'
export * from './handlers/apiProxyHandler'
export * from './handlers/handlerFactory'
export * from './http'
export * from './reporters/accessLogReporter'
export * from './transport'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createGatewayApp({config})

  await app.start()

  const shutdown = async () => {
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Gateway startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
