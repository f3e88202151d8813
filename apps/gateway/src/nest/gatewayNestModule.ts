import {All, Controller, DynamicModule, Inject, Module, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {StructuredLogger} from '@gatehouse/logging'
import type {Reactor} from '@gatehouse/reactor'

import {createReactorRequestHandler, type ReactorRequestHandler} from '../transport'
import {GATEWAY_LOGGER, GATEWAY_MAX_BODY_BYTES, GATEWAY_REACTOR, GATEWAY_REQUEST_HANDLER} from './tokens'

export type GatewayNestModuleOptions = {
  reactor: Pick<Reactor, 'process'>
  logger: StructuredLogger
  maxBodyBytes: number
}

@Controller()
export class GatewayController {
  public constructor(
    @Inject(GATEWAY_REQUEST_HANDLER)
    private readonly requestHandler: ReactorRequestHandler
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.requestHandler(request, response)
  }
}

@Module({
  controllers: [GatewayController]
})
export class GatewayNestModule {
  public static register(options: GatewayNestModuleOptions): DynamicModule {
    return {
      module: GatewayNestModule,
      providers: [
        {
          provide: GATEWAY_REACTOR,
          useValue: options.reactor
        },
        {
          provide: GATEWAY_LOGGER,
          useValue: options.logger
        },
        {
          provide: GATEWAY_MAX_BODY_BYTES,
          useValue: options.maxBodyBytes
        },
        {
          provide: GATEWAY_REQUEST_HANDLER,
          inject: [GATEWAY_REACTOR, GATEWAY_LOGGER, GATEWAY_MAX_BODY_BYTES],
          useFactory: (reactor: Pick<Reactor, 'process'>, logger: StructuredLogger, maxBodyBytes: number) =>
            createReactorRequestHandler({reactor, logger, maxBodyBytes})
        }
      ]
    }
  }
}
