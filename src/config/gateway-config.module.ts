import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { GATEWAY_CONFIG, buildGatewayConfig } from './gateway-config';

@Global()
@Module({
  providers: [
    {
      provide: GATEWAY_CONFIG,
      inject: [ConfigService],
      useFactory: buildGatewayConfig,
    },
  ],
  exports: [GATEWAY_CONFIG],
})
export class GatewayConfigModule {}
