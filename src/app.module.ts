import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AdminSessionsModule } from './admin-sessions/admin-sessions.module';
import { ApiKeysModule } from './api-keys/api-keys.module';
import { envValidationSchema } from './config/env.validation';
import { GatewayConfigModule } from './config/gateway-config.module';
import { HealthModule } from './health/health.module';
import { OcrModule } from './ocr/ocr.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
    GatewayConfigModule,
    AdminSessionsModule,
    ApiKeysModule,
    HealthModule,
    OcrModule,
  ],
})
export class AppModule {}
