import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';

import { AdminAuthController } from './admin-auth.controller';
import { AdminAuthGuard } from './admin-auth.guard';
import { AdminSessionService } from './admin-session.service';
import { LoginThrottleService } from './login-throttle.service';

@Module({
  // Secrets are passed per call from GATEWAY_CONFIG.
  imports: [JwtModule.register({})],
  controllers: [AdminAuthController],
  providers: [AdminSessionService, AdminAuthGuard, LoginThrottleService],
  exports: [AdminSessionService, AdminAuthGuard],
})
export class AdminSessionsModule {}
