import { Module } from '@nestjs/common';

import { AdminSessionsModule } from '../admin-sessions/admin-sessions.module';
import { ApiKeyGate } from './api-key-gate.service';
import { ApiKeyStore } from './api-key-store.service';
import { ApiKeysAdminController } from './api-keys-admin.controller';
import { OcrAccessGuard } from './ocr-access.guard';
import { RateLimiterService } from './rate-limiter.service';
import { SecretGenerator } from './secret-generator';

@Module({
  imports: [AdminSessionsModule],
  controllers: [ApiKeysAdminController],
  providers: [SecretGenerator, ApiKeyStore, RateLimiterService, ApiKeyGate, OcrAccessGuard],
  exports: [ApiKeyStore, ApiKeyGate, OcrAccessGuard],
})
export class ApiKeysModule {}
