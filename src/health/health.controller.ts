import { Controller, Get } from '@nestjs/common';

import { ApiKeyStore } from '../api-keys/api-key-store.service';

type KeyStoreHealth = { status: 'ok' | 'degraded' };

@Controller('health')
export class HealthController {
  constructor(private readonly apiKeyStore: ApiKeyStore) {}

  @Get()
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  /** Public, so it reports state only; details are at GET /admin/storage. */
  @Get('keys')
  getKeyStoreHealth(): KeyStoreHealth {
    return { status: this.apiKeyStore.status().lastPersistError ? 'degraded' : 'ok' };
  }
}
