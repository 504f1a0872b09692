import { ApiKey } from '../src/api-keys/types';
import { GatewayConfig } from '../src/config/gateway-config';

export const ADMIN_PASSWORD = 'test-password';
export const SESSION_SECRET = 'test-secret-test-secret';

export function buildTestConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    apiKeysFile: '/tmp/ocr-gateway-unused.json',
    defaultRateLimitPerMinute: 60,
    defaultRateLimitPerDay: 1000,
    ...overrides,
    admin: {
      username: 'admin',
      password: ADMIN_PASSWORD,
      sessionSecret: SESSION_SECRET,
      sessionTtlSeconds: 3600,
      loginRateLimitPerMinute: 5,
      ...overrides.admin,
    },
  };
}

export function buildApiKey(overrides: Partial<ApiKey> = {}): ApiKey {
  return {
    id: 'key-1',
    name: 'scanner-prod',
    secretHash: 'a'.repeat(64),
    createdAt: '2026-01-01T00:00:00.000Z',
    isActive: true,
    rateLimitPerMinute: 60,
    rateLimitPerDay: 1000,
    totalRequests: 0,
    lastUsedAt: null,
    minuteWindow: { bucket: 0, count: 0 },
    dayWindow: { bucket: 0, count: 0 },
    ...overrides,
  };
}
