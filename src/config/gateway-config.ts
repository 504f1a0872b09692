import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const GATEWAY_CONFIG = Symbol('GATEWAY_CONFIG');

export type GatewayConfig = {
  apiKeysFile: string;
  defaultRateLimitPerMinute: number;
  defaultRateLimitPerDay: number;
  admin: {
    username: string;
    password: string;
    sessionSecret: string;
    sessionTtlSeconds: number;
    loginRateLimitPerMinute: number;
  };
};

const logger = new Logger('GatewayConfig');

/**
 * Collect the gate's settings once at startup. Services receive this object
 * through the GATEWAY_CONFIG token instead of reading ConfigService themselves.
 */
export function buildGatewayConfig(configService: ConfigService): GatewayConfig {
  return {
    apiKeysFile: configService.get<string>('API_KEYS_FILE') ?? 'data/api_keys.json',
    defaultRateLimitPerMinute: parseLimit(
      configService.get<unknown>('API_KEYS_DEFAULT_RATE_LIMIT_PER_MINUTE'),
      60,
      'API_KEYS_DEFAULT_RATE_LIMIT_PER_MINUTE',
    ),
    defaultRateLimitPerDay: parseLimit(
      configService.get<unknown>('API_KEYS_DEFAULT_RATE_LIMIT_PER_DAY'),
      1000,
      'API_KEYS_DEFAULT_RATE_LIMIT_PER_DAY',
    ),
    admin: {
      username: configService.get<string>('ADMIN_USERNAME') ?? 'admin',
      password: configService.get<string>('ADMIN_PASSWORD') ?? '',
      sessionSecret: configService.get<string>('ADMIN_SESSION_SECRET') ?? '',
      sessionTtlSeconds: parsePositiveInteger(
        configService.get<unknown>('ADMIN_SESSION_TTL_SECONDS'),
        604800,
        'ADMIN_SESSION_TTL_SECONDS',
      ),
      loginRateLimitPerMinute: parsePositiveInteger(
        configService.get<unknown>('ADMIN_LOGIN_RATE_LIMIT_PER_MINUTE'),
        5,
        'ADMIN_LOGIN_RATE_LIMIT_PER_MINUTE',
      ),
    },
  };
}

function parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (Number.isInteger(parsed) && parsed > 0) {
    return parsed;
  }

  logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
  return fallback;
}

// Quota limits accept zero ("unlimited").
function parseLimit(value: unknown, fallback: number, fieldName: string): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (Number.isInteger(parsed) && parsed >= 0) {
    return parsed;
  }

  logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
  return fallback;
}
