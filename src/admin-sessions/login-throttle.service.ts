import { Inject, Injectable } from '@nestjs/common';

import { MINUTE_SECONDS, bucketFor } from '../api-keys/rate-limiter.service';
import { QuotaWindow } from '../api-keys/types';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/gateway-config';
import { LoginAttemptResult } from './types';

/** Fixed one-minute window of login attempts per client address. */
@Injectable()
export class LoginThrottleService {
  private readonly windows = new Map<string, QuotaWindow>();

  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  consume(clientAddress: string | undefined, nowMs = Date.now()): LoginAttemptResult {
    const limit = this.config.admin.loginRateLimitPerMinute;
    const bucket = bucketFor(nowMs, MINUTE_SECONDS);
    const identifier = clientAddress?.trim() || 'unknown';
    this.prune(bucket);

    const window = this.windows.get(identifier) ?? { bucket, count: 0 };
    const resetAt = (bucket + 1) * MINUTE_SECONDS;
    const retryAfter = Math.max(1, Math.ceil(resetAt - nowMs / 1000));
    if (window.count >= limit) {
      return { allowed: false, limit, remaining: 0, retryAfter };
    }

    window.count += 1;
    this.windows.set(identifier, window);
    return { allowed: true, limit, remaining: limit - window.count, retryAfter };
  }

  private prune(currentBucket: number): void {
    for (const [identifier, window] of this.windows) {
      if (window.bucket !== currentBucket) {
        this.windows.delete(identifier);
      }
    }
  }
}
