import { Injectable } from '@nestjs/common';

import { ApiKeyStore, toView } from './api-key-store.service';
import { RateLimiterService } from './rate-limiter.service';
import { SecretGenerator } from './secret-generator';
import { GateDecision } from './types';

/**
 * Admission decision for OCR-class requests. Holds no state: it reads the
 * store and, on admission, commits the quota increment through it. Quota is
 * consumed at admission, so an aborted request still counts.
 */
@Injectable()
export class ApiKeyGate {
  constructor(
    private readonly store: ApiKeyStore,
    private readonly rateLimiter: RateLimiterService,
    private readonly secretGenerator: SecretGenerator,
  ) {}

  async check(presentedSecret: string | null | undefined, nowMs = Date.now()): Promise<GateDecision> {
    const secret = presentedSecret?.trim() ?? '';
    if (secret.length === 0) {
      return { outcome: 'missing' };
    }

    if (!this.secretGenerator.looksLikeSecret(secret)) {
      return { outcome: 'unknown' };
    }

    const found = this.store.findByHash(this.secretGenerator.hash(secret));
    if (!found) {
      return { outcome: 'unknown' };
    }

    const decision = await this.store.mutateCounters(found.id, (record): GateDecision => {
      // Re-read under the key lock: a deactivation may have landed since lookup.
      if (!record.isActive) {
        return { outcome: 'inactive' };
      }

      const limit = this.rateLimiter.consume(record, nowMs);
      if (!limit.allowed) {
        return {
          outcome: 'rate_limited',
          keyId: record.id,
          reason: limit.reason,
          retryAfter: limit.retryAfter,
          quota: limit.quota,
        };
      }

      return { outcome: 'admitted', key: toView(record), quota: limit.quota };
    });

    return decision ?? { outcome: 'unknown' };
  }
}
