import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';

import { hashKeyForLogging } from '../utils/hash';
import { ApiKeyGate } from './api-key-gate.service';
import { ApiKeyView, QuotaDenialReason, QuotaSnapshot } from './types';

export type RequestWithApiKey = FastifyRequest & {
  apiKey?: ApiKeyView;
};

const DENIAL_MESSAGES: Record<QuotaDenialReason, string> = {
  MinuteQuotaExceeded: 'Rate limit exceeded: too many requests per minute',
  DailyQuotaExceeded: 'Rate limit exceeded: daily limit reached',
};

@Injectable()
export class OcrAccessGuard implements CanActivate {
  private readonly logger = new Logger(OcrAccessGuard.name);

  constructor(private readonly gate: ApiKeyGate) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithApiKey>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const apiKeyHeader = request.headers['x-api-key'];
    const rawApiKey = Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;

    try {
      const decision = await this.gate.check(rawApiKey ?? null);
      switch (decision.outcome) {
        case 'admitted':
          request.apiKey = decision.key;
          if (decision.quota) {
            this.applyRateLimitHeaders(reply, decision.quota);
          }
          return true;
        case 'rate_limited':
          this.logger.warn(
            `Quota denial for keyId hash ${hashKeyForLogging(decision.keyId)}: ${decision.reason}`,
          );
          this.applyRateLimitHeaders(reply, decision.quota);
          reply.header('retry-after', String(decision.retryAfter));
          throw new HttpException(
            { message: DENIAL_MESSAGES[decision.reason], reason: decision.reason },
            HttpStatus.TOO_MANY_REQUESTS,
          );
        case 'missing':
        case 'unknown':
        case 'inactive':
          // Same response for all three.
          reply.header('www-authenticate', 'API-Key');
          throw new UnauthorizedException('Invalid or missing API key');
      }
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error(
        'API key admission failed',
        error instanceof Error ? error.stack : String(error),
      );
      throw new ServiceUnavailableException('API access validation failed');
    }
  }

  private applyRateLimitHeaders(reply: FastifyReply, quota: QuotaSnapshot): void {
    reply.header('x-ratelimit-limit', String(quota.limit));
    reply.header('x-ratelimit-remaining', String(quota.remaining));
    reply.header('x-ratelimit-reset', String(quota.resetAt));
  }
}
