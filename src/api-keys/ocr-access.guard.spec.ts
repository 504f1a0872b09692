import {
  ExecutionContext,
  HttpException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';

import { buildApiKey } from '../../test/fixtures';
import { ApiKeyGate } from './api-key-gate.service';
import { toView } from './api-key-store.service';
import { OcrAccessGuard } from './ocr-access.guard';
import { GateDecision } from './types';

describe('OcrAccessGuard', () => {
  let gate: { check: jest.Mock<Promise<GateDecision>, [string | null]> };
  let guard: OcrAccessGuard;
  let reply: { header: jest.Mock };

  const buildContext = (request: Record<string, unknown>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => reply,
      }),
    }) as unknown as ExecutionContext;

  beforeEach(() => {
    gate = { check: jest.fn() };
    reply = { header: jest.fn() };
    guard = new OcrAccessGuard(gate as unknown as ApiKeyGate);
  });

  it('attaches the admitted key and quota headers', async () => {
    const key = toView(buildApiKey());
    gate.check.mockResolvedValue({
      outcome: 'admitted',
      key,
      quota: { limit: 60, remaining: 59, resetAt: 1768471260 },
    });
    const request: Record<string, unknown> = { headers: { 'x-api-key': 'ocr_presented' } };

    await expect(guard.canActivate(buildContext(request))).resolves.toBe(true);

    expect(gate.check).toHaveBeenCalledWith('ocr_presented');
    expect(request.apiKey).toBe(key);
    expect(reply.header).toHaveBeenCalledWith('x-ratelimit-limit', '60');
    expect(reply.header).toHaveBeenCalledWith('x-ratelimit-remaining', '59');
    expect(reply.header).toHaveBeenCalledWith('x-ratelimit-reset', '1768471260');
  });

  it('sets no quota headers for an unlimited key', async () => {
    gate.check.mockResolvedValue({ outcome: 'admitted', key: toView(buildApiKey()), quota: null });

    await guard.canActivate(buildContext({ headers: { 'x-api-key': 'ocr_presented' } }));

    expect(reply.header).not.toHaveBeenCalled();
  });

  it.each(['missing', 'unknown', 'inactive'] as const)(
    'answers %s keys with the same 401',
    async (outcome) => {
      gate.check.mockResolvedValue({ outcome });

      const failure = guard.canActivate(buildContext({ headers: {} }));

      await expect(failure).rejects.toThrow(new UnauthorizedException('Invalid or missing API key'));
      expect(gate.check).toHaveBeenCalledWith(null);
      expect(reply.header).toHaveBeenCalledWith('www-authenticate', 'API-Key');
    },
  );

  it('answers a quota denial with 429 and retry-after', async () => {
    gate.check.mockResolvedValue({
      outcome: 'rate_limited',
      keyId: 'key-1',
      reason: 'DailyQuotaExceeded',
      retryAfter: 3600,
      quota: { limit: 1000, remaining: 0, resetAt: 1768521600 },
    });

    let caught: unknown;
    try {
      await guard.canActivate(buildContext({ headers: { 'x-api-key': 'ocr_presented' } }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HttpException);
    if (!(caught instanceof HttpException)) {
      return;
    }
    expect(caught.getStatus()).toBe(429);
    expect(caught.getResponse()).toEqual({
      message: 'Rate limit exceeded: daily limit reached',
      reason: 'DailyQuotaExceeded',
    });
    expect(reply.header).toHaveBeenCalledWith('retry-after', '3600');
    expect(reply.header).toHaveBeenCalledWith('x-ratelimit-remaining', '0');
  });

  it('maps unexpected gate failures to 503', async () => {
    gate.check.mockRejectedValue(new Error('store unavailable'));

    await expect(
      guard.canActivate(buildContext({ headers: { 'x-api-key': 'ocr_presented' } })),
    ).rejects.toBeInstanceOf(ServiceUnavailableException);
  });
});
