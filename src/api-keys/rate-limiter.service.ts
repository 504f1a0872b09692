import { Injectable } from '@nestjs/common';

import {
  ApiKey,
  QuotaDenialReason,
  QuotaSnapshot,
  QuotaWindow,
  RateLimitDecision,
} from './types';

export const MINUTE_SECONDS = 60;
export const DAY_SECONDS = 86_400;

type WindowState = {
  window: QuotaWindow;
  limit: number;
  lengthSeconds: number;
  reason: QuotaDenialReason;
};

export function bucketFor(nowMs: number, lengthSeconds: number): number {
  return Math.floor(nowMs / 1000 / lengthSeconds);
}

/** Count of a window as seen at `nowMs`; a stale bucket counts as zero. */
export function currentCount(window: QuotaWindow, nowMs: number, lengthSeconds: number): number {
  return window.bucket === bucketFor(nowMs, lengthSeconds) ? window.count : 0;
}

/**
 * Fixed-window quotas: one bucket per UTC minute and one per UTC day.
 * A burst of up to 2x the limit across a boundary is accepted in exchange
 * for O(1) state per key.
 */
@Injectable()
export class RateLimiterService {
  /**
   * Decide without mutating anything but window rollover. Denial reasons are
   * checked day first, so an exhausted day always reports DailyQuotaExceeded.
   */
  evaluate(key: ApiKey, nowMs: number): RateLimitDecision {
    const windows = this.rollOver(key, nowMs);
    for (const state of windows) {
      if (state.limit > 0 && state.window.count >= state.limit) {
        const resetAt = (state.window.bucket + 1) * state.lengthSeconds;
        return {
          allowed: false,
          reason: state.reason,
          retryAfter: Math.max(1, Math.ceil(resetAt - nowMs / 1000)),
          quota: { limit: state.limit, remaining: 0, resetAt },
        };
      }
    }

    return { allowed: true, quota: this.snapshot(windows) };
  }

  /**
   * Evaluate and, on admission, bump both windows, the lifetime counter and
   * lastUsedAt in one synchronous step. Callers hold the key's lock.
   */
  consume(key: ApiKey, nowMs: number): RateLimitDecision {
    const decision = this.evaluate(key, nowMs);
    if (!decision.allowed) {
      return decision;
    }

    key.minuteWindow.count += 1;
    key.dayWindow.count += 1;
    key.totalRequests += 1;
    key.lastUsedAt = new Date(nowMs).toISOString();

    return { allowed: true, quota: this.snapshot(this.windowsOf(key)) };
  }

  private rollOver(key: ApiKey, nowMs: number): WindowState[] {
    const minuteBucket = bucketFor(nowMs, MINUTE_SECONDS);
    if (key.minuteWindow.bucket !== minuteBucket) {
      key.minuteWindow = { bucket: minuteBucket, count: 0 };
    }

    const dayBucket = bucketFor(nowMs, DAY_SECONDS);
    if (key.dayWindow.bucket !== dayBucket) {
      key.dayWindow = { bucket: dayBucket, count: 0 };
    }

    return this.windowsOf(key);
  }

  private windowsOf(key: ApiKey): WindowState[] {
    return [
      {
        window: key.dayWindow,
        limit: key.rateLimitPerDay,
        lengthSeconds: DAY_SECONDS,
        reason: 'DailyQuotaExceeded',
      },
      {
        window: key.minuteWindow,
        limit: key.rateLimitPerMinute,
        lengthSeconds: MINUTE_SECONDS,
        reason: 'MinuteQuotaExceeded',
      },
    ];
  }

  private snapshot(windows: WindowState[]): QuotaSnapshot | null {
    let tightest: QuotaSnapshot | null = null;
    for (const state of windows) {
      if (state.limit <= 0) {
        continue;
      }
      const remaining = Math.max(0, state.limit - state.window.count);
      if (!tightest || remaining < tightest.remaining) {
        tightest = {
          limit: state.limit,
          remaining,
          resetAt: (state.window.bucket + 1) * state.lengthSeconds,
        };
      }
    }
    return tightest;
  }
}
