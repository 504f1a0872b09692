export type QuotaWindow = {
  bucket: number;
  count: number;
};

export type ApiKey = {
  id: string;
  name: string;
  secretHash: string;
  createdAt: string;
  isActive: boolean;
  deactivatedAt?: string;
  // 0 means unlimited for that window.
  rateLimitPerMinute: number;
  rateLimitPerDay: number;
  totalRequests: number;
  lastUsedAt: string | null;
  minuteWindow: QuotaWindow;
  dayWindow: QuotaWindow;
};

export type ApiKeyView = Omit<ApiKey, 'secretHash'>;

/** Returned by create only; the plaintext secret is never stored or read back. */
export type CreatedApiKey = {
  secret: string;
  key: ApiKeyView;
};

export type CreateApiKeyInput = {
  name: string;
  rateLimitPerMinute?: number;
  rateLimitPerDay?: number;
  isActive?: boolean;
};

export type UpdateApiKeyInput = {
  name?: string;
  rateLimitPerMinute?: number;
  rateLimitPerDay?: number;
  isActive?: boolean;
};

export type ListApiKeysOptions = {
  includeInactive?: boolean;
};

export type ApiKeyStats = {
  id: string;
  name: string;
  isActive: boolean;
  totalRequests: number;
  requestsThisMinute: number;
  requestsToday: number;
  lastUsedAt: string | null;
};

export type UsageStats = {
  totalApiKeys: number;
  activeApiKeys: number;
  totalRequestsToday: number;
  totalRequestsAllTime: number;
};

export type QuotaDenialReason = 'MinuteQuotaExceeded' | 'DailyQuotaExceeded';

/** Snapshot of the most restrictive limited window, for x-ratelimit-* headers. */
export type QuotaSnapshot = {
  limit: number;
  remaining: number;
  resetAt: number;
};

export type RateLimitDecision =
  | { allowed: true; quota: QuotaSnapshot | null }
  | { allowed: false; reason: QuotaDenialReason; retryAfter: number; quota: QuotaSnapshot };

export type GateDecision =
  | { outcome: 'missing' }
  | { outcome: 'unknown' }
  | { outcome: 'inactive' }
  | {
      outcome: 'rate_limited';
      keyId: string;
      reason: QuotaDenialReason;
      retryAfter: number;
      quota: QuotaSnapshot;
    }
  | { outcome: 'admitted'; key: ApiKeyView; quota: QuotaSnapshot | null };
