import Joi from 'joi';

import { ApiKey, QuotaWindow } from './types';

export const PERSISTED_KEYS_VERSION = 1;

export type PersistedKeys = {
  version: number;
  keys: Record<string, ApiKey>;
};

const quotaWindowSchema = Joi.object<QuotaWindow>({
  bucket: Joi.number().integer().min(0).required(),
  count: Joi.number().integer().min(0).required(),
});

/**
 * One stored record. Validated on its own so that a single bad record does
 * not take the rest of the file down with it; fields this version does not
 * know are dropped.
 */
export const persistedApiKeySchema = Joi.object<ApiKey>({
  id: Joi.string().required(),
  name: Joi.string().allow('').required(),
  secretHash: Joi.string().hex().length(64).required(),
  createdAt: Joi.string().isoDate().required(),
  isActive: Joi.boolean().required(),
  deactivatedAt: Joi.string().isoDate(),
  rateLimitPerMinute: Joi.number().integer().min(0).required(),
  rateLimitPerDay: Joi.number().integer().min(0).required(),
  totalRequests: Joi.number().integer().min(0).required(),
  lastUsedAt: Joi.string().isoDate().allow(null).default(null),
  // Files written before windows were tracked start from an empty bucket.
  minuteWindow: quotaWindowSchema.default({ bucket: 0, count: 0 }),
  dayWindow: quotaWindowSchema.default({ bucket: 0, count: 0 }),
}).options({ stripUnknown: true });

export type PersistedKeysEnvelope = {
  version: number;
  keys: Record<string, unknown>;
};

/** File envelope only; records are checked one by one with persistedApiKeySchema. */
export const persistedKeysEnvelopeSchema = Joi.object<PersistedKeysEnvelope>({
  version: Joi.number().valid(PERSISTED_KEYS_VERSION).required(),
  keys: Joi.object().pattern(Joi.string(), Joi.any()).required(),
}).unknown(true);
