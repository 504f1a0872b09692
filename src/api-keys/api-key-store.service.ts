import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, open, readFile, rename } from 'node:fs/promises';
import { basename, dirname } from 'node:path';

import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { Mutex } from 'async-mutex';

import { GATEWAY_CONFIG, GatewayConfig } from '../config/gateway-config';
import { hashKeyForLogging } from '../utils/hash';
import {
  PERSISTED_KEYS_VERSION,
  PersistedKeys,
  persistedApiKeySchema,
  persistedKeysEnvelopeSchema,
} from './persisted-keys.schema';
import { DAY_SECONDS, MINUTE_SECONDS, bucketFor, currentCount } from './rate-limiter.service';
import { GenerationError, SecretGenerator } from './secret-generator';
import {
  ApiKey,
  ApiKeyStats,
  ApiKeyView,
  CreateApiKeyInput,
  CreatedApiKey,
  ListApiKeysOptions,
  UpdateApiKeyInput,
  UsageStats,
} from './types';

const MAX_GENERATION_ATTEMPTS = 3;

export type ApiKeyStoreStatus = {
  keys: number;
  lastPersistError: string | null;
};

export function toView(record: ApiKey): ApiKeyView {
  const { secretHash: _secretHash, ...view } = record;
  return {
    ...view,
    minuteWindow: { ...record.minuteWindow },
    dayWindow: { ...record.dayWindow },
  };
}

/**
 * In-memory authority for API keys, flushed to a JSON file after each
 * mutation. Collection changes serialize on one store-wide mutex; counter
 * updates serialize per key so unrelated callers do not wait on each other.
 */
@Injectable()
export class ApiKeyStore implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(ApiKeyStore.name);
  private readonly keysById = new Map<string, ApiKey>();
  private readonly idByHash = new Map<string, string>();
  private readonly keyLocks = new Map<string, Mutex>();
  private readonly storeLock = new Mutex();
  private flushChain: Promise<void> = Promise.resolve();
  private flushQueued = false;
  private lastPersistError: string | null = null;

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    private readonly secretGenerator: SecretGenerator,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.flush();
  }

  async create(input: CreateApiKeyInput): Promise<CreatedApiKey> {
    const created = await this.storeLock.runExclusive(() => {
      const { secret, hash } = this.generateUniqueSecret();
      const nowMs = Date.now();
      const record: ApiKey = {
        id: randomUUID(),
        name: input.name,
        secretHash: hash,
        createdAt: new Date(nowMs).toISOString(),
        isActive: input.isActive ?? true,
        rateLimitPerMinute: input.rateLimitPerMinute ?? this.config.defaultRateLimitPerMinute,
        rateLimitPerDay: input.rateLimitPerDay ?? this.config.defaultRateLimitPerDay,
        totalRequests: 0,
        lastUsedAt: null,
        minuteWindow: { bucket: bucketFor(nowMs, MINUTE_SECONDS), count: 0 },
        dayWindow: { bucket: bucketFor(nowMs, DAY_SECONDS), count: 0 },
      };
      if (!record.isActive) {
        record.deactivatedAt = record.createdAt;
      }

      this.keysById.set(record.id, record);
      this.idByHash.set(hash, record.id);
      return { secret, key: toView(record) };
    });

    this.schedulePersist();
    return created;
  }

  /** Exact match on the full digest; never by prefix. */
  findByHash(hash: string): ApiKey | null {
    const id = this.idByHash.get(hash);
    if (!id) {
      return null;
    }

    const record = this.keysById.get(id);
    return record ? structuredClone(record) : null;
  }

  findById(id: string): ApiKeyView {
    return toView(this.getRecordOrThrow(id));
  }

  async update(id: string, patch: UpdateApiKeyInput): Promise<ApiKeyView> {
    const updated = await this.storeLock.runExclusive(() => {
      // Membership only changes under the store lock, so the check holds.
      this.getRecordOrThrow(id);
      return this.lockFor(id).runExclusive(() => {
        const record = this.getRecordOrThrow(id);
        if (patch.name !== undefined) {
          record.name = patch.name;
        }
        if (patch.rateLimitPerMinute !== undefined) {
          record.rateLimitPerMinute = patch.rateLimitPerMinute;
        }
        if (patch.rateLimitPerDay !== undefined) {
          record.rateLimitPerDay = patch.rateLimitPerDay;
        }
        if (patch.isActive !== undefined) {
          this.applyActive(record, patch.isActive);
        }
        return toView(record);
      });
    });

    this.schedulePersist();
    return updated;
  }

  async deactivate(id: string): Promise<ApiKeyView> {
    return this.update(id, { isActive: false });
  }

  async activate(id: string): Promise<ApiKeyView> {
    return this.update(id, { isActive: true });
  }

  list(options: ListApiKeysOptions = {}): ApiKeyView[] {
    const includeInactive = options.includeInactive ?? true;
    return [...this.keysById.values()]
      .filter((record) => includeInactive || record.isActive)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id))
      .map((record) => toView(record));
  }

  async delete(id: string): Promise<void> {
    await this.storeLock.runExclusive(async () => {
      this.getRecordOrThrow(id);
      await this.lockFor(id).runExclusive(() => {
        const record = this.getRecordOrThrow(id);
        this.keysById.delete(id);
        this.idByHash.delete(record.secretHash);
      });
      this.keyLocks.delete(id);
    });

    this.schedulePersist();
  }

  /**
   * Run a counter mutation against the live record under its key lock. The
   * flush is scheduled after the lock is released. Resolves to null when the
   * key vanished in the meantime.
   */
  async mutateCounters<T>(id: string, mutate: (record: ApiKey) => T): Promise<T | null> {
    if (!this.keysById.has(id)) {
      return null;
    }

    const result = await this.lockFor(id).runExclusive(() => {
      const record = this.keysById.get(id);
      if (!record) {
        // Deleted while waiting; do not keep a lock for it.
        this.keyLocks.delete(id);
        return null;
      }
      return { value: mutate(record) };
    });
    if (!result) {
      return null;
    }

    this.schedulePersist();
    return result.value;
  }

  getStats(id: string, nowMs = Date.now()): ApiKeyStats {
    const record = this.getRecordOrThrow(id);
    return {
      id: record.id,
      name: record.name,
      isActive: record.isActive,
      totalRequests: record.totalRequests,
      requestsThisMinute: currentCount(record.minuteWindow, nowMs, MINUTE_SECONDS),
      requestsToday: currentCount(record.dayWindow, nowMs, DAY_SECONDS),
      lastUsedAt: record.lastUsedAt,
    };
  }

  getUsageStats(nowMs = Date.now()): UsageStats {
    const stats: UsageStats = {
      totalApiKeys: 0,
      activeApiKeys: 0,
      totalRequestsToday: 0,
      totalRequestsAllTime: 0,
    };
    for (const record of this.keysById.values()) {
      stats.totalApiKeys += 1;
      stats.activeApiKeys += record.isActive ? 1 : 0;
      stats.totalRequestsToday += currentCount(record.dayWindow, nowMs, DAY_SECONDS);
      stats.totalRequestsAllTime += record.totalRequests;
    }
    return stats;
  }

  status(): ApiKeyStoreStatus {
    return { keys: this.keysById.size, lastPersistError: this.lastPersistError };
  }

  /** Write the current snapshot now. Unlike background flushes, errors propagate. */
  persist(): Promise<void> {
    const run = this.flushChain.then(() => this.writeSnapshot());
    this.flushChain = run.catch(() => undefined);
    return run;
  }

  /** Wait for every scheduled write to settle. */
  async flush(): Promise<void> {
    await this.flushChain;
  }

  /** Replace the in-memory collection with the file's content, or nothing. */
  async reload(): Promise<void> {
    const records = await this.readRecords();

    await this.storeLock.runExclusive(() => {
      this.keysById.clear();
      this.idByHash.clear();
      this.keyLocks.clear();

      for (const record of records) {
        if (this.idByHash.has(record.secretHash)) {
          this.logger.warn(
            `Skipping API key with duplicate hash, keyId hash ${hashKeyForLogging(record.id)}`,
          );
          continue;
        }
        this.keysById.set(record.id, record);
        this.idByHash.set(record.secretHash, record.id);
      }
    });

    this.logger.log(`Loaded ${this.keysById.size} API key(s)`);
  }

  private schedulePersist(): void {
    if (this.flushQueued) {
      return;
    }

    this.flushQueued = true;
    this.flushChain = this.flushChain.then(async () => {
      this.flushQueued = false;
      try {
        await this.writeSnapshot();
        this.lastPersistError = null;
      } catch (error) {
        this.lastPersistError = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to persist API keys: ${this.lastPersistError}`);
      }
    });
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot: PersistedKeys = {
      version: PERSISTED_KEYS_VERSION,
      keys: Object.fromEntries([...this.keysById].map(([id, record]) => [id, { ...record }])),
    };
    const payload = JSON.stringify(snapshot, null, 2);
    const target = this.config.apiKeysFile;
    const temp = `${target}.tmp`;

    await mkdir(dirname(target), { recursive: true });
    const handle = await open(temp, 'w');
    try {
      await handle.writeFile(payload, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(temp, target);
  }

  private async readRecords(): Promise<ApiKey[]> {
    const source = this.config.apiKeysFile;
    let raw: string;
    try {
      raw = await readFile(source, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.log('No API key file found; starting with an empty store');
        return [];
      }
      await this.setAside(source, 'unreadable', 'move');
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      await this.setAside(source, 'not valid JSON', 'move');
      return [];
    }

    const envelope = persistedKeysEnvelopeSchema.validate(parsed);
    if (envelope.error) {
      await this.setAside(source, `invalid (${envelope.error.message})`, 'move');
      return [];
    }

    const records: ApiKey[] = [];
    let skipped = 0;
    for (const [id, candidate] of Object.entries(envelope.value.keys)) {
      const result = persistedApiKeySchema.validate(candidate);
      if (result.error) {
        skipped += 1;
        this.logger.warn(
          `Skipping invalid API key record, keyId hash ${hashKeyForLogging(id)}: ` +
            result.error.message,
        );
        continue;
      }
      records.push({ ...result.value, id });
    }

    if (skipped > 0) {
      await this.setAside(source, `holding ${skipped} invalid record(s)`, 'copy');
    }
    return records;
  }

  /**
   * Keep the file's current bytes under a timestamped name before the next
   * write replaces them. Throws when that is not possible, so startup stops
   * instead of overwriting keys it could not read.
   */
  private async setAside(source: string, problem: string, mode: 'move' | 'copy'): Promise<void> {
    const target = `${source}.corrupt-${Date.now()}`;
    try {
      if (mode === 'move') {
        await rename(source, target);
      } else {
        await copyFile(source, target);
      }
    } catch (error) {
      this.logger.error(`API key file is ${problem} and could not be set aside`);
      throw error;
    }

    this.logger.warn(`API key file is ${problem}; original kept at ${basename(target)}`);
  }

  private generateUniqueSecret(): { secret: string; hash: string } {
    for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt += 1) {
      const generated = this.secretGenerator.generate();
      if (!this.idByHash.has(generated.hash)) {
        return generated;
      }
      this.logger.warn('Generated API key hash collided with an existing key; retrying');
    }

    throw new GenerationError('Unable to generate a unique API key');
  }

  private applyActive(record: ApiKey, isActive: boolean): void {
    if (record.isActive === isActive) {
      return;
    }

    record.isActive = isActive;
    if (isActive) {
      delete record.deactivatedAt;
    } else {
      record.deactivatedAt = new Date().toISOString();
    }
  }

  private lockFor(id: string): Mutex {
    let lock = this.keyLocks.get(id);
    if (!lock) {
      lock = new Mutex();
      this.keyLocks.set(id, lock);
    }
    return lock;
  }

  private getRecordOrThrow(id: string): ApiKey {
    const record = this.keysById.get(id);
    if (!record) {
      throw new NotFoundException('API key not found');
    }
    return record;
  }
}
