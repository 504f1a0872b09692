import { mkdtemp, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { NotFoundException } from '@nestjs/common';

import { buildTestConfig } from '../../test/fixtures';
import { ApiKeyStore } from './api-key-store.service';
import { RateLimiterService } from './rate-limiter.service';
import { GenerationError, SecretGenerator } from './secret-generator';

jest.mock('node:fs/promises', () => {
  const actual = jest.requireActual<typeof import('node:fs/promises')>('node:fs/promises');
  return { ...actual, rename: jest.fn(actual.rename) };
});

describe('ApiKeyStore', () => {
  let dir: string;
  let file: string;
  let generator: SecretGenerator;
  let store: ApiKeyStore;

  const buildStore = (overrides: Parameters<typeof buildTestConfig>[0] = {}): ApiKeyStore =>
    new ApiKeyStore(buildTestConfig({ apiKeysFile: file, ...overrides }), generator);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ocr-gateway-keys-'));
    file = join(dir, 'data', 'api_keys.json');
    generator = new SecretGenerator();
    store = buildStore();
    await store.reload();
  });

  const corruptCopies = async (): Promise<string[]> =>
    (await readdir(dirname(file))).filter((name) => name.includes('.corrupt-'));

  afterEach(async () => {
    await store.flush();
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('creates keys with default limits and returns the secret once', async () => {
    const created = await store.create({ name: 'scanner-prod' });

    expect(created.secret).toMatch(/^ocr_[A-Za-z0-9_-]{43}$/);
    expect(created.key).toEqual(
      expect.objectContaining({
        name: 'scanner-prod',
        isActive: true,
        rateLimitPerMinute: 60,
        rateLimitPerDay: 1000,
        totalRequests: 0,
        lastUsedAt: null,
      }),
    );
    expect(created.key).not.toHaveProperty('secretHash');
    expect(created.key).not.toHaveProperty('secret');
  });

  it('keeps explicit limits, including zero for unlimited', async () => {
    const created = await store.create({
      name: 'batch-job',
      rateLimitPerMinute: 0,
      rateLimitPerDay: 10,
    });

    expect(created.key.rateLimitPerMinute).toBe(0);
    expect(created.key.rateLimitPerDay).toBe(10);
  });

  it('finds a created key by the hash of its secret', async () => {
    const created = await store.create({ name: 'lookup' });

    const found = store.findByHash(generator.hash(created.secret));

    expect(found?.id).toBe(created.key.id);
    expect(store.findByHash(generator.hash(`${created.secret}x`))).toBeNull();
  });

  it('never exposes secrets or hashes through list', async () => {
    const created = await store.create({ name: 'listed' });

    const [item] = store.list();

    expect(item?.id).toBe(created.key.id);
    expect(item).not.toHaveProperty('secretHash');
    expect(item).not.toHaveProperty('secret');
  });

  it('lists keys by creation time and can hide inactive ones', async () => {
    const now = jest.spyOn(Date, 'now');
    now.mockReturnValue(Date.UTC(2026, 0, 2));
    const second = await store.create({ name: 'second' });
    now.mockReturnValue(Date.UTC(2026, 0, 1));
    const first = await store.create({ name: 'first', isActive: false });
    now.mockRestore();

    expect(store.list().map((item) => item.id)).toEqual([first.key.id, second.key.id]);
    expect(store.list({ includeInactive: false }).map((item) => item.id)).toEqual([
      second.key.id,
    ]);
  });

  it('updates name and limits', async () => {
    const created = await store.create({ name: 'before' });

    const updated = await store.update(created.key.id, {
      name: 'after',
      rateLimitPerMinute: 5,
      rateLimitPerDay: 50,
    });

    expect(updated).toEqual(
      expect.objectContaining({ name: 'after', rateLimitPerMinute: 5, rateLimitPerDay: 50 }),
    );
    expect(store.findById(created.key.id).name).toBe('after');
  });

  it('throws NotFoundException for unknown ids', async () => {
    await expect(store.update('missing', { name: 'x' })).rejects.toBeInstanceOf(NotFoundException);
    await expect(store.deactivate('missing')).rejects.toBeInstanceOf(NotFoundException);
    await expect(store.delete('missing')).rejects.toBeInstanceOf(NotFoundException);
    expect(() => store.findById('missing')).toThrow(NotFoundException);
    expect(() => store.getStats('missing')).toThrow(NotFoundException);
  });

  it('deactivates idempotently and reactivates', async () => {
    const created = await store.create({ name: 'toggle' });

    const first = await store.deactivate(created.key.id);
    const second = await store.deactivate(created.key.id);

    expect(first.isActive).toBe(false);
    expect(second.deactivatedAt).toBe(first.deactivatedAt);

    const reactivated = await store.activate(created.key.id);
    expect(reactivated.isActive).toBe(true);
    expect(reactivated).not.toHaveProperty('deactivatedAt');
  });

  it('hard-deletes keys so their secret is unknown afterwards', async () => {
    const created = await store.create({ name: 'doomed' });

    await store.delete(created.key.id);

    expect(store.findByHash(generator.hash(created.secret))).toBeNull();
    expect(store.list()).toEqual([]);
  });

  it('persists records and reloads them in a new store', async () => {
    const created = await store.create({ name: 'durable', rateLimitPerDay: 7 });
    await store.flush();

    const reloaded = buildStore({ defaultRateLimitPerDay: 99 });
    await reloaded.reload();

    const found = reloaded.findByHash(generator.hash(created.secret));
    expect(found?.id).toBe(created.key.id);
    expect(found?.rateLimitPerDay).toBe(7);
    expect(found?.rateLimitPerMinute).toBe(60);
  });

  it('writes every field except the plaintext secret', async () => {
    const created = await store.create({ name: 'on-disk' });
    await store.flush();

    const raw = await readFile(file, 'utf8');
    const parsed = JSON.parse(raw) as { version: number; keys: Record<string, unknown> };

    expect(parsed.version).toBe(1);
    expect(parsed.keys[created.key.id]).toEqual(
      expect.objectContaining({
        id: created.key.id,
        secretHash: generator.hash(created.secret),
        name: 'on-disk',
      }),
    );
    expect(raw.includes(created.secret)).toBe(false);
  });

  it('starts empty when the file is missing', async () => {
    await expect(store.reload()).resolves.toBeUndefined();
    expect(store.list()).toEqual([]);
  });

  it('moves an unparsable file aside before starting empty', async () => {
    await store.create({ name: 'kept-aside' });
    await store.flush();
    await writeFile(file, '{"version":1,"keys":', 'utf8');

    await store.reload();

    expect(store.list()).toEqual([]);
    const asides = await corruptCopies();
    expect(asides).toHaveLength(1);
    await expect(readFile(join(dirname(file), asides[0] ?? ''), 'utf8')).resolves.toBe(
      '{"version":1,"keys":',
    );
    await expect(readFile(file, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('moves a file with the wrong envelope aside', async () => {
    await store.create({ name: 'kept-aside' });
    await store.flush();
    await writeFile(file, JSON.stringify({ version: 2, keys: {} }), 'utf8');

    await store.reload();

    expect(store.list()).toEqual([]);
    expect(await corruptCopies()).toHaveLength(1);
  });

  it('keeps valid records and ignores unknown fields on reload', async () => {
    const first = await store.create({ name: 'first' });
    const second = await store.create({ name: 'second' });
    await store.flush();
    const content = JSON.parse(await readFile(file, 'utf8')) as {
      keys: Record<string, Record<string, unknown>>;
    };
    content.keys[first.key.id] = { ...content.keys[first.key.id], note: 'added by hand' };
    await writeFile(file, JSON.stringify(content), 'utf8');

    const reloaded = buildStore();
    await reloaded.reload();

    expect(reloaded.findByHash(generator.hash(first.secret))?.id).toBe(first.key.id);
    expect(reloaded.findByHash(generator.hash(second.secret))?.id).toBe(second.key.id);
    expect(reloaded.findById(first.key.id)).not.toHaveProperty('note');
    expect(await corruptCopies()).toEqual([]);
  });

  it('skips only the invalid record and keeps a copy of the original file', async () => {
    const good = await store.create({ name: 'good' });
    const bad = await store.create({ name: 'bad' });
    await store.flush();
    const content = JSON.parse(await readFile(file, 'utf8')) as {
      keys: Record<string, Record<string, unknown>>;
    };
    content.keys[bad.key.id] = { ...content.keys[bad.key.id], secretHash: 'not-a-digest' };
    const original = JSON.stringify(content);
    await writeFile(file, original, 'utf8');

    const reloaded = buildStore();
    await reloaded.reload();

    expect(reloaded.list().map((key) => key.id)).toEqual([good.key.id]);
    const asides = await corruptCopies();
    expect(asides).toHaveLength(1);
    await expect(readFile(join(dirname(file), asides[0] ?? ''), 'utf8')).resolves.toBe(original);

    await reloaded.create({ name: 'after-reload' });
    await reloaded.flush();
    await expect(readFile(join(dirname(file), asides[0] ?? ''), 'utf8')).resolves.toBe(original);
  });

  it('refuses to start when an unreadable file cannot be set aside', async () => {
    await store.create({ name: 'stuck' });
    await store.flush();
    await writeFile(file, 'garbage', 'utf8');
    jest.mocked(rename).mockRejectedValueOnce(new Error('EACCES'));

    await expect(buildStore().reload()).rejects.toThrow('EACCES');
    await expect(readFile(file, 'utf8')).resolves.toBe('garbage');
  });

  it('keeps serving when background persistence fails', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const broken = new ApiKeyStore(
      buildTestConfig({ apiKeysFile: join(blocker, 'api_keys.json') }),
      generator,
    );

    const created = await broken.create({ name: 'memory-only' });
    await broken.flush();

    expect(broken.findById(created.key.id).name).toBe('memory-only');
    expect(broken.status().lastPersistError).not.toBeNull();
    await expect(broken.persist()).rejects.toThrow();
  });

  it('serializes concurrent counter updates per key', async () => {
    const limiter = new RateLimiterService();
    const created = await store.create({ name: 'busy', rateLimitPerMinute: 5, rateLimitPerDay: 0 });
    const now = Date.now();

    const results = await Promise.all(
      Array.from({ length: 20 }, () =>
        store.mutateCounters(created.key.id, (record) => limiter.consume(record, now).allowed),
      ),
    );

    expect(results.filter((allowed) => allowed === true)).toHaveLength(5);
    expect(store.findById(created.key.id).totalRequests).toBe(5);
  });

  it('returns null from mutateCounters for removed keys', async () => {
    await expect(store.mutateCounters('missing', () => true)).resolves.toBeNull();
  });

  it('does not keep locks for ids that do not exist', async () => {
    const created = await store.create({ name: 'lock-owner' });
    const keyLocks = (store as unknown as { keyLocks: Map<string, unknown> }).keyLocks;

    for (let index = 0; index < 50; index += 1) {
      await expect(store.update(`missing-${index}`, { name: 'x' })).rejects.toBeInstanceOf(
        NotFoundException,
      );
      await expect(store.delete(`gone-${index}`)).rejects.toBeInstanceOf(NotFoundException);
      await expect(store.mutateCounters(`absent-${index}`, () => true)).resolves.toBeNull();
    }
    await store.mutateCounters(created.key.id, () => true);

    expect([...keyLocks.keys()]).toEqual([created.key.id]);

    await store.delete(created.key.id);
    expect(keyLocks.size).toBe(0);
  });

  it('resolves every secret to its own key across ten thousand keys', async () => {
    const created: { id: string; secret: string }[] = [];
    for (let batch = 0; batch < 10; batch += 1) {
      const keys = await Promise.all(
        Array.from({ length: 1000 }, (_, index) =>
          store.create({ name: `bulk-${batch}-${index}` }),
        ),
      );
      created.push(...keys.map(({ secret, key }) => ({ id: key.id, secret })));
    }

    const mismatches = created.filter(
      ({ id, secret }) => store.findByHash(generator.hash(secret))?.id !== id,
    );

    expect(created).toHaveLength(10_000);
    expect(new Set(created.map(({ id }) => id)).size).toBe(10_000);
    expect(mismatches).toEqual([]);
  }, 60_000);

  it('reports per-key and overall usage', async () => {
    const limiter = new RateLimiterService();
    const now = Date.UTC(2026, 0, 15, 10, 0, 0);
    const busy = await store.create({ name: 'busy' });
    const idle = await store.create({ name: 'idle', isActive: false });

    await store.mutateCounters(busy.key.id, (record) => limiter.consume(record, now));
    await store.mutateCounters(busy.key.id, (record) => limiter.consume(record, now));

    expect(store.getStats(busy.key.id, now)).toEqual({
      id: busy.key.id,
      name: 'busy',
      isActive: true,
      totalRequests: 2,
      requestsThisMinute: 2,
      requestsToday: 2,
      lastUsedAt: '2026-01-15T10:00:00.000Z',
    });
    expect(store.getStats(busy.key.id, now + 60_000).requestsThisMinute).toBe(0);
    expect(store.getStats(idle.key.id, now).totalRequests).toBe(0);
    expect(store.getUsageStats(now)).toEqual({
      totalApiKeys: 2,
      activeApiKeys: 1,
      totalRequestsToday: 2,
      totalRequestsAllTime: 2,
    });
  });

  it('regenerates secrets whose hash collides with an existing key', async () => {
    const existing = await store.create({ name: 'existing' });
    const existingHash = generator.hash(existing.secret);
    const fresh = generator.generate();
    jest
      .spyOn(generator, 'generate')
      .mockReturnValueOnce({ secret: existing.secret, hash: existingHash })
      .mockReturnValueOnce(fresh);

    const created = await store.create({ name: 'retry' });

    expect(created.secret).toBe(fresh.secret);
  });

  it('gives up with GenerationError after repeated collisions', async () => {
    const existing = await store.create({ name: 'existing' });
    const colliding = { secret: existing.secret, hash: generator.hash(existing.secret) };
    jest.spyOn(generator, 'generate').mockReturnValue(colliding);

    await expect(store.create({ name: 'never' })).rejects.toBeInstanceOf(GenerationError);
  });
});
