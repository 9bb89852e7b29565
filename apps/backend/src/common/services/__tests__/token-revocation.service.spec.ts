import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryKeyValueStore } from '../../../../test/support/in-memory-key-value-store';
import { KEY_VALUE_STORE } from '../../cache/key-value-store';
import { TokenRevocationService } from '../token-revocation.service';

describe('TokenRevocationService', () => {
  let service: TokenRevocationService;
  let store: InMemoryKeyValueStore;

  beforeEach(async () => {
    jest.useFakeTimers({ now: new Date('2024-03-01T08:00:00Z') });
    store = new InMemoryKeyValueStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenRevocationService,
        { provide: KEY_VALUE_STORE, useValue: store },
      ],
    }).compile();

    service = module.get<TokenRevocationService>(TokenRevocationService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('reports a revoked id until its ttl elapses', async () => {
    await expect(service.revoke('jti-1', 60)).resolves.toEqual({
      jti: 'jti-1',
      durable: true,
    });
    await expect(service.isRevoked('jti-1')).resolves.toBe(true);

    jest.advanceTimersByTime(60_000);
    await expect(service.isRevoked('jti-1')).resolves.toBe(false);
  });

  it('stores entries under token:revoked:<jti>', async () => {
    await service.revoke('abc', 10);

    expect([...store.data.keys()]).toEqual(['token:revoked:abc']);
  });

  it('ignores blank ids and non-positive ttls', async () => {
    await expect(
      service.revokeMany([
        { jti: '', ttlSeconds: 60 },
        { jti: 'expired', ttlSeconds: 0 },
        { jti: 'negative', ttlSeconds: -5 },
      ]),
    ).resolves.toEqual([]);
    expect(store.data.size).toBe(0);
  });

  it('revokes several ids in one batch', async () => {
    const setMany = jest.spyOn(store, 'setMany');

    await service.revokeMany([
      { jti: 'access', ttlSeconds: 43_200 },
      { jti: 'refresh', ttlSeconds: 604_800 },
    ]);

    expect(setMany).toHaveBeenCalledTimes(1);
    await expect(service.isRevoked('access')).resolves.toBe(true);
    await expect(service.isRevoked('refresh')).resolves.toBe(true);
  });

  it('retries one by one when the batch fails', async () => {
    jest.spyOn(store, 'setMany').mockRejectedValueOnce(new Error('MULTI aborted'));

    const outcomes = await service.revokeMany([
      { jti: 'a', ttlSeconds: 30 },
      { jti: 'b', ttlSeconds: 30 },
    ]);

    expect(outcomes).toEqual([
      { jti: 'a', durable: true },
      { jti: 'b', durable: true },
    ]);
    expect(store.data.has('token:revoked:b')).toBe(true);
  });

  it('falls back to process memory when the store is down', async () => {
    store.offline = true;

    await expect(service.revoke('jti-2', 30)).resolves.toEqual({
      jti: 'jti-2',
      durable: false,
    });
    await expect(service.isRevoked('jti-2')).resolves.toBe(true);

    jest.advanceTimersByTime(30_000);
    await expect(service.isRevoked('jti-2')).resolves.toBe(false);
  });

  it('treats a failed store lookup as not revoked', async () => {
    await service.revoke('jti-3', 30);
    store.offline = true;

    await expect(service.isRevoked('jti-3')).resolves.toBe(false);
  });

  it('rejects malformed ids without a lookup', async () => {
    const exists = jest.spyOn(store, 'exists');

    await expect(service.isRevoked(undefined)).resolves.toBe(false);
    await expect(service.isRevoked(42)).resolves.toBe(false);
    expect(exists).not.toHaveBeenCalled();
  });

  it('reinstates a revoked id', async () => {
    await service.revoke('jti-4', 30);
    await service.unrevoke('jti-4');

    await expect(service.isRevoked('jti-4')).resolves.toBe(false);
  });

  describe('consume', () => {
    it('lets only the first caller claim an id', async () => {
      await expect(service.consume('jti-5', 30)).resolves.toEqual({
        consumed: true,
        durable: true,
      });
      await expect(service.consume('jti-5', 30)).resolves.toEqual({
        consumed: false,
        durable: true,
      });
      await expect(service.isRevoked('jti-5')).resolves.toBe(true);
    });

    it('resolves concurrent claims to a single winner', async () => {
      const results = await Promise.all([
        service.consume('jti-6', 30),
        service.consume('jti-6', 30),
      ]);

      expect(results.map((r) => r.consumed).sort()).toEqual([false, true]);
    });

    it('refuses an id that was already revoked', async () => {
      await service.revoke('jti-7', 30);

      await expect(service.consume('jti-7', 30)).resolves.toEqual({
        consumed: false,
        durable: true,
      });
    });

    it('claims in process memory when the store is down', async () => {
      store.offline = true;

      await expect(service.consume('jti-8', 30)).resolves.toEqual({
        consumed: true,
        durable: false,
      });
      await expect(service.consume('jti-8', 30)).resolves.toEqual({
        consumed: false,
        durable: false,
      });
    });

    it('ignores blank ids and non-positive ttls', async () => {
      await expect(service.consume('', 30)).resolves.toEqual({
        consumed: false,
        durable: false,
      });
      await expect(service.consume('jti-9', 0)).resolves.toEqual({
        consumed: false,
        durable: false,
      });
      expect(store.data.size).toBe(0);
    });
  });
});
