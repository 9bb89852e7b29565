import { InMemoryKeyValueStore } from '../../../../test/support/in-memory-key-value-store';
import { decodeStringArray } from '../cache.factory';
import { LocalCache } from '../local-cache';
import { TwoTierCache } from '../two-tier-cache';

const build = (shared: InMemoryKeyValueStore) =>
  new TwoTierCache<string[]>({
    namespace: 'perms:user',
    local: new LocalCache<string[]>({ ttlMs: 60_000, maxEntries: 100 }),
    shared,
    sharedTtlMs: 300_000,
    decode: decodeStringArray,
  });

describe('TwoTierCache', () => {
  let shared: InMemoryKeyValueStore;
  let cache: TwoTierCache<string[]>;

  beforeEach(() => {
    shared = new InMemoryKeyValueStore();
    cache = build(shared);
  });

  it('writes through both tiers on load', async () => {
    const loader = jest.fn().mockResolvedValue(['students.read']);

    await expect(cache.getOrLoad('u1', loader)).resolves.toEqual(['students.read']);
    await expect(cache.getOrLoad('u1', loader)).resolves.toEqual(['students.read']);

    expect(loader).toHaveBeenCalledTimes(1);
    await expect(shared.get('cache:perms:user:u1')).resolves.toBe('["students.read"]');
  });

  it('serves another instance from the shared tier', async () => {
    await cache.put('u1', ['a.b']);
    const other = build(shared.connectPeer());
    const loader = jest.fn();

    await expect(other.getOrLoad('u1', loader)).resolves.toEqual(['a.b']);
    expect(loader).not.toHaveBeenCalled();
  });

  it('does not cache a loader that yields undefined', async () => {
    const loader = jest.fn().mockResolvedValue(undefined);

    await expect(cache.getOrLoad('ghost', loader)).resolves.toBeUndefined();
    await expect(cache.getOrLoad('ghost', loader)).resolves.toBeUndefined();

    expect(loader).toHaveBeenCalledTimes(2);
    expect(shared.data.size).toBe(0);
  });

  it('caches an empty value', async () => {
    const loader = jest.fn().mockResolvedValue([]);

    await cache.getOrLoad('u2', loader);
    await expect(cache.getOrLoad('u2', loader)).resolves.toEqual([]);

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('treats an unavailable shared tier as a miss', async () => {
    shared.offline = true;
    const loader = jest.fn().mockResolvedValue(['x']);

    await expect(cache.getOrLoad('u1', loader)).resolves.toEqual(['x']);
    // local tier still got the value
    await expect(cache.get('u1')).resolves.toEqual(['x']);
  });

  it('discards malformed shared entries', async () => {
    await shared.set('cache:perms:user:u1', '{"not":"an array"}', 1000);

    await expect(cache.get('u1')).resolves.toBeUndefined();
  });

  it('evicts both tiers and tells other instances', async () => {
    const peerStore = shared.connectPeer();
    const other = build(peerStore);
    await other.listenForInvalidations();
    await cache.put('u1', ['a']);
    await other.get('u1');

    await cache.evict('u1');

    await expect(shared.get('cache:perms:user:u1')).resolves.toBeNull();
    expect(shared.published).toEqual([
      { channel: 'cache:invalidate:perms:user', message: '{"op":"key","value":"u1"}' },
    ]);
    expect(other.stats().local.size).toBe(0);
  });

  it('clears a whole namespace', async () => {
    await cache.put('u1', ['a']);
    await cache.put('u2', ['b']);
    await shared.set('cache:other:k', 'keep', 1000);

    await cache.clear();

    expect([...shared.data.keys()]).toEqual(['cache:other:k']);
    expect(cache.stats().local.size).toBe(0);
  });
});
