import type { ConfigService } from '@nestjs/config';
import type { KeyValueStore } from './key-value-store';
import { LocalCache } from './local-cache';
import { TwoTierCache } from './two-tier-cache';

/**
 * Builds a two-tier cache with the configured tier-1 and tier-2 policy.
 * Each cache owns its own local tier; only the shared store is common.
 */
export function createTwoTierCache<V>(
  config: ConfigService,
  shared: KeyValueStore,
  namespace: string,
  decode: (raw: unknown) => V | undefined,
): TwoTierCache<V> {
  return new TwoTierCache<V>({
    namespace,
    local: new LocalCache<V>({
      ttlMs: config.get<number>('cache.localTtlMs', 60_000),
      maxEntries: config.get<number>('cache.localMaxEntries', 10_000),
    }),
    shared,
    sharedTtlMs: config.get<number>('cache.sharedTtlMs', 300_000),
    decode,
  });
}

export const decodeStringArray = (raw: unknown): string[] | undefined =>
  Array.isArray(raw) && raw.every((item) => typeof item === 'string')
    ? raw
    : undefined;
