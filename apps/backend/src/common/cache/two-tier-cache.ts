import { Logger } from '@nestjs/common';
import { describeError } from '../errors/cache-unavailable.error';
import type { KeyValueStore } from './key-value-store';
import type { LocalCache, LocalCacheStats } from './local-cache';

export interface TwoTierCacheOptions<V> {
  namespace: string;
  local: LocalCache<V>;
  shared: KeyValueStore;
  sharedTtlMs: number;
  /** Validates a value read back from the shared tier; undefined drops it. */
  decode: (raw: unknown) => V | undefined;
}

type InvalidationMessage =
  | { op: 'key'; value: string }
  | { op: 'prefix'; value: string }
  | { op: 'all' };

const isInvalidationMessage = (v: unknown): v is InvalidationMessage => {
  if (typeof v !== 'object' || v === null || !('op' in v)) return false;
  if (v.op === 'all') return true;
  return (
    (v.op === 'key' || v.op === 'prefix') &&
    'value' in v &&
    typeof v.value === 'string'
  );
};

/**
 * Process-local tier in front of a shared tier. Reads fall through
 * local → shared → loader and write back through both tiers. A loader that
 * yields `undefined` is never cached, so "not computed" stays distinct from
 * an empty value. Shared-tier failures degrade to a miss.
 */
export class TwoTierCache<V> {
  private readonly logger: Logger;
  private readonly namespace: string;
  private readonly local: LocalCache<V>;
  private readonly shared: KeyValueStore;
  private readonly sharedTtlMs: number;
  private readonly decode: (raw: unknown) => V | undefined;

  constructor(options: TwoTierCacheOptions<V>) {
    this.namespace = options.namespace;
    this.local = options.local;
    this.shared = options.shared;
    this.sharedTtlMs = options.sharedTtlMs;
    this.decode = options.decode;
    this.logger = new Logger(`TwoTierCache:${options.namespace}`);
  }

  get channel(): string {
    return `cache:invalidate:${this.namespace}`;
  }

  private sharedKey(key: string): string {
    return `cache:${this.namespace}:${key}`;
  }

  async get(key: string): Promise<V | undefined> {
    const local = this.local.get(key);
    if (local !== undefined) {
      return local;
    }

    let raw: string | null;
    try {
      raw = await this.shared.get(this.sharedKey(key));
    } catch (err) {
      this.logger.warn(`Shared tier read failed for ${key}: ${describeError(err)}`);
      return undefined;
    }
    if (raw === null) return undefined;

    let value: V | undefined;
    try {
      value = this.decode(JSON.parse(raw));
    } catch {
      value = undefined;
    }
    if (value === undefined) {
      this.logger.warn(`Discarding malformed shared entry for ${key}`);
      return undefined;
    }
    this.local.set(key, value);
    return value;
  }

  async getOrLoad(
    key: string,
    loader: () => Promise<V | undefined>,
  ): Promise<V | undefined> {
    const cached = await this.get(key);
    if (cached !== undefined) return cached;

    const loaded = await loader();
    if (loaded !== undefined) {
      await this.put(key, loaded);
    }
    return loaded;
  }

  async put(key: string, value: V): Promise<void> {
    this.local.set(key, value);
    try {
      await this.shared.set(this.sharedKey(key), JSON.stringify(value), this.sharedTtlMs);
    } catch (err) {
      this.logger.warn(`Shared tier write failed for ${key}: ${describeError(err)}`);
    }
  }

  async evict(key: string): Promise<void> {
    this.local.delete(key);
    await this.evictShared(
      () => this.shared.del([this.sharedKey(key)]),
      { op: 'key', value: key },
    );
  }

  async evictByPrefix(prefix: string): Promise<void> {
    this.local.deleteByPrefix(prefix);
    await this.evictShared(
      () => this.shared.deleteByPrefix(this.sharedKey(prefix)),
      { op: 'prefix', value: prefix },
    );
  }

  async clear(): Promise<void> {
    this.local.clear();
    await this.evictShared(
      () => this.shared.deleteByPrefix(this.sharedKey('')),
      { op: 'all' },
    );
  }

  private async evictShared(
    remove: () => Promise<number>,
    message: InvalidationMessage,
  ): Promise<void> {
    try {
      await remove();
      await this.shared.publish(this.channel, JSON.stringify(message));
    } catch (err) {
      // stale shared entries now live until sharedTtlMs; other instances until their local TTL
      this.logger.warn(
        `Shared tier invalidation failed (${message.op}): ${describeError(err)}`,
      );
    }
  }

  /** Drops local entries when another instance broadcasts an eviction. */
  async listenForInvalidations(): Promise<void> {
    try {
      await this.shared.subscribe(this.channel, (payload) => {
        this.applyInvalidation(payload);
      });
    } catch (err) {
      this.logger.warn(
        `Cross-instance invalidation disabled: ${describeError(err)}`,
      );
    }
  }

  private applyInvalidation(payload: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      parsed = undefined;
    }
    if (!isInvalidationMessage(parsed)) {
      this.logger.debug(`Ignoring invalidation payload: ${payload}`);
      return;
    }
    switch (parsed.op) {
      case 'all':
        this.local.clear();
        break;
      case 'prefix':
        this.local.deleteByPrefix(parsed.value);
        break;
      case 'key':
        this.local.delete(parsed.value);
        break;
    }
  }

  stats(): { namespace: string; local: LocalCacheStats } {
    return { namespace: this.namespace, local: this.local.stats() };
  }
}
