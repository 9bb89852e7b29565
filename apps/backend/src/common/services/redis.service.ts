import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import IORedis, { Redis as RedisClient } from 'ioredis';
import {
  CacheUnavailableError,
  describeError,
} from '../errors/cache-unavailable.error';
import { withTimeout } from '../utils/with-timeout';
import type { KeyValueEntry, KeyValueStore } from '../cache/key-value-store';

@Injectable()
export class RedisService implements KeyValueStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private redis?: RedisClient;
  private subscriber?: RedisClient;
  private readonly listeners = new Map<string, Array<(message: string) => void>>();
  private readonly redisUrl?: string;
  private readonly readTimeoutMs: number;
  private readonly writeTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    const url: unknown = this.configService.get('redis.url');
    this.redisUrl = typeof url === 'string' && url.length > 0 ? url : undefined;
    this.readTimeoutMs = this.configService.get<number>('redis.readTimeoutMs', 50);
    this.writeTimeoutMs = this.configService.get<number>(
      'redis.writeTimeoutMs',
      500,
    );
    if (!this.redisUrl) {
      this.logger.warn(
        'REDIS_URL not set; shared cache and revocation store run process-local only',
      );
    }
  }

  private client(): RedisClient {
    if (!this.redisUrl) {
      throw new CacheUnavailableError('Redis is not configured');
    }
    if (!this.redis) {
      this.redis = new IORedis(this.redisUrl, {
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        lazyConnect: false,
        enableAutoPipelining: true,
      });
      this.redis.on('error', (err: unknown) => {
        this.logger.error(`Redis error: ${describeError(err)}`);
      });
      this.redis.on('ready', () => {
        this.logger.log('Shared cache is using Redis backend');
      });
    }
    return this.redis;
  }

  private async read<T>(label: string, op: (redis: RedisClient) => Promise<T>): Promise<T> {
    return this.call(label, op, this.readTimeoutMs);
  }

  private async write<T>(label: string, op: (redis: RedisClient) => Promise<T>): Promise<T> {
    return this.call(label, op, this.writeTimeoutMs);
  }

  private async call<T>(
    label: string,
    op: (redis: RedisClient) => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    const redis = this.client();
    try {
      return await withTimeout(op(redis), timeoutMs, `Redis ${label}`);
    } catch (err) {
      if (err instanceof CacheUnavailableError) throw err;
      throw new CacheUnavailableError(`Redis ${label} failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async get(key: string): Promise<string | null> {
    return this.read('GET', (redis) => redis.get(key));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    const ttl = Math.max(1, Math.floor(ttlMs));
    await this.write('SET', (redis) => redis.set(key, value, 'PX', ttl));
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const ttl = Math.max(1, Math.floor(ttlMs));
    const reply = await this.write('SET NX', (redis) =>
      redis.set(key, value, 'PX', ttl, 'NX'),
    );
    return reply === 'OK';
  }

  async setMany(entries: readonly KeyValueEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.write('MULTI', async (redis) => {
      const tx = redis.multi();
      for (const entry of entries) {
        tx.set(entry.key, entry.value, 'PX', Math.max(1, Math.floor(entry.ttlMs)));
      }
      const results = await tx.exec();
      if (!results) {
        throw new Error('transaction aborted');
      }
      const failed = results.find(([err]) => err !== null);
      if (failed && failed[0]) {
        throw failed[0];
      }
    });
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.read('EXISTS', (redis) => redis.exists(key));
    return count === 1;
  }

  async del(keys: readonly string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.write('DEL', (redis) => redis.del(...keys));
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const redis = this.client();
    let removed = 0;
    try {
      const stream = redis.scanStream({ match: `${prefix}*`, count: 200 });
      for await (const chunk of stream) {
        const keys: string[] = Array.isArray(chunk)
          ? chunk.filter((k): k is string => typeof k === 'string')
          : [];
        if (keys.length > 0) {
          removed += await this.write('DEL', (r) => r.del(...keys));
        }
      }
    } catch (err) {
      if (err instanceof CacheUnavailableError) throw err;
      throw new CacheUnavailableError(`Redis SCAN failed: ${describeError(err)}`, {
        cause: err,
      });
    }
    return removed;
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.write('PUBLISH', (redis) => redis.publish(channel, message));
  }

  async subscribe(
    channel: string,
    listener: (message: string) => void,
  ): Promise<void> {
    if (!this.redisUrl) {
      throw new CacheUnavailableError('Redis is not configured');
    }
    if (!this.subscriber) {
      this.subscriber = new IORedis(this.redisUrl, {
        maxRetriesPerRequest: 1,
        lazyConnect: false,
      });
      this.subscriber.on('error', (err: unknown) => {
        this.logger.error(`Redis subscriber error: ${describeError(err)}`);
      });
      this.subscriber.on('message', (ch: string, message: string) => {
        for (const fn of this.listeners.get(ch) ?? []) {
          fn(message);
        }
      });
    }
    const existing = this.listeners.get(channel);
    if (existing) {
      existing.push(listener);
      return;
    }
    this.listeners.set(channel, [listener]);
    await this.subscriber.subscribe(channel);
    this.logger.log(`Subscribed to ${channel}`);
  }

  async onModuleDestroy(): Promise<void> {
    // subscriber first so no message lands on a closing client
    for (const client of [this.subscriber, this.redis]) {
      if (!client) continue;
      try {
        await client.quit();
      } catch (err) {
        this.logger.debug(`Redis quit failed: ${describeError(err)}`);
      }
    }
  }
}
