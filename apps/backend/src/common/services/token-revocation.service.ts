import { Inject, Injectable, Logger } from '@nestjs/common';
import { KEY_VALUE_STORE, KeyValueStore } from '../cache/key-value-store';
import { describeError } from '../errors/cache-unavailable.error';

type RevocationRecord = { expiresAtMs: number };

export type RevocationRequest = { jti: string; ttlSeconds: number };

/** `durable` is false when the entry only landed in this process's memory. */
export type RevocationOutcome = { jti: string; durable: boolean };

export type ConsumeOutcome = { consumed: boolean; durable: boolean };

@Injectable()
export class TokenRevocationService {
  private readonly logger = new Logger(TokenRevocationService.name);
  private readonly memoryRevoked = new Map<string, RevocationRecord>();

  constructor(@Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore) {}

  public async revoke(jti: string, ttlSeconds: number): Promise<RevocationOutcome> {
    const [outcome] = await this.revokeMany([{ jti, ttlSeconds }]);
    return outcome ?? { jti, durable: false };
  }

  /**
   * Revokes several token ids in one shared-store transaction. If the batch
   * cannot be written each id is retried alone, then kept in memory.
   */
  public async revokeMany(
    requests: readonly RevocationRequest[],
  ): Promise<RevocationOutcome[]> {
    const valid = requests
      .filter((r) => typeof r.jti === 'string' && r.jti.length > 0)
      .map((r) => ({ jti: r.jti, ttl: Math.floor(Number(r.ttlSeconds)) }))
      .filter((r) => Number.isFinite(r.ttl) && r.ttl > 0);
    if (valid.length === 0) return [];

    try {
      await this.store.setMany(
        valid.map((r) => ({
          key: this.buildKey(r.jti),
          value: '1',
          ttlMs: r.ttl * 1000,
        })),
      );
      for (const r of valid) {
        this.logger.debug(`Revoked jti=${r.jti} for ${r.ttl}s (shared)`);
      }
      return valid.map((r) => ({ jti: r.jti, durable: true }));
    } catch (err) {
      this.logger.warn(
        `Batch revocation failed, retrying individually: ${describeError(err)}`,
      );
    }

    const outcomes: RevocationOutcome[] = [];
    for (const r of valid) {
      outcomes.push(await this.revokeOne(r.jti, r.ttl));
    }
    return outcomes;
  }

  private async revokeOne(jti: string, ttl: number): Promise<RevocationOutcome> {
    try {
      await this.store.set(this.buildKey(jti), '1', ttl * 1000);
      this.logger.debug(`Revoked jti=${jti} for ${ttl}s (shared)`);
      return { jti, durable: true };
    } catch (err) {
      this.logger.error(
        `Shared revocation failed, using memory fallback: ${describeError(err)}`,
      );
    }
    this.cleanupExpired();
    this.memoryRevoked.set(jti, { expiresAtMs: Date.now() + ttl * 1000 });
    this.logger.debug(`Revoked jti=${jti} for ${ttl}s (memory)`);
    return { jti, durable: false };
  }

  /**
   * Revokes a single-use token id in one step. Exactly one caller per jti
   * gets `consumed: true`; every later or concurrent caller gets false.
   */
  public async consume(jti: string, ttlSeconds: number): Promise<ConsumeOutcome> {
    const ttl = Math.floor(Number(ttlSeconds));
    if (typeof jti !== 'string' || jti.length === 0 || !Number.isFinite(ttl) || ttl <= 0) {
      return { consumed: false, durable: false };
    }
    if (this.isRevokedInMemory(jti)) {
      return { consumed: false, durable: false };
    }

    try {
      const consumed = await this.store.setIfAbsent(this.buildKey(jti), '1', ttl * 1000);
      return { consumed, durable: true };
    } catch (err) {
      this.logger.error(
        `Shared consume failed, using memory fallback: ${describeError(err)}`,
      );
    }
    // re-checked after the await: a concurrent caller may have claimed it
    if (this.isRevokedInMemory(jti)) {
      return { consumed: false, durable: false };
    }
    this.cleanupExpired();
    this.memoryRevoked.set(jti, { expiresAtMs: Date.now() + ttl * 1000 });
    return { consumed: true, durable: false };
  }

  private isRevokedInMemory(jti: string): boolean {
    const rec = this.memoryRevoked.get(jti);
    if (!rec) return false;
    if (Date.now() < rec.expiresAtMs) return true;
    this.memoryRevoked.delete(jti);
    return false;
  }

  public async isRevoked(jti: unknown): Promise<boolean> {
    if (typeof jti !== 'string' || jti.length === 0) return false;
    if (this.isRevokedInMemory(jti)) return true;

    try {
      return await this.store.exists(this.buildKey(jti));
    } catch (err) {
      this.logger.warn(
        `Shared revocation check failed, memory only: ${describeError(err)}`,
      );
      return false;
    }
  }

  /** Administrative reinstatement of a revoked token id. */
  public async unrevoke(jti: string): Promise<void> {
    this.memoryRevoked.delete(jti);
    try {
      await this.store.del([this.buildKey(jti)]);
    } catch (err) {
      this.logger.warn(`Shared unrevoke failed for jti=${jti}: ${describeError(err)}`);
    }
  }

  public cleanupExpired(): void {
    const now = Date.now();
    for (const [k, v] of this.memoryRevoked.entries()) {
      if (now >= v.expiresAtMs) this.memoryRevoked.delete(k);
    }
  }

  private buildKey(jti: string): string {
    return `token:revoked:${jti}`;
  }
}
