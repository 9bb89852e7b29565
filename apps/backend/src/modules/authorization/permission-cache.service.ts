import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import type { TwoTierCache } from '../../common/cache/two-tier-cache';
import { PermissionRepository } from './permission.repository';

export const PERMISSION_CACHE = Symbol('PERMISSION_CACHE');

const EMPTY: ReadonlySet<string> = new Set<string>();

@Injectable()
export class PermissionCacheService implements OnModuleInit {
  constructor(
    @Inject(PERMISSION_CACHE) private readonly cache: TwoTierCache<string[]>,
    private readonly repository: PermissionRepository,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.cache.listenForInvalidations();
  }

  /**
   * Effective permission codes of a user. An empty set for a known user is
   * cached like any other result; an unknown user is not cached.
   */
  async getPermissions(userId: string): Promise<ReadonlySet<string>> {
    if (typeof userId !== 'string' || userId.length === 0) return EMPTY;
    const codes = await this.cache.getOrLoad(
      userId,
      async () => (await this.repository.findCodesByUserId(userId)) ?? undefined,
    );
    return codes ? new Set(codes) : EMPTY;
  }

  invalidateUser(userId: string): Promise<void> {
    return this.cache.evict(userId);
  }

  async invalidateUsers(userIds: readonly string[]): Promise<void> {
    await Promise.all(userIds.map((id) => this.cache.evict(id)));
  }

  invalidateAll(): Promise<void> {
    return this.cache.clear();
  }

  stats() {
    return this.cache.stats();
  }
}
