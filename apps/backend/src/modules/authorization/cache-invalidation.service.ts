import { Injectable, Logger } from '@nestjs/common';
import { INVALIDATION_FAN_OUT_LIMIT } from '../../common/constants/app.constants';
import { describeError } from '../../common/errors/cache-unavailable.error';
import { MenuService } from '../menu/menu.service';
import { PermissionCacheService } from './permission-cache.service';
import { PermissionRepository } from './permission.repository';

export type InvalidationResult =
  | { scope: 'users'; affectedUsers: number }
  | { scope: 'all'; reason: 'requested' | 'fan-out-limit' | 'lookup-failed' };

/**
 * Entry points for management code that changes users, roles, permissions
 * or menus. Every call returns only after both tiers are evicted and the
 * eviction is broadcast.
 */
@Injectable()
export class CacheInvalidationService {
  private readonly logger = new Logger(CacheInvalidationService.name);

  constructor(
    private readonly permissions: PermissionCacheService,
    private readonly menu: MenuService,
    private readonly repository: PermissionRepository,
  ) {}

  async invalidateUser(userId: string): Promise<InvalidationResult> {
    await this.evictUsers([userId]);
    return { scope: 'users', affectedUsers: 1 };
  }

  invalidateRole(roleId: string): Promise<InvalidationResult> {
    return this.fanOut(`role ${roleId}`, () =>
      this.repository.findUserIdsByRole(roleId, INVALIDATION_FAN_OUT_LIMIT + 1),
    );
  }

  invalidatePermission(permissionId: string): Promise<InvalidationResult> {
    return this.fanOut(`permission ${permissionId}`, () =>
      this.repository.findUserIdsByPermission(
        permissionId,
        INVALIDATION_FAN_OUT_LIMIT + 1,
      ),
    );
  }

  async invalidateMenuStructure(): Promise<void> {
    await this.menu.invalidateStructure();
  }

  async invalidateAll(): Promise<InvalidationResult> {
    await this.clearAll();
    return { scope: 'all', reason: 'requested' };
  }

  stats() {
    return {
      permissions: this.permissions.stats(),
      menu: this.menu.stats(),
    };
  }

  private async fanOut(
    label: string,
    lookup: () => Promise<string[]>,
  ): Promise<InvalidationResult> {
    let userIds: string[];
    try {
      userIds = await lookup();
    } catch (err) {
      this.logger.warn(
        `Fan-out lookup for ${label} failed, clearing all: ${describeError(err)}`,
      );
      await this.clearAll();
      return { scope: 'all', reason: 'lookup-failed' };
    }

    if (userIds.length > INVALIDATION_FAN_OUT_LIMIT) {
      this.logger.log(
        `${label} affects more than ${INVALIDATION_FAN_OUT_LIMIT} users, clearing all`,
      );
      await this.clearAll();
      return { scope: 'all', reason: 'fan-out-limit' };
    }

    await this.evictUsers(userIds);
    this.logger.debug(`Invalidated ${userIds.length} users for ${label}`);
    return { scope: 'users', affectedUsers: userIds.length };
  }

  private async evictUsers(userIds: readonly string[]): Promise<void> {
    await Promise.all([
      this.permissions.invalidateUsers(userIds),
      ...userIds.map((id) => this.menu.evictUser(id)),
    ]);
  }

  private async clearAll(): Promise<void> {
    await Promise.all([
      this.permissions.invalidateAll(),
      this.menu.invalidateUserTrees(),
    ]);
  }
}
