import { Test, TestingModule } from '@nestjs/testing';
import { INVALIDATION_FAN_OUT_LIMIT } from '../../../common/constants/app.constants';
import { CONNECTION_SOURCE } from '../../../common/database/connection-source';
import { DataAccessRouter } from '../../../common/database/data-access-router.service';
import { MenuService } from '../../menu/menu.service';
import { CacheInvalidationService } from '../cache-invalidation.service';
import { PermissionCacheService } from '../permission-cache.service';
import { PermissionRepository } from '../permission.repository';
import {
  InMemoryConnectionSource,
  emptyTables,
} from '../../../../test/support/in-memory-connection-source';

describe('CacheInvalidationService', () => {
  let service: CacheInvalidationService;
  let source: InMemoryConnectionSource;
  let permissions: {
    invalidateUsers: jest.Mock;
    invalidateAll: jest.Mock;
    stats: jest.Mock;
  };
  let menu: {
    evictUser: jest.Mock;
    invalidateUserTrees: jest.Mock;
    invalidateStructure: jest.Mock;
    stats: jest.Mock;
  };

  beforeEach(async () => {
    source = new InMemoryConnectionSource({
      ...emptyTables(),
      userRoles: [
        { user_id: 'u-1', role_id: 'lecturer' },
        { user_id: 'u-2', role_id: 'lecturer' },
        { user_id: 'u-2', role_id: 'dean' },
      ],
      rolePermissions: [
        { role_id: 'lecturer', permission_id: 'p-view' },
        { role_id: 'dean', permission_id: 'p-view' },
      ],
    });
    permissions = {
      invalidateUsers: jest.fn().mockResolvedValue(undefined),
      invalidateAll: jest.fn().mockResolvedValue(undefined),
      stats: jest.fn().mockReturnValue({ namespace: 'perms:user' }),
    };
    menu = {
      evictUser: jest.fn().mockResolvedValue(undefined),
      invalidateUserTrees: jest.fn().mockResolvedValue(undefined),
      invalidateStructure: jest.fn().mockResolvedValue(undefined),
      stats: jest.fn().mockReturnValue({ structure: {}, trees: {} }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CacheInvalidationService,
        PermissionRepository,
        DataAccessRouter,
        { provide: CONNECTION_SOURCE, useValue: source },
        { provide: PermissionCacheService, useValue: permissions },
        { provide: MenuService, useValue: menu },
      ],
    }).compile();

    service = module.get<CacheInvalidationService>(CacheInvalidationService);
  });

  it('evicts one user from both caches', async () => {
    await expect(service.invalidateUser('u-1')).resolves.toEqual({
      scope: 'users',
      affectedUsers: 1,
    });
    expect(permissions.invalidateUsers).toHaveBeenCalledWith(['u-1']);
    expect(menu.evictUser).toHaveBeenCalledWith('u-1');
  });

  it('fans a role change out to its holders', async () => {
    const result = await service.invalidateRole('lecturer');

    expect(result).toEqual({ scope: 'users', affectedUsers: 2 });
    expect(permissions.invalidateUsers).toHaveBeenCalledWith(['u-1', 'u-2']);
    expect(menu.evictUser).toHaveBeenCalledTimes(2);
    expect(permissions.invalidateAll).not.toHaveBeenCalled();
  });

  it('fans a permission change out once per user', async () => {
    const result = await service.invalidatePermission('p-view');

    expect(result).toEqual({ scope: 'users', affectedUsers: 2 });
    expect(permissions.invalidateUsers).toHaveBeenCalledWith(['u-1', 'u-2']);
  });

  it('clears everything when too many users are affected', async () => {
    for (let i = 0; i <= INVALIDATION_FAN_OUT_LIMIT; i++) {
      source.tables.userRoles.push({ user_id: `bulk-${i}`, role_id: 'student' });
    }

    const result = await service.invalidateRole('student');

    expect(result).toEqual({ scope: 'all', reason: 'fan-out-limit' });
    expect(permissions.invalidateAll).toHaveBeenCalledTimes(1);
    expect(menu.invalidateUserTrees).toHaveBeenCalledTimes(1);
    expect(permissions.invalidateUsers).not.toHaveBeenCalled();
  });

  it('evicts exactly at the limit without clearing', async () => {
    for (let i = 0; i < INVALIDATION_FAN_OUT_LIMIT; i++) {
      source.tables.userRoles.push({ user_id: `bulk-${i}`, role_id: 'student' });
    }

    await expect(service.invalidateRole('student')).resolves.toEqual({
      scope: 'users',
      affectedUsers: INVALIDATION_FAN_OUT_LIMIT,
    });
  });

  it('clears everything when the lookup fails', async () => {
    source.failWith = new Error('replica down');

    const result = await service.invalidatePermission('p-view');

    expect(result).toEqual({ scope: 'all', reason: 'lookup-failed' });
    expect(permissions.invalidateAll).toHaveBeenCalledTimes(1);
    expect(menu.invalidateUserTrees).toHaveBeenCalledTimes(1);
  });

  it('drops the menu structure on a menu change', async () => {
    await service.invalidateMenuStructure();

    expect(menu.invalidateStructure).toHaveBeenCalledTimes(1);
  });

  it('clears everything on request', async () => {
    await expect(service.invalidateAll()).resolves.toEqual({
      scope: 'all',
      reason: 'requested',
    });
  });
});
