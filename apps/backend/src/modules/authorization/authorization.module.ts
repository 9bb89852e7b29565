import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  createTwoTierCache,
  decodeStringArray,
} from '../../common/cache/cache.factory';
import {
  KEY_VALUE_STORE,
  KeyValueStore,
} from '../../common/cache/key-value-store';
import { cacheNamespaces } from '../../common/constants/app.constants';
import { MenuModule } from '../menu/menu.module';
import { CacheInvalidationService } from './cache-invalidation.service';
import {
  PERMISSION_CACHE,
  PermissionCacheService,
} from './permission-cache.service';
import { PermissionRepository } from './permission.repository';

@Module({
  imports: [MenuModule],
  providers: [
    PermissionRepository,
    {
      provide: PERMISSION_CACHE,
      useFactory: (config: ConfigService, store: KeyValueStore) =>
        createTwoTierCache(
          config,
          store,
          cacheNamespaces.USER_PERMISSIONS,
          decodeStringArray,
        ),
      inject: [ConfigService, KEY_VALUE_STORE],
    },
    PermissionCacheService,
    CacheInvalidationService,
  ],
  exports: [PermissionCacheService, CacheInvalidationService],
})
export class AuthorizationModule {}
