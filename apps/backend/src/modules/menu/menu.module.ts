import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createTwoTierCache } from '../../common/cache/cache.factory';
import {
  KEY_VALUE_STORE,
  KeyValueStore,
} from '../../common/cache/key-value-store';
import { cacheNamespaces } from '../../common/constants/app.constants';
import { MenuController } from './menu.controller';
import { MenuRepository } from './menu.repository';
import {
  MENU_STRUCTURE_CACHE,
  MENU_TREE_CACHE,
  MenuService,
} from './menu.service';
import { decodeMenuItems, decodeMenuTree } from './menu.types';

@Module({
  controllers: [MenuController],
  providers: [
    MenuRepository,
    {
      provide: MENU_STRUCTURE_CACHE,
      useFactory: (config: ConfigService, store: KeyValueStore) =>
        createTwoTierCache(
          config,
          store,
          cacheNamespaces.MENU_STRUCTURE,
          decodeMenuItems,
        ),
      inject: [ConfigService, KEY_VALUE_STORE],
    },
    {
      provide: MENU_TREE_CACHE,
      useFactory: (config: ConfigService, store: KeyValueStore) =>
        createTwoTierCache(config, store, cacheNamespaces.MENU_TREE, decodeMenuTree),
      inject: [ConfigService, KEY_VALUE_STORE],
    },
    MenuService,
  ],
  exports: [MenuService],
})
export class MenuModule {}
