import { Test, TestingModule } from '@nestjs/testing';
import { createTwoTierCache } from '../../../common/cache/cache.factory';
import { cacheNamespaces } from '../../../common/constants/app.constants';
import { CONNECTION_SOURCE } from '../../../common/database/connection-source';
import { DataAccessRouter } from '../../../common/database/data-access-router.service';
import { MenuRepository } from '../menu.repository';
import {
  MENU_STRUCTURE_CACHE,
  MENU_TREE_CACHE,
  MenuService,
  normalizeLanguage,
} from '../menu.service';
import { decodeMenuItems, decodeMenuTree } from '../menu.types';
import {
  InMemoryConnectionSource,
  MenuRecord,
  emptyTables,
} from '../../../../test/support/in-memory-connection-source';
import { InMemoryKeyValueStore } from '../../../../test/support/in-memory-key-value-store';
import { createTestConfig } from '../../../../test/support/fixtures';

const menu = (overrides: Partial<MenuRecord> & { id: string }): MenuRecord => ({
  code: overrides.id,
  i18n_key: null,
  url: `/${overrides.id}`,
  icon: null,
  permission: null,
  parent_id: null,
  order_number: null,
  active: true,
  ...overrides,
});

describe('normalizeLanguage', () => {
  it.each([
    ['ru-RU', 'ru-RU'],
    ['en-us', 'en-US'],
    [' oz-UZ ', 'oz-UZ'],
    ['fr-FR', 'uz-UZ'],
    ['', 'uz-UZ'],
    [undefined, 'uz-UZ'],
    [null, 'uz-UZ'],
  ])('maps %p to %s', (input, expected) => {
    expect(normalizeLanguage(input)).toBe(expected);
  });
});

describe('MenuService', () => {
  let service: MenuService;
  let source: InMemoryConnectionSource;
  let store: InMemoryKeyValueStore;

  beforeEach(async () => {
    source = new InMemoryConnectionSource({
      ...emptyTables(),
      menus: [
        menu({ id: 'students', i18n_key: 'menu.students', permission: 'students.view', order_number: 1 }),
        menu({ id: 'grades', i18n_key: 'menu.grades', permission: 'grades.view', order_number: 2 }),
        menu({ id: 'help', order_number: 3 }),
        menu({ id: 'retired', active: false }),
      ],
      translations: [
        { key: 'menu.students', language: 'uz-UZ', message: 'Talabalar' },
        { key: 'menu.students', language: 'ru-RU', message: 'Студенты' },
      ],
    });
    store = new InMemoryKeyValueStore();
    const config = createTestConfig();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MenuService,
        MenuRepository,
        DataAccessRouter,
        { provide: CONNECTION_SOURCE, useValue: source },
        {
          provide: MENU_STRUCTURE_CACHE,
          useValue: createTwoTierCache(
            config,
            store,
            cacheNamespaces.MENU_STRUCTURE,
            decodeMenuItems,
          ),
        },
        {
          provide: MENU_TREE_CACHE,
          useValue: createTwoTierCache(
            config,
            store,
            cacheNamespaces.MENU_TREE,
            decodeMenuTree,
          ),
        },
      ],
    }).compile();

    service = module.get<MenuService>(MenuService);
  });

  it('builds the permitted tree with translated labels', async () => {
    const tree = await service.getMenu('u-1', new Set(['students.view']), 'ru-RU');

    expect(tree.map((n) => [n.id, n.label])).toEqual([
      ['students', 'Студенты'],
      ['help', 'help'],
    ]);
  });

  it('falls back to the default language and then to the i18n key', async () => {
    const tree = await service.getMenu('u-1', new Set(['*']), 'fr-FR');

    expect(tree.map((n) => n.label)).toEqual(['Talabalar', 'menu.grades', 'help']);
  });

  it('serves a repeated request from cache', async () => {
    await service.getMenu('u-1', new Set(['students.view']));
    const afterFirst = source.statements.length;

    await service.getMenu('u-1', new Set(['students.view']));

    expect(source.statements).toHaveLength(afterFirst);
  });

  it('shares the structure between users but not the tree', async () => {
    await service.getMenu('u-1', new Set(['students.view']));
    const afterFirst = source.statements.length;

    const other = await service.getMenu('u-2', new Set(['grades.view']));

    expect(other.map((n) => n.id)).toEqual(['grades', 'help']);
    expect(source.statements).toHaveLength(afterFirst);
  });

  it('evicts every language variant of one user', async () => {
    await service.getMenu('u-1', new Set(), 'ru-RU');
    await service.getMenu('u-1', new Set(), 'en-US');
    await service.getMenu('u-2', new Set(), 'ru-RU');

    await service.evictUser('u-1');

    const treeKeys = [...store.data.keys()]
      .filter((k) => k.startsWith('cache:menu:tree:'))
      .sort();
    expect(treeKeys).toEqual(['cache:menu:tree:u-2:ru-RU']);
  });

  it('rebuilds from the database after a structure change', async () => {
    await service.getMenu('u-1', new Set(['*']));
    source.tables.menus.push(menu({ id: 'calendar', order_number: 0 }));

    await service.invalidateStructure();

    const tree = await service.getMenu('u-1', new Set(['*']));
    expect(tree.map((n) => n.id)).toEqual(['calendar', 'students', 'grades', 'help']);
  });

  it('keeps working when the shared store is down', async () => {
    store.offline = true;

    const tree = await service.getMenu('u-1', new Set());

    expect(tree.map((n) => n.id)).toEqual(['help']);
  });
});
