import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import type { TwoTierCache } from '../../common/cache/two-tier-cache';
import { menuLanguages } from '../../common/constants/app.constants';
import { buildMenuTree } from './menu-tree';
import { MenuRepository } from './menu.repository';
import type { MenuItemRecord, MenuNode } from './menu.types';

export const MENU_STRUCTURE_CACHE = Symbol('MENU_STRUCTURE_CACHE');
export const MENU_TREE_CACHE = Symbol('MENU_TREE_CACHE');

/** Case-insensitive match against the supported codes, else the default. */
export function normalizeLanguage(languageCode?: string | null): string {
  if (typeof languageCode !== 'string') return menuLanguages.DEFAULT;
  const wanted = languageCode.trim().toLowerCase();
  return (
    menuLanguages.SUPPORTED.find((code) => code.toLowerCase() === wanted) ??
    menuLanguages.DEFAULT
  );
}

@Injectable()
export class MenuService implements OnModuleInit {
  constructor(
    @Inject(MENU_STRUCTURE_CACHE)
    private readonly structure: TwoTierCache<MenuItemRecord[]>,
    @Inject(MENU_TREE_CACHE)
    private readonly trees: TwoTierCache<MenuNode[]>,
    private readonly repository: MenuRepository,
  ) {}

  async onModuleInit(): Promise<void> {
    await Promise.all([
      this.structure.listenForInvalidations(),
      this.trees.listenForInvalidations(),
    ]);
  }

  /**
   * Permission-filtered menu of one user. The flat structure is cached per
   * language and the built tree per (user, language).
   */
  async getMenu(
    userId: string,
    permissions: ReadonlySet<string>,
    languageCode?: string | null,
  ): Promise<MenuNode[]> {
    const language = normalizeLanguage(languageCode);
    const tree = await this.trees.getOrLoad(`${userId}:${language}`, async () => {
      const items = await this.structure.getOrLoad(language, () =>
        this.repository.findActive(language),
      );
      return buildMenuTree(items ?? [], permissions);
    });
    return tree ?? [];
  }

  /** Drops every language variant of one user's tree. */
  evictUser(userId: string): Promise<void> {
    return this.trees.evictByPrefix(`${userId}:`);
  }

  invalidateUserTrees(): Promise<void> {
    return this.trees.clear();
  }

  async invalidateStructure(): Promise<void> {
    await Promise.all([this.structure.clear(), this.trees.clear()]);
  }

  stats() {
    return {
      structure: this.structure.stats(),
      trees: this.trees.stats(),
    };
  }
}
