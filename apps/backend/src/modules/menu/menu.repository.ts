import { Injectable } from '@nestjs/common';
import { DataAccessRouter } from '../../common/database/data-access-router.service';
import type { MenuItemRecord } from './menu.types';

interface MenuRow {
  id: string;
  code: string;
  i18n_key: string | null;
  label: string;
  url: string | null;
  icon: string | null;
  permission: string | null;
  parent_id: string | null;
  order_number: number | null;
}

const nullableString = (v: unknown): v is string | null =>
  v === null || typeof v === 'string';

const isMenuRow = (row: unknown): row is MenuRow =>
  typeof row === 'object' &&
  row !== null &&
  'id' in row &&
  typeof row.id === 'string' &&
  'code' in row &&
  typeof row.code === 'string' &&
  'i18n_key' in row &&
  nullableString(row.i18n_key) &&
  'label' in row &&
  typeof row.label === 'string' &&
  'url' in row &&
  nullableString(row.url) &&
  'icon' in row &&
  nullableString(row.icon) &&
  'permission' in row &&
  nullableString(row.permission) &&
  'parent_id' in row &&
  nullableString(row.parent_id) &&
  'order_number' in row &&
  (row.order_number === null || typeof row.order_number === 'number');

@Injectable()
export class MenuRepository {
  constructor(private readonly router: DataAccessRouter) {}

  /** Flat list of active rows; labels fall back to the i18n key, then the code. */
  async findActive(languageCode: string): Promise<MenuItemRecord[]> {
    const rows = await this.router.read((db) =>
      db.query(
        `SELECT m.id, m.code, m.i18n_key,
                COALESCE(t.message, m.i18n_key, m.code) AS label,
                m.url, m.icon, m.permission, m.parent_id, m.order_number
           FROM menus m
           LEFT JOIN translations t
             ON t.key = m.i18n_key AND t.language = $1
          WHERE m.active = true AND m.deleted_at IS NULL
          ORDER BY m.order_number NULLS LAST, m.code`,
        [languageCode],
      ),
    );
    return rows.filter(isMenuRow).map((row) => ({
      id: row.id,
      code: row.code,
      i18nKey: row.i18n_key,
      label: row.label,
      url: row.url,
      icon: row.icon,
      permissionCode: row.permission,
      parentId: row.parent_id,
      order: row.order_number,
    }));
  }
}
