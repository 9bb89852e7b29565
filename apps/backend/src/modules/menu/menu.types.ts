/** One active menu row with its label resolved for a language. */
export interface MenuItemRecord {
  id: string;
  code: string;
  i18nKey: string | null;
  label: string;
  url: string | null;
  icon: string | null;
  permissionCode: string | null;
  parentId: string | null;
  order: number | null;
}

export interface MenuNode extends MenuItemRecord {
  children: MenuNode[];
}

const isNullableString = (v: unknown): v is string | null =>
  v === null || typeof v === 'string';

export const isMenuItemRecord = (v: unknown): v is MenuItemRecord =>
  typeof v === 'object' &&
  v !== null &&
  'id' in v &&
  typeof v.id === 'string' &&
  'code' in v &&
  typeof v.code === 'string' &&
  'i18nKey' in v &&
  isNullableString(v.i18nKey) &&
  'label' in v &&
  typeof v.label === 'string' &&
  'url' in v &&
  isNullableString(v.url) &&
  'icon' in v &&
  isNullableString(v.icon) &&
  'permissionCode' in v &&
  isNullableString(v.permissionCode) &&
  'parentId' in v &&
  isNullableString(v.parentId) &&
  'order' in v &&
  (v.order === null || typeof v.order === 'number');

export const isMenuNode = (v: unknown): v is MenuNode =>
  isMenuItemRecord(v) &&
  'children' in v &&
  Array.isArray(v.children) &&
  v.children.every(isMenuNode);

export const decodeMenuItems = (raw: unknown): MenuItemRecord[] | undefined =>
  Array.isArray(raw) && raw.every(isMenuItemRecord) ? raw : undefined;

export const decodeMenuTree = (raw: unknown): MenuNode[] | undefined =>
  Array.isArray(raw) && raw.every(isMenuNode) ? raw : undefined;
