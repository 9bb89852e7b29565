import { hasPermission } from '../../common/permissions/permission-matcher';
import type { MenuItemRecord, MenuNode } from './menu.types';

/** `order` ascending with nulls last, then code. */
export function compareMenuOrder(a: MenuItemRecord, b: MenuItemRecord): number {
  if (a.order !== b.order) {
    if (a.order === null) return 1;
    if (b.order === null) return -1;
    return a.order - b.order;
  }
  if (a.code === b.code) return 0;
  return a.code < b.code ? -1 : 1;
}

const hasUrl = (item: MenuItemRecord): boolean =>
  item.url !== null && item.url.trim().length > 0;

/**
 * Builds the visible tree by descending from the roots (`parentId` null).
 * A hidden node takes its whole subtree with it; a node without a url and
 * without visible children is dropped. Rows unreachable from a root (orphans
 * or cycles) never appear.
 */
export function buildMenuTree(
  items: readonly MenuItemRecord[],
  permissions: ReadonlySet<string>,
): MenuNode[] {
  const childrenOf = new Map<string | null, MenuItemRecord[]>();
  for (const item of items) {
    const siblings = childrenOf.get(item.parentId);
    if (siblings) siblings.push(item);
    else childrenOf.set(item.parentId, [item]);
  }

  const visited = new Set<string>();
  const build = (parentId: string | null): MenuNode[] => {
    const level = [...(childrenOf.get(parentId) ?? [])].sort(compareMenuOrder);
    const nodes: MenuNode[] = [];
    for (const item of level) {
      if (visited.has(item.id)) continue;
      visited.add(item.id);
      if (!hasPermission(item.permissionCode, permissions)) continue;

      const children = build(item.id);
      if (!hasUrl(item) && children.length === 0) continue;
      nodes.push({ ...item, children });
    }
    return nodes;
  };

  return build(null);
}
