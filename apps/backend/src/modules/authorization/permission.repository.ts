import { Injectable } from '@nestjs/common';
import { DataAccessRouter } from '../../common/database/data-access-router.service';

const isCodeRow = (row: unknown): row is { code: string } =>
  typeof row === 'object' &&
  row !== null &&
  'code' in row &&
  typeof row.code === 'string';

const isUserIdRow = (row: unknown): row is { user_id: string } =>
  typeof row === 'object' &&
  row !== null &&
  'user_id' in row &&
  typeof row.user_id === 'string';

const isKnownRow = (row: unknown): row is { known: boolean } =>
  typeof row === 'object' &&
  row !== null &&
  'known' in row &&
  row.known === true;

@Injectable()
export class PermissionRepository {
  constructor(private readonly router: DataAccessRouter) {}

  /**
   * Active permission codes granted through the user's roles, or null when
   * no live account in either store has this id. Served by the primary: it
   * refills the cache right after an invalidation and must not see a lagging
   * replica.
   */
  async findCodesByUserId(userId: string): Promise<string[] | null> {
    return this.router.readFromPrimary(async (db) => {
      const known = await db.query(
        `SELECT (EXISTS (SELECT 1 FROM users WHERE id = $1 AND deleted_at IS NULL)
              OR EXISTS (SELECT 1 FROM sec_user WHERE id = $1 AND delete_ts IS NULL)) AS known`,
        [userId],
      );
      if (!known.some(isKnownRow)) return null;

      const rows = await db.query(
        `SELECT DISTINCT p.code
           FROM user_roles ur
           JOIN role_permissions rp ON rp.role_id = ur.role_id
           JOIN permissions p ON p.id = rp.permission_id
          WHERE ur.user_id = $1 AND p.active = true
          ORDER BY p.code`,
        [userId],
      );
      return rows.filter(isCodeRow).map((row) => row.code);
    });
  }

  /** At most `limit` ids; callers pass their fan-out limit + 1 to detect overflow. */
  async findUserIdsByRole(roleId: string, limit: number): Promise<string[]> {
    const rows = await this.router.read((db) =>
      db.query(
        `SELECT DISTINCT ur.user_id
           FROM user_roles ur
          WHERE ur.role_id = $1
          LIMIT $2`,
        [roleId, limit],
      ),
    );
    return rows.filter(isUserIdRow).map((row) => row.user_id);
  }

  async findUserIdsByPermission(
    permissionId: string,
    limit: number,
  ): Promise<string[]> {
    const rows = await this.router.read((db) =>
      db.query(
        `SELECT DISTINCT ur.user_id
           FROM user_roles ur
           JOIN role_permissions rp ON rp.role_id = ur.role_id
          WHERE rp.permission_id = $1
          LIMIT $2`,
        [permissionId, limit],
      ),
    );
    return rows.filter(isUserIdRow).map((row) => row.user_id);
  }
}
