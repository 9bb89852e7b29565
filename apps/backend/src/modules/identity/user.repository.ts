import { Injectable } from '@nestjs/common';
import { DataAccessRouter } from '../../common/database/data-access-router.service';
import {
  CredentialStore,
  Principal,
  isCredentialRow,
  toPrincipal,
} from './principal';

@Injectable()
export class UserRepository {
  constructor(private readonly router: DataAccessRouter) {}

  async findByUsername(username: string): Promise<Principal | null> {
    const rows = await this.router.read((db) =>
      db.query(
        `SELECT id, username, password_hash, enabled
           FROM users
          WHERE username = $1 AND deleted_at IS NULL
          LIMIT 1`,
        [username],
      ),
    );
    const row = rows.find(isCredentialRow);
    return row ? toPrincipal(row, CredentialStore.MODERN) : null;
  }
}
