import { Injectable } from '@nestjs/common';
import { DataAccessRouter } from '../../common/database/data-access-router.service';
import {
  CredentialStore,
  Principal,
  isCredentialRow,
  toPrincipal,
} from './principal';

/** `sec_user` columns aliased onto the modern row shape. */
@Injectable()
export class LegacyUserRepository {
  constructor(private readonly router: DataAccessRouter) {}

  async findByLogin(login: string): Promise<Principal | null> {
    const rows = await this.router.read((db) =>
      db.query(
        `SELECT id, login AS username, password AS password_hash, active AS enabled
           FROM sec_user
          WHERE login = $1 AND delete_ts IS NULL
          LIMIT 1`,
        [login],
      ),
    );
    const row = rows.find(isCredentialRow);
    return row ? toPrincipal(row, CredentialStore.LEGACY) : null;
  }
}
