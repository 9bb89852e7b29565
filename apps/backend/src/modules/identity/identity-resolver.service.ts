import { Injectable, Logger } from '@nestjs/common';
import { LegacyUserRepository } from './legacy-user.repository';
import { Principal } from './principal';
import { UserRepository } from './user.repository';

@Injectable()
export class IdentityResolverService {
  private readonly logger = new Logger(IdentityResolverService.name);

  constructor(
    private readonly users: UserRepository,
    private readonly legacyUsers: LegacyUserRepository,
  ) {}

  /**
   * Modern store first, legacy store on a miss. Exactly one store answers;
   * records are never merged.
   */
  async resolve(username: string): Promise<Principal | null> {
    if (typeof username !== 'string' || username.trim().length === 0) {
      return null;
    }

    const modern = await this.users.findByUsername(username);
    if (modern) return modern;

    const legacy = await this.legacyUsers.findByLogin(username);
    if (legacy) {
      this.logger.warn(
        `User ${legacy.username} resolved from the legacy store; migration pending`,
      );
    }
    return legacy;
  }
}
