import { Module } from '@nestjs/common';
import { IdentityResolverService } from './identity-resolver.service';
import { LegacyUserRepository } from './legacy-user.repository';
import { UserRepository } from './user.repository';

@Module({
  providers: [UserRepository, LegacyUserRepository, IdentityResolverService],
  exports: [IdentityResolverService],
})
export class IdentityModule {}
