import { SetMetadata, UseGuards, applyDecorators } from '@nestjs/common';
import { ApiBearerAuth } from '@nestjs/swagger';
import { ServiceAuthGuard } from '../guards/service-auth.guard';

export const isPublicKey = 'isPublic';

/** Skips the global user-token guard (login, refresh, legacy OAuth). */
export const publicDecorator = () => SetMetadata(isPublicKey, true);

/**
 * Internal service-to-service routes: no user token and no revocation
 * lookup, only a service token carrying the internal scope.
 */
export const serviceOnly = () =>
  applyDecorators(publicDecorator(), UseGuards(ServiceAuthGuard), ApiBearerAuth());
