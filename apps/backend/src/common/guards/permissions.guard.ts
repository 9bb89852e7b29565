import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { PERMISSIONS_KEY } from '../decorators/require-permissions.decorator';
import { PermissionDeniedException } from '../errors/auth.errors';
import { missingPermissions } from '../permissions/permission-matcher';
import type { AuthenticatedUser } from '../../modules/auth/interfaces/authenticated-user.interface';

interface RequestWithUser {
  user?: AuthenticatedUser;
}

@Injectable()
export class PermissionsGuard implements CanActivate {
  private readonly logger = new Logger(PermissionsGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<string[] | undefined>(
      PERMISSIONS_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!required || required.length === 0) {
      return true;
    }

    const user = context.switchToHttp().getRequest<RequestWithUser>().user;
    if (!user) {
      this.logger.warn('PermissionsGuard: no authenticated user on request');
      throw new PermissionDeniedException(required);
    }

    const missing = missingPermissions(required, new Set(user.permissions));
    if (missing.length > 0) {
      this.logger.warn(
        `PermissionsGuard: user ${user.username} lacks [${missing.join(', ')}]`,
      );
      throw new PermissionDeniedException(missing);
    }
    return true;
  }
}
