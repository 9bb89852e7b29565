import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { authErrorCodes, PermissionDeniedException } from '../errors/auth.errors';
import type { AuthenticatedUser } from '../../modules/auth/interfaces/authenticated-user.interface';

interface RequestWithUser extends Request {
  user?: AuthenticatedUser;
}

@Catch(ForbiddenException)
export class RbacExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RbacExceptionFilter.name);

  catch(exception: ForbiddenException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<RequestWithUser>();
    const status = exception.getStatus();

    const user = request.user;
    const method = request.method;
    const url = request.url;
    const timestamp = new Date().toISOString();

    const requiredPermissions =
      exception instanceof PermissionDeniedException
        ? [...exception.requiredPermissions]
        : [];
    const errorCode =
      exception instanceof PermissionDeniedException
        ? authErrorCodes.PERMISSION_DENIED
        : 'RBAC_ACCESS_DENIED';

    // security monitoring
    this.logger.warn(
      `Access denied: user ${user?.username ?? 'unknown'} attempted ${method} ${url}` +
        (requiredPermissions.length > 0
          ? ` (missing ${requiredPermissions.join(', ')})`
          : ''),
    );

    response.status(status).json({
      statusCode: status,
      timestamp,
      path: url,
      method,
      error: 'Forbidden',
      message: 'Insufficient permissions',
      errorCode,
      details: {
        requiredPermissions,
        resource: this.extractResourceFromUrl(url),
        action: this.extractActionFromMethod(method),
      },
      help: this.getHelpMessage(requiredPermissions),
    });
  }

  private extractActionFromMethod(method: string): string {
    const actionMap: Record<string, string> = {
      GET: 'read',
      POST: 'create',
      PUT: 'update',
      PATCH: 'update',
      DELETE: 'delete',
    };
    return actionMap[method] || 'unknown';
  }

  private extractResourceFromUrl(url: string): string {
    const pathSegments = url
      .split('?')[0]
      .split('/')
      .filter((segment) => segment && !segment.match(/^\d+$/));

    if (pathSegments.length >= 1) {
      if (pathSegments[0] === 'api' && pathSegments.length >= 2) {
        return pathSegments[1];
      }
      return pathSegments[0];
    }

    return 'unknown';
  }

  private getHelpMessage(requiredPermissions: string[]): string {
    if (requiredPermissions.length === 0) {
      return 'Access denied. Please check your permissions or contact support.';
    }
    return `Ask an administrator to grant: ${requiredPermissions.join(', ')}.`;
  }
}
