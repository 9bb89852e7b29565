import { applyDecorators } from '@nestjs/common';
import { ApiBearerAuth, ApiResponse } from '@nestjs/swagger';
import { RequirePermissions } from './require-permissions.decorator';

/**
 * Documents a bearer-protected endpoint and, when codes are given, requires
 * those permissions. Authentication itself comes from the global guard.
 *
 * @example
 * ```typescript
 * @Authenticated('menu.read')
 * @Get('menu')
 * getMenu() {}
 * ```
 */
export function Authenticated(...permissions: string[]) {
  const decorators: Array<ClassDecorator | MethodDecorator> = [
    ApiBearerAuth(),
    ApiResponse({
      status: 401,
      description: 'Unauthorized - invalid, expired or revoked token',
      schema: {
        type: 'object',
        properties: {
          statusCode: { type: 'number', example: 401 },
          message: { type: 'string', example: 'Invalid or expired token' },
          errorCode: { type: 'string', example: 'AUTH_TOKEN_INVALID' },
        },
      },
    }),
  ];
  if (permissions.length > 0) {
    decorators.push(
      RequirePermissions(...permissions),
      ApiResponse({
        status: 403,
        description: 'Forbidden - insufficient permissions',
      }),
    );
  }
  return applyDecorators(...decorators);
}
