import { SetMetadata } from '@nestjs/common';

export const PERMISSIONS_KEY = 'permissions';

/**
 * Every listed permission code must be granted to the caller.
 *
 * @example
 * ```typescript
 * @RequirePermissions('students.read')
 * @Get('students')
 * list() {}
 * ```
 */
export const RequirePermissions = (...permissions: string[]) =>
  SetMetadata(PERMISSIONS_KEY, permissions);
