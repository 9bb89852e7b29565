import { ForbiddenException, UnauthorizedException } from '@nestjs/common';

export const authErrorCodes = {
  INVALID_CREDENTIALS: 'AUTH_INVALID_CREDENTIALS',
  TOKEN_INVALID: 'AUTH_TOKEN_INVALID',
  ACCOUNT_DISABLED: 'AUTH_ACCOUNT_DISABLED',
  PERMISSION_DENIED: 'RBAC_PERMISSION_DENIED',
} as const;

/**
 * Unknown user or wrong secret. Both cases share one message so that a
 * caller cannot probe which usernames exist.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      message: 'Invalid credentials',
      errorCode: authErrorCodes.INVALID_CREDENTIALS,
    });
  }
}

/**
 * Bad signature, malformed, expired, wrong kind or revoked token. Revoked
 * tokens are deliberately reported exactly like the rest.
 */
export class TokenInvalidException extends UnauthorizedException {
  constructor() {
    super({
      message: 'Invalid or expired token',
      errorCode: authErrorCodes.TOKEN_INVALID,
    });
  }
}

export class AccountDisabledException extends UnauthorizedException {
  constructor() {
    super({
      message: 'Account is disabled',
      errorCode: authErrorCodes.ACCOUNT_DISABLED,
    });
  }
}

export class PermissionDeniedException extends ForbiddenException {
  constructor(readonly requiredPermissions: readonly string[]) {
    super({
      message: 'Insufficient permissions',
      errorCode: authErrorCodes.PERMISSION_DENIED,
      requiredPermissions: [...requiredPermissions],
    });
  }
}
