import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { tokenScopes } from '../../../common/constants/app.constants';
import { TokenInvalidException } from '../../../common/errors/auth.errors';
import { RequestContextService } from '../../../common/services/request-context.service';
import { TokenRevocationService } from '../../../common/services/token-revocation.service';
import { PermissionCacheService } from '../../authorization/permission-cache.service';
import type { AuthenticatedUser } from '../interfaces/authenticated-user.interface';
import { hasScope, toClaims } from '../token.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly revocation: TokenRevocationService,
    private readonly permissionCache: PermissionCacheService,
    private readonly requestContext: RequestContextService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('jwt.secret'),
      algorithms: ['HS256'],
    });
  }

  /**
   * Runs after signature and expiry checks. Revocation and permission
   * lookups are issued together and both awaited before anything else.
   */
  async validate(payload: unknown): Promise<AuthenticatedUser> {
    const claims = toClaims(payload);
    if (!claims || !hasScope(claims, tokenScopes.API)) {
      throw new TokenInvalidException();
    }

    const [revoked, permissions] = await Promise.all([
      this.revocation.isRevoked(claims.jti),
      this.permissionCache.getPermissions(claims.sub),
    ]);
    if (revoked) {
      throw new TokenInvalidException();
    }

    this.requestContext.set('userId', claims.sub);
    return {
      id: claims.sub,
      username: claims.username,
      scope: claims.scope,
      jti: claims.jti,
      expiresAt: claims.exp,
      permissions: [...permissions],
    };
  }
}
