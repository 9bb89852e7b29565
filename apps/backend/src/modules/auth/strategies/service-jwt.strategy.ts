import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { tokenScopes } from '../../../common/constants/app.constants';
import { TokenInvalidException } from '../../../common/errors/auth.errors';
import type { ServicePrincipal } from '../interfaces/authenticated-user.interface';
import { hasScope, toClaims } from '../token.service';

/** Internal callers; revocation is deliberately not consulted here. */
@Injectable()
export class ServiceJwtStrategy extends PassportStrategy(Strategy, 'service-jwt') {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('jwt.secret'),
      algorithms: ['HS256'],
    });
  }

  validate(payload: unknown): ServicePrincipal {
    const claims = toClaims(payload);
    if (!claims || !hasScope(claims, tokenScopes.INTERNAL)) {
      throw new TokenInvalidException();
    }
    return { service: claims.sub, jti: claims.jti };
  }
}
