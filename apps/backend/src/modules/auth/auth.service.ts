import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { tokenScopes } from '../../common/constants/app.constants';
import {
  AccountDisabledException,
  InvalidCredentialsException,
  TokenInvalidException,
} from '../../common/errors/auth.errors';
import { describeError } from '../../common/errors/cache-unavailable.error';
import {
  hashCredential,
  verifyCredential,
} from '../../common/security/credential-verifier';
import { AppLoggerService } from '../../common/services/app-logger.service';
import {
  RevocationRequest,
  TokenRevocationService,
} from '../../common/services/token-revocation.service';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import type { Principal } from '../identity/principal';
import { LoginDto } from './dto/login.dto';
import type {
  AuthResponse,
  CurrentUserResponse,
  LegacyTokenResponse,
} from './interfaces/auth-response.interface';
import type { AuthenticatedUser } from './interfaces/authenticated-user.interface';
import { IssuedToken, TokenKind } from './interfaces/token-claims.interface';
import { TokenService, hasScope } from './token.service';

type TokenPair = {
  principal: Principal;
  access: IssuedToken;
  refresh: IssuedToken;
};

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private dummyHash?: Promise<string>;

  constructor(
    private readonly identity: IdentityResolverService,
    private readonly tokens: TokenService,
    private readonly revocation: TokenRevocationService,
    private readonly appLogger: AppLoggerService,
  ) {}

  async login(loginDto: LoginDto): Promise<AuthResponse> {
    const principal = await this.authenticate(loginDto.username, loginDto.password);
    const pair = this.issuePair(principal, TokenKind.ACCESS);
    this.logger.log(
      `User logged in: ${principal.username} (${principal.sourceStore})`,
    );
    return this.toAuthResponse(pair);
  }

  /** Rotates a refresh token: the presented one is revoked, a new pair issued. */
  async refresh(refreshToken: string): Promise<AuthResponse> {
    const pair = await this.rotate(refreshToken, TokenKind.ACCESS);
    return this.toAuthResponse(pair);
  }

  /**
   * Revokes the access token and, when given and owned by the same user,
   * the refresh token in one batch. Never fails the logout itself.
   */
  async logout(user: AuthenticatedUser, refreshToken?: string): Promise<void> {
    const requests: RevocationRequest[] = [
      {
        jti: user.jti,
        ttlSeconds: this.tokens.remainingSeconds({ exp: user.expiresAt }),
      },
    ];

    if (refreshToken) {
      const claims = this.tokens.validate(refreshToken);
      if (claims && hasScope(claims, tokenScopes.REFRESH) && claims.sub === user.id) {
        requests.push({
          jti: claims.jti,
          ttlSeconds: this.tokens.remainingSeconds(claims),
        });
      } else {
        this.logger.debug(`Ignoring unusable refresh token on logout for ${user.id}`);
      }
    }

    try {
      const outcomes = await this.revocation.revokeMany(requests);
      const durable = outcomes.filter((o) => o.durable).length;
      if (durable < requests.length) {
        this.appLogger.logSecurity('Partial token revocation on logout', {
          userId: user.id,
          requested: requests.length,
          durable,
        });
      }
    } catch (err) {
      this.appLogger.logSecurity('Token revocation failed on logout', {
        userId: user.id,
        error: describeError(err),
      });
    }
    this.logger.log(`User logged out: ${user.username}`);
  }

  me(user: AuthenticatedUser): CurrentUserResponse {
    return {
      id: user.id,
      username: user.username,
      scope: user.scope,
      permissions: [...user.permissions].sort(),
      expiresAt: user.expiresAt,
    };
  }

  /** Password grant of the legacy OAuth2 endpoint. */
  async legacyPasswordGrant(
    username: string,
    password: string,
  ): Promise<LegacyTokenResponse> {
    const principal = await this.authenticate(username, password);
    return this.toLegacyResponse(this.issuePair(principal, TokenKind.LEGACY));
  }

  async legacyRefreshGrant(refreshToken: string): Promise<LegacyTokenResponse> {
    const pair = await this.rotate(refreshToken, TokenKind.LEGACY);
    return this.toLegacyResponse(pair);
  }

  /**
   * Unknown user and wrong secret fail identically, and both run one hash
   * verification. Disabled accounts are reported only after the secret
   * verified.
   */
  private async authenticate(username: string, password: string): Promise<Principal> {
    const principal = await this.identity.resolve(username);
    if (!principal) {
      await verifyCredential(password, await this.getDummyHash());
      throw new InvalidCredentialsException();
    }

    const valid = await verifyCredential(password, principal.passwordHash);
    if (!valid) {
      this.logger.warn(`Failed login for ${principal.username}`);
      throw new InvalidCredentialsException();
    }

    if (!principal.enabled) {
      this.appLogger.logSecurity('Login attempt on disabled account', {
        userId: principal.id,
      });
      throw new AccountDisabledException();
    }
    return principal;
  }

  private async rotate(refreshToken: string, accessKind: TokenKind): Promise<TokenPair> {
    const claims = this.tokens.validate(refreshToken);
    if (!claims || !hasScope(claims, tokenScopes.REFRESH)) {
      throw new TokenInvalidException();
    }
    if (await this.revocation.isRevoked(claims.jti)) {
      this.appLogger.logSecurity('Revoked refresh token presented', {
        userId: claims.sub,
      });
      throw new TokenInvalidException();
    }

    const principal = await this.identity.resolve(claims.username);
    if (!principal || principal.id !== claims.sub) {
      throw new TokenInvalidException();
    }
    if (!principal.enabled) {
      throw new AccountDisabledException();
    }

    // single use: of two concurrent refreshes only one claims the jti
    const outcome = await this.revocation.consume(
      claims.jti,
      this.tokens.remainingSeconds(claims),
    );
    if (!outcome.consumed) {
      this.appLogger.logSecurity('Revoked refresh token presented', {
        userId: principal.id,
      });
      throw new TokenInvalidException();
    }
    if (!outcome.durable) {
      this.appLogger.logSecurity('Refresh token rotation not durable', {
        userId: principal.id,
      });
    }
    return this.issuePair(principal, accessKind);
  }

  private issuePair(principal: Principal, accessKind: TokenKind): TokenPair {
    return {
      principal,
      access: this.tokens.issue(principal, accessKind),
      refresh: this.tokens.issue(principal, TokenKind.REFRESH),
    };
  }

  private toAuthResponse({ principal, access, refresh }: TokenPair): AuthResponse {
    return {
      user: {
        id: principal.id,
        username: principal.username,
        sourceStore: principal.sourceStore,
      },
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'Bearer',
      expiresIn: access.expiresIn,
      scope: access.claims.scope,
    };
  }

  private toLegacyResponse({ access, refresh }: TokenPair): LegacyTokenResponse {
    return {
      access_token: access.token,
      token_type: 'bearer',
      refresh_token: refresh.token,
      expires_in: access.expiresIn,
      scope: access.claims.scope.join(' '),
    };
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = hashCredential(randomUUID());
    }
    return this.dummyHash;
  }
}
