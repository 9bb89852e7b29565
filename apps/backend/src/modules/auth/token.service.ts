import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { tokenScopes } from '../../common/constants/app.constants';
import { describeError } from '../../common/errors/cache-unavailable.error';
import { parseDurationSeconds } from '../../common/utils/duration';
import type { Principal } from '../identity/principal';
import {
  IssuedToken,
  TokenClaims,
  TokenKind,
} from './interfaces/token-claims.interface';

export const MIN_SECRET_LENGTH = 32;

const SCOPES: Record<TokenKind, readonly string[]> = {
  [TokenKind.ACCESS]: [tokenScopes.API],
  [TokenKind.REFRESH]: [tokenScopes.REFRESH],
  [TokenKind.LEGACY]: [tokenScopes.API, tokenScopes.LEGACY],
  [TokenKind.SERVICE]: [tokenScopes.INTERNAL],
};

const isPositiveInteger = (v: unknown): v is number =>
  typeof v === 'number' && Number.isInteger(v) && v > 0;

const isNonEmptyString = (v: unknown): v is string =>
  typeof v === 'string' && v.length > 0;

/** Structural check of a verified payload; anything off yields null. */
export function toClaims(payload: unknown): TokenClaims | null {
  if (typeof payload !== 'object' || payload === null) return null;
  if (
    !('sub' in payload && isNonEmptyString(payload.sub)) ||
    !('username' in payload && isNonEmptyString(payload.username)) ||
    !('jti' in payload && isNonEmptyString(payload.jti)) ||
    !('iat' in payload && isPositiveInteger(payload.iat)) ||
    !('exp' in payload && isPositiveInteger(payload.exp)) ||
    !('scope' in payload && Array.isArray(payload.scope))
  ) {
    return null;
  }
  const scope: string[] = [];
  for (const item of payload.scope) {
    if (!isNonEmptyString(item)) return null;
    scope.push(item);
  }
  if (scope.length === 0 || payload.exp <= payload.iat) return null;
  return {
    sub: payload.sub,
    username: payload.username,
    scope,
    jti: payload.jti,
    iat: payload.iat,
    exp: payload.exp,
  };
}

export const hasScope = (claims: TokenClaims, scope: string): boolean =>
  claims.scope.includes(scope);

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly lifetimes: Record<TokenKind, number>;

  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {
    const secret = this.configService.get<string>('jwt.secret');
    if (typeof secret !== 'string' || secret.length < MIN_SECRET_LENGTH) {
      throw new Error(
        `JWT secret must be set and at least ${MIN_SECRET_LENGTH} characters long`,
      );
    }
    const access = this.lifetime('jwt.accessExpiresIn', '12h');
    this.lifetimes = {
      [TokenKind.ACCESS]: access,
      [TokenKind.REFRESH]: this.lifetime('jwt.refreshExpiresIn', '7d'),
      [TokenKind.LEGACY]: this.lifetime('jwt.legacyExpiresIn', '30d'),
      [TokenKind.SERVICE]: access,
    };
  }

  private lifetime(key: string, fallback: string): number {
    const raw = this.configService.get<string>(key, fallback);
    const seconds = parseDurationSeconds(raw);
    if (seconds === undefined) {
      throw new Error(`Invalid token lifetime for ${key}: ${raw}`);
    }
    return seconds;
  }

  issue(principal: Pick<Principal, 'id' | 'username'>, kind: TokenKind): IssuedToken {
    const iat = Math.floor(Date.now() / 1000);
    const expiresIn = this.lifetimes[kind];
    const claims: TokenClaims = {
      sub: principal.id,
      username: principal.username,
      scope: [...SCOPES[kind]],
      jti: randomUUID(),
      iat,
      exp: iat + expiresIn,
    };
    // exp is in the payload, so no expiresIn option is passed to the signer
    const token = this.jwtService.sign({ ...claims });
    return { token, kind, claims, expiresIn };
  }

  /** Token for a trusted internal caller; its subject is the service name. */
  issueServiceToken(serviceName: string): IssuedToken {
    return this.issue({ id: serviceName, username: serviceName }, TokenKind.SERVICE);
  }

  /**
   * Signature, expiry and shape only. Revocation is the caller's concern.
   */
  validate(raw: string): TokenClaims | null {
    if (typeof raw !== 'string' || raw.length === 0) return null;
    try {
      const payload = this.jwtService.verify<Record<string, unknown>>(raw);
      return toClaims(payload);
    } catch (err) {
      this.logger.debug(`Token rejected: ${describeError(err)}`);
      return null;
    }
  }

  /** Seconds until expiry, never negative. */
  remainingSeconds(claims: Pick<TokenClaims, 'exp'>): number {
    return Math.max(0, claims.exp - Math.floor(Date.now() / 1000));
  }
}
