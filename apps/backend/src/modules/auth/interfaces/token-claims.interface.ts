export enum TokenKind {
  ACCESS = 'access',
  REFRESH = 'refresh',
  LEGACY = 'legacy',
  SERVICE = 'service',
}

/** Wire-visible claims. Permissions are never carried in a token. */
export interface TokenClaims {
  sub: string;
  username: string;
  scope: string[];
  jti: string;
  iat: number;
  exp: number;
}

export interface IssuedToken {
  token: string;
  kind: TokenKind;
  claims: TokenClaims;
  /** Lifetime in seconds. */
  expiresIn: number;
}
