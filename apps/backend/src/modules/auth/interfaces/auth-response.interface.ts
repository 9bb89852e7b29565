import type { CredentialStore } from '../../identity/principal';

export interface AuthResponse {
  user: {
    id: string;
    username: string;
    sourceStore: CredentialStore;
  };
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Access token lifetime in seconds. */
  expiresIn: number;
  scope: string[];
}

/** OAuth2 token response of the legacy-compatible endpoint. */
export interface LegacyTokenResponse {
  access_token: string;
  token_type: 'bearer';
  refresh_token: string;
  expires_in: number;
  scope: string;
}

export interface CurrentUserResponse {
  id: string;
  username: string;
  scope: string[];
  permissions: string[];
  expiresAt: number;
}
