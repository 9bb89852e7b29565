/** What the bearer strategy attaches to `request.user`. */
export interface AuthenticatedUser {
  id: string;
  username: string;
  scope: string[];
  jti: string;
  /** Epoch seconds. */
  expiresAt: number;
  permissions: string[];
}

export interface ServicePrincipal {
  service: string;
  jti: string;
}
