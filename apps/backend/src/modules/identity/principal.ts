export enum CredentialStore {
  MODERN = 'MODERN',
  LEGACY = 'LEGACY',
}

/** Read-only view of an account; authentication never writes back to it. */
export interface Principal {
  readonly id: string;
  readonly username: string;
  readonly passwordHash: string;
  readonly enabled: boolean;
  readonly sourceStore: CredentialStore;
}

export interface CredentialRow {
  id: string;
  username: string;
  password_hash: string;
  enabled: boolean;
}

export const isCredentialRow = (row: unknown): row is CredentialRow =>
  typeof row === 'object' &&
  row !== null &&
  'id' in row &&
  typeof row.id === 'string' &&
  'username' in row &&
  typeof row.username === 'string' &&
  'password_hash' in row &&
  typeof row.password_hash === 'string' &&
  'enabled' in row &&
  typeof row.enabled === 'boolean';

export const toPrincipal = (
  row: CredentialRow,
  sourceStore: CredentialStore,
): Principal => ({
  id: row.id,
  username: row.username,
  passwordHash: row.password_hash,
  enabled: row.enabled,
  sourceStore,
});
