// Token scopes
export const tokenScopes = {
  API: 'rest-api',
  LEGACY: 'legacy',
  REFRESH: 'refresh',
  INTERNAL: 'internal',
} as const;

// Permission wildcards
export const permissionWildcards = {
  ALL: '*',
  PREFIX_SUFFIX: '.*',
} as const;

// Cache namespaces (tier-2 keys are `cache:<namespace>:<key>`)
export const cacheNamespaces = {
  USER_PERMISSIONS: 'perms:user',
  MENU_STRUCTURE: 'menu:structure',
  MENU_TREE: 'menu:tree',
} as const;

// Above this many affected users an invalidation clears the namespace instead
export const INVALIDATION_FAN_OUT_LIMIT = 500;

// Menu languages
export const menuLanguages = {
  DEFAULT: 'uz-UZ',
  SUPPORTED: ['uz-UZ', 'oz-UZ', 'ru-RU', 'en-US'],
} as const;

// Legacy OAuth2 client accepted by the compatibility token endpoint
export const legacyOAuthClient = {
  CLIENT_ID: 'client',
  CLIENT_SECRET: 'secret',
} as const;

// Credential hashing
export const credentialHashing = {
  BCRYPT_ROUNDS: 12,
  BCRYPT_TEST_ROUNDS: 4,
  LEGACY_KEY_LENGTH: 20,
  LEGACY_DIGEST: 'sha1',
  LEGACY_MAX_ITERATIONS: 1_000_000,
} as const;
