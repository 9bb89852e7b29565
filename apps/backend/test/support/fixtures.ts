import { pbkdf2Sync } from 'crypto';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';

export const TEST_SECRET = 'test-secret-test-secret-test-secret!';

export const createTestConfig = (
  overrides: Record<string, unknown> = {},
): ConfigService =>
  new ConfigService({
    jwt: {
      secret: TEST_SECRET,
      accessExpiresIn: '12h',
      refreshExpiresIn: '7d',
      legacyExpiresIn: '30d',
    },
    cache: { localTtlMs: 60_000, sharedTtlMs: 300_000, localMaxEntries: 1000 },
    ...overrides,
  });

export const createTestJwt = (secret: string = TEST_SECRET): JwtService =>
  new JwtService({
    secret,
    signOptions: { algorithm: 'HS256' },
    verifyOptions: { algorithms: ['HS256'] },
  });

/** `base64(hash):base64(salt):iterations`, the legacy store's format. */
export const legacyHash = (raw: string, iterations = 1000): string => {
  const salt = Buffer.from('campus-salt');
  const hash = pbkdf2Sync(raw, salt, iterations, 20, 'sha1');
  return `${hash.toString('base64')}:${salt.toString('base64')}:${iterations}`;
};
