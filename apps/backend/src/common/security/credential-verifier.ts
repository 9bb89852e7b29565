import { Logger } from '@nestjs/common';
import { pbkdf2, timingSafeEqual } from 'crypto';
import { promisify } from 'util';
import * as bcrypt from 'bcryptjs';
import { credentialHashing } from '../constants/app.constants';

const pbkdf2Async = promisify(pbkdf2);
const logger = new Logger('CredentialVerifier');

export type HashFormat = 'modern' | 'legacy' | 'unknown';

const BCRYPT_PREFIX = /^\$2[aby]\$\d{2}\$/;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

type LegacyHash = { hash: Buffer; salt: Buffer; iterations: number };

/**
 * Classifies a stored hash by its structural marker. Modern hashes are
 * bcrypt; legacy hashes are `base64(hash):base64(salt):iterations`.
 */
export function detectHashFormat(stored: string): HashFormat {
  if (BCRYPT_PREFIX.test(stored)) return 'modern';
  return parseLegacyHash(stored) ? 'legacy' : 'unknown';
}

function parseLegacyHash(stored: string): LegacyHash | null {
  const parts = stored.split(':');
  if (parts.length !== 3) return null;
  const [hash, salt, iterationsRaw] = parts;
  if (!BASE64.test(hash) || !BASE64.test(salt)) return null;
  if (!/^\d+$/.test(iterationsRaw)) return null;
  const iterations = Number(iterationsRaw);
  if (
    iterations < 1 ||
    iterations > credentialHashing.LEGACY_MAX_ITERATIONS
  ) {
    return null;
  }
  return {
    hash: Buffer.from(hash, 'base64'),
    salt: Buffer.from(salt, 'base64'),
    iterations,
  };
}

async function verifyLegacy(raw: string, legacy: LegacyHash): Promise<boolean> {
  const derived = await pbkdf2Async(
    raw,
    legacy.salt,
    legacy.iterations,
    credentialHashing.LEGACY_KEY_LENGTH,
    credentialHashing.LEGACY_DIGEST,
  );
  if (derived.length !== legacy.hash.length) return false;
  return timingSafeEqual(derived, legacy.hash);
}

/**
 * Verifies a presented secret against a stored hash of either scheme.
 * Fails closed: unrecognized formats and internal errors yield false.
 */
export async function verifyCredential(
  raw: string,
  stored: string | null | undefined,
): Promise<boolean> {
  if (typeof raw !== 'string' || raw.length === 0) return false;
  if (typeof stored !== 'string' || stored.length === 0) return false;

  try {
    if (BCRYPT_PREFIX.test(stored)) {
      return await bcrypt.compare(raw, stored);
    }
    const legacy = parseLegacyHash(stored);
    if (legacy) {
      return await verifyLegacy(raw, legacy);
    }
    logger.warn('Stored credential has an unrecognized hash format');
    return false;
  } catch (err) {
    logger.error(
      `Credential verification failed: ${err instanceof Error ? err.message : String(err)}`,
    );
    return false;
  }
}

/** New hashes are always written in the modern scheme. */
export async function hashCredential(raw: string): Promise<string> {
  const rounds =
    process.env.NODE_ENV === 'test'
      ? credentialHashing.BCRYPT_TEST_ROUNDS
      : credentialHashing.BCRYPT_ROUNDS;
  return bcrypt.hash(raw, rounds);
}
