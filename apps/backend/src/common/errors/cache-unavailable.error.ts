/**
 * Raised by the shared key-value store when Redis is not configured, not
 * reachable, or too slow. Internal only: callers fall back to the database.
 */
export class CacheUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheUnavailableError';
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
