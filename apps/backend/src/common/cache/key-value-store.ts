export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');

export type KeyValueEntry = { key: string; value: string; ttlMs: number };

/**
 * Shared, expiring key-value store seen by every process instance.
 * Implementations throw `CacheUnavailableError` when the backend cannot
 * answer in time; callers treat that as a miss.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Writes only when the key is absent; true when this call wrote it. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Writes every entry in one atomic batch. */
  setMany(entries: readonly KeyValueEntry[]): Promise<void>;
  exists(key: string): Promise<boolean>;
  del(keys: readonly string[]): Promise<number>;
  deleteByPrefix(prefix: string): Promise<number>;
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, listener: (message: string) => void): Promise<void>;
}
