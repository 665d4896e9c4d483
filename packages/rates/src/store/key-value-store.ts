/**
 * The shared store behind the rate cache and the distributed lock.
 * Values are opaque strings; every write carries a TTL.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlMs: number): Promise<void>;

  /**
   * Writes only if the key is absent. Resolves true when this call created the key.
   */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;

  /**
   * Atomically deletes the key if its current value equals `expected`.
   * Resolves true when the key was deleted.
   */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
