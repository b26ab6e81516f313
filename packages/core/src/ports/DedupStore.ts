/**
 * Idempotency store shared across runs, keyed by "YYYY-MM-DD|signature".
 * Callers check with `has` and record with `set` once the guarded action
 * has succeeded.
 */
export interface DedupStorePort {
  has(key: string): Promise<boolean>;
  /** Records the key, replacing any earlier value */
  set(key: string, value?: string): Promise<void>;
}
