import type { CacheEntry } from '../types/analysis.js'

/**
 * Storage backend behind AnalysisCache. Implementations may throw
 * CacheBackendError; the cache catches it and switches to bypass mode.
 * Expiry is enforced by the cache, not the store.
 */
export interface CacheStore {
  readonly name: string
  get(fingerprint: string): Promise<CacheEntry | null>
  set(entry: CacheEntry): Promise<void>
  delete(fingerprint: string): Promise<void>
  clear(): Promise<void>
  /**
   * Drop expired entries; returns the number removed
   */
  sweep(now: number): Promise<number>
  close(): Promise<void>
}
