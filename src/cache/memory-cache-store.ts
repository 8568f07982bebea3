/**
 * In-process cache store: a Map kept in least-recently-used order, bounded by
 * maxEntries, with an optional periodic sweep of expired entries.
 */

import type { CacheEntry } from '../types/analysis.js'
import type { CacheStore } from './cache-store.js'
import { logger } from '../utils/logger.js'

export interface MemoryCacheStoreOptions {
  maxEntries?: number
  sweepIntervalMs?: number
  now?: () => number
}

export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory'
  private entries = new Map<string, CacheEntry>()
  private readonly maxEntries: number
  private sweepTimer: NodeJS.Timeout | null = null
  evictions = 0

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000
    const now = options.now ?? Date.now

    if (options.sweepIntervalMs && options.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        const removed = this.sweepSync(now())
        if (removed > 0) {
          logger.debug(`Cache sweep removed ${removed} expired entries`)
        }
      }, options.sweepIntervalMs)
      // Never keep the process alive for housekeeping
      this.sweepTimer.unref()
    }
  }

  get size(): number {
    return this.entries.size
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(fingerprint)
    if (!entry) return null

    // Refresh recency
    this.entries.delete(fingerprint)
    this.entries.set(fingerprint, entry)
    return entry
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.delete(entry.fingerprint)
    this.entries.set(entry.fingerprint, entry)

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
      this.evictions++
    }
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint)
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }

  async sweep(now: number): Promise<number> {
    return this.sweepSync(now)
  }

  async close(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  private sweepSync(now: number): number {
    let removed = 0
    for (const [fingerprint, entry] of this.entries) {
      if (entry.expiresAt.getTime() <= now) {
        this.entries.delete(fingerprint)
        removed++
      }
    }
    return removed
  }
}
