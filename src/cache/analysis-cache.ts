/**
 * Analysis Cache
 *
 * Fingerprint-keyed TTL cache in front of the pipeline:
 * - Expiry checked on every read, whatever the store does
 * - Single-flight: concurrent misses for one fingerprint share one computation
 * - Store errors or slow responses put the cache in bypass mode for a cooldown,
 *   during which reads miss and writes are skipped
 */

import type { AnalysisResult, CacheEntry } from '../types/analysis.js'
import { CacheBackendError } from '../types/errors.js'
import { CacheConfigSchema, parseConfig, type CacheConfig, type CacheConfigInput } from '../types/config.js'
import { logger } from '../utils/logger.js'
import type { CacheStore } from './cache-store.js'

export interface CacheStats {
  hits: number
  misses: number
  writes: number
  backendErrors: number
  inFlight: number
  bypassed: boolean
  store: string
}

export interface CacheLookup {
  result: AnalysisResult
  fromCache: boolean
}

export interface AnalysisCacheOptions {
  now?: () => number
}

export class AnalysisCache {
  readonly config: CacheConfig
  private readonly now: () => number
  private readonly inFlight = new Map<string, Promise<CacheLookup>>()
  private bypassUntil = 0
  private hits = 0
  private misses = 0
  private writes = 0
  private backendErrors = 0

  constructor(
    private readonly store: CacheStore,
    config: CacheConfigInput = {},
    options: AnalysisCacheOptions = {}
  ) {
    this.config = parseConfig(CacheConfigSchema, config, 'cache')
    this.now = options.now ?? Date.now
  }

  get bypassed(): boolean {
    return this.now() < this.bypassUntil
  }

  async get(fingerprint: string): Promise<AnalysisResult | null> {
    if (!this.config.enabled || this.bypassed) {
      this.misses++
      return null
    }

    const entry = await this.withBackend('get', () => this.store.get(fingerprint))
    if (!entry) {
      this.misses++
      return null
    }

    if (entry.expiresAt.getTime() <= this.now()) {
      this.misses++
      await this.withBackend('delete', () => this.store.delete(fingerprint))
      return null
    }

    this.hits++
    return entry.payload
  }

  async set(fingerprint: string, result: AnalysisResult, ttlMs: number = this.config.ttlMs): Promise<void> {
    if (!this.config.enabled || this.bypassed) return
    if (result.status === 'FAILED') {
      logger.scope(fingerprint, 'debug', `Not caching failed result for ${result.url}`)
      return
    }

    const createdAt = this.now()
    const entry: CacheEntry = {
      fingerprint,
      url: result.url,
      payload: result,
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + ttlMs),
    }

    const stored = await this.withBackend('set', async () => {
      await this.store.set(entry)
      return true
    })
    if (stored) this.writes++
  }

  async invalidate(fingerprint: string): Promise<void> {
    await this.withBackend('delete', () => this.store.delete(fingerprint))
  }

  async clear(): Promise<void> {
    await this.withBackend('clear', () => this.store.clear())
  }

  /**
   * Return the cached result, or run compute once for every concurrent caller
   * and store what it produces. Errors from compute reach every waiting caller.
   */
  getOrCompute(fingerprint: string, compute: () => Promise<AnalysisResult>): Promise<CacheLookup> {
    const pending = this.inFlight.get(fingerprint)
    if (pending) {
      logger.scope(fingerprint, 'debug', 'Joining in-flight analysis')
      return pending
    }

    const lookup = this.lookupOrCompute(fingerprint, compute).finally(() => {
      this.inFlight.delete(fingerprint)
    })
    this.inFlight.set(fingerprint, lookup)
    return lookup
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      writes: this.writes,
      backendErrors: this.backendErrors,
      inFlight: this.inFlight.size,
      bypassed: this.bypassed,
      store: this.store.name,
    }
  }

  async close(): Promise<void> {
    await this.store.close()
  }

  private async lookupOrCompute(
    fingerprint: string,
    compute: () => Promise<AnalysisResult>
  ): Promise<CacheLookup> {
    const cached = await this.get(fingerprint)
    if (cached) {
      logger.scope(fingerprint, 'debug', `Cache hit for ${cached.url}`)
      return { result: cached, fromCache: true }
    }

    const result = await compute()
    await this.set(fingerprint, result)
    return { result, fromCache: false }
  }

  /**
   * Run a store operation under backendTimeoutMs. Any failure switches to
   * bypass mode and resolves to null instead of rejecting.
   */
  private async withBackend<T>(operation: string, run: () => Promise<T>): Promise<T | null> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CacheBackendError(`Cache ${operation} timed out after ${this.config.backendTimeoutMs}ms`))
      }, this.config.backendTimeoutMs)
    })

    try {
      return await Promise.race([run(), timeout])
    } catch (error) {
      this.backendErrors++
      this.bypassUntil = this.now() + this.config.bypassCooldownMs
      logger.warn(
        `Cache store "${this.store.name}" ${operation} failed; bypassing cache for ${this.config.bypassCooldownMs}ms`,
        error instanceof Error ? error.message : error
      )
      return null
    } finally {
      clearTimeout(timer)
    }
  }
}
