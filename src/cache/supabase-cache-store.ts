/**
 * Cache store backed by a Supabase (PostgREST) table.
 *
 * Expected table:
 *   create table analysis_cache (
 *     fingerprint text primary key,
 *     url text not null,
 *     payload jsonb not null,
 *     created_at timestamptz not null,
 *     expires_at timestamptz not null
 *   );
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { AnalysisResult, CacheEntry } from '../types/analysis.js'
import { CacheBackendError } from '../types/errors.js'
import { serializeResult } from '../utils/result-serializer.js'
import type { CacheStore } from './cache-store.js'

const CacheRowSchema = z.object({
  fingerprint: z.string(),
  url: z.string(),
  payload: z.unknown(),
  created_at: z.string(),
  expires_at: z.string(),
})

export interface SupabaseCacheStoreOptions {
  table?: string
  /**
   * Turns a stored payload back into a result, usually deserializeResult
   * bound to the engine's aggregator
   */
  decode: (payload: unknown) => AnalysisResult
}

export class SupabaseCacheStore implements CacheStore {
  readonly name = 'supabase'
  private readonly table: string
  private readonly decode: (payload: unknown) => AnalysisResult

  constructor(
    private readonly supabase: SupabaseClient,
    options: SupabaseCacheStoreOptions
  ) {
    this.table = options.table ?? 'analysis_cache'
    this.decode = options.decode
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('fingerprint, url, payload, created_at, expires_at')
      .eq('fingerprint', fingerprint)
      .maybeSingle()

    if (error) {
      throw new CacheBackendError(`Cache read failed: ${error.message}`, { cause: error })
    }
    if (!data) return null

    const row = CacheRowSchema.safeParse(data)
    if (!row.success) {
      throw new CacheBackendError(`Malformed cache row for ${fingerprint}`, { cause: row.error })
    }

    let payload: AnalysisResult
    try {
      payload = this.decode(row.data.payload)
    } catch (decodeError) {
      throw new CacheBackendError(`Undecodable cache payload for ${fingerprint}`, { cause: decodeError })
    }

    return {
      fingerprint: row.data.fingerprint,
      url: row.data.url,
      payload,
      createdAt: new Date(row.data.created_at),
      expiresAt: new Date(row.data.expires_at),
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    const { error } = await this.supabase.from(this.table).upsert(
      {
        fingerprint: entry.fingerprint,
        url: entry.url,
        payload: serializeResult(entry.payload),
        created_at: entry.createdAt.toISOString(),
        expires_at: entry.expiresAt.toISOString(),
      },
      { onConflict: 'fingerprint' }
    )

    if (error) {
      throw new CacheBackendError(`Cache write failed: ${error.message}`, { cause: error })
    }
  }

  async delete(fingerprint: string): Promise<void> {
    const { error } = await this.supabase.from(this.table).delete().eq('fingerprint', fingerprint)
    if (error) {
      throw new CacheBackendError(`Cache delete failed: ${error.message}`, { cause: error })
    }
  }

  async clear(): Promise<void> {
    // PostgREST refuses an unfiltered delete
    const { error } = await this.supabase.from(this.table).delete().neq('fingerprint', '')
    if (error) {
      throw new CacheBackendError(`Cache clear failed: ${error.message}`, { cause: error })
    }
  }

  async sweep(now: number): Promise<number> {
    const { error, count } = await this.supabase
      .from(this.table)
      .delete({ count: 'exact' })
      .lte('expires_at', new Date(now).toISOString())

    if (error) {
      throw new CacheBackendError(`Cache sweep failed: ${error.message}`, { cause: error })
    }
    return count ?? 0
  }

  async close(): Promise<void> {}
}
