/**
 * SEO Page Analyzer
 *
 * Fetches pages under rate-limit and robots.txt policy, parses them once and
 * runs pluggable analyzers (SEO, security, performance, accessibility and
 * more) to produce scored, prioritized findings.
 */

import { createClient } from '@supabase/supabase-js'
import { createDefaultRegistry, type AnalyzerRegistry } from './analyzers/analyzer-registry.js'
import { ResultAggregator } from './analyzers/result-aggregator.js'
import { AnalysisCache } from './cache/analysis-cache.js'
import type { CacheStore } from './cache/cache-store.js'
import { MemoryCacheStore } from './cache/memory-cache-store.js'
import { SupabaseCacheStore } from './cache/supabase-cache-store.js'
import { loadEnvConfig, type EngineConfig } from './config/env.js'
import { AnalysisOrchestrator } from './crawler/analysis-orchestrator.js'
import { PageCollector, type PageCollectorOptions } from './crawler/page-collector.js'
import { PageProcessor } from './crawler/page-processor.js'
import { CacheConfigSchema, parseConfig } from './types/config.js'
import { logger } from './utils/logger.js'
import { deserializeResult } from './utils/result-serializer.js'

export * from './types/analysis.js'
export * from './types/config.js'
export * from './types/errors.js'
export type * from './types/page-data.js'
export * from './analyzers/base-analyzer.js'
export * from './analyzers/analyzer-registry.js'
export * from './analyzers/result-aggregator.js'
export * from './analyzers/accessibility-analyzer.js'
export * from './analyzers/heading-structure-analyzer.js'
export * from './analyzers/image-analyzer.js'
export * from './analyzers/link-analyzer.js'
export * from './analyzers/meta-analyzer.js'
export * from './analyzers/mobile-friendly-analyzer.js'
export * from './analyzers/performance-analyzer.js'
export * from './analyzers/schema-analyzer.js'
export * from './analyzers/security-analyzer.js'
export * from './analyzers/social-media-analyzer.js'
export * from './analyzers/title-analyzer.js'
export * from './cache/analysis-cache.js'
export type * from './cache/cache-store.js'
export * from './cache/fingerprint.js'
export * from './cache/memory-cache-store.js'
export * from './cache/supabase-cache-store.js'
export * from './config/env.js'
export * from './crawler/analysis-orchestrator.js'
export * from './crawler/page-collector.js'
export * from './crawler/page-processor.js'
export * from './utils/result-serializer.js'
export { RateLimiter } from './utils/rate-limiter.js'
export { RobotsCache } from './utils/robots-parser.js'
export { logger } from './utils/logger.js'
export type { LogLevel } from './utils/logger.js'

export interface AnalysisEngine {
  orchestrator: AnalysisOrchestrator
  registry: AnalyzerRegistry
  collector: PageCollector
  processor: PageProcessor
  aggregator: ResultAggregator
  cache: AnalysisCache
  close(): Promise<void>
}

export interface EngineOptions {
  registry?: AnalyzerRegistry
  store?: CacheStore
  collector?: PageCollectorOptions
}

/**
 * Wire every component from an EngineConfig. The cache is persisted in
 * Supabase when credentials are configured, in memory otherwise.
 */
export function createAnalysisEngine(config: EngineConfig, options: EngineOptions = {}): AnalysisEngine {
  if (config.logLevel) {
    logger.setLevel(config.logLevel)
  }

  const registry = options.registry ?? createDefaultRegistry()
  const aggregator = new ResultAggregator(config.scoring)
  const processor = new PageProcessor(config.processor)
  const collector = new PageCollector(config.collector, options.collector)

  const cacheConfig = parseConfig(CacheConfigSchema, config.cache, 'cache')
  let store = options.store
  if (!store && config.supabase) {
    const supabase = createClient(config.supabase.url, config.supabase.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    })
    store = new SupabaseCacheStore(supabase, { decode: (payload) => deserializeResult(payload, aggregator) })
    logger.info(`Using Supabase cache at ${config.supabase.url}`)
  }
  store ??= new MemoryCacheStore({
    maxEntries: cacheConfig.maxEntries,
    sweepIntervalMs: cacheConfig.sweepIntervalMs,
  })

  const cache = new AnalysisCache(store, cacheConfig)
  const orchestrator = new AnalysisOrchestrator({
    registry,
    collector,
    processor,
    cache,
    aggregator,
    config: config.orchestrator,
  })

  return {
    orchestrator,
    registry,
    collector,
    processor,
    aggregator,
    cache,
    async close() {
      await cache.close()
      await collector.close()
    },
  }
}

export function createAnalysisEngineFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisEngine {
  return createAnalysisEngine(loadEnvConfig(env))
}
