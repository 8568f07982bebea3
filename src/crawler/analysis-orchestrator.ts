/**
 * Analysis Orchestrator
 *
 * Drives the pipeline for one URL, a batch of URLs or a whole site:
 * - Cache lookup (single-flight) before any network work
 * - Fetch, parse, then run the selected analyzers on a bounded sub-pool
 * - Batches run on N workers pulling from a shared cursor; the collector's
 *   rate limiter is shared by all of them
 * - Deadline and AbortSignal stop new work; in-flight URLs finish
 */

import os from 'os'
import pLimit from 'p-limit'
import type { Analyzer } from '../analyzers/base-analyzer.js'
import type { AnalyzerRegistry } from '../analyzers/analyzer-registry.js'
import type { ResultAggregator } from '../analyzers/result-aggregator.js'
import type { AnalysisCache, CacheLookup } from '../cache/analysis-cache.js'
import { computeFingerprint } from '../cache/fingerprint.js'
import type {
  AnalysisResult,
  AnalyzerFailure,
  AnalyzerResult,
  BatchEntry,
  BatchEntryError,
  BatchEntryStatus,
  BatchResult,
} from '../types/analysis.js'
import {
  OrchestratorConfigSchema,
  parseConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from '../types/config.js'
import { AnalyzerError, CollectionError, ConfigError } from '../types/errors.js'
import type { Collector } from './page-collector.js'
import type { PageProcessor } from './page-processor.js'
import { SitemapParser } from '../utils/sitemap-parser.js'
import { isSameSite, isSeoRelevantUrl } from '../utils/seo-url-filter.js'
import { logger } from '../utils/logger.js'

export interface AnalysisRequest {
  readonly url: string
  readonly analyzers: readonly Analyzer[]
}

export interface RequestOptions {
  /**
   * Analyzer names to run; defaults to config.defaultAnalyzers, then every
   * registered analyzer
   */
  analyzers?: string[]
  // Per-analyzer config, keyed by analyzer name
  analyzerConfig?: Record<string, unknown>
}

export interface BatchProgress {
  url: string
  entry: BatchEntry
  completed: number
  total: number
}

export interface BatchOptions extends RequestOptions {
  workers?: number
  // Epoch milliseconds or a Date
  deadline?: number | Date
  signal?: AbortSignal
  onProgress?: (progress: BatchProgress) => void
}

export interface SiteOptions extends BatchOptions {
  maxPages?: number
}

export interface OrchestratorDeps {
  registry: AnalyzerRegistry
  collector: Collector
  processor: PageProcessor
  cache: AnalysisCache
  aggregator: ResultAggregator
  config?: OrchestratorConfigInput
}

export function validateUrl(url: string): string {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new ConfigError(`Invalid URL: ${url}`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Unsupported protocol ${parsed.protocol} in ${url}`)
  }
  return parsed.toString()
}

/**
 * Key a batch URL by its serialized form, so spellings of one URL share an
 * entry. Unparseable input is kept as given and fails in its own entry.
 */
export function batchKey(url: string): string {
  try {
    return new URL(url).toString()
  } catch {
    return url
  }
}

export function toBatchError(error: unknown): BatchEntryError {
  if (error instanceof CollectionError) {
    return { kind: error.kind, message: error.message, statusCode: error.statusCode }
  }
  if (error instanceof Error) {
    return { kind: error.name, message: error.message }
  }
  return { kind: 'Error', message: String(error) }
}

export class AnalysisOrchestrator {
  readonly config: OrchestratorConfig
  private readonly registry: AnalyzerRegistry
  private readonly collector: Collector
  private readonly processor: PageProcessor
  private readonly cache: AnalysisCache
  private readonly aggregator: ResultAggregator
  private readonly analyzerLimit: ReturnType<typeof pLimit>

  constructor(deps: OrchestratorDeps) {
    this.registry = deps.registry
    this.collector = deps.collector
    this.processor = deps.processor
    this.cache = deps.cache
    this.aggregator = deps.aggregator
    this.config = parseConfig(OrchestratorConfigSchema, deps.config, 'orchestrator')
    this.analyzerLimit = pLimit(this.config.analyzerConcurrency || os.availableParallelism())
  }

  /**
   * Validate the URL and instantiate the analyzers. Unknown names and invalid
   * analyzer configs fail here, before anything is fetched.
   */
  createRequest(url: string, options: RequestOptions = {}): AnalysisRequest {
    return this.buildRequest(url, this.resolveAnalyzers(options))
  }

  fingerprint(request: AnalysisRequest): string {
    return computeFingerprint({
      url: request.url,
      analyzers: request.analyzers.map((analyzer) => ({ name: analyzer.name, config: analyzer.config })),
      scoring: this.aggregator.config,
      processor: this.processor.config,
    })
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const { result } = await this.lookup(request)
    return result
  }

  async analyzeUrl(url: string, options: RequestOptions = {}): Promise<AnalysisResult> {
    return this.analyze(this.createRequest(url, options))
  }

  async analyzeBatch(urls: string[], options: BatchOptions = {}): Promise<BatchResult> {
    const analyzers = this.resolveAnalyzers(options)
    const workers = options.workers ?? this.config.workers
    if (!Number.isInteger(workers) || workers < 1) {
      throw new ConfigError(`workers must be a positive integer, got ${workers}`)
    }

    const deadline = options.deadline instanceof Date ? options.deadline.getTime() : options.deadline
    const unique = [...new Set(urls.map(batchKey))]
    const entries: Record<string, BatchEntry> = {}
    const startedAt = new Date()
    let cursor = 0
    let completed = 0
    let cancelled = false

    const stopRequested = (): boolean => {
      if (options.signal?.aborted) return true
      return deadline !== undefined && Date.now() >= deadline
    }

    const worker = async (workerId: number): Promise<void> => {
      while (cursor < unique.length) {
        if (stopRequested()) {
          cancelled = true
          return
        }

        const url = unique[cursor++]
        if (url === undefined) return

        logger.debug(`Worker ${workerId} analyzing ${url}`)
        const entry = await this.runEntry(url, analyzers)
        entries[url] = entry
        completed++
        options.onProgress?.({ url, entry, completed, total: unique.length })
      }
    }

    logger.info(`Analyzing ${unique.length} URLs with ${Math.min(workers, unique.length)} workers`)
    await Promise.all(Array.from({ length: Math.min(workers, unique.length) }, (_, index) => worker(index + 1)))

    const summary: Record<BatchEntryStatus, number> = { COMPLETED: 0, PARTIAL: 0, FAILED: 0, SKIPPED: 0 }
    const ordered: Record<string, BatchEntry> = {}
    for (const url of unique) {
      const entry: BatchEntry = entries[url] ?? { url, status: 'SKIPPED', fromCache: false }
      ordered[url] = entry
      summary[entry.status]++
    }

    if (cancelled) {
      logger.warn(`Batch stopped early; ${summary.SKIPPED} URLs skipped`)
    }

    const completedAt = new Date()
    return {
      entries: ordered,
      summary,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      cancelled,
    }
  }

  /**
   * Discover pages from the site's sitemaps and analyze them as a batch.
   * The root URL is always analyzed.
   */
  async analyzeSite(rootUrl: string, options: SiteOptions = {}): Promise<BatchResult> {
    const root = validateUrl(rootUrl)
    const maxPages = options.maxPages ?? this.config.maxSitePages
    const selected = [root]

    let sitemapUrls: string[] = []
    try {
      sitemapUrls = await this.collector.getSitemapUrls(root)
    } catch (error) {
      logger.warn(`Could not read robots.txt sitemaps for ${root}:`, error instanceof Error ? error.message : error)
    }

    const parser = new SitemapParser(root, (url, accept) => this.collector.fetchText(url, accept), {
      maxUrls: maxPages * 10,
    })
    const discovered = await parser.parse(sitemapUrls)
    if (discovered.errors.length > 0) {
      logger.debug(`Sitemap errors for ${root}: ${discovered.errors.join(', ')}`)
    }

    for (const { loc } of discovered.urls) {
      if (selected.length >= maxPages) break
      if (!isSameSite(loc, root)) continue

      const relevance = isSeoRelevantUrl(loc)
      if (!relevance.isRelevant) {
        logger.debug(`Skipping ${loc}: ${relevance.reason}`)
        continue
      }
      if (!selected.includes(loc)) selected.push(loc)
    }

    logger.info(`Site ${root}: ${discovered.urls.length} sitemap URLs, analyzing ${selected.length}`)
    return this.analyzeBatch(selected, options)
  }

  private resolveAnalyzers(options: RequestOptions): Analyzer[] {
    const names = options.analyzers ?? this.config.defaultAnalyzers ?? this.registry.names()
    if (names.length === 0) {
      throw new ConfigError('At least one analyzer must be selected')
    }

    const severityWeights = this.aggregator.config.severityWeights
    return [...new Set(names)].map((name) =>
      this.registry.create(name, options.analyzerConfig?.[name] ?? {}, { severityWeights })
    )
  }

  private buildRequest(url: string, analyzers: readonly Analyzer[]): AnalysisRequest {
    return Object.freeze({ url: validateUrl(url), analyzers: Object.freeze([...analyzers]) })
  }

  private lookup(request: AnalysisRequest): Promise<CacheLookup> {
    const fingerprint = this.fingerprint(request)
    return this.cache.getOrCompute(fingerprint, () => this.run(request, fingerprint))
  }

  private async runEntry(url: string, analyzers: readonly Analyzer[]): Promise<BatchEntry> {
    try {
      const { result, fromCache } = await this.lookup(this.buildRequest(url, analyzers))
      return { url, status: result.status, result, fromCache }
    } catch (error) {
      const entryError = toBatchError(error)
      logger.warn(`Analysis failed for ${url}: ${entryError.message}`)
      return { url, status: 'FAILED', error: entryError, fromCache: false }
    }
  }

  private async run(request: AnalysisRequest, fingerprint: string): Promise<AnalysisResult> {
    const startedAt = new Date()
    logger.scope(fingerprint, 'info', `Analyzing ${request.url}`)

    const raw = await this.collector.fetch(request.url)
    const doc = this.processor.parse(raw)
    for (const warning of doc.metadata.warnings) {
      logger.scope(fingerprint, 'debug', `Parse warning: ${warning}`)
    }

    const results: AnalyzerResult[] = []
    const failures: AnalyzerFailure[] = []
    const outcomes = await Promise.all(
      request.analyzers.map((analyzer) =>
        this.analyzerLimit(async (): Promise<AnalyzerResult | AnalyzerFailure> => {
          const started = Date.now()
          try {
            const report = analyzer.analyze(doc)
            return { ...report, durationMs: Date.now() - started }
          } catch (error) {
            const failure = new AnalyzerError(analyzer.name, error)
            logger.scope(fingerprint, 'warn', failure.message)
            return { analyzer: analyzer.name, message: failure.message }
          }
        })
      )
    )

    for (const outcome of outcomes) {
      if ('score' in outcome) {
        results.push(outcome)
      } else {
        failures.push(outcome)
      }
    }

    const result = this.aggregator.merge({
      url: request.url,
      results,
      failures,
      startedAt,
      completedAt: new Date(),
    })
    logger.scope(
      fingerprint,
      'info',
      `Finished ${request.url}: score ${result.overallScore}, ${result.findings.length} findings (${result.status})`
    )
    return result
  }
}
