/**
 * Page Collector
 *
 * Fetches raw page content:
 * - Consults robots.txt (cached per origin) before fetching
 * - Takes a token from the shared rate limiter for every request
 * - Retries transient failures with exponential backoff plus jitter
 * - Follows redirects manually so the chain is recorded
 */

import { Agent, fetch, type Dispatcher, type Response } from 'undici'
import { gunzipSync } from 'zlib'
import type { RawDocument, RedirectInfo } from '../types/page-data.js'
import { CollectionError } from '../types/errors.js'
import {
  CollectorConfigSchema,
  parseConfig,
  type CollectorConfig,
  type CollectorConfigInput,
} from '../types/config.js'
import { RateLimiter } from '../utils/rate-limiter.js'
import { RobotsCache } from '../utils/robots-parser.js'
import { logger } from '../utils/logger.js'

/**
 * What the orchestrator needs from a collector
 */
export interface Collector {
  fetch(url: string): Promise<RawDocument>
  /**
   * Fetch an auxiliary text resource (robots.txt, sitemaps). Resolves to null
   * for non-2xx responses.
   */
  fetchText(url: string, accept?: string): Promise<string | null>
  getSitemapUrls(url: string): Promise<string[]>
}

export interface PageCollectorOptions {
  dispatcher?: Dispatcher
  rateLimiter?: RateLimiter
  robotsCache?: RobotsCache
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
])

/**
 * Delay before retry number `attempt` (0-based): exponential growth from
 * retryDelayMs capped at maxRetryDelayMs, plus uniform jitter in [0, retryDelayMs)
 */
export function computeBackoffDelay(
  attempt: number,
  config: Pick<CollectorConfig, 'retryDelayMs' | 'maxRetryDelayMs'>,
  random: () => number = Math.random,
  retryAfterMs?: number
): number {
  const exponential = Math.min(config.maxRetryDelayMs, config.retryDelayMs * Math.pow(2, attempt))
  const delay = exponential + Math.floor(random() * config.retryDelayMs)
  return retryAfterMs !== undefined ? Math.max(delay, retryAfterMs) : delay
}

/**
 * Parse a Retry-After header given in seconds; HTTP-date values are ignored
 */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) return undefined
  const seconds = Number(value.trim())
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined
  if ('code' in error && typeof error.code === 'string') return error.code
  return errorCode(error.cause)
}

function isRedirect(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400 && statusCode !== 304
}

function collectHeaders(response: Response): Record<string, string> {
  const headers: Record<string, string> = {}
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value
  })
  return headers
}

function charsetOf(contentType: string): string {
  const match = contentType.match(/charset=["']?([^;"'\s]+)/i)
  return match?.[1]?.toLowerCase() ?? 'utf-8'
}

function decode(bytes: Uint8Array, charset: string): string {
  try {
    return new TextDecoder(charset).decode(bytes)
  } catch {
    // Unknown charset label
    return new TextDecoder('utf-8').decode(bytes)
  }
}

type AttemptOutcome =
  | { kind: 'document'; document: RawDocument }
  | { kind: 'redirect'; redirectTo: string; statusCode: number }

export class PageCollector implements Collector {
  readonly config: CollectorConfig
  private dispatcher: Dispatcher
  private ownsDispatcher: boolean
  private rateLimiter: RateLimiter
  private robotsCache: RobotsCache
  private sleep: (ms: number) => Promise<void>
  private random: () => number

  constructor(config: CollectorConfigInput = {}, options: PageCollectorOptions = {}) {
    this.config = parseConfig(CollectorConfigSchema, config, 'collector')
    this.ownsDispatcher = options.dispatcher === undefined
    this.dispatcher =
      options.dispatcher ?? new Agent({ connect: { rejectUnauthorized: this.config.verifySsl } })
    this.rateLimiter =
      options.rateLimiter ??
      new RateLimiter({ refillRate: this.config.requestsPerSecond, capacity: this.config.burst })
    this.robotsCache =
      options.robotsCache ??
      new RobotsCache((robotsUrl) => this.fetchText(robotsUrl, 'text/plain'), {
        ttlMs: this.config.robotsTtlMs,
      })
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
    this.random = options.random ?? Math.random
  }

  /**
   * Fetch a page with retry logic for transient failures
   */
  async fetch(url: string): Promise<RawDocument> {
    this.assertFetchable(url)

    if (this.config.respectRobotsTxt) {
      await this.assertAllowed(url)
    }

    let lastError: CollectionError | null = null

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await this.fetchAttempt(url)
      } catch (error) {
        lastError = this.toCollectionError(error, url)

        // Don't retry on non-transient errors
        if (!lastError.retryable || attempt === this.config.maxRetries) {
          break
        }

        const delay = computeBackoffDelay(attempt, this.config, this.random, lastError.retryAfterMs)
        logger.debug(`Retrying ${url} in ${delay}ms (attempt ${attempt + 1}): ${lastError.message}`)
        await this.sleep(delay)
      }
    }

    throw lastError ?? new CollectionError('CONNECTION_ERROR', url, `Failed to fetch ${url}`)
  }

  async fetchText(url: string, accept = 'text/plain, */*'): Promise<string | null> {
    return this.send(url, accept, async (response) => {
      if (!response.ok) {
        await response.body?.cancel()
        return null
      }

      // Check if gzipped
      if (url.endsWith('.gz')) {
        const buffer = Buffer.from(await response.arrayBuffer())
        return gunzipSync(buffer).toString('utf-8')
      }

      return response.text()
    })
  }

  async getSitemapUrls(url: string): Promise<string[]> {
    const rules = await this.robotsCache.getRules(url)
    return rules.getSitemaps()
  }

  /**
   * Release the connection pool if this collector created it
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close()
    }
  }

  /**
   * Perform a single fetch attempt, following redirects
   */
  private async fetchAttempt(url: string): Promise<RawDocument> {
    const startTime = Date.now()
    const fetchedAt = new Date()
    const redirectChain: RedirectInfo[] = []
    let currentUrl = url

    for (let hop = 0; ; hop++) {
      const outcome = await this.send(currentUrl, HTML_ACCEPT, async (response): Promise<AttemptOutcome> => {
        const statusCode = response.status

        if (isRedirect(statusCode)) {
          const location = response.headers.get('location')
          await response.body?.cancel()
          if (!location) {
            throw new CollectionError('CONNECTION_ERROR', url, `Redirect without location header from ${currentUrl}`)
          }
          return { kind: 'redirect', redirectTo: new URL(location, currentUrl).toString(), statusCode }
        }

        const headers = collectHeaders(response)

        if (statusCode >= 400) {
          await response.body?.cancel()
          throw CollectionError.httpStatus(url, statusCode, parseRetryAfter(headers['retry-after']))
        }

        const contentType = headers['content-type'] ?? ''
        const { bytes, truncated } = await this.readBody(response)

        const document: RawDocument = {
          url,
          finalUrl: currentUrl,
          statusCode,
          headers,
          body: decode(bytes, charsetOf(contentType)),
          contentType,
          byteLength: bytes.byteLength,
          fetchedAt,
          responseTimeMs: Date.now() - startTime,
          redirectChain,
          truncated,
        }
        return { kind: 'document', document }
      })

      if (outcome.kind === 'document') {
        return outcome.document
      }

      if (hop >= this.config.maxRedirects) {
        throw new CollectionError('CONNECTION_ERROR', url, `Too many redirects (>${this.config.maxRedirects})`)
      }

      redirectChain.push({ url: currentUrl, statusCode: outcome.statusCode })
      currentUrl = outcome.redirectTo
      this.assertFetchable(currentUrl)

      if (this.config.respectRobotsTxt) {
        await this.assertAllowed(currentUrl)
      }
    }
  }

  /**
   * Issue one request: wait for a rate-limit token, then fetch with a timeout
   * covering headers and body
   */
  private async send<T>(url: string, accept: string, handle: (response: Response) => Promise<T>): Promise<T> {
    await this.rateLimiter.acquire()

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

    try {
      const response = await fetch(url, {
        dispatcher: this.dispatcher,
        signal: controller.signal,
        redirect: 'manual',
        headers: {
          Accept: accept,
          'Accept-Language': 'en-US,en;q=0.5',
          ...this.config.headers,
          'User-Agent': this.config.userAgent,
        },
      })
      return await handle(response)
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private async readBody(response: Response): Promise<{ bytes: Uint8Array; truncated: boolean }> {
    const limit = this.config.maxContentLength
    const chunks: Uint8Array[] = []
    let total = 0
    let truncated = false

    if (response.body) {
      const reader = response.body.getReader()
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break
        if (total + value.byteLength > limit) {
          chunks.push(value.subarray(0, limit - total))
          total = limit
          truncated = true
          await reader.cancel()
          break
        }
        chunks.push(value)
        total += value.byteLength
      }
    }

    return { bytes: Buffer.concat(chunks, total), truncated }
  }

  private assertFetchable(url: string): void {
    let protocol: string
    try {
      protocol = new URL(url).protocol
    } catch {
      throw new CollectionError('CONNECTION_ERROR', url, `Invalid URL: ${url}`)
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      throw new CollectionError('CONNECTION_ERROR', url, `Unsupported protocol ${protocol} for ${url}`)
    }
  }

  private async assertAllowed(url: string): Promise<void> {
    const allowed = await this.robotsCache.isAllowed(url, this.config.userAgent)
    if (!allowed) {
      throw CollectionError.robotsDisallowed(url)
    }
  }

  /**
   * Map fetch failures onto the collection error taxonomy
   */
  private toCollectionError(error: unknown, url: string): CollectionError {
    if (error instanceof CollectionError) {
      return error
    }

    const name = error instanceof Error ? error.name : ''
    const code = errorCode(error)
    const message = error instanceof Error ? error.message : String(error)

    if (name === 'AbortError' || name === 'TimeoutError' || (code && TIMEOUT_CODES.has(code))) {
      return new CollectionError('TIMEOUT', url, `Request timeout after ${this.config.timeoutMs}ms: ${url}`, {
        cause: error,
      })
    }

    return new CollectionError('CONNECTION_ERROR', url, `Connection failed for ${url}: ${code ?? message}`, {
      cause: error,
    })
  }
}
