import { MockAgent } from 'undici'
import { afterEach, describe, expect, it } from 'vitest'
import { AnalysisOrchestrator, batchKey, toBatchError, validateUrl } from './analysis-orchestrator.js'
import { PageCollector, type Collector } from './page-collector.js'
import { PageProcessor } from './page-processor.js'
import { AnalyzerRegistry, createDefaultRegistry } from '../analyzers/analyzer-registry.js'
import { ResultAggregator } from '../analyzers/result-aggregator.js'
import { TitleAnalyzer } from '../analyzers/title-analyzer.js'
import { AnalysisCache } from '../cache/analysis-cache.js'
import { MemoryCacheStore } from '../cache/memory-cache-store.js'
import { page, rawDocument } from '../testing/fixtures.js'
import type { BatchProgress } from './analysis-orchestrator.js'
import type { OrchestratorConfigInput } from '../types/config.js'
import type { RawDocument } from '../types/page-data.js'
import { CollectionError, ConfigError, UnknownAnalyzerError } from '../types/errors.js'

const GOOD_PAGE = page('<title>Handmade Oak Furniture for Every Room</title>', '<h1>Oak furniture</h1>')

/**
 * Collector serving canned pages from memory. Unknown URLs answer 404.
 */
class FakeCollector implements Collector {
  readonly fetched: string[] = []

  constructor(
    private readonly pages: Record<string, string | Error> = {},
    private readonly texts: Record<string, string> = {},
    private readonly robotsSitemaps: string[] = []
  ) {}

  async fetch(url: string): Promise<RawDocument> {
    this.fetched.push(url)
    const body = this.pages[url]
    if (body === undefined) throw CollectionError.httpStatus(url, 404)
    if (body instanceof Error) throw body
    return rawDocument(body, { url })
  }

  async fetchText(url: string): Promise<string | null> {
    return this.texts[url] ?? null
  }

  async getSitemapUrls(): Promise<string[]> {
    return this.robotsSitemaps
  }
}

/**
 * FakeCollector whose fetches take a while, so concurrent requests overlap
 */
class SlowCollector extends FakeCollector {
  override async fetch(url: string): Promise<RawDocument> {
    await new Promise((resolve) => setTimeout(resolve, 25))
    return super.fetch(url)
  }
}

function createOrchestrator(
  collector: Collector,
  config: OrchestratorConfigInput = { defaultAnalyzers: ['title'] },
  registry: AnalyzerRegistry = createDefaultRegistry()
) {
  return new AnalysisOrchestrator({
    registry,
    collector,
    processor: new PageProcessor(),
    cache: new AnalysisCache(new MemoryCacheStore()),
    aggregator: new ResultAggregator(),
    config,
  })
}

describe('AnalysisOrchestrator', () => {
  describe('analyzeUrl', () => {
    it('should fetch, parse and score a page', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const result = await createOrchestrator(collector).analyzeUrl('https://example.com')

      expect(collector.fetched).toEqual(['https://example.com/'])
      expect(result.url).toBe('https://example.com/')
      expect(Object.keys(result.analyzers)).toEqual(['title'])
      expect(result.overallScore).toBe(100)
      expect(result.status).toBe('COMPLETED')
    })

    it('should run the analyzers named in the request', async () => {
      const collector = new FakeCollector({
        'http://example.com/': page('<title>Plain</title>', '', 'en'),
      })
      const result = await createOrchestrator(collector).analyzeUrl('http://example.com/', {
        analyzers: ['security', 'title'],
        analyzerConfig: { title: { minLength: 1 } },
      })

      expect(Object.keys(result.analyzers)).toEqual(['security', 'title'])
      expect(result.findings.find((finding) => finding.category === 'HTTPS')?.severity).toBe('CRITICAL')
      expect(result.analyzers.title?.score).toBe(100)
    })

    it('should serve repeated requests from the cache', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const orchestrator = createOrchestrator(collector)

      const first = await orchestrator.analyzeUrl('https://example.com/')
      const second = await orchestrator.analyzeUrl('https://example.com/#top')

      expect(second).toBe(first)
      expect(collector.fetched).toHaveLength(1)
    })

    it('should hand out cached results that callers cannot modify', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const orchestrator = createOrchestrator(collector)

      const first = await orchestrator.analyzeUrl('https://example.com/')
      const findingCount = first.findings.length

      expect(() => {
        first.overallScore = -42
      }).toThrow(TypeError)
      expect(() =>
        first.findings.push({
          analyzer: 'title',
          category: 'Title',
          severity: 'LOW',
          message: 'injected',
          remediation: 'none',
        })
      ).toThrow(TypeError)
      expect(() => {
        delete first.analyzers.title
      }).toThrow(TypeError)

      const second = await orchestrator.analyzeUrl('https://example.com/')
      expect(second.overallScore).toBe(100)
      expect(second.findings).toHaveLength(findingCount)
      expect(second.analyzers.title?.score).toBe(100)
      expect(collector.fetched).toHaveLength(1)
    })

    it('should share one fetch between concurrent requests for the same page', async () => {
      const collector = new SlowCollector({ 'https://example.com/': GOOD_PAGE })
      const orchestrator = createOrchestrator(collector)

      const results = await Promise.all(
        Array.from({ length: 5 }, () => orchestrator.analyzeUrl('https://example.com/'))
      )

      expect(collector.fetched).toEqual(['https://example.com/'])
      for (const result of results) {
        expect(result).toBe(results[0])
        expect(result.overallScore).toBe(100)
      }
    })

    it('should fetch paths with and without a trailing slash separately', async () => {
      const collector = new FakeCollector({
        'https://example.com/a/': GOOD_PAGE,
        'https://example.com/a': GOOD_PAGE,
      })
      const orchestrator = createOrchestrator(collector)

      const withSlash = await orchestrator.analyzeUrl('https://example.com/a/')
      const withoutSlash = await orchestrator.analyzeUrl('https://example.com/a')

      expect(collector.fetched).toEqual(['https://example.com/a/', 'https://example.com/a'])
      expect(withSlash.url).toBe('https://example.com/a/')
      expect(withoutSlash.url).toBe('https://example.com/a')
    })

    it('should use separate cache entries for different analyzer configs', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const orchestrator = createOrchestrator(collector)

      await orchestrator.analyzeUrl('https://example.com/')
      await orchestrator.analyzeUrl('https://example.com/', { analyzerConfig: { title: { maxLength: 70 } } })

      expect(collector.fetched).toHaveLength(2)
    })

    it('should reject unknown analyzers before fetching anything', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })

      await expect(
        createOrchestrator(collector).analyzeUrl('https://example.com/', { analyzers: ['title', 'seo_magic'] })
      ).rejects.toThrow(UnknownAnalyzerError)
      expect(collector.fetched).toEqual([])
    })

    it('should reject invalid analyzer config before fetching anything', async () => {
      const collector = new FakeCollector()

      await expect(
        createOrchestrator(collector).analyzeUrl('https://example.com/', { analyzerConfig: { title: { minLength: -5 } } })
      ).rejects.toThrow(ConfigError)
      expect(collector.fetched).toEqual([])
    })

    it('should propagate collection errors', async () => {
      const collector = new FakeCollector()
      await expect(createOrchestrator(collector).analyzeUrl('https://example.com/missing')).rejects.toThrow(
        'HTTP 404 for https://example.com/missing'
      )
    })

    it('should report analyzer exceptions as failures and keep the other results', async () => {
      const registry = new AnalyzerRegistry()
        .register('title', (config, options) => new TitleAnalyzer(config, options))
        .register('broken', () => ({
          name: 'broken',
          config: {},
          analyze: () => {
            throw new Error('boom')
          },
        }))
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const result = await createOrchestrator(collector, {}, registry).analyzeUrl('https://example.com/')

      expect(result.status).toBe('PARTIAL')
      expect(result.failures).toEqual([{ analyzer: 'broken', message: 'Analyzer "broken" failed: boom' }])
      expect(result.overallScore).toBe(100)
      expect(result.severityCounts.INFO).toBe(1)
    })

    it('should return FAILED when every analyzer throws', async () => {
      const registry = new AnalyzerRegistry().register('broken', () => ({
        name: 'broken',
        config: {},
        analyze: () => {
          throw new Error('boom')
        },
      }))
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const result = await createOrchestrator(collector, {}, registry).analyzeUrl('https://example.com/')

      expect(result.status).toBe('FAILED')
      expect(result.overallScore).toBe(0)
    })
  })

  describe('analyzeBatch', () => {
    const urls = Array.from({ length: 10 }, (_, index) => `https://example.com/p${index}`)

    function pagesFor(list: string[]): Record<string, string> {
      return Object.fromEntries(list.map((url) => [url, GOOD_PAGE]))
    }

    it('should isolate per-URL failures', async () => {
      const pages: Record<string, string | Error> = pagesFor(urls)
      delete pages['https://example.com/p3']
      pages['https://example.com/p7'] = new CollectionError(
        'CONNECTION_ERROR',
        'https://example.com/p7',
        'Connection refused for https://example.com/p7'
      )
      const progress: BatchProgress[] = []

      const batch = await createOrchestrator(new FakeCollector(pages)).analyzeBatch(urls, {
        workers: 3,
        onProgress: (update) => progress.push(update),
      })

      expect(Object.keys(batch.entries)).toEqual(urls)
      expect(batch.summary).toEqual({ COMPLETED: 8, PARTIAL: 0, FAILED: 2, SKIPPED: 0 })
      expect(batch.cancelled).toBe(false)
      expect(batch.entries['https://example.com/p3']).toEqual({
        url: 'https://example.com/p3',
        status: 'FAILED',
        error: { kind: 'HTTP_STATUS', message: 'HTTP 404 for https://example.com/p3', statusCode: 404 },
        fromCache: false,
      })
      expect(batch.entries['https://example.com/p7']?.error?.kind).toBe('CONNECTION_ERROR')
      expect(batch.entries['https://example.com/p0']?.result?.overallScore).toBe(100)
      expect(progress).toHaveLength(10)
      expect(progress.at(-1)?.completed).toBe(10)
      expect(progress.every((update) => update.total === 10)).toBe(true)
    })

    it('should analyze duplicate URLs once', async () => {
      const collector = new FakeCollector(pagesFor(urls.slice(0, 2)))
      const batch = await createOrchestrator(collector).analyzeBatch([urls[0] ?? '', urls[1] ?? '', urls[0] ?? ''])

      expect(Object.keys(batch.entries)).toEqual(urls.slice(0, 2))
      expect(collector.fetched).toHaveLength(2)
    })

    it('should treat spellings of one URL as a duplicate', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const batch = await createOrchestrator(collector).analyzeBatch([
        'https://example.com',
        'https://example.com/',
        'HTTPS://EXAMPLE.COM/',
      ])

      expect(Object.keys(batch.entries)).toEqual(['https://example.com/'])
      expect(batch.summary.COMPLETED).toBe(1)
      expect(collector.fetched).toEqual(['https://example.com/'])
    })

    it('should mark cached entries', async () => {
      const collector = new FakeCollector(pagesFor(urls.slice(0, 1)))
      const orchestrator = createOrchestrator(collector)
      await orchestrator.analyzeUrl('https://example.com/p0')

      const batch = await orchestrator.analyzeBatch(['https://example.com/p0'])
      expect(batch.entries['https://example.com/p0']?.fromCache).toBe(true)
      expect(collector.fetched).toHaveLength(1)
    })

    it('should record invalid URLs as failed entries', async () => {
      const batch = await createOrchestrator(new FakeCollector()).analyzeBatch(['mailto:someone@example.com'])

      expect(batch.entries['mailto:someone@example.com']?.error).toEqual({
        kind: 'ConfigError',
        message: 'Unsupported protocol mailto: in mailto:someone@example.com',
      })
    })

    it('should skip every URL when the deadline has passed', async () => {
      const collector = new FakeCollector(pagesFor(urls))
      const batch = await createOrchestrator(collector).analyzeBatch(urls.slice(0, 4), { deadline: Date.now() - 1 })

      expect(batch.summary).toEqual({ COMPLETED: 0, PARTIAL: 0, FAILED: 0, SKIPPED: 4 })
      expect(batch.cancelled).toBe(true)
      expect(collector.fetched).toEqual([])
    })

    it('should stop taking new URLs once aborted', async () => {
      const controller = new AbortController()
      const collector = new FakeCollector(pagesFor(urls))

      const batch = await createOrchestrator(collector).analyzeBatch(urls.slice(0, 5), {
        workers: 1,
        signal: controller.signal,
        onProgress: ({ completed }) => {
          if (completed === 2) controller.abort()
        },
      })

      expect(batch.summary).toEqual({ COMPLETED: 2, PARTIAL: 0, FAILED: 0, SKIPPED: 3 })
      expect(batch.entries['https://example.com/p4']).toEqual({
        url: 'https://example.com/p4',
        status: 'SKIPPED',
        fromCache: false,
      })
      expect(collector.fetched).toEqual(urls.slice(0, 2))
    })

    it('should reject a non-positive worker count', async () => {
      await expect(createOrchestrator(new FakeCollector()).analyzeBatch(urls, { workers: 0 })).rejects.toThrow(
        'workers must be a positive integer, got 0'
      )
    })

    it('should fail the whole batch for unknown analyzers without fetching', async () => {
      const collector = new FakeCollector(pagesFor(urls))
      await expect(createOrchestrator(collector).analyzeBatch(urls, { analyzers: ['nope'] })).rejects.toThrow(
        UnknownAnalyzerError
      )
      expect(collector.fetched).toEqual([])
    })

    describe('with a rate-limited collector', () => {
      let agent: MockAgent | undefined

      afterEach(async () => {
        await agent?.close()
      })

      it('should space requests by the configured rate', async () => {
        agent = new MockAgent()
        agent.disableNetConnect()
        const pool = agent.get('https://example.com')
        for (const url of urls) {
          pool.intercept({ path: new URL(url).pathname, method: 'GET' }).reply(200, GOOD_PAGE, {
            headers: { 'content-type': 'text/html; charset=utf-8' },
          })
        }
        // The bucket starts full when the collector is built
        const started = Date.now()
        const collector = new PageCollector({ requestsPerSecond: 2, respectRobotsTxt: false }, { dispatcher: agent })

        const batch = await createOrchestrator(collector).analyzeBatch(urls, { workers: 1 })
        const elapsed = Date.now() - started

        expect(batch.summary.COMPLETED).toBe(10)
        expect(elapsed).toBeGreaterThanOrEqual(4500)
      }, 20000)
    })
  })

  describe('analyzeSite', () => {
    const SITEMAP = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://example.com/about</loc></url>
  <url><loc>https://example.com/cart/</loc></url>
  <url><loc>https://other.org/elsewhere</loc></url>
  <url><loc>https://example.com/about</loc></url>
  <url><loc>https://example.com/brochure.pdf</loc></url>
  <url><loc>https://example.com/blog/post</loc></url>
  <url><loc>https://example.com/contact</loc></url>
</urlset>`

    it('should analyze the root plus relevant sitemap pages up to maxPages', async () => {
      const collector = new FakeCollector(
        {
          'https://example.com/': GOOD_PAGE,
          'https://example.com/about': GOOD_PAGE,
          'https://example.com/blog/post': GOOD_PAGE,
        },
        { 'https://example.com/site-map.xml': SITEMAP },
        ['https://example.com/site-map.xml']
      )
      const batch = await createOrchestrator(collector).analyzeSite('https://example.com', { maxPages: 3 })

      expect(Object.keys(batch.entries)).toEqual([
        'https://example.com/',
        'https://example.com/about',
        'https://example.com/blog/post',
      ])
      expect(batch.summary.COMPLETED).toBe(3)
    })

    it('should fall back to the default sitemap location', async () => {
      const collector = new FakeCollector(
        { 'https://example.com/': GOOD_PAGE, 'https://example.com/about': GOOD_PAGE },
        { 'https://example.com/sitemap.xml': SITEMAP }
      )
      const batch = await createOrchestrator(collector).analyzeSite('https://example.com/', { maxPages: 2 })

      expect(Object.keys(batch.entries)).toEqual(['https://example.com/', 'https://example.com/about'])
    })

    it('should analyze only the root when no sitemap exists', async () => {
      const collector = new FakeCollector({ 'https://example.com/': GOOD_PAGE })
      const batch = await createOrchestrator(collector).analyzeSite('https://example.com/')

      expect(Object.keys(batch.entries)).toEqual(['https://example.com/'])
    })
  })
})

describe('validateUrl', () => {
  it('should normalize http(s) URLs and reject others', () => {
    expect(validateUrl('HTTPS://Example.com')).toBe('https://example.com/')
    expect(() => validateUrl('example.com/page')).toThrow('Invalid URL: example.com/page')
    expect(() => validateUrl('ftp://example.com/')).toThrow(ConfigError)
  })
})

describe('batchKey', () => {
  it('should serialize parseable URLs and keep others as given', () => {
    expect(batchKey('https://Example.com')).toBe('https://example.com/')
    expect(batchKey('https://example.com/a')).toBe('https://example.com/a')
    expect(batchKey('not a url')).toBe('not a url')
  })
})

describe('toBatchError', () => {
  it('should keep the collection error kind and status code', () => {
    expect(toBatchError(CollectionError.httpStatus('https://example.com/', 503))).toEqual({
      kind: 'HTTP_STATUS',
      message: 'HTTP 503 for https://example.com/',
      statusCode: 503,
    })
    expect(toBatchError(new TypeError('bad'))).toEqual({ kind: 'TypeError', message: 'bad' })
    expect(toBatchError('odd')).toEqual({ kind: 'Error', message: 'odd' })
  })
})
