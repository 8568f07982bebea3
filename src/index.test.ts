import { MockAgent } from 'undici'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createAnalysisEngine, logger, type AnalysisEngine, type LogLevel } from './index.js'
import { page } from './testing/fixtures.js'

describe('createAnalysisEngine', () => {
  let agent: MockAgent
  let engine: AnalysisEngine | undefined
  let previousLevel: LogLevel

  beforeEach(() => {
    previousLevel = logger.getLevel()
    agent = new MockAgent()
    agent.disableNetConnect()
  })

  afterEach(async () => {
    await engine?.close()
    engine = undefined
    await agent.close()
    logger.setLevel(previousLevel)
  })

  it('should analyze a page end to end with the in-memory cache', async () => {
    const pool = agent.get('https://example.com')
    pool.intercept({ path: '/robots.txt', method: 'GET' }).reply(200, 'User-agent: *\nDisallow: /private/')
    pool
      .intercept({ path: '/', method: 'GET' })
      .reply(200, page('<title>Handmade Oak Furniture for Every Room</title>', '<h1>Oak</h1>'), {
        headers: { 'content-type': 'text/html; charset=utf-8' },
      })

    engine = createAnalysisEngine(
      {
        collector: { requestsPerSecond: 100 },
        processor: {},
        scoring: {},
        cache: {},
        orchestrator: { defaultAnalyzers: ['title', 'heading_structure'] },
        logLevel: 'error',
      },
      { collector: { dispatcher: agent } }
    )

    const result = await engine.orchestrator.analyzeUrl('https://example.com/')
    const again = await engine.orchestrator.analyzeUrl('https://example.com/')

    expect(logger.getLevel()).toBe('error')
    expect(Object.keys(result.analyzers)).toEqual(['title', 'heading_structure'])
    expect(result.analyzers.title?.score).toBe(100)
    expect(again).toBe(result)
    expect(engine.cache.stats()).toMatchObject({ store: 'memory', hits: 1, writes: 1 })
  })

  it('should refuse pages disallowed by robots.txt', async () => {
    const pool = agent.get('https://example.com')
    pool.intercept({ path: '/robots.txt', method: 'GET' }).reply(200, 'User-agent: *\nDisallow: /private/')

    engine = createAnalysisEngine(
      { collector: {}, processor: {}, scoring: {}, cache: {}, orchestrator: {}, logLevel: 'silent' },
      { collector: { dispatcher: agent } }
    )

    await expect(engine.orchestrator.analyzeUrl('https://example.com/private/page')).rejects.toThrow(
      'Blocked by robots.txt: https://example.com/private/page'
    )
  })

  it('should keep the cache in Supabase when credentials are configured', () => {
    engine = createAnalysisEngine({
      collector: {},
      processor: {},
      scoring: {},
      cache: {},
      orchestrator: {},
      supabase: { url: 'https://test-project.supabase.co', serviceKey: 'test-secret' },
      logLevel: 'silent',
    })

    expect(engine.cache.stats().store).toBe('supabase')
  })
})
