import { describe, expect, it } from 'vitest'
import {
  SerializationError,
  deserializeResult,
  serializeBatch,
  serializeResult,
  serializeResultToJson,
} from './result-serializer.js'
import { ResultAggregator } from '../analyzers/result-aggregator.js'
import { analysisResult } from '../testing/fixtures.js'
import type { BatchResult } from '../types/analysis.js'

const aggregator = new ResultAggregator()

function mergedResult() {
  return aggregator.merge({
    url: 'https://example.com/',
    results: [
      {
        analyzer: 'title',
        score: 85,
        durationMs: 2,
        findings: [
          {
            analyzer: 'title',
            category: 'Title',
            severity: 'HIGH',
            message: 'Page has no title',
            remediation: 'Add a title.',
            effort: 'easy',
          },
        ],
      },
      {
        analyzer: 'security',
        score: 97,
        durationMs: 4,
        findings: [
          {
            analyzer: 'security',
            category: 'Links',
            severity: 'LOW',
            message: '1 external link(s) open a new tab without rel="noopener"',
            location: 'https://other.org/',
            remediation: 'Add rel="noopener".',
          },
        ],
      },
    ],
    failures: [{ analyzer: 'schema', message: 'Analyzer "schema" failed: boom' }],
    startedAt: new Date('2024-03-01T10:00:00.000Z'),
    completedAt: new Date('2024-03-01T10:00:00.125Z'),
  })
}

describe('serializeResult', () => {
  it('should write the snake_case contract', () => {
    expect(serializeResult(analysisResult())).toEqual({
      url: 'https://example.com/page',
      overall_score: 85,
      analyzers: {
        title: {
          score: 85,
          duration: 3,
          findings: [
            {
              severity: 'HIGH',
              category: 'Title',
              message: 'Page has no title',
              location: null,
              remediation: 'Add a unique, descriptive <title> element to the page head.',
              effort: 'easy',
            },
          ],
        },
      },
      failures: [],
      started_at: '2024-01-01T00:00:00.000Z',
      completed_at: '2024-01-01T00:00:00.040Z',
      duration: 40,
      status: 'COMPLETED',
    })
  })
})

describe('deserializeResult', () => {
  it('should restore an equal result from its JSON form', () => {
    const original = mergedResult()
    expect(original.status).toBe('PARTIAL')

    const restored = deserializeResult(serializeResultToJson(original, 2), aggregator)
    expect(restored).toEqual(original)
  })

  it('should return a frozen result', () => {
    const restored = deserializeResult(serializeResult(mergedResult()), aggregator)

    expect(Object.isFrozen(restored)).toBe(true)
    expect(Object.isFrozen(restored.findings)).toBe(true)
    expect(Object.isFrozen(restored.analyzers)).toBe(true)
  })

  it('should accept an already-parsed value', () => {
    const original = mergedResult()
    expect(deserializeResult(serializeResult(original), aggregator)).toEqual(original)
  })

  it('should keep the stored overall score whatever the aggregator weights', () => {
    const serialized = serializeResult(mergedResult())
    const weighted = new ResultAggregator({ analyzerWeights: { title: 5 } })

    expect(deserializeResult(serialized, weighted).overallScore).toBe(91)
  })

  it('should reject malformed JSON', () => {
    expect(() => deserializeResult('{"url":', aggregator)).toThrow(SerializationError)
    expect(() => deserializeResult('{"url":', aggregator)).toThrow('Serialized result is not valid JSON')
  })

  it('should reject values that break the contract', () => {
    const serialized = { ...serializeResult(analysisResult()), overall_score: 120 }
    expect(() => deserializeResult(serialized, aggregator)).toThrow(/^Invalid serialized result: overall_score: /)
  })
})

describe('serializeBatch', () => {
  it('should serialize entries, errors and the summary', () => {
    const batch: BatchResult = {
      entries: {
        'https://example.com/': { url: 'https://example.com/', status: 'COMPLETED', result: analysisResult(), fromCache: true },
        'https://example.com/gone': {
          url: 'https://example.com/gone',
          status: 'FAILED',
          error: { kind: 'HTTP_STATUS', message: 'HTTP 404 for https://example.com/gone', statusCode: 404 },
          fromCache: false,
        },
        'https://example.com/late': { url: 'https://example.com/late', status: 'SKIPPED', fromCache: false },
      },
      summary: { COMPLETED: 1, PARTIAL: 0, FAILED: 1, SKIPPED: 1 },
      startedAt: new Date('2024-01-01T00:00:00.000Z'),
      completedAt: new Date('2024-01-01T00:00:02.000Z'),
      durationMs: 2000,
      cancelled: true,
    }
    const serialized = serializeBatch(batch)

    expect(serialized.entries['https://example.com/']?.from_cache).toBe(true)
    expect(serialized.entries['https://example.com/']?.result?.overall_score).toBe(85)
    expect(serialized.entries['https://example.com/gone']).toEqual({
      url: 'https://example.com/gone',
      status: 'FAILED',
      from_cache: false,
      error: { kind: 'HTTP_STATUS', message: 'HTTP 404 for https://example.com/gone', status_code: 404 },
    })
    expect(serialized.entries['https://example.com/late']).toEqual({
      url: 'https://example.com/late',
      status: 'SKIPPED',
      from_cache: false,
    })
    expect(serialized).toMatchObject({
      summary: { COMPLETED: 1, PARTIAL: 0, FAILED: 1, SKIPPED: 1 },
      started_at: '2024-01-01T00:00:00.000Z',
      completed_at: '2024-01-01T00:00:02.000Z',
      duration: 2000,
      cancelled: true,
    })
  })
})
