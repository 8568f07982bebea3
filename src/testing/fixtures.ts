/**
 * Document builders shared by the test suites
 */

import { PageProcessor } from '../crawler/page-processor.js'
import type { AnalysisResult, Finding } from '../types/analysis.js'
import type { ParsedDocument, RawDocument } from '../types/page-data.js'

export const TEST_URL = 'https://example.com/page'

export function rawDocument(body: string, overrides: Partial<RawDocument> = {}): RawDocument {
  const url = overrides.url ?? TEST_URL
  return {
    url,
    finalUrl: url,
    statusCode: 200,
    headers: { 'content-type': 'text/html; charset=utf-8' },
    body,
    contentType: 'text/html; charset=utf-8',
    byteLength: Buffer.byteLength(body),
    fetchedAt: new Date('2024-01-01T00:00:00.000Z'),
    responseTimeMs: 120,
    redirectChain: [],
    truncated: false,
    ...overrides,
  }
}

const processor = new PageProcessor()

export function parseHtml(body: string, overrides: Partial<RawDocument> = {}): ParsedDocument {
  return processor.parse(rawDocument(body, overrides))
}

/**
 * Wrap body markup in a minimal document with the given head markup
 */
export function page(head: string, body: string, lang = 'en'): string {
  return `<!DOCTYPE html><html lang="${lang}"><head>${head}</head><body>${body}</body></html>`
}

export function analysisResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  const finding: Finding = {
    analyzer: 'title',
    category: 'Title',
    severity: 'HIGH',
    message: 'Page has no title',
    remediation: 'Add a unique, descriptive <title> element to the page head.',
    effort: 'easy',
  }
  return {
    url: TEST_URL,
    overallScore: 85,
    analyzers: { title: { analyzer: 'title', score: 85, findings: [finding], durationMs: 3 } },
    failures: [],
    findings: [finding],
    severityCounts: { CRITICAL: 0, HIGH: 1, MEDIUM: 0, LOW: 0, INFO: 0 },
    recommendations: [],
    startedAt: new Date('2024-01-01T00:00:00.000Z'),
    completedAt: new Date('2024-01-01T00:00:00.040Z'),
    durationMs: 40,
    status: 'COMPLETED',
    ...overrides,
  }
}
