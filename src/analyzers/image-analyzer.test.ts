import { describe, expect, it } from 'vitest'
import { ImageAnalyzer } from './image-analyzer.js'
import { page, parseHtml } from '../testing/fixtures.js'

function analyzeBody(body: string, config: unknown = {}) {
  return new ImageAnalyzer(config).analyze(parseHtml(page('<title>Images</title>', body)))
}

function summarize(findings: { severity: string; message: string }[]) {
  return findings.map((finding) => [finding.severity, finding.message])
}

describe('ImageAnalyzer', () => {
  it('should have nothing to say about a page without images', () => {
    const report = analyzeBody('<p>Text only</p>')
    expect(report.findings).toEqual([])
    expect(report.score).toBe(100)
  })

  it('should pass a well-formed modern image', () => {
    expect(analyzeBody('<img src="/oak-table.webp" alt="Oak dining table" width="800" height="600">').findings).toEqual([])
  })

  it('should report missing alt, dimensions and legacy formats', () => {
    const report = analyzeBody('<img src="/a.jpg">')

    expect(report.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['HIGH', '1 of 1 image(s) have no alt attribute', 'https://example.com/a.jpg'],
      ['MEDIUM', '1 image(s) lack width/height attributes', 'https://example.com/a.jpg'],
      ['LOW', '1 image(s) use legacy formats without a modern alternative', 'https://example.com/a.jpg'],
    ])
    expect(report.score).toBe(75)
  })

  it('should treat an empty alt as decorative, not missing', () => {
    expect(analyzeBody('<img src="/divider.svg" alt="" width="10" height="2">').findings).toEqual([])
  })

  it('should flag generic alt text', () => {
    const report = analyzeBody('<img src="/logo.svg" alt="logo" width="10" height="10">')
    expect(summarize(report.findings)).toEqual([['LOW', '1 image(s) have non-descriptive alt text']])
    expect(report.score).toBe(97)
  })

  it('should note overly long alt text', () => {
    const report = analyzeBody(`<img src="/a.webp" alt="${'a'.repeat(130)}" width="1" height="1">`)
    expect(summarize(report.findings)).toEqual([['INFO', '1 image(s) have alt text longer than 125 characters']])
  })

  it('should accept legacy formats inside <picture>', () => {
    const report = analyzeBody(
      '<picture><source srcset="/table.avif" type="image/avif"><img src="/table.jpg" alt="Oak table" width="1" height="1"></picture>'
    )
    expect(report.findings).toEqual([])
  })

  it('should report images without a source', () => {
    expect(summarize(analyzeBody('<img alt="Oak" width="1" height="1">').findings)).toEqual([
      ['MEDIUM', '1 image(s) have no src'],
    ])
  })

  it('should use the configured modern formats', () => {
    const report = analyzeBody('<img src="/a.png" alt="Chart" width="1" height="1">', { modernFormats: ['png'] })
    expect(report.findings).toEqual([])
  })
})
