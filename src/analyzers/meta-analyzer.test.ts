import { describe, expect, it } from 'vitest'
import { MetaAnalyzer } from './meta-analyzer.js'
import { page, parseHtml } from '../testing/fixtures.js'

const DESCRIPTION = 'Solid oak tables, chairs and shelving made to order in our workshop. '.repeat(2).trim()
const CHARSET = '<meta charset="utf-8">'
const VIEWPORT = '<meta name="viewport" content="width=device-width, initial-scale=1">'
const CANONICAL = '<link rel="canonical" href="https://example.com/page">'
const DESCRIPTION_TAG = `<meta name="description" content="${DESCRIPTION}">`

function summarize(findings: { severity: string; message: string }[]) {
  return findings.map((finding) => [finding.severity, finding.message])
}

describe('MetaAnalyzer', () => {
  const analyzer = new MetaAnalyzer()

  it('should pass a page with complete meta tags', () => {
    const report = analyzer.analyze(parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT + CANONICAL, '')))

    expect(DESCRIPTION.length).toBeGreaterThanOrEqual(120)
    expect(DESCRIPTION.length).toBeLessThanOrEqual(160)
    expect(report.findings).toEqual([])
    expect(report.score).toBe(100)
  })

  it('should report every missing tag', () => {
    const report = analyzer.analyze(parseHtml(page('', '')))

    expect(summarize(report.findings)).toEqual([
      ['HIGH', 'Missing meta description'],
      ['MEDIUM', 'Missing canonical link'],
      ['MEDIUM', 'Missing viewport meta tag'],
      ['LOW', 'No character encoding declared in the document'],
    ])
    expect(report.score).toBe(68)
  })

  it('should report descriptions outside the length bounds', () => {
    const short = analyzer.analyze(
      parseHtml(page(CHARSET + VIEWPORT + CANONICAL + '<meta name="description" content="Oak tables.">', ''))
    )
    expect(summarize(short.findings)).toEqual([['LOW', 'Meta description is 11 characters, below 120']])

    const longText = 'x'.repeat(200)
    const long = analyzer.analyze(
      parseHtml(page(CHARSET + VIEWPORT + CANONICAL + `<meta name="description" content="${longText}">`, ''))
    )
    expect(summarize(long.findings)).toEqual([['LOW', 'Meta description is 200 characters, above 160']])
  })

  it('should report noindex and nofollow robots directives', () => {
    const report = analyzer.analyze(
      parseHtml(
        page(CHARSET + DESCRIPTION_TAG + VIEWPORT + CANONICAL + '<meta name="robots" content="noindex, nofollow">', '')
      )
    )

    expect(report.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['HIGH', 'Page is excluded from indexing (noindex)', 'meta robots: noindex, nofollow'],
      ['MEDIUM', 'Robots meta tag tells crawlers not to follow links', 'meta robots: noindex, nofollow'],
    ])
  })

  it('should read noindex from the X-Robots-Tag header', () => {
    const report = analyzer.analyze(
      parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT + CANONICAL, ''), {
        headers: { 'content-type': 'text/html', 'x-robots-tag': 'noindex' },
      })
    )

    expect(report.findings.map((finding) => [finding.severity, finding.location])).toEqual([
      ['HIGH', 'X-Robots-Tag: noindex'],
    ])
  })

  it('should compare the canonical URL ignoring a trailing slash', () => {
    const same = analyzer.analyze(
      parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT + '<link rel="canonical" href="https://example.com/page/">', ''))
    )
    expect(same.findings).toEqual([])

    const other = analyzer.analyze(
      parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT + '<link rel="canonical" href="/other">', ''))
    )
    expect(other.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['INFO', 'Canonical URL points to a different page', 'https://example.com/other'],
    ])
  })

  it('should not require a canonical link when configured', () => {
    const report = new MetaAnalyzer({ requireCanonical: false }).analyze(
      parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT, ''))
    )
    expect(report.findings).toEqual([])
  })

  it('should flag long keyword lists', () => {
    const keywords = Array.from({ length: 11 }, (_, index) => `term${index}`).join(', ')
    const report = analyzer.analyze(
      parseHtml(page(CHARSET + DESCRIPTION_TAG + VIEWPORT + CANONICAL + `<meta name="keywords" content="${keywords}">`, ''))
    )

    expect(summarize(report.findings)).toEqual([['LOW', 'Meta keywords lists 11 entries (limit 10)']])
  })
})
