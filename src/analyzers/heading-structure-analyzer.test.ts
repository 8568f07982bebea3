import { describe, expect, it } from 'vitest'
import { HeadingStructureAnalyzer } from './heading-structure-analyzer.js'
import { page, parseHtml } from '../testing/fixtures.js'

function analyzeBody(body: string, config: unknown = {}) {
  return new HeadingStructureAnalyzer(config).analyze(parseHtml(page('<title>Headings</title>', body)))
}

function summarize(findings: { severity: string; message: string }[]) {
  return findings.map((finding) => [finding.severity, finding.message])
}

describe('HeadingStructureAnalyzer', () => {
  it('should pass a clean outline', () => {
    const report = analyzeBody('<h1>Oak furniture</h1><h2>Tables</h2><h3>Dining</h3><h2>Chairs</h2>')
    expect(report.analyzer).toBe('heading_structure')
    expect(report.findings).toEqual([])
    expect(report.score).toBe(100)
  })

  it('should report a missing H1', () => {
    const report = analyzeBody('<h2>Tables</h2>')
    expect(summarize(report.findings)).toEqual([['HIGH', 'Page has no H1 heading']])
    expect(report.score).toBe(85)
  })

  it('should report several H1 headings', () => {
    const report = analyzeBody('<h1>Tables</h1><h1>Chairs</h1>')
    expect(report.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['MEDIUM', 'Page has 2 H1 headings', 'Tables | Chairs'],
    ])
  })

  it('should allow more H1 headings when configured', () => {
    expect(analyzeBody('<h1>Tables</h1><h1>Chairs</h1>', { maxH1: 2 }).findings).toEqual([])
  })

  it('should report an H1 that is not the first heading', () => {
    const report = analyzeBody('<h2>Intro</h2><h1>Oak furniture</h1>')
    expect(summarize(report.findings)).toEqual([['LOW', 'First heading is an H2, not the H1']])
  })

  it('should report skipped levels', () => {
    const report = analyzeBody('<h1>Oak</h1><h2>Tables</h2><h4>Legs</h4>')
    expect(report.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['LOW', 'Heading level skipped from H2 to H4', 'Legs'],
    ])
  })

  it('should report empty, long and repeated headings', () => {
    const long = 'A very long heading that keeps going well past the configured limit of characters'
    const report = analyzeBody(`<h1>Oak</h1><h2></h2><h2>${long}</h2><h2>Details</h2><h2>details</h2>`)

    expect(summarize(report.findings)).toEqual([
      ['MEDIUM', '1 empty heading(s)'],
      ['INFO', '1 heading(s) longer than 70 characters'],
      ['LOW', '1 heading text(s) repeated on the page'],
    ])
  })
})
