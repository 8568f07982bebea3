import { describe, expect, it } from 'vitest'
import { SocialMediaAnalyzer } from './social-media-analyzer.js'
import { page, parseHtml } from '../testing/fixtures.js'

function tags(og: Record<string, string>, twitter: Record<string, string> = { 'twitter:card': 'summary_large_image' }) {
  return [
    ...Object.entries(og).map(([property, content]) => `<meta property="${property}" content="${content}">`),
    ...Object.entries(twitter).map(([name, content]) => `<meta name="${name}" content="${content}">`),
  ].join('')
}

const COMPLETE_OG = {
  'og:title': 'Handmade Oak Furniture',
  'og:type': 'website',
  'og:url': 'https://example.com/page',
  'og:image': 'https://example.com/share.jpg',
  'og:image:width': '1200',
  'og:image:height': '630',
  'og:description': 'Tables, chairs and shelving made to order.',
}

function summarize(findings: { severity: string; message: string }[]) {
  return findings.map((finding) => [finding.severity, finding.message])
}

describe('SocialMediaAnalyzer', () => {
  const analyzer = new SocialMediaAnalyzer()

  it('should pass complete Open Graph and Twitter Card tags', () => {
    const report = analyzer.analyze(parseHtml(page(tags(COMPLETE_OG), '')))
    expect(report.findings).toEqual([])
    expect(report.score).toBe(100)
  })

  it('should report pages without any social tags', () => {
    const report = analyzer.analyze(parseHtml(page('', '')))

    expect(summarize(report.findings)).toEqual([
      ['MEDIUM', 'No Open Graph tags'],
      ['LOW', 'No Twitter Card tags'],
    ])
    expect(report.score).toBe(90)
  })

  it('should list missing required tags', () => {
    const report = analyzer.analyze(
      parseHtml(page(tags({ 'og:title': 'Oak' }, { 'twitter:title': 'Oak' }), ''))
    )

    expect(summarize(report.findings)).toEqual([
      ['MEDIUM', 'Missing Open Graph tags: og:type, og:image, og:url'],
      ['LOW', 'Missing og:description'],
      ['LOW', 'Missing Twitter Card tags: twitter:card'],
    ])
  })

  it('should rate missing tags LOW when og:image is present', () => {
    const { 'og:type': _type, ...og } = COMPLETE_OG
    const report = analyzer.analyze(parseHtml(page(tags(og), '')))
    expect(summarize(report.findings)).toEqual([['LOW', 'Missing Open Graph tags: og:type']])
  })

  it('should check the share image URL and dimensions', () => {
    const relative = analyzer.analyze(
      parseHtml(
        page(tags({ ...COMPLETE_OG, 'og:image': '/share.jpg', 'og:image:width': '', 'og:image:height': '' }), '')
      )
    )
    expect(relative.findings.map((finding) => [finding.severity, finding.message, finding.location])).toEqual([
      ['MEDIUM', 'og:image is not an absolute URL', '/share.jpg'],
      ['INFO', 'og:image dimensions are not declared', '/share.jpg'],
    ])

    const small = analyzer.analyze(
      parseHtml(page(tags({ ...COMPLETE_OG, 'og:image:width': '600', 'og:image:height': '315' }), ''))
    )
    expect(summarize(small.findings)).toEqual([['LOW', 'og:image is 600x315, below 1200x630']])
  })

  it('should report overlong titles and descriptions', () => {
    const title = 'T'.repeat(61)
    const description = 'D'.repeat(201)
    const report = analyzer.analyze(
      parseHtml(page(tags({ ...COMPLETE_OG, 'og:title': title, 'og:description': description }), ''))
    )

    expect(summarize(report.findings)).toEqual([
      ['LOW', 'og:title is 61 characters (max 60)'],
      ['LOW', 'og:description is 201 characters (max 200)'],
    ])
  })

  it('should use configured required tags', () => {
    const report = new SocialMediaAnalyzer({
      requiredOgTags: ['og:title'],
      requiredTwitterTags: ['twitter:card', 'twitter:site'],
    }).analyze(parseHtml(page(tags({ 'og:title': 'Oak', 'og:description': 'Oak furniture' }), '')))

    expect(summarize(report.findings)).toEqual([['LOW', 'Missing Twitter Card tags: twitter:site']])
  })
})
