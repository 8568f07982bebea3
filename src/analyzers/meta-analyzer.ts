/**
 * Meta Analyzer
 *
 * Description, robots directives, canonical URL, keywords and viewport tags.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const MetaConfigSchema = z.object({
  minDescriptionLength: z.number().int().min(0).default(120),
  maxDescriptionLength: z.number().int().positive().default(160),
  keywordLimit: z.number().int().positive().default(10),
  requireCanonical: z.boolean().default(true),
})

function stripFragmentAndSlash(url: string): string {
  try {
    const parsed = new URL(url)
    parsed.hash = ''
    const normalized = parsed.toString()
    return normalized.endsWith('/') && parsed.pathname !== '/' ? normalized.slice(0, -1) : normalized
  } catch {
    return url
  }
}

export class MetaAnalyzer extends BaseAnalyzer<typeof MetaConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('meta', MetaConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    return [...this.checkDescription(doc), ...this.checkIndexing(doc), ...this.checkKeywords(doc)]
  }

  private checkDescription(doc: ParsedDocument): FindingInput[] {
    const { minDescriptionLength, maxDescriptionLength } = this.config
    const description = doc.description

    if (!description) {
      return [
        {
          category: 'Meta Description',
          severity: 'HIGH',
          message: 'Missing meta description',
          remediation: `Add a meta description of ${minDescriptionLength}-${maxDescriptionLength} characters summarizing the page.`,
          effort: 'easy',
        },
      ]
    }

    if (description.length < minDescriptionLength) {
      return [
        {
          category: 'Meta Description',
          severity: 'LOW',
          message: `Meta description is ${description.length} characters, below ${minDescriptionLength}`,
          location: description,
          remediation: 'Expand the description with a clear summary and call to action.',
          effort: 'easy',
        },
      ]
    }

    if (description.length > maxDescriptionLength) {
      return [
        {
          category: 'Meta Description',
          severity: 'LOW',
          message: `Meta description is ${description.length} characters, above ${maxDescriptionLength}`,
          location: description,
          remediation: `Trim the description to ${maxDescriptionLength} characters so it is not truncated.`,
          effort: 'easy',
        },
      ]
    }

    return []
  }

  private checkIndexing(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const robots = doc.robots?.toLowerCase() ?? ''
    const headerRobots = doc.headers['x-robots-tag']?.toLowerCase() ?? ''

    // Noindex
    if (robots.includes('noindex') || headerRobots.includes('noindex')) {
      findings.push({
        category: 'Indexability',
        severity: 'HIGH',
        message: 'Page is excluded from indexing (noindex)',
        location: robots.includes('noindex') ? `meta robots: ${doc.robots}` : `X-Robots-Tag: ${doc.headers['x-robots-tag']}`,
        remediation: 'Remove the noindex directive if the page should appear in search results.',
        effort: 'easy',
      })
    }

    if (robots.includes('nofollow')) {
      findings.push({
        category: 'Indexability',
        severity: 'MEDIUM',
        message: 'Robots meta tag tells crawlers not to follow links',
        location: `meta robots: ${doc.robots}`,
        remediation: 'Remove nofollow from the robots meta tag unless intended.',
        effort: 'easy',
      })
    }

    // Canonical
    if (!doc.canonical) {
      if (this.config.requireCanonical) {
        findings.push({
          category: 'Canonical',
          severity: 'MEDIUM',
          message: 'Missing canonical link',
          remediation: 'Add <link rel="canonical"> pointing at the preferred URL of this page.',
          effort: 'easy',
        })
      }
    } else if (stripFragmentAndSlash(doc.canonical) !== stripFragmentAndSlash(doc.finalUrl)) {
      findings.push({
        category: 'Canonical',
        severity: 'INFO',
        message: 'Canonical URL points to a different page',
        location: doc.canonical,
        remediation: 'Confirm the canonical target is the preferred version of this content.',
        effort: 'easy',
      })
    }

    if (!doc.viewport) {
      findings.push({
        category: 'Meta Tags',
        severity: 'MEDIUM',
        message: 'Missing viewport meta tag',
        remediation: 'Add <meta name="viewport" content="width=device-width, initial-scale=1">.',
        effort: 'easy',
      })
    }

    if (!doc.charset) {
      findings.push({
        category: 'Meta Tags',
        severity: 'LOW',
        message: 'No character encoding declared in the document',
        remediation: 'Add <meta charset="utf-8"> as the first element of <head>.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkKeywords(doc: ParsedDocument): FindingInput[] {
    if (!doc.keywords) return []
    const keywords = doc.keywords
      .split(',')
      .map((keyword) => keyword.trim())
      .filter(Boolean)

    if (keywords.length > this.config.keywordLimit) {
      return [
        {
          category: 'Keywords',
          severity: 'LOW',
          message: `Meta keywords lists ${keywords.length} entries (limit ${this.config.keywordLimit})`,
          remediation: 'Remove the meta keywords tag or reduce it to a few relevant terms; search engines ignore it.',
          effort: 'easy',
        },
      ]
    }

    return []
  }
}
