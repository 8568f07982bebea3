import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const SocialMediaConfigSchema = z.object({
  requiredOgTags: z.array(z.string()).default(['og:title', 'og:type', 'og:image', 'og:url']),
  requiredTwitterTags: z.array(z.string()).default(['twitter:card']),
  maxOgTitleLength: z.number().int().positive().default(60),
  maxOgDescriptionLength: z.number().int().positive().default(200),
  imageMinWidth: z.number().int().positive().default(1200),
  imageMinHeight: z.number().int().positive().default(630),
})

export class SocialMediaAnalyzer extends BaseAnalyzer<typeof SocialMediaConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('social_media', SocialMediaConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    return [...this.checkOpenGraph(doc), ...this.checkTwitter(doc)]
  }

  private checkOpenGraph(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const og = doc.openGraph
    const config = this.config

    // Missing Open Graph tags
    if (Object.keys(og).length === 0) {
      findings.push({
        category: 'Open Graph',
        severity: 'MEDIUM',
        message: 'No Open Graph tags',
        remediation: `Add ${config.requiredOgTags.join(', ')} meta tags so shared links render a preview.`,
        effort: 'easy',
      })
      return findings
    }

    const missing = config.requiredOgTags.filter((tag) => !og[tag])
    if (missing.length > 0) {
      findings.push({
        category: 'Open Graph',
        severity: missing.includes('og:image') ? 'MEDIUM' : 'LOW',
        message: `Missing Open Graph tags: ${missing.join(', ')}`,
        remediation: `Add ${missing.join(', ')}.`,
        effort: 'easy',
      })
    }

    const image = og['og:image']
    if (image && !/^https?:\/\//i.test(image)) {
      findings.push({
        category: 'Open Graph',
        severity: 'MEDIUM',
        message: 'og:image is not an absolute URL',
        location: image,
        remediation: 'Use a fully qualified https:// URL for og:image.',
        effort: 'easy',
      })
    }

    if (image) {
      const width = parseInt(og['og:image:width'] ?? '', 10)
      const height = parseInt(og['og:image:height'] ?? '', 10)
      if (isNaN(width) || isNaN(height)) {
        findings.push({
          category: 'Open Graph',
          severity: 'INFO',
          message: 'og:image dimensions are not declared',
          location: image,
          remediation: 'Add og:image:width and og:image:height so platforms can render the preview immediately.',
          effort: 'easy',
        })
      } else if (width < config.imageMinWidth || height < config.imageMinHeight) {
        findings.push({
          category: 'Open Graph',
          severity: 'LOW',
          message: `og:image is ${width}x${height}, below ${config.imageMinWidth}x${config.imageMinHeight}`,
          location: image,
          remediation: `Use a share image of at least ${config.imageMinWidth}x${config.imageMinHeight} pixels.`,
          effort: 'medium',
        })
      }
    }

    const title = og['og:title']
    if (title && title.length > config.maxOgTitleLength) {
      findings.push({
        category: 'Open Graph',
        severity: 'LOW',
        message: `og:title is ${title.length} characters (max ${config.maxOgTitleLength})`,
        location: title,
        remediation: 'Shorten og:title so it is not truncated in previews.',
        effort: 'easy',
      })
    }

    const description = og['og:description']
    if (!description) {
      findings.push({
        category: 'Open Graph',
        severity: 'LOW',
        message: 'Missing og:description',
        remediation: 'Add og:description summarizing the page.',
        effort: 'easy',
      })
    } else if (description.length > config.maxOgDescriptionLength) {
      findings.push({
        category: 'Open Graph',
        severity: 'LOW',
        message: `og:description is ${description.length} characters (max ${config.maxOgDescriptionLength})`,
        remediation: 'Shorten og:description.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkTwitter(doc: ParsedDocument): FindingInput[] {
    const twitter = doc.twitterCard

    // Missing Twitter Card
    if (Object.keys(twitter).length === 0) {
      return [
        {
          category: 'Twitter Card',
          severity: 'LOW',
          message: 'No Twitter Card tags',
          remediation: 'Add <meta name="twitter:card" content="summary_large_image">.',
          effort: 'easy',
        },
      ]
    }

    const missing = this.config.requiredTwitterTags.filter((tag) => !twitter[tag])
    if (missing.length > 0) {
      return [
        {
          category: 'Twitter Card',
          severity: 'LOW',
          message: `Missing Twitter Card tags: ${missing.join(', ')}`,
          remediation: `Add ${missing.join(', ')}.`,
          effort: 'easy',
        },
      ]
    }

    return []
  }
}
