import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const LinkConfigSchema = z.object({
  maxLinks: z.number().int().positive().default(100),
  minInternalLinks: z.number().int().min(0).default(3),
  genericAnchors: z
    .array(z.string())
    .default(['click here', 'here', 'read more', 'more', 'learn more', 'link', 'this']),
})

export class LinkAnalyzer extends BaseAnalyzer<typeof LinkConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('link', LinkConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const webLinks = doc.links.filter((link) => link.href.startsWith('http'))
    const internal = webLinks.filter((link) => link.internal)

    if (doc.links.length > this.config.maxLinks) {
      findings.push({
        category: 'Link Count',
        severity: 'LOW',
        message: `Page has ${doc.links.length} links (more than ${this.config.maxLinks})`,
        remediation: 'Reduce the number of links so each carries more weight.',
        effort: 'medium',
      })
    }

    if (internal.length < this.config.minInternalLinks) {
      findings.push({
        category: 'Internal Linking',
        severity: 'MEDIUM',
        message: `Only ${internal.length} internal link(s) on the page`,
        remediation: `Link to at least ${this.config.minInternalLinks} related pages on the site.`,
        effort: 'medium',
      })
    }

    const empty = doc.links.filter((link) => !link.text && !link.ariaLabel && !link.hasImageWithAlt)
    if (empty.length > 0) {
      findings.push({
        category: 'Anchor Text',
        severity: 'MEDIUM',
        message: `${empty.length} link(s) have no anchor text`,
        location: empty[0]?.href,
        remediation: 'Give every link descriptive text, an aria-label or an image with alt text.',
        effort: 'easy',
      })
    }

    const generic = doc.links.filter((link) => this.config.genericAnchors.includes(link.text.toLowerCase()))
    if (generic.length > 0) {
      findings.push({
        category: 'Anchor Text',
        severity: 'LOW',
        message: `${generic.length} link(s) use generic anchor text such as "${generic[0]?.text}"`,
        location: generic[0]?.href,
        remediation: 'Describe the link target in the anchor text.',
        effort: 'easy',
      })
    }

    const internalNofollow = internal.filter((link) => link.nofollow)
    if (internalNofollow.length > 0) {
      findings.push({
        category: 'Nofollow',
        severity: 'LOW',
        message: `${internalNofollow.length} internal link(s) are marked nofollow`,
        location: internalNofollow[0]?.href,
        remediation: 'Remove rel="nofollow" from internal links.',
        effort: 'easy',
      })
    }

    const scriptLinks = doc.links.filter((link) => link.href.toLowerCase().startsWith('javascript:'))
    if (scriptLinks.length > 0) {
      findings.push({
        category: 'Crawlability',
        severity: 'MEDIUM',
        message: `${scriptLinks.length} link(s) use javascript: URLs`,
        remediation: 'Use real URLs in href and attach behaviour with event listeners.',
        effort: 'medium',
      })
    }

    const insecure = webLinks.filter((link) => link.internal && link.href.startsWith('http://') && doc.finalUrl.startsWith('https://'))
    if (insecure.length > 0) {
      findings.push({
        category: 'Internal Linking',
        severity: 'LOW',
        message: `${insecure.length} internal link(s) point to HTTP URLs`,
        location: insecure[0]?.href,
        remediation: 'Update internal links to HTTPS.',
        effort: 'easy',
      })
    }

    return findings
  }
}
