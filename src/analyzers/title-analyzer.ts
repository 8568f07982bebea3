import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const TitleConfigSchema = z
  .object({
    minLength: z.number().int().min(0).default(30),
    maxLength: z.number().int().positive().default(60),
    brandName: z.string().optional(),
    targetKeywords: z.array(z.string()).default([]),
  })
  .refine((config) => config.minLength <= config.maxLength, {
    message: 'minLength must not exceed maxLength',
  })

export class TitleAnalyzer extends BaseAnalyzer<typeof TitleConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('title', TitleConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const title = doc.title

    if (!title) {
      findings.push({
        category: 'Title',
        severity: 'HIGH',
        message: 'Page has no title',
        remediation: 'Add a unique, descriptive <title> element to the page head.',
        effort: 'easy',
      })
      return findings
    }

    if (doc.titleCount > 1) {
      findings.push({
        category: 'Title',
        severity: 'MEDIUM',
        message: `Page has ${doc.titleCount} <title> elements`,
        remediation: 'Keep a single <title> element.',
        effort: 'easy',
      })
    }

    const { minLength, maxLength } = this.config
    if (title.length < minLength) {
      findings.push({
        category: 'Title',
        severity: 'MEDIUM',
        message: `Title is ${title.length} characters, below the minimum of ${minLength}`,
        location: title,
        remediation: `Expand the title to between ${minLength} and ${maxLength} characters.`,
        effort: 'easy',
      })
    } else if (title.length > maxLength) {
      findings.push({
        category: 'Title',
        severity: 'LOW',
        message: `Title is ${title.length} characters, above the maximum of ${maxLength}`,
        location: title,
        remediation: `Shorten the title to at most ${maxLength} characters so it is not truncated in results.`,
        effort: 'easy',
      })
    }

    const h1 = doc.headings.find((heading) => heading.level === 1)
    if (h1 && h1.text.toLowerCase() === title.toLowerCase()) {
      findings.push({
        category: 'Title',
        severity: 'INFO',
        message: 'Title duplicates the H1 heading',
        location: title,
        remediation: 'Consider varying the title and H1 to cover more search phrasing.',
        effort: 'easy',
      })
    }

    if (this.config.brandName && !title.toLowerCase().includes(this.config.brandName.toLowerCase())) {
      findings.push({
        category: 'Branding',
        severity: 'LOW',
        message: `Title does not include the brand name "${this.config.brandName}"`,
        location: title,
        remediation: 'Append the brand name to the title, e.g. "Topic | Brand".',
        effort: 'easy',
      })
    }

    const lower = title.toLowerCase()
    const missingKeywords = this.config.targetKeywords.filter((keyword) => !lower.includes(keyword.toLowerCase()))
    if (this.config.targetKeywords.length > 0 && missingKeywords.length === this.config.targetKeywords.length) {
      findings.push({
        category: 'Keywords',
        severity: 'MEDIUM',
        message: 'Title contains none of the target keywords',
        location: title,
        remediation: `Include a target keyword such as "${this.config.targetKeywords[0]}" near the start of the title.`,
        effort: 'easy',
      })
    }

    if (title === title.toUpperCase() && /[A-Z]/.test(title)) {
      findings.push({
        category: 'Title',
        severity: 'LOW',
        message: 'Title is written in all capitals',
        location: title,
        remediation: 'Use sentence or title case.',
        effort: 'easy',
      })
    }

    return findings
  }
}
