import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const HeadingStructureConfigSchema = z.object({
  maxH1: z.number().int().positive().default(1),
  maxHeadingLength: z.number().int().positive().default(70),
})

export class HeadingStructureAnalyzer extends BaseAnalyzer<typeof HeadingStructureConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('heading_structure', HeadingStructureConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const h1s = doc.headings.filter((heading) => heading.level === 1)

    if (h1s.length === 0) {
      findings.push({
        category: 'H1',
        severity: 'HIGH',
        message: 'Page has no H1 heading',
        remediation: 'Add one H1 describing the main topic of the page.',
        effort: 'easy',
      })
    } else if (h1s.length > this.config.maxH1) {
      findings.push({
        category: 'H1',
        severity: 'MEDIUM',
        message: `Page has ${h1s.length} H1 headings`,
        location: h1s.map((heading) => heading.text).join(' | '),
        remediation: 'Keep a single H1 and demote the others to H2.',
        effort: 'easy',
      })
    }

    if (doc.headings[0] && doc.headings[0].level !== 1 && h1s.length > 0) {
      findings.push({
        category: 'Hierarchy',
        severity: 'LOW',
        message: `First heading is an H${doc.headings[0].level}, not the H1`,
        location: doc.headings[0].text,
        remediation: 'Place the H1 before other headings.',
        effort: 'easy',
      })
    }

    // Skipped levels, e.g. H2 -> H4
    let previous = 0
    for (const heading of doc.headings) {
      if (previous > 0 && heading.level > previous + 1) {
        findings.push({
          category: 'Hierarchy',
          severity: 'LOW',
          message: `Heading level skipped from H${previous} to H${heading.level}`,
          location: heading.text,
          remediation: `Use an H${previous + 1} here or restructure the outline.`,
          effort: 'easy',
        })
      }
      previous = heading.level
    }

    const empty = doc.headings.filter((heading) => heading.text === '')
    if (empty.length > 0) {
      findings.push({
        category: 'Content',
        severity: 'MEDIUM',
        message: `${empty.length} empty heading(s)`,
        remediation: 'Remove empty headings or give them text.',
        effort: 'easy',
      })
    }

    const long = doc.headings.filter((heading) => heading.text.length > this.config.maxHeadingLength)
    if (long.length > 0) {
      findings.push({
        category: 'Content',
        severity: 'INFO',
        message: `${long.length} heading(s) longer than ${this.config.maxHeadingLength} characters`,
        location: long[0]?.text,
        remediation: 'Keep headings short and descriptive.',
        effort: 'easy',
      })
    }

    const texts = new Map<string, number>()
    for (const heading of doc.headings) {
      if (heading.text) texts.set(heading.text.toLowerCase(), (texts.get(heading.text.toLowerCase()) ?? 0) + 1)
    }
    const duplicates = [...texts].filter(([, count]) => count > 1)
    if (duplicates.length > 0) {
      findings.push({
        category: 'Content',
        severity: 'LOW',
        message: `${duplicates.length} heading text(s) repeated on the page`,
        location: duplicates[0]?.[0],
        remediation: 'Give each section a distinct heading.',
        effort: 'easy',
      })
    }

    return findings
  }
}
