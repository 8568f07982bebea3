/**
 * Schema Analyzer
 *
 * Validates JSON-LD and microdata blocks. Required and recommended
 * properties per Schema.org type are read from data/schema-requirements.json.
 */

import { z } from 'zod'
import type { ParsedDocument, StructuredDataBlock } from '../types/page-data.js'
import { lazyData, readDataFile } from '../utils/data-files.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const SchemaConfigSchema = z.object({
  requireStructuredData: z.boolean().default(true),
  checkRecommended: z.boolean().default(true),
})

const SchemaRequirementsSchema = z.record(
  z.object({
    required: z.array(z.string()),
    recommended: z.array(z.string()),
  })
)

export const getSchemaRequirements = lazyData(() =>
  readDataFile('schema-requirements.json', SchemaRequirementsSchema)
)

function hasValue(value: unknown): boolean {
  if (value === undefined || value === null) return false
  if (typeof value === 'string') return value.trim() !== ''
  if (Array.isArray(value)) return value.length > 0
  return true
}

function blockLabel(block: StructuredDataBlock, index: number): string {
  return `${block.format} block ${index + 1}${block.types.length > 0 ? ` (${block.types.join(', ')})` : ''}`
}

export class SchemaAnalyzer extends BaseAnalyzer<typeof SchemaConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('schema', SchemaConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const blocks = doc.structuredData

    if (blocks.length === 0) {
      if (this.config.requireStructuredData) {
        findings.push({
          category: 'Structured Data',
          severity: 'MEDIUM',
          message: 'No structured data found',
          remediation: 'Add Schema.org JSON-LD describing the page (Organization, Article, Product, ...).',
          effort: 'medium',
        })
      }
      return findings
    }

    const requirements = getSchemaRequirements()

    blocks.forEach((block, index) => {
      const location = blockLabel(block, index)

      if (block.error) {
        findings.push({
          category: 'Syntax',
          severity: 'HIGH',
          message: block.error,
          location,
          remediation: 'Fix the JSON syntax; invalid blocks are ignored by search engines.',
          effort: 'easy',
        })
        return
      }

      const data: Record<string, unknown> = block.data ?? {}

      if (block.format === 'json-ld') {
        const context = data['@context']
        if (typeof context !== 'string' || !/schema\.org/i.test(context)) {
          findings.push({
            category: 'Syntax',
            severity: 'MEDIUM',
            message: 'JSON-LD block is missing a schema.org @context',
            location,
            remediation: 'Set "@context": "https://schema.org".',
            effort: 'easy',
          })
        }
      }

      if (block.types.length === 0) {
        findings.push({
          category: 'Syntax',
          severity: 'MEDIUM',
          message: 'Structured data block has no @type',
          location,
          remediation: 'Declare the Schema.org type of the entity with @type.',
          effort: 'easy',
        })
        return
      }

      for (const type of block.types) {
        const requirement = requirements[type]
        if (!requirement) continue

        const missing = requirement.required.filter((property) => !hasValue(data[property]))
        if (missing.length > 0) {
          findings.push({
            category: 'Required Properties',
            severity: 'HIGH',
            message: `${type} is missing required properties: ${missing.join(', ')}`,
            location,
            remediation: `Add ${missing.join(', ')} to the ${type} markup.`,
            effort: 'easy',
          })
        }

        if (this.config.checkRecommended) {
          const missingRecommended = requirement.recommended.filter((property) => !hasValue(data[property]))
          if (missingRecommended.length > 0) {
            findings.push({
              category: 'Recommended Properties',
              severity: 'LOW',
              message: `${type} is missing recommended properties: ${missingRecommended.join(', ')}`,
              location,
              remediation: `Consider adding ${missingRecommended.join(', ')} for richer search results.`,
              effort: 'easy',
            })
          }
        }
      }
    })

    return findings
  }
}
