import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const ImageConfigSchema = z.object({
  maxAltLength: z.number().int().positive().default(125),
  modernFormats: z.array(z.string()).default(['webp', 'avif', 'svg']),
})

const GENERIC_ALT = /^(image|img|photo|picture|graphic|logo|icon|banner|untitled|\d+)$/i

function extensionOf(src: string): string {
  try {
    const path = new URL(src).pathname.toLowerCase()
    const dot = path.lastIndexOf('.')
    return dot === -1 ? '' : path.slice(dot + 1)
  } catch {
    return ''
  }
}

export class ImageAnalyzer extends BaseAnalyzer<typeof ImageConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('image', ImageConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const images = doc.images

    if (images.length === 0) return findings

    // Images without alt text
    const noAlt = images.filter((image) => image.alt === null)
    if (noAlt.length > 0) {
      findings.push({
        category: 'Alt Text',
        severity: 'HIGH',
        message: `${noAlt.length} of ${images.length} image(s) have no alt attribute`,
        location: noAlt[0]?.src,
        remediation: 'Add descriptive alt text, or alt="" for purely decorative images.',
        effort: 'easy',
      })
    }

    const generic = images.filter((image) => image.alt !== null && GENERIC_ALT.test(image.alt.trim()))
    if (generic.length > 0) {
      findings.push({
        category: 'Alt Text',
        severity: 'LOW',
        message: `${generic.length} image(s) have non-descriptive alt text`,
        location: generic[0]?.src,
        remediation: 'Describe what the image shows instead of generic words like "image".',
        effort: 'easy',
      })
    }

    const longAlt = images.filter((image) => (image.alt?.length ?? 0) > this.config.maxAltLength)
    if (longAlt.length > 0) {
      findings.push({
        category: 'Alt Text',
        severity: 'INFO',
        message: `${longAlt.length} image(s) have alt text longer than ${this.config.maxAltLength} characters`,
        location: longAlt[0]?.src,
        remediation: 'Keep alt text concise; move long descriptions into surrounding content.',
        effort: 'easy',
      })
    }

    // Images without dimensions
    const noDimensions = images.filter((image) => image.width === undefined || image.height === undefined)
    if (noDimensions.length > 0) {
      findings.push({
        category: 'Dimensions',
        severity: 'MEDIUM',
        message: `${noDimensions.length} image(s) lack width/height attributes`,
        location: noDimensions[0]?.src,
        remediation: 'Set width and height on images to prevent layout shift.',
        effort: 'easy',
      })
    }

    const legacy = images.filter((image) => {
      const ext = extensionOf(image.src)
      return ext !== '' && !image.inPicture && !this.config.modernFormats.includes(ext)
    })
    if (legacy.length > 0) {
      findings.push({
        category: 'Formats',
        severity: 'LOW',
        message: `${legacy.length} image(s) use legacy formats without a modern alternative`,
        location: legacy[0]?.src,
        remediation: 'Serve WebP or AVIF, e.g. with <picture> sources.',
        effort: 'medium',
      })
    }

    const missingSrc = images.filter((image) => image.src === '')
    if (missingSrc.length > 0) {
      findings.push({
        category: 'Source',
        severity: 'MEDIUM',
        message: `${missingSrc.length} image(s) have no src`,
        remediation: 'Remove empty <img> elements or give them a source.',
        effort: 'easy',
      })
    }

    return findings
  }
}
