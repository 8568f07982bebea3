/**
 * Accessibility Analyzer
 *
 * Markup-level WCAG checks: document language, text alternatives, link and
 * control names, form labels, heading order, landmarks, skip links, frames,
 * data tables, tab order and zoom.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const AccessibilityConfigSchema = z.object({
  requireSkipLink: z.boolean().default(true),
  requireLandmarks: z.boolean().default(true),
})

/**
 * Whether the viewport content prevents pinch zoom
 */
export function disablesZoom(viewport: string | undefined): boolean {
  if (!viewport) return false
  const content = viewport.toLowerCase().replace(/\s+/g, '')
  const maxScale = content.match(/maximum-scale=([\d.]+)/)?.[1]
  return /user-scalable=(no|0)/.test(content) || (maxScale !== undefined && parseFloat(maxScale) <= 1)
}

export class AccessibilityAnalyzer extends BaseAnalyzer<typeof AccessibilityConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('accessibility', AccessibilityConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    return [...this.checkDocument(doc), ...this.checkContent(doc), ...this.checkControls(doc), ...this.checkStructure(doc)]
  }

  private checkDocument(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    if (!doc.lang) {
      findings.push({
        category: 'Language',
        severity: 'HIGH',
        message: 'Document language is not declared',
        remediation: 'Add a lang attribute to <html>, e.g. <html lang="en">.',
        effort: 'easy',
      })
    }

    if (disablesZoom(doc.viewport)) {
      findings.push({
        category: 'Zoom',
        severity: 'HIGH',
        message: 'Viewport disables zooming',
        location: doc.viewport,
        remediation: 'Remove user-scalable=no and maximum-scale limits from the viewport meta tag.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkContent(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    const noAlt = doc.images.filter((image) => image.alt === null)
    if (noAlt.length > 0) {
      findings.push({
        category: 'Text Alternatives',
        severity: 'HIGH',
        message: `${noAlt.length} image(s) without an alt attribute`,
        location: noAlt[0]?.src,
        remediation: 'Give each image alt text, or alt="" when decorative.',
        effort: 'easy',
      })
    }

    const untitledFrames = doc.iframes.filter((iframe) => !iframe.title)
    if (untitledFrames.length > 0) {
      findings.push({
        category: 'Frames',
        severity: 'MEDIUM',
        message: `${untitledFrames.length} iframe(s) without a title`,
        location: untitledFrames[0]?.src,
        remediation: 'Add a title attribute describing each iframe.',
        effort: 'easy',
      })
    }

    const headerlessTables = doc.tables.filter((table) => !table.hasHeaderCells)
    if (headerlessTables.length > 0) {
      findings.push({
        category: 'Tables',
        severity: 'LOW',
        message: `${headerlessTables.length} table(s) without header cells`,
        remediation: 'Mark header cells with <th> and scope attributes, or use CSS for layout instead of tables.',
        effort: 'medium',
      })
    }

    // Skipped heading levels
    let previous = 0
    let skips = 0
    for (const heading of doc.headings) {
      if (previous > 0 && heading.level > previous + 1) skips++
      previous = heading.level
    }
    if (skips > 0) {
      findings.push({
        category: 'Headings',
        severity: 'LOW',
        message: `Heading levels are skipped ${skips} time(s)`,
        remediation: 'Nest headings sequentially so screen reader users can follow the outline.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkControls(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    // Empty links
    const emptyLinks = doc.links.filter((link) => !link.text && !link.ariaLabel && !link.hasImageWithAlt)
    if (emptyLinks.length > 0) {
      findings.push({
        category: 'Links',
        severity: 'HIGH',
        message: `${emptyLinks.length} link(s) have no accessible name`,
        location: emptyLinks[0]?.href,
        remediation: 'Give links visible text, an aria-label or an image with alt text.',
        effort: 'easy',
      })
    }

    const unnamedButtons = doc.buttons.filter((button) => !button.text && !button.ariaLabel)
    if (unnamedButtons.length > 0) {
      findings.push({
        category: 'Buttons',
        severity: 'HIGH',
        message: `${unnamedButtons.length} button(s) have no accessible name`,
        remediation: 'Add text content or an aria-label to every button.',
        effort: 'easy',
      })
    }

    // Missing form labels
    const unlabelled = doc.forms.flatMap((form) => form.fields.filter((field) => !field.labelled))
    if (unlabelled.length > 0) {
      findings.push({
        category: 'Forms',
        severity: 'HIGH',
        message: `${unlabelled.length} form field(s) without a label`,
        location: unlabelled[0]?.name ?? unlabelled[0]?.id,
        remediation: 'Associate each field with a <label for>, wrap it in a label, or add aria-label.',
        effort: 'easy',
      })
    }

    if (doc.positiveTabindexCount > 0) {
      findings.push({
        category: 'Keyboard',
        severity: 'MEDIUM',
        message: `${doc.positiveTabindexCount} element(s) use a positive tabindex`,
        remediation: 'Use tabindex="0" or "-1" and let DOM order define focus order.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkStructure(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    // Missing skip links
    if (this.config.requireSkipLink && !doc.hasSkipLink && doc.landmarks.nav) {
      findings.push({
        category: 'Navigation',
        severity: 'LOW',
        message: 'No skip link to bypass navigation',
        remediation: 'Add a "Skip to content" link as the first focusable element.',
        effort: 'easy',
      })
    }

    // Missing ARIA landmarks
    if (this.config.requireLandmarks && !doc.landmarks.main) {
      findings.push({
        category: 'Landmarks',
        severity: 'MEDIUM',
        message: 'Page has no main landmark',
        remediation: 'Wrap the primary content in <main>.',
        effort: 'easy',
      })
    }

    return findings
  }
}
