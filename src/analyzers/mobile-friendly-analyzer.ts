/**
 * Mobile Friendly Analyzer
 *
 * Viewport configuration, fixed-width layout, small fonts, responsive media
 * and home-screen metadata. Works from markup and inline CSS only; computed
 * styles are not available.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'
import { disablesZoom } from './accessibility-analyzer.js'

export const MobileFriendlyConfigSchema = z.object({
  // Typical narrow phone width in CSS pixels
  maxFixedWidth: z.number().int().positive().default(360),
  minFontSizePx: z.number().positive().default(12),
  requireTouchIcon: z.boolean().default(true),
})

const FIXED_WIDTH = /(?:^|;)\s*(?:min-)?width\s*:\s*(\d+)px/i
const FONT_SIZE = /font-size\s*:\s*(\d+(?:\.\d+)?)px/gi

export class MobileFriendlyAnalyzer extends BaseAnalyzer<typeof MobileFriendlyConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('mobile_friendly', MobileFriendlyConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    return [...this.checkViewport(doc), ...this.checkLayout(doc), ...this.checkHomeScreen(doc)]
  }

  private checkViewport(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    // No viewport meta tag
    if (!doc.viewport) {
      findings.push({
        category: 'Viewport',
        severity: 'CRITICAL',
        message: 'Missing viewport meta tag',
        remediation: 'Add <meta name="viewport" content="width=device-width, initial-scale=1">.',
        effort: 'easy',
      })
      return findings
    }

    const content = doc.viewport.toLowerCase().replace(/\s+/g, '')

    // Fixed width viewport
    if (!content.includes('width=device-width')) {
      findings.push({
        category: 'Viewport',
        severity: 'HIGH',
        message: 'Viewport does not use width=device-width',
        location: doc.viewport,
        remediation: 'Set width=device-width so the layout adapts to the screen.',
        effort: 'easy',
      })
    }

    const initialScale = content.match(/initial-scale=([\d.]+)/)?.[1]
    if (initialScale !== undefined && parseFloat(initialScale) !== 1) {
      findings.push({
        category: 'Viewport',
        severity: 'LOW',
        message: `Viewport initial-scale is ${initialScale}`,
        location: doc.viewport,
        remediation: 'Use initial-scale=1.',
        effort: 'easy',
      })
    }

    // Zoom disabled (user-scalable=no or maximum-scale=1)
    if (disablesZoom(doc.viewport)) {
      findings.push({
        category: 'Viewport',
        severity: 'MEDIUM',
        message: 'Viewport prevents users from zooming',
        location: doc.viewport,
        remediation: 'Remove user-scalable=no and maximum-scale from the viewport.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkLayout(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const config = this.config

    // Content wider than viewport
    const fixed = doc.inlineStyles.filter((style) => {
      const width = style.style.match(FIXED_WIDTH)?.[1]
      return width !== undefined && parseInt(width, 10) > config.maxFixedWidth
    })
    if (fixed.length > 0) {
      findings.push({
        category: 'Layout',
        severity: 'MEDIUM',
        message: `${fixed.length} element(s) have a fixed width above ${config.maxFixedWidth}px`,
        location: `<${fixed[0]?.tag} style="${fixed[0]?.style}">`,
        remediation: 'Use relative widths (%, max-width) instead of fixed pixel widths.',
        effort: 'medium',
      })
    }

    // Font too small
    const css = [...doc.inlineStyles.map((style) => style.style), ...doc.styleBlocks].join('\n')
    const smallFonts = [...css.matchAll(FONT_SIZE)].filter((match) => parseFloat(match[1] ?? '0') < config.minFontSizePx)
    if (smallFonts.length > 0) {
      findings.push({
        category: 'Typography',
        severity: 'MEDIUM',
        message: `${smallFonts.length} font-size declaration(s) below ${config.minFontSizePx}px`,
        location: smallFonts[0]?.[0],
        remediation: `Use a base font size of at least 16px and never below ${config.minFontSizePx}px.`,
        effort: 'easy',
      })
    }

    // Images not responsive
    const fixedImages = doc.images.filter(
      (image) => !image.srcset && !image.inPicture && (image.width ?? 0) > config.maxFixedWidth
    )
    if (fixedImages.length > 0) {
      findings.push({
        category: 'Responsive Images',
        severity: 'LOW',
        message: `${fixedImages.length} wide image(s) without srcset or <picture>`,
        location: fixedImages[0]?.src,
        remediation: 'Provide srcset/sizes so phones download appropriately sized images.',
        effort: 'medium',
      })
    }

    // Tables without responsive handling
    const wideTables = doc.tables.filter((table) => !table.responsive)
    if (wideTables.length > 0) {
      findings.push({
        category: 'Tables',
        severity: 'LOW',
        message: `${wideTables.length} table(s) without a responsive wrapper`,
        remediation: 'Wrap tables in a container with overflow-x: auto.',
        effort: 'easy',
      })
    }

    // No responsive CSS media queries
    const hasMediaQueries =
      doc.styleBlocks.some((block) => /@media/i.test(block)) ||
      doc.stylesheets.some((sheet) => sheet.media !== undefined && sheet.media !== 'all' && sheet.media !== 'print')
    if (doc.styleBlocks.length > 0 && doc.stylesheets.length === 0 && !hasMediaQueries) {
      findings.push({
        category: 'Layout',
        severity: 'LOW',
        message: 'Inline CSS defines no media queries',
        remediation: 'Add media queries so the layout adapts to small screens.',
        effort: 'medium',
      })
    }

    return findings
  }

  private checkHomeScreen(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    // Missing Apple Touch Icon
    if (this.config.requireTouchIcon && !doc.icons.appleTouchIcon) {
      findings.push({
        category: 'Home Screen',
        severity: 'LOW',
        message: 'Missing apple-touch-icon',
        remediation: 'Add <link rel="apple-touch-icon" href="/apple-touch-icon.png">.',
        effort: 'easy',
      })
    }

    // Missing Web App Manifest
    if (!doc.icons.manifest) {
      findings.push({
        category: 'Home Screen',
        severity: 'INFO',
        message: 'No web app manifest',
        remediation: 'Link a manifest.json to describe the site when installed.',
        effort: 'easy',
      })
    }

    // Missing theme color
    if (!doc.themeColor) {
      findings.push({
        category: 'Home Screen',
        severity: 'INFO',
        message: 'No theme-color meta tag',
        remediation: 'Add <meta name="theme-color"> to tint the mobile browser UI.',
        effort: 'easy',
      })
    }

    return findings
  }
}
