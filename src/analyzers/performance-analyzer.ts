/**
 * Performance Analyzer
 *
 * Static performance checks over the fetched document: payload size, server
 * response time, request count, render-blocking resources, inline code size,
 * compression, caching and image loading.
 */

import { z } from 'zod'
import type { ParsedDocument } from '../types/page-data.js'
import { BaseAnalyzer, type AnalyzerOptions, type FindingInput } from './base-analyzer.js'

export const PerformanceConfigSchema = z.object({
  maxHtmlSize: z.number().int().positive().default(100 * 1024),
  maxResponseTimeMs: z.number().int().positive().default(800),
  maxRequests: z.number().int().positive().default(100),
  maxRenderBlockingStylesheets: z.number().int().min(0).default(3),
  maxInlineScriptSize: z.number().int().positive().default(10 * 1024),
  maxInlineStyleSize: z.number().int().positive().default(10 * 1024),
  // Images above the fold are expected to load eagerly
  eagerImageAllowance: z.number().int().min(0).default(3),
  // Below this size compression makes no practical difference
  compressionThreshold: z.number().int().min(0).default(1400),
})

const formatKb = (bytes: number): string => `${Math.round(bytes / 1024)}KB`

export class PerformanceAnalyzer extends BaseAnalyzer<typeof PerformanceConfigSchema> {
  constructor(config: unknown = {}, options: AnalyzerOptions = {}) {
    super('performance', PerformanceConfigSchema, config, options)
  }

  protected detect(doc: ParsedDocument): FindingInput[] {
    return [...this.checkPayload(doc), ...this.checkRendering(doc), ...this.checkImages(doc)]
  }

  private checkPayload(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const config = this.config

    // Large HTML
    if (doc.htmlSize > config.maxHtmlSize) {
      findings.push({
        category: 'Page Size',
        severity: 'MEDIUM',
        message: `HTML document is ${formatKb(doc.htmlSize)} (limit ${formatKb(config.maxHtmlSize)})`,
        remediation: 'Reduce markup size: remove inline data, paginate long lists, move scripts and styles to files.',
        effort: 'medium',
      })
    }

    // Slow response time
    if (doc.responseTimeMs > config.maxResponseTimeMs) {
      findings.push({
        category: 'Server Response',
        severity: doc.responseTimeMs > config.maxResponseTimeMs * 3 ? 'HIGH' : 'MEDIUM',
        message: `Server responded in ${doc.responseTimeMs}ms (target ${config.maxResponseTimeMs}ms)`,
        remediation: 'Add server-side caching or a CDN and optimize slow backend queries.',
        effort: 'hard',
      })
    }

    // Redirect chains
    if (doc.redirectChain.length > 1) {
      findings.push({
        category: 'Redirects',
        severity: 'MEDIUM',
        message: `Request went through ${doc.redirectChain.length} redirects`,
        location: doc.redirectChain.map((hop) => hop.url).join(' -> '),
        remediation: 'Link directly to the final URL and collapse redirect chains into one hop.',
        effort: 'easy',
      })
    }

    const requestCount =
      doc.scripts.filter((script) => script.src).length +
      doc.stylesheets.length +
      doc.images.filter((image) => image.src).length +
      doc.iframes.filter((iframe) => iframe.src).length
    if (requestCount > config.maxRequests) {
      findings.push({
        category: 'Requests',
        severity: 'MEDIUM',
        message: `Page references ${requestCount} resources (limit ${config.maxRequests})`,
        remediation: 'Bundle scripts and styles, and lazy load media below the fold.',
        effort: 'hard',
      })
    }

    const encoding = doc.headers['content-encoding']
    if (!encoding && doc.htmlSize > config.compressionThreshold) {
      findings.push({
        category: 'Compression',
        severity: 'MEDIUM',
        message: 'HTML response is not compressed',
        remediation: 'Enable gzip or brotli compression on the server.',
        effort: 'easy',
      })
    }

    const cacheControl = doc.headers['cache-control']
    if (!cacheControl && !doc.headers['etag'] && !doc.headers['last-modified']) {
      findings.push({
        category: 'Caching',
        severity: 'LOW',
        message: 'Response has no caching headers',
        remediation: 'Send Cache-Control and an ETag or Last-Modified validator.',
        effort: 'easy',
      })
    }

    return findings
  }

  private checkRendering(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []
    const config = this.config

    // Render-blocking resources
    const blockingScripts = doc.scripts.filter(
      (script) => script.src && script.inHead && !script.async && !script.defer && script.type !== 'module'
    )
    if (blockingScripts.length > 0) {
      findings.push({
        category: 'Render Blocking',
        severity: 'MEDIUM',
        message: `${blockingScripts.length} render-blocking script(s) in <head>`,
        location: blockingScripts[0]?.src,
        remediation: 'Add defer or async to scripts in <head>, or move them to the end of <body>.',
        effort: 'easy',
      })
    }

    const blockingStyles = doc.stylesheets.filter((sheet) => sheet.inHead && sheet.media !== 'print')
    if (blockingStyles.length > config.maxRenderBlockingStylesheets) {
      findings.push({
        category: 'Render Blocking',
        severity: 'LOW',
        message: `${blockingStyles.length} render-blocking stylesheets (limit ${config.maxRenderBlockingStylesheets})`,
        remediation: 'Combine stylesheets, inline critical CSS and load the rest asynchronously.',
        effort: 'medium',
      })
    }

    const inlineScriptSize = doc.scripts
      .filter((script) => script.inline && script.type !== 'application/ld+json')
      .reduce((total, script) => total + script.size, 0)
    if (inlineScriptSize > config.maxInlineScriptSize) {
      findings.push({
        category: 'Inline Code',
        severity: 'LOW',
        message: `Inline scripts total ${formatKb(inlineScriptSize)}`,
        remediation: 'Move large inline scripts to cacheable external files.',
        effort: 'medium',
      })
    }

    const inlineStyleSize = doc.styleBlocks.reduce((total, block) => total + block.length, 0)
    if (inlineStyleSize > config.maxInlineStyleSize) {
      findings.push({
        category: 'Inline Code',
        severity: 'LOW',
        message: `Inline <style> blocks total ${formatKb(inlineStyleSize)}`,
        remediation: 'Keep only critical CSS inline and move the rest to a stylesheet.',
        effort: 'medium',
      })
    }

    return findings
  }

  private checkImages(doc: ParsedDocument): FindingInput[] {
    const findings: FindingInput[] = []

    const noDimensions = doc.images.filter((image) => image.width === undefined || image.height === undefined)
    if (noDimensions.length > 0) {
      findings.push({
        category: 'Layout Shift',
        severity: 'LOW',
        message: `${noDimensions.length} image(s) without explicit dimensions can cause layout shift`,
        location: noDimensions[0]?.src,
        remediation: 'Set width and height attributes on images.',
        effort: 'easy',
      })
    }

    const eager = doc.images.slice(this.config.eagerImageAllowance).filter((image) => image.loading !== 'lazy')
    if (eager.length > 0) {
      findings.push({
        category: 'Lazy Loading',
        severity: 'LOW',
        message: `${eager.length} image(s) below the first ${this.config.eagerImageAllowance} are not lazy loaded`,
        location: eager[0]?.src,
        remediation: 'Add loading="lazy" to images that are not immediately visible.',
        effort: 'easy',
      })
    }

    return findings
  }
}
