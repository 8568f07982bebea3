/**
 * Page Processor
 *
 * Turns a RawDocument into the ParsedDocument analyzers read:
 * - Resolves relative URLs against <base href> or the final URL
 * - Extracts meta tags, headings, links, images, scripts, forms, structured data
 * - Falls back to regex extraction when the markup cannot be processed
 *
 * parse() never throws. Problems are recorded in metadata.warnings.
 */

import * as cheerio from 'cheerio'
import type {
  ButtonData,
  DocumentMetadata,
  FormData,
  FormField,
  HeadingData,
  HeadingNode,
  HreflangEntry,
  IconData,
  IframeData,
  ImageData,
  InlineStyle,
  LandmarkData,
  LinkData,
  MetaTag,
  ParsedDocument,
  ParserName,
  RawDocument,
  ScriptData,
  StructuredDataBlock,
  StylesheetData,
  TableData,
} from '../types/page-data.js'
import { ProcessingError } from '../types/errors.js'
import {
  ProcessorConfigSchema,
  parseConfig,
  type ProcessorConfig,
  type ProcessorConfigInput,
} from '../types/config.js'
import { deepFreeze } from '../utils/deep-freeze.js'
import { logger } from '../utils/logger.js'

type Extracted = Omit<
  ParsedDocument,
  | 'url'
  | 'finalUrl'
  | 'statusCode'
  | 'headers'
  | 'contentType'
  | 'fetchedAt'
  | 'responseTimeMs'
  | 'htmlSize'
  | 'redirectChain'
  | 'metadata'
>

const NON_FIELD_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'image', 'reset'])

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Normalize hostname for internal/external comparison
 */
function siteHost(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '').toLowerCase()
  } catch {
    return null
  }
}

function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = parseInt(value, 10)
  return isNaN(parsed) ? undefined : parsed
}

function schemaTypes(value: unknown): string[] {
  if (typeof value === 'string') return [value]
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string')
  return []
}

/**
 * Build a heading tree from the flat, document-ordered heading list
 */
export function buildHeadingTree(headings: HeadingData[]): HeadingNode[] {
  const roots: HeadingNode[] = []
  const stack: HeadingNode[] = []

  for (const heading of headings) {
    const node: HeadingNode = { level: heading.level, text: heading.text, children: [] }
    while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= heading.level) {
      stack.pop()
    }
    const parent = stack[stack.length - 1]
    if (parent) {
      parent.children.push(node)
    } else {
      roots.push(node)
    }
    stack.push(node)
  }

  return roots
}

export class PageProcessor {
  readonly config: ProcessorConfig

  constructor(config: ProcessorConfigInput = {}) {
    this.config = parseConfig(ProcessorConfigSchema, config, 'processor')
  }

  parse(raw: RawDocument): ParsedDocument {
    const warnings: string[] = []
    const contentType = raw.contentType.toLowerCase()

    if (contentType && !contentType.includes('html') && !contentType.includes('xml')) {
      warnings.push(`Non-HTML content type: ${raw.contentType}`)
    }
    if (raw.truncated) {
      warnings.push(`Document truncated at ${raw.byteLength} bytes`)
    }

    const source = raw.body
    if (source.trim() === '') {
      warnings.push('Empty document')
    } else {
      if (!/<head[\s>]/i.test(source)) warnings.push('Missing <head> element')
      if (!/<body[\s>]/i.test(source)) warnings.push('Missing <body> element')
    }

    let extracted: Extracted
    let parser: ParserName | 'fallback' = this.config.parser

    try {
      extracted = this.extract(raw, warnings)
    } catch (error) {
      const failure = new ProcessingError(
        `Markup extraction failed, using fallback: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
      logger.warn(`${raw.finalUrl}: ${failure.message}`)
      warnings.push(failure.message)
      extracted = this.fallbackExtract(raw)
      parser = 'fallback'
    }

    const metadata: DocumentMetadata = {
      parser,
      warnings,
      commentsRemoved: this.config.removeComments && parser !== 'fallback',
      whitespaceCleaned: this.config.cleanWhitespace,
    }

    const document: ParsedDocument = {
      url: raw.url,
      finalUrl: raw.finalUrl,
      statusCode: raw.statusCode,
      headers: { ...raw.headers },
      contentType: raw.contentType,
      fetchedAt: raw.fetchedAt,
      responseTimeMs: raw.responseTimeMs,
      htmlSize: raw.byteLength,
      redirectChain: raw.redirectChain.map((hop) => ({ ...hop })),
      ...extracted,
      metadata,
    }

    return deepFreeze(document)
  }

  private load(html: string): cheerio.CheerioAPI {
    if (this.config.parser === 'htmlparser2') {
      return cheerio.load(html, { xml: { xmlMode: false, decodeEntities: true } })
    }
    return cheerio.load(html)
  }

  private clean(text: string): string {
    return this.config.cleanWhitespace ? text.replace(/\s+/g, ' ').trim() : text.trim()
  }

  private resolve(href: string, baseUrl: string): string | undefined {
    try {
      const parsed = new URL(href.trim(), baseUrl)
      if (this.config.normalizeUrls) {
        parsed.hash = ''
      }
      return parsed.toString()
    } catch {
      return undefined
    }
  }

  private extract(raw: RawDocument, warnings: string[]): Extracted {
    const $ = this.load(raw.body)

    if (this.config.removeComments) {
      $.root()
        .find('*')
        .addBack()
        .contents()
        .filter((_, node) => node.type === 'comment')
        .remove()
    }

    // Base URL
    const baseHref = $('base[href]').first().attr('href')
    const baseUrl = (baseHref && this.resolve(baseHref, raw.finalUrl)) || raw.finalUrl

    // Title
    const titles = $('title')
    if (titles.length > 1) {
      warnings.push(`Multiple <title> elements (${titles.length})`)
    }
    const title = this.clean(titles.first().text()) || undefined

    // Meta tags
    const meta = this.extractMeta($)
    const metaByName = (name: string): string | undefined =>
      meta.find((tag) => tag.name?.toLowerCase() === name)?.content.trim()

    const charsetMeta =
      $('meta[charset]').attr('charset') ??
      meta
        .find((tag) => tag.httpEquiv?.toLowerCase() === 'content-type')
        ?.content.match(/charset=([^;\s]+)/i)?.[1]

    // Canonical URL
    const canonicalHref = $('link[rel="canonical"]').attr('href')
    const canonical = canonicalHref ? this.resolve(canonicalHref, baseUrl) : undefined

    // Headings
    const headings: HeadingData[] = []
    $('h1, h2, h3, h4, h5, h6').each((_, el) => {
      headings.push({
        level: parseInt(el.tagName.slice(1), 10),
        text: this.clean($(el).text()),
      })
    })

    const structured = this.config.extractMetadata
      ? this.extractSchemaData($, warnings)
      : []
    const social = this.config.extractMetadata
      ? this.extractSocial(meta)
      : { openGraph: {}, twitterCard: {} }

    const text = this.extractBodyText($)

    return {
      baseUrl,
      title,
      titleCount: titles.length,
      lang: $('html').attr('lang')?.trim() || undefined,
      charset: charsetMeta?.toLowerCase(),
      meta,
      description: metaByName('description'),
      robots: metaByName('robots') ?? metaByName('googlebot'),
      viewport: metaByName('viewport'),
      keywords: metaByName('keywords'),
      themeColor: metaByName('theme-color'),
      canonical,
      hreflang: this.extractHreflang($, baseUrl),
      headings,
      headingTree: buildHeadingTree(headings),
      links: this.extractLinks($, baseUrl, raw.finalUrl),
      images: this.extractImages($, baseUrl),
      scripts: this.extractScripts($, baseUrl),
      stylesheets: this.extractStylesheets($, baseUrl),
      forms: this.extractForms($, baseUrl),
      iframes: this.extractIframes($, baseUrl),
      buttons: this.extractButtons($),
      tables: this.extractTables($),
      landmarks: this.extractLandmarks($),
      hasSkipLink: this.hasSkipLink($),
      positiveTabindexCount: $('[tabindex]').filter((_, el) => parseInt($(el).attr('tabindex') ?? '', 10) > 0).length,
      inlineStyles: this.extractInlineStyles($),
      styleBlocks: $('style')
        .map((_, el) => $(el).text())
        .get(),
      icons: this.extractIcons($),
      structuredData: structured,
      openGraph: social.openGraph,
      twitterCard: social.twitterCard,
      text,
      wordCount: text ? text.split(/\s+/).filter(Boolean).length : 0,
      html: $.html(),
    }
  }

  /**
   * Minimal extraction used when cheerio processing fails
   */
  private fallbackExtract(raw: RawDocument): Extracted {
    const titleMatch = raw.body.match(/<title[^>]*>([\s\S]*?)<\/title>/i)
    const text = raw.body
      .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<[^>]+>/g, ' ')
      .replace(/\s+/g, ' ')
      .trim()

    return {
      baseUrl: raw.finalUrl,
      title: titleMatch?.[1]?.replace(/\s+/g, ' ').trim() || undefined,
      titleCount: titleMatch ? 1 : 0,
      meta: [],
      hreflang: [],
      headings: [],
      headingTree: [],
      links: [],
      images: [],
      scripts: [],
      stylesheets: [],
      forms: [],
      iframes: [],
      buttons: [],
      tables: [],
      landmarks: { main: false, nav: false, header: false, footer: false, roles: [] },
      hasSkipLink: false,
      positiveTabindexCount: 0,
      inlineStyles: [],
      styleBlocks: [],
      icons: { favicon: false, appleTouchIcon: false, manifest: false },
      structuredData: [],
      openGraph: {},
      twitterCard: {},
      text,
      wordCount: text ? text.split(/\s+/).length : 0,
      html: raw.body,
    }
  }

  private extractMeta($: cheerio.CheerioAPI): MetaTag[] {
    const tags: MetaTag[] = []
    $('meta[content]').each((_, el) => {
      const $el = $(el)
      tags.push({
        name: $el.attr('name'),
        property: $el.attr('property'),
        httpEquiv: $el.attr('http-equiv'),
        content: $el.attr('content') ?? '',
      })
    })
    return tags
  }

  private extractSocial(meta: MetaTag[]): { openGraph: Record<string, string>; twitterCard: Record<string, string> } {
    const openGraph: Record<string, string> = {}
    const twitterCard: Record<string, string> = {}

    for (const tag of meta) {
      const key = (tag.property ?? tag.name ?? '').toLowerCase()
      if (key.startsWith('og:') && !(key in openGraph)) {
        openGraph[key] = tag.content.trim()
      } else if (key.startsWith('twitter:') && !(key in twitterCard)) {
        twitterCard[key] = tag.content.trim()
      }
    }

    return { openGraph, twitterCard }
  }

  /**
   * Extract hreflang tags
   */
  private extractHreflang($: cheerio.CheerioAPI, baseUrl: string): HreflangEntry[] {
    const tags: HreflangEntry[] = []

    $('link[rel="alternate"][hreflang]').each((_, el) => {
      const hreflang = $(el).attr('hreflang')
      const href = $(el).attr('href')
      const url = href ? this.resolve(href, baseUrl) : undefined
      if (hreflang && url) {
        tags.push({ lang: hreflang, url })
      }
    })

    return tags
  }

  /**
   * Extract links from page
   */
  private extractLinks($: cheerio.CheerioAPI, baseUrl: string, pageUrl: string): LinkData[] {
    const links: LinkData[] = []
    const pageHost = siteHost(pageUrl)

    $('a[href]').each((_, el) => {
      const $el = $(el)
      const href = this.resolve($el.attr('href') ?? '', baseUrl)
      if (!href) return

      const rel = ($el.attr('rel') ?? '').toLowerCase().split(/\s+/).filter(Boolean)
      const linkHost = href.startsWith('http') ? siteHost(href) : null
      const internal =
        pageHost !== null &&
        linkHost !== null &&
        (linkHost === pageHost || linkHost.endsWith(`.${pageHost}`))

      links.push({
        href,
        text: this.clean($el.text()),
        rel,
        internal,
        nofollow: rel.includes('nofollow'),
        ariaLabel: $el.attr('aria-label')?.trim() || undefined,
        hasImageWithAlt: $el.find('img[alt]').filter((_, img) => ($(img).attr('alt') ?? '').trim() !== '').length > 0,
        target: $el.attr('target'),
      })
    })

    return links
  }

  /**
   * Extract image data
   */
  private extractImages($: cheerio.CheerioAPI, baseUrl: string): ImageData[] {
    const images: ImageData[] = []

    $('img').each((_, el) => {
      const $el = $(el)
      const src = $el.attr('src') ?? $el.attr('data-src') ?? ''
      images.push({
        src: src ? (this.resolve(src, baseUrl) ?? src) : '',
        alt: $el.attr('alt') ?? null,
        width: parseDimension($el.attr('width')),
        height: parseDimension($el.attr('height')),
        loading: $el.attr('loading'),
        srcset: $el.attr('srcset'),
        inPicture: $el.closest('picture').length > 0,
      })
    })

    return images
  }

  private extractScripts($: cheerio.CheerioAPI, baseUrl: string): ScriptData[] {
    const scripts: ScriptData[] = []

    $('script').each((_, el) => {
      const $el = $(el)
      const src = $el.attr('src')
      const code = src ? '' : $el.text()
      scripts.push({
        src: src ? (this.resolve(src, baseUrl) ?? src) : undefined,
        type: $el.attr('type'),
        async: $el.attr('async') !== undefined,
        defer: $el.attr('defer') !== undefined,
        inline: !src,
        inHead: $el.closest('head').length > 0,
        size: code.length,
      })
    })

    return scripts
  }

  private extractStylesheets($: cheerio.CheerioAPI, baseUrl: string): StylesheetData[] {
    const stylesheets: StylesheetData[] = []

    $('link[rel~="stylesheet"][href]').each((_, el) => {
      const $el = $(el)
      const href = $el.attr('href') ?? ''
      stylesheets.push({
        href: this.resolve(href, baseUrl) ?? href,
        media: $el.attr('media'),
        inHead: $el.closest('head').length > 0,
      })
    })

    return stylesheets
  }

  private extractForms($: cheerio.CheerioAPI, baseUrl: string): FormData[] {
    const forms: FormData[] = []
    const labelTargets = new Set<string>()
    $('label[for]').each((_, label) => {
      const target = $(label).attr('for')
      if (target) labelTargets.add(target)
    })

    $('form').each((_, form) => {
      const $form = $(form)
      const action = $form.attr('action')
      const fields: FormField[] = []

      $form.find('input, select, textarea').each((_, el) => {
        const $el = $(el)
        const type = el.tagName === 'input' ? ($el.attr('type') ?? 'text').toLowerCase() : el.tagName
        if (NON_FIELD_INPUT_TYPES.has(type)) return

        const id = $el.attr('id')
        const labelled =
          (id !== undefined && labelTargets.has(id)) ||
          $el.closest('label').length > 0 ||
          Boolean($el.attr('aria-label')?.trim()) ||
          $el.attr('aria-labelledby') !== undefined ||
          Boolean($el.attr('title')?.trim())

        fields.push({ type, name: $el.attr('name'), id, labelled })
      })

      forms.push({
        action: action ? (this.resolve(action, baseUrl) ?? action) : '',
        method: ($form.attr('method') ?? 'get').toLowerCase(),
        fields,
      })
    })

    return forms
  }

  private extractIframes($: cheerio.CheerioAPI, baseUrl: string): IframeData[] {
    const iframes: IframeData[] = []
    $('iframe').each((_, el) => {
      const src = $(el).attr('src') ?? ''
      iframes.push({
        src: src ? (this.resolve(src, baseUrl) ?? src) : '',
        title: $(el).attr('title')?.trim() || undefined,
      })
    })
    return iframes
  }

  private extractButtons($: cheerio.CheerioAPI): ButtonData[] {
    const buttons: ButtonData[] = []
    $('button, input[type="button"], input[type="submit"], [role="button"]').each((_, el) => {
      const $el = $(el)
      const label = el.tagName === 'input' ? ($el.attr('value') ?? '') : $el.text()
      buttons.push({
        text: this.clean(label),
        ariaLabel: ($el.attr('aria-label') ?? $el.attr('title'))?.trim() || undefined,
      })
    })
    return buttons
  }

  private extractTables($: cheerio.CheerioAPI): TableData[] {
    const tables: TableData[] = []
    $('table').each((_, el) => {
      const $el = $(el)
      const wrapper = $el.parent()
      tables.push({
        hasHeaderCells: $el.find('th').length > 0,
        hasCaption: $el.find('caption').length > 0,
        responsive:
          /responsive|scroll/i.test(`${$el.attr('class') ?? ''} ${wrapper.attr('class') ?? ''}`) ||
          /overflow(-x)?\s*:\s*(auto|scroll)/i.test(wrapper.attr('style') ?? ''),
      })
    })
    return tables
  }

  private extractLandmarks($: cheerio.CheerioAPI): LandmarkData {
    const roles = new Set<string>()
    $('[role]').each((_, el) => {
      const role = $(el).attr('role')?.trim().toLowerCase()
      if (role) roles.add(role)
    })

    return {
      main: $('main, [role="main"]').length > 0,
      nav: $('nav, [role="navigation"]').length > 0,
      header: $('header, [role="banner"]').length > 0,
      footer: $('footer, [role="contentinfo"]').length > 0,
      roles: [...roles].sort(),
    }
  }

  private hasSkipLink($: cheerio.CheerioAPI): boolean {
    return (
      $('a[href^="#"]').filter((_, el) => /skip|jump to/i.test($(el).text() + ($(el).attr('class') ?? ''))).length > 0
    )
  }

  private extractInlineStyles($: cheerio.CheerioAPI): InlineStyle[] {
    const styles: InlineStyle[] = []
    $('body [style]').each((_, el) => {
      styles.push({ tag: el.tagName, style: $(el).attr('style') ?? '' })
    })
    return styles
  }

  private extractIcons($: cheerio.CheerioAPI): IconData {
    return {
      favicon: $('link[rel~="icon"]').length > 0,
      appleTouchIcon: $('link[rel="apple-touch-icon"], link[rel="apple-touch-icon-precomposed"]').length > 0,
      manifest: $('link[rel="manifest"]').length > 0,
    }
  }

  /**
   * Extract Schema.org data
   */
  private extractSchemaData($: cheerio.CheerioAPI, warnings: string[]): StructuredDataBlock[] {
    const blocks: StructuredDataBlock[] = []

    // JSON-LD
    $('script[type="application/ld+json"]').each((index, el) => {
      let json: unknown
      try {
        json = JSON.parse($(el).html() ?? '')
      } catch (e) {
        const error = `Invalid JSON-LD: ${e instanceof Error ? e.message : 'Parse error'}`
        warnings.push(`${error} (block ${index + 1})`)
        blocks.push({ format: 'json-ld', types: [], error })
        return
      }

      const items = Array.isArray(json) ? json : [json]
      for (const item of items) {
        if (!isRecord(item)) continue
        const graph = item['@graph']
        if (Array.isArray(graph)) {
          for (const node of graph) {
            if (!isRecord(node)) continue
            // Nodes inherit the graph's @context
            const data = '@context' in node ? node : { '@context': item['@context'], ...node }
            blocks.push({ format: 'json-ld', types: schemaTypes(node['@type']), data })
          }
        } else {
          blocks.push({ format: 'json-ld', types: schemaTypes(item['@type']), data: item })
        }
      }
    })

    // Microdata
    $('[itemscope][itemtype]')
      .filter((_, el) => $(el).parents('[itemscope]').length === 0)
      .each((_, el) => {
        const $el = $(el)
        const types = ($el.attr('itemtype') ?? '')
          .split(/\s+/)
          .map((itemtype) => itemtype.split('/').pop() ?? '')
          .filter(Boolean)

        const data: Record<string, unknown> = { '@type': types.length === 1 ? types[0] : types }
        $el.find('[itemprop]').each((_, prop) => {
          const $prop = $(prop)
          const name = $prop.attr('itemprop')
          if (!name || name in data) return
          data[name] =
            $prop.attr('content') ?? $prop.attr('href') ?? $prop.attr('src') ?? this.clean($prop.text())
        })

        blocks.push({ format: 'microdata', types, data })
      })

    return blocks
  }

  /**
   * Extract clean body text (removing scripts, styles, etc.)
   */
  private extractBodyText($: cheerio.CheerioAPI): string {
    const $body = $('body').clone()
    $body.find('script, style, noscript, template').remove()
    return this.clean($body.text())
  }
}
