/**
 * Sitemap Parser
 *
 * Discovers page URLs from XML sitemaps and sitemap index files.
 * Gzipped sitemaps (.gz) are inflated by the fetcher.
 */

import * as cheerio from 'cheerio'
import { logger } from './logger.js'
import { isSameSite } from './seo-url-filter.js'

/**
 * Fetches a sitemap body; resolves to null when the sitemap is missing.
 * The collector's fetchText satisfies this, so sitemap requests share its
 * rate limit and headers.
 */
export type SitemapFetcher = (url: string, accept: string) => Promise<string | null>

export interface SitemapUrl {
  loc: string
  lastmod?: string
  changefreq?: string
  priority?: number
}

export interface SitemapParseResult {
  urls: SitemapUrl[]
  sitemapIndexUrls: string[]
  errors: string[]
}

export interface SitemapParserOptions {
  maxUrls?: number
  maxSitemaps?: number
}

const SITEMAP_ACCEPT = 'application/xml, text/xml, */*'
const DEFAULT_LOCATIONS = ['/sitemap.xml', '/sitemap_index.xml']

type SitemapDocument = { kind: 'index'; children: string[] } | { kind: 'urlset'; urls: SitemapUrl[] }

export class SitemapParser {
  private readonly origin: string
  private readonly maxUrls: number
  private readonly maxSitemaps: number

  constructor(
    rootUrl: string,
    private readonly fetcher: SitemapFetcher,
    options: SitemapParserOptions = {}
  ) {
    this.origin = new URL(rootUrl).origin
    this.maxUrls = options.maxUrls ?? 10000
    this.maxSitemaps = options.maxSitemaps ?? 50
  }

  /**
   * Walk the given sitemaps (or the common locations when none are given),
   * following index files, until maxUrls pages or maxSitemaps files.
   */
  async parse(sitemapUrls: string[]): Promise<SitemapParseResult> {
    const result: SitemapParseResult = { urls: [], sitemapIndexUrls: [], errors: [] }
    const queue = sitemapUrls.length > 0 ? [...sitemapUrls] : DEFAULT_LOCATIONS.map((path) => this.origin + path)
    const visited = new Set<string>()

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (result.urls.length >= this.maxUrls || visited.size >= this.maxSitemaps) break
      if (visited.has(next)) continue
      visited.add(next)

      let document: SitemapDocument | null
      try {
        document = await this.read(next)
      } catch (error) {
        const message = `Failed to parse ${next}: ${error instanceof Error ? error.message : 'Unknown error'}`
        logger.debug(message)
        result.errors.push(message)
        continue
      }
      if (!document) continue

      if (document.kind === 'index') {
        result.sitemapIndexUrls.push(...document.children)
        queue.push(...document.children.filter((child) => !visited.has(child)))
      } else {
        result.urls.push(...document.urls.slice(0, this.maxUrls - result.urls.length))
      }
    }

    return result
  }

  private async read(url: string): Promise<SitemapDocument | null> {
    const content = await this.fetcher(url, SITEMAP_ACCEPT)
    if (!content) return null

    const $ = cheerio.load(content, { xml: true })

    if ($('sitemapindex').length > 0) {
      const children = $('sitemapindex > sitemap > loc')
        .map((_, loc) => absoluteUrl($(loc).text()))
        .get()
        .filter((child): child is string => child !== null)
      return { kind: 'index', children }
    }

    const urls: SitemapUrl[] = []
    $('urlset > url').each((_, element) => {
      const entry = $(element)
      const loc = absoluteUrl(entry.children('loc').first().text())
      if (!loc || !isSameSite(loc, this.origin)) return

      const url: SitemapUrl = { loc }
      const lastmod = entry.children('lastmod').first().text().trim()
      if (lastmod) url.lastmod = lastmod
      const changefreq = entry.children('changefreq').first().text().trim()
      if (changefreq) url.changefreq = changefreq
      const priority = Number.parseFloat(entry.children('priority').first().text())
      if (priority >= 0 && priority <= 1) url.priority = priority
      urls.push(url)
    })
    return { kind: 'urlset', urls }
  }
}

// Entities are already decoded by the XML parser
function absoluteUrl(text: string): string | null {
  const trimmed = text.trim()
  if (!trimmed) return null
  try {
    return new URL(trimmed).toString()
  } catch {
    return null
  }
}
