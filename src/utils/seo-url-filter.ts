/**
 * SEO URL Filter Utility
 *
 * Filters URLs to only include those that affect SEO.
 * Excludes non-HTML resources, admin pages, tracking parameters, etc.
 * The exclusion lists live in data/seo-url-filter.json.
 */

import { z } from 'zod'
import { lazyData, readDataFile } from './data-files.js'

const SeoFilterTablesSchema = z.object({
  nonHtmlExtensions: z.array(z.string()),
  // Matched against whole path segments, not substrings
  excludedPathSegments: z.array(z.string()),
  excludedPathSubstrings: z.array(z.string()),
  excludedQueryParams: z.array(z.string()),
})

export type SeoFilterTables = z.infer<typeof SeoFilterTablesSchema>

export const getSeoFilterTables = lazyData(() => readDataFile('seo-url-filter.json', SeoFilterTablesSchema))

export interface SeoFilterResult {
  isRelevant: boolean
  reason?: string
}

/**
 * Check if a path segment matches any excluded segment
 */
function hasExcludedPathSegment(pathname: string, excluded: string[]): string | null {
  const segments = pathname.split('/').filter((s) => s.length > 0)

  for (const segment of segments) {
    if (excluded.includes(segment)) {
      return segment
    }
  }

  return null
}

/**
 * Check if a URL is SEO-relevant (affects SEO)
 * Filters out non-HTML resources, pagination, tracking, admin, and other non-SEO URLs
 */
export function isSeoRelevantUrl(url: string): SeoFilterResult {
  const tables = getSeoFilterTables()
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return { isRelevant: false, reason: 'Invalid URL' }
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { isRelevant: false, reason: `Unsupported protocol: ${parsed.protocol}` }
  }

  const pathname = parsed.pathname.toLowerCase()

  // Check file extension
  for (const ext of tables.nonHtmlExtensions) {
    if (pathname.endsWith(ext)) {
      return { isRelevant: false, reason: `Non-HTML file extension: ${ext}` }
    }
  }

  // Check path segments (exact match)
  const excludedSegment = hasExcludedPathSegment(pathname, tables.excludedPathSegments)
  if (excludedSegment) {
    return { isRelevant: false, reason: `Excluded path segment: ${excludedSegment}` }
  }

  // Check path substrings (for patterns like /wp-content/uploads)
  for (const pattern of tables.excludedPathSubstrings) {
    if (pathname.includes(pattern)) {
      return { isRelevant: false, reason: `Excluded path pattern: ${pattern}` }
    }
  }

  // Check query parameters
  for (const param of tables.excludedQueryParams) {
    if (parsed.searchParams.has(param)) {
      return { isRelevant: false, reason: `Excluded query parameter: ${param}` }
    }
  }

  return { isRelevant: true }
}

/**
 * Simple boolean check for SEO relevance
 */
export function isSeoRelevant(url: string): boolean {
  return isSeoRelevantUrl(url).isRelevant
}

/**
 * Whether two URLs belong to the same site, ignoring a leading www. and
 * treating subdomains of the root as the same site
 */
export function isSameSite(url: string, rootUrl: string): boolean {
  try {
    const host = new URL(url).hostname.replace(/^www\./, '').toLowerCase()
    const rootHost = new URL(rootUrl).hostname.replace(/^www\./, '').toLowerCase()
    return host === rootHost || host.endsWith(`.${rootHost}`)
  } catch {
    return false
  }
}
