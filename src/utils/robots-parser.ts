/**
 * Robots.txt Parser
 *
 * Parses robots.txt per origin and caches the rules. Concurrent lookups for the
 * same origin share one fetch.
 */

import robotsParser from 'robots-parser'
import { logger } from './logger.js'

type ParseRobots = typeof robotsParser.default
type Robot = ReturnType<ParseRobots>

// robots-parser is CommonJS but its typings declare a default export, so
// under NodeNext the default import is typed as the module namespace while
// at runtime it is the function itself
function isParseRobots(value: unknown): value is ParseRobots {
  return typeof value === 'function'
}

export const parseRobots: ParseRobots = isParseRobots(robotsParser) ? robotsParser : robotsParser.default

/**
 * Returns the robots.txt body, or null when the file is missing or unreadable
 */
export type RobotsFetcher = (robotsUrl: string) => Promise<string | null>

export class RobotsRules {
  readonly robotsUrl: string
  private parser: Robot

  constructor(robotsUrl: string, content: string) {
    this.robotsUrl = robotsUrl
    this.parser = parseRobots(robotsUrl, content)
  }

  /**
   * Check if URL is allowed for crawling
   */
  isAllowed(url: string, userAgent: string): boolean {
    return this.parser.isAllowed(url, userAgent) ?? true
  }

  /**
   * Get crawl delay in seconds if specified
   */
  getCrawlDelay(userAgent: string): number | null {
    return this.parser.getCrawlDelay(userAgent) ?? null
  }

  /**
   * Get sitemaps listed in robots.txt
   */
  getSitemaps(): string[] {
    return this.parser.getSitemaps()
  }
}

interface RobotsCacheEntry {
  rules: Promise<RobotsRules>
  expiresAt: number
}

export class RobotsCache {
  private entries = new Map<string, RobotsCacheEntry>()
  private readonly fetcher: RobotsFetcher
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(fetcher: RobotsFetcher, options: { ttlMs?: number; now?: () => number } = {}) {
    this.fetcher = fetcher
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000
    this.now = options.now ?? Date.now
  }

  /**
   * Get the rules governing a URL's origin, fetching robots.txt on first use
   */
  getRules(url: string): Promise<RobotsRules> {
    const origin = new URL(url).origin
    const cached = this.entries.get(origin)
    if (cached && cached.expiresAt > this.now()) {
      return cached.rules
    }

    const robotsUrl = `${origin}/robots.txt`
    const rules = this.load(robotsUrl)
    this.entries.set(origin, { rules, expiresAt: this.now() + this.ttlMs })
    return rules
  }

  async isAllowed(url: string, userAgent: string): Promise<boolean> {
    const rules = await this.getRules(url)
    return rules.isAllowed(url, userAgent)
  }

  clear(): void {
    this.entries.clear()
  }

  private async load(robotsUrl: string): Promise<RobotsRules> {
    try {
      const content = await this.fetcher(robotsUrl)
      if (content === null) {
        // No robots.txt - allow all
        logger.debug(`No robots.txt at ${robotsUrl}`)
        return new RobotsRules(robotsUrl, '')
      }
      return new RobotsRules(robotsUrl, content)
    } catch (error) {
      // Error fetching - allow all
      logger.warn(`Failed to fetch ${robotsUrl}, allowing all paths:`, error)
      return new RobotsRules(robotsUrl, '')
    }
  }
}
