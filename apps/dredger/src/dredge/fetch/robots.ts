/**
 * Robots.txt Reader
 *
 * Policy rules:
 * 1. Obey Disallow rules for `User-agent: *` and `User-agent: RecipeDredger`
 * 2. Honor Crawl-delay (clamped to 1s..60s)
 * 3. Collect every `Sitemap:` line for discovery
 * 4. If robots.txt is unavailable: fail open (allow everything, no sitemaps)
 * 5. Rules are cached per origin for the lifetime of the reader (one run)
 */

import { loggers } from '../../config/logger.js'
import type { Fetcher, RobotsRules } from '../types.js'
import { siteOrigin } from '../utils/url.js'

const log = loggers.fetch.child('robots')

export const ROBOTS_AGENT_NAME = 'RecipeDredger'

export interface RobotsReaderOptions {
  /** Our User-Agent token for matching rule groups */
  userAgentName?: string
  /** Min crawl delay in seconds (default: 1) */
  minCrawlDelay?: number
  /** Max crawl delay in seconds (default: 60) */
  maxCrawlDelay?: number
}

const DEFAULT_OPTIONS: Required<RobotsReaderOptions> = {
  userAgentName: ROBOTS_AGENT_NAME,
  minCrawlDelay: 1,
  maxCrawlDelay: 60,
}

const EMPTY_RULES: RobotsRules = {
  sitemaps: [],
  globalDisallowed: [],
  agentDisallowed: [],
  crawlDelay: null,
  fetchSucceeded: true,
}

/**
 * Parse robots.txt content.
 *
 * Consecutive User-agent lines form one group; the first rule line closes the agent list.
 * Sitemap lines are global and may appear anywhere.
 */
export function parseRobotsTxt(text: string, baseUrl: string, userAgentName = ROBOTS_AGENT_NAME): RobotsRules {
  const rules: RobotsRules = {
    sitemaps: [],
    globalDisallowed: [],
    agentDisallowed: [],
    crawlDelay: null,
    fetchSucceeded: true,
  }

  const ourAgent = userAgentName.toLowerCase()
  let currentAgents: string[] = []
  let inRules = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'sitemap') {
      try {
        rules.sitemaps.push(new URL(value, baseUrl).toString())
      } catch {
        log.debug('Ignoring malformed Sitemap line', { value })
      }
      continue
    }

    if (directive === 'user-agent') {
      if (inRules) {
        currentAgents = []
        inRules = false
      }
      currentAgents.push(value.toLowerCase())
      continue
    }

    inRules = true
    const isOurAgent = currentAgents.includes(ourAgent)
    const isGlobal = currentAgents.includes('*')

    if (directive === 'disallow') {
      if (!value) continue // Empty disallow = allow all

      if (isOurAgent) {
        rules.agentDisallowed.push(value)
      } else if (isGlobal) {
        rules.globalDisallowed.push(value)
      }
    } else if (directive === 'crawl-delay') {
      if (isOurAgent || isGlobal) {
        const delay = parseFloat(value)
        if (!isNaN(delay) && delay > 0) {
          rules.crawlDelay = delay
        }
      }
    }
  }

  return rules
}

/**
 * Whether a path matches a Disallow value. Supports `*` wildcards and a trailing `$` anchor.
 */
export function matchesRobotsRule(path: string, rule: string): boolean {
  if (!rule.includes('*') && !rule.endsWith('$')) {
    return path.startsWith(rule)
  }

  const anchored = rule.endsWith('$')
  const body = anchored ? rule.slice(0, -1) : rule
  const pattern = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')

  return new RegExp(`^${pattern}${anchored ? '$' : ''}`).test(path)
}

export class RobotsReader {
  private readonly options: Required<RobotsReaderOptions>
  private readonly cache = new Map<string, Promise<RobotsRules>>()

  constructor(
    private readonly fetcher: Fetcher,
    options: RobotsReaderOptions = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  /**
   * Rules for the origin of a URL, fetching robots.txt at most once per origin.
   */
  getRules(url: string, signal?: AbortSignal): Promise<RobotsRules> {
    const origin = siteOrigin(url)
    const cached = this.cache.get(origin)
    if (cached) return cached

    const pending = this.fetchRules(origin, signal)
    this.cache.set(origin, pending)
    return pending
  }

  /**
   * Check if a URL may be fetched. Fail-open when robots.txt was unavailable.
   */
  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    const rules = await this.getRules(url, signal)
    const parsed = new URL(url)
    const path = parsed.pathname + parsed.search

    // Agent-specific group replaces the global one
    const applicable = rules.agentDisallowed.length > 0 ? rules.agentDisallowed : rules.globalDisallowed
    return !applicable.some((rule) => matchesRobotsRule(path, rule))
  }

  /**
   * Declared crawl delay in milliseconds, clamped, or null if robots.txt sets none.
   */
  async getCrawlDelayMs(url: string, signal?: AbortSignal): Promise<number | null> {
    const rules = await this.getRules(url, signal)
    if (rules.crawlDelay === null) return null

    const seconds = Math.max(this.options.minCrawlDelay, Math.min(this.options.maxCrawlDelay, rules.crawlDelay))
    return seconds * 1000
  }

  clearCache(): void {
    this.cache.clear()
  }

  private async fetchRules(origin: string, signal?: AbortSignal): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`
    const outcome = await this.fetcher.fetch(robotsUrl, { kind: 'robots', signal })

    if (outcome.ok) {
      const rules = parseRobotsTxt(outcome.body, robotsUrl, this.options.userAgentName)
      log.debug('Parsed robots.txt', {
        origin,
        sitemaps: rules.sitemaps.length,
        disallowed: rules.globalDisallowed.length + rules.agentDisallowed.length,
        crawlDelay: rules.crawlDelay,
      })
      return rules
    }

    // 404 = no robots.txt = allow all
    if (outcome.error.statusCode === 404) {
      return { ...EMPTY_RULES, sitemaps: [] }
    }

    if (outcome.error.kind === 'cancelled') {
      this.cache.delete(origin)
    }

    log.debug('robots.txt unavailable, allowing all', { origin, errorCode: outcome.error.code })
    return { ...EMPTY_RULES, sitemaps: [], fetchSucceeded: false }
  }
}
