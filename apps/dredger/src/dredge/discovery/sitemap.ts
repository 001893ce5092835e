/**
 * Sitemap Discovery
 *
 * Locates a site's sitemaps (robots.txt first, then conventional paths), walks sitemap
 * indexes depth-first with post/recipe children first, and yields leaf entries newest first.
 *
 * Traversal is bounded by depth and by documents fetched per site, and never fetches the
 * same sitemap URL twice, so self-references and cycles terminate.
 */

import { XMLParser } from 'fast-xml-parser'
import { loggers } from '../../config/logger.js'
import { DiscoveryError } from '../errors.js'
import type { RobotsReader } from '../fetch/robots.js'
import type { Fetcher, SiteSource, SitemapEntry } from '../types.js'
import { isValidUrl } from '../utils/url.js'

const log = loggers.discovery

/** Tried in order when robots.txt declares no sitemap */
export const CONVENTIONAL_SITEMAP_PATHS = [
  '/sitemap_index.xml',
  '/sitemap.xml',
  '/wp-sitemap.xml',
  '/post-sitemap.xml',
  '/recipe-sitemap.xml',
]

const PREFERRED_CHILD = /post|recipe/i

export type ParsedSitemap =
  | { type: 'index'; children: string[] }
  | { type: 'urlset'; entries: SitemapEntry[] }
  | { type: 'unknown' }

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === 'sitemap' || name === 'url',
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value
  return value === undefined ? [] : [value]
}

function textOf(node: Record<string, unknown>, key: string): string | undefined {
  const value = node[key]
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed || undefined
  }
  return undefined
}

function parseLastModified(value: string | undefined): Date | undefined {
  if (!value) return undefined
  const time = Date.parse(value)
  return isNaN(time) ? undefined : new Date(time)
}

/**
 * Parse a sitemap document. Anything that is neither <sitemapindex> nor <urlset> is 'unknown'.
 */
export function parseSitemapXml(xml: string): ParsedSitemap {
  let parsed: unknown
  try {
    parsed = xmlParser.parse(xml)
  } catch {
    return { type: 'unknown' }
  }
  if (!isRecord(parsed)) return { type: 'unknown' }

  const index = parsed.sitemapindex
  if (isRecord(index) || index === '') {
    const children = asArray(isRecord(index) ? index.sitemap : undefined)
      .filter(isRecord)
      .map((child) => textOf(child, 'loc'))
      .filter((loc): loc is string => loc !== undefined && isValidUrl(loc))
    return { type: 'index', children }
  }

  const urlset = parsed.urlset
  if (isRecord(urlset) || urlset === '') {
    const entries: SitemapEntry[] = []
    for (const node of asArray(isRecord(urlset) ? urlset.url : undefined)) {
      if (!isRecord(node)) continue
      const loc = textOf(node, 'loc')
      if (!loc || !isValidUrl(loc)) continue

      const lastModified = parseLastModified(textOf(node, 'lastmod'))
      entries.push(lastModified ? { url: loc, lastModified } : { url: loc })
    }
    return { type: 'urlset', entries }
  }

  return { type: 'unknown' }
}

/**
 * Drop repeated locations (first wins), order newest first (undated last, ties stable), cap.
 */
export function rankEntries(entries: SitemapEntry[], scanDepth: number): SitemapEntry[] {
  const seen = new Set<string>()
  const unique: SitemapEntry[] = []
  for (const entry of entries) {
    if (seen.has(entry.url)) continue
    seen.add(entry.url)
    unique.push(entry)
  }

  const time = (entry: SitemapEntry) => entry.lastModified?.getTime() ?? Number.NEGATIVE_INFINITY
  unique.sort((a, b) => {
    const diff = time(b) - time(a)
    return isNaN(diff) ? 0 : diff
  })

  return unique.slice(0, Math.max(0, scanDepth))
}

export interface SitemapDiscoveryOptions {
  /** Deepest index nesting followed (default: 3) */
  maxDepth?: number
  /** Sitemap documents fetched per site (default: 25) */
  maxDocuments?: number
}

export interface DiscoverOptions {
  scanDepth: number
  signal?: AbortSignal
}

/** Mutable traversal state for one discover() call */
interface Walk {
  site: string
  visited: Set<string>
  documents: number
  entries: SitemapEntry[]
  signal?: AbortSignal
}

export class SitemapDiscovery {
  private readonly maxDepth: number
  private readonly maxDocuments: number

  constructor(
    private readonly fetcher: Fetcher,
    private readonly robots: RobotsReader,
    options: SitemapDiscoveryOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? 3
    this.maxDocuments = options.maxDocuments ?? 25
  }

  /**
   * Yield a site's sitemap entries newest first. Every call starts over.
   *
   * @throws DiscoveryError when no sitemap can be located
   */
  async *discover(site: SiteSource, options: DiscoverOptions): AsyncGenerator<SitemapEntry> {
    const walk: Walk = {
      site: site.url,
      visited: new Set(),
      documents: 0,
      entries: [],
      signal: options.signal,
    }

    const rules = await this.robots.getRules(site.url, options.signal)
    let rootsFound = 0

    for (const sitemapUrl of rules.sitemaps) {
      const parsed = await this.load(sitemapUrl, walk)
      if (parsed && parsed.type !== 'unknown') {
        rootsFound += 1
        await this.expand(parsed, 0, walk)
      }
    }

    if (rootsFound === 0) {
      const base = site.url.replace(/\/+$/, '')
      for (const path of CONVENTIONAL_SITEMAP_PATHS) {
        if (options.signal?.aborted) return

        const parsed = await this.load(`${base}${path}`, walk)
        if (parsed && parsed.type !== 'unknown') {
          rootsFound += 1
          await this.expand(parsed, 0, walk)
          break
        }
      }
    }

    if (options.signal?.aborted) return

    if (rootsFound === 0) {
      throw new DiscoveryError(site.url)
    }

    const ranked = rankEntries(walk.entries, options.scanDepth)
    log.info('Sitemap discovery complete', {
      site: site.url,
      documents: walk.documents,
      entries: walk.entries.length,
      yielded: ranked.length,
    })

    for (const entry of ranked) {
      if (options.signal?.aborted) return
      yield entry
    }
  }

  private async expand(parsed: ParsedSitemap, depth: number, walk: Walk): Promise<void> {
    if (parsed.type === 'urlset') {
      walk.entries.push(...parsed.entries)
      return
    }
    if (parsed.type !== 'index') return

    if (depth >= this.maxDepth) {
      log.debug('Max sitemap depth reached', { site: walk.site, depth })
      return
    }

    const preferred = parsed.children.filter((child) => PREFERRED_CHILD.test(child))
    const rest = parsed.children.filter((child) => !PREFERRED_CHILD.test(child))

    for (const child of [...preferred, ...rest]) {
      if (walk.signal?.aborted) return

      const childParsed = await this.load(child, walk)
      if (childParsed) {
        await this.expand(childParsed, depth + 1, walk)
      }
    }
  }

  /**
   * Fetch and parse one sitemap document. Returns null when skipped or unavailable.
   */
  private async load(url: string, walk: Walk): Promise<ParsedSitemap | null> {
    if (walk.visited.has(url) || walk.documents >= this.maxDocuments || walk.signal?.aborted) {
      return null
    }
    walk.visited.add(url)
    walk.documents += 1

    const outcome = await this.fetcher.fetch(url, { kind: 'sitemap', signal: walk.signal })
    if (!outcome.ok) {
      log.debug('Sitemap unavailable', { site: walk.site, url, errorCode: outcome.error.code })
      return null
    }

    const parsed = parseSitemapXml(outcome.body)
    if (parsed.type === 'unknown') {
      log.debug('Not a sitemap document', { site: walk.site, url })
    }
    return parsed
  }
}
