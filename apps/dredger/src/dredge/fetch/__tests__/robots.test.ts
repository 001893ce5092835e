import { describe, it, expect, vi } from 'vitest'
import { matchesRobotsRule, parseRobotsTxt, RobotsReader } from '../robots.js'
import { FetchError } from '../../errors.js'
import type { Fetcher, FetchOutcome } from '../../types.js'

const ROBOTS = `
# comment
User-agent: *
Disallow: /wp-admin/
Disallow:
Crawl-delay: 5

User-agent: BadBot
Disallow: /

SITEMAP: /sitemap_index.xml
Sitemap: https://cdn.example.com/recipe-sitemap.xml
`

function fetcherReturning(outcome: FetchOutcome) {
  const fetch = vi.fn().mockResolvedValue(outcome)
  const fetcher: Fetcher = { fetch }
  return { fetcher, fetch }
}

describe('parseRobotsTxt', () => {
  it('collects sitemaps, global disallows and crawl delay', () => {
    const rules = parseRobotsTxt(ROBOTS, 'https://example.com/robots.txt')

    expect(rules.sitemaps).toEqual([
      'https://example.com/sitemap_index.xml',
      'https://cdn.example.com/recipe-sitemap.xml',
    ])
    expect(rules.globalDisallowed).toEqual(['/wp-admin/'])
    expect(rules.agentDisallowed).toEqual([])
    expect(rules.crawlDelay).toBe(5)
  })

  it('groups consecutive user-agent lines', () => {
    const rules = parseRobotsTxt(
      'User-agent: googlebot\nUser-agent: RecipeDredger\nDisallow: /private\n',
      'https://example.com/robots.txt'
    )
    expect(rules.agentDisallowed).toEqual(['/private'])
    expect(rules.globalDisallowed).toEqual([])
  })
})

describe('matchesRobotsRule', () => {
  it('matches prefixes, wildcards and end anchors', () => {
    expect(matchesRobotsRule('/wp-admin/edit', '/wp-admin/')).toBe(true)
    expect(matchesRobotsRule('/print/soup?x=1', '/*?')).toBe(true)
    expect(matchesRobotsRule('/files/menu.pdf', '/*.pdf$')).toBe(true)
    expect(matchesRobotsRule('/files/menu.pdf?v=2', '/*.pdf$')).toBe(false)
    expect(matchesRobotsRule('/soup', '/wp-admin/')).toBe(false)
  })
})

describe('RobotsReader', () => {
  it('fetches robots.txt once per origin', async () => {
    const { fetcher, fetch } = fetcherReturning({
      ok: true,
      body: ROBOTS,
      statusCode: 200,
      attempts: 1,
      durationMs: 1,
    })
    const reader = new RobotsReader(fetcher)

    expect(await reader.isAllowed('https://example.com/creamy-tomato-soup')).toBe(true)
    expect(await reader.isAllowed('https://example.com/wp-admin/login')).toBe(false)
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch).toHaveBeenCalledWith('https://example.com/robots.txt', { kind: 'robots', signal: undefined })
  })

  it('clamps crawl delay into the allowed range', async () => {
    const { fetcher } = fetcherReturning({
      ok: true,
      body: 'User-agent: *\nCrawl-delay: 120\n',
      statusCode: 200,
      attempts: 1,
      durationMs: 1,
    })

    expect(await new RobotsReader(fetcher).getCrawlDelayMs('https://example.com/')).toBe(60_000)
  })

  it('allows everything when robots.txt is missing', async () => {
    const { fetcher } = fetcherReturning({
      ok: false,
      error: new FetchError('permanent', 'https://example.com/robots.txt', 'HTTP 404', { attempts: 1, statusCode: 404 }),
    })
    const reader = new RobotsReader(fetcher)

    const rules = await reader.getRules('https://example.com/a')
    expect(rules.fetchSucceeded).toBe(true)
    expect(await reader.isAllowed('https://example.com/anything')).toBe(true)
  })

  it('fails open when robots.txt is unreachable', async () => {
    const { fetcher } = fetcherReturning({
      ok: false,
      error: new FetchError('transient', 'https://example.com/robots.txt', 'HTTP 503', { attempts: 3, statusCode: 503 }),
    })
    const reader = new RobotsReader(fetcher)

    const rules = await reader.getRules('https://example.com/a')
    expect(rules.fetchSucceeded).toBe(false)
    expect(await reader.isAllowed('https://example.com/wp-admin/')).toBe(true)
    expect(await reader.getCrawlDelayMs('https://example.com/')).toBeNull()
  })
})
