import { describe, it, expect, vi } from 'vitest'
import { parseSitemapXml, rankEntries, SitemapDiscovery } from '../sitemap.js'
import { RobotsReader } from '../../fetch/robots.js'
import { DiscoveryError, FetchError } from '../../errors.js'
import type { Fetcher, FetchOptions, FetchOutcome, SitemapEntry } from '../../types.js'

const urlset = (...urls: Array<[string, string?]>) =>
  `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map(([loc, lastmod]) => `<url><loc>${loc}</loc>${lastmod ? `<lastmod>${lastmod}</lastmod>` : ''}</url>`).join('\n')}
</urlset>`

const index = (...children: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${children.map((loc) => `<sitemap><loc>${loc}</loc></sitemap>`).join('\n')}
</sitemapindex>`

/** Serves bodies from a map; anything else is a 404 */
function siteFetcher(pages: Record<string, string>) {
  const fetch = vi.fn(async (url: string, _options: FetchOptions): Promise<FetchOutcome> => {
    const body = pages[url]
    if (body === undefined) {
      return {
        ok: false,
        error: new FetchError('permanent', url, 'HTTP 404', { attempts: 1, statusCode: 404 }),
      }
    }
    return { ok: true, body, statusCode: 200, attempts: 1, durationMs: 1 }
  })
  const fetcher: Fetcher = { fetch }
  return { fetcher, fetch }
}

async function collect(iterable: AsyncIterable<SitemapEntry>): Promise<string[]> {
  const urls: string[] = []
  for await (const entry of iterable) {
    urls.push(entry.url)
  }
  return urls
}

function discoveryFor(pages: Record<string, string>, options = {}) {
  const { fetcher, fetch } = siteFetcher(pages)
  return { discovery: new SitemapDiscovery(fetcher, new RobotsReader(fetcher), options), fetch }
}

describe('parseSitemapXml', () => {
  it('reads urlset entries with dates', () => {
    const parsed = parseSitemapXml(urlset(['https://example.com/a', '2026-01-02'], ['https://example.com/b']))

    expect(parsed.type).toBe('urlset')
    if (parsed.type === 'urlset') {
      expect(parsed.entries).toEqual([
        { url: 'https://example.com/a', lastModified: new Date('2026-01-02') },
        { url: 'https://example.com/b' },
      ])
    }
  })

  it('reads a sitemap index with a single child', () => {
    expect(parseSitemapXml(index('https://example.com/post-sitemap.xml'))).toEqual({
      type: 'index',
      children: ['https://example.com/post-sitemap.xml'],
    })
  })

  it('treats HTML as unknown', () => {
    expect(parseSitemapXml('<html><body>Not here</body></html>')).toEqual({ type: 'unknown' })
  })
})

describe('rankEntries', () => {
  it('orders newest first, undated last, ties in document order, and caps', () => {
    const ranked = rankEntries(
      [
        { url: 'https://e.com/old', lastModified: new Date('2025-01-01') },
        { url: 'https://e.com/undated' },
        { url: 'https://e.com/new', lastModified: new Date('2026-01-01') },
        { url: 'https://e.com/tie', lastModified: new Date('2025-01-01') },
        { url: 'https://e.com/new' },
      ],
      3
    )

    expect(ranked.map((e) => e.url)).toEqual(['https://e.com/new', 'https://e.com/old', 'https://e.com/tie'])
  })
})

describe('SitemapDiscovery', () => {
  it('uses sitemaps declared in robots.txt', async () => {
    const { discovery, fetch } = discoveryFor({
      'https://example.com/robots.txt': 'User-agent: *\nSitemap: https://example.com/custom.xml\n',
      'https://example.com/custom.xml': urlset(['https://example.com/soup', '2026-01-01']),
    })

    const urls = await collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 10 }))

    expect(urls).toEqual(['https://example.com/soup'])
    expect(fetch).not.toHaveBeenCalledWith('https://example.com/sitemap_index.xml', expect.anything())
  })

  it('tries conventional paths in order and stops at the first sitemap', async () => {
    const { discovery, fetch } = discoveryFor({
      'https://example.com/sitemap.xml': urlset(['https://example.com/soup']),
      'https://example.com/wp-sitemap.xml': urlset(['https://example.com/other']),
    })

    const urls = await collect(discovery.discover({ url: 'https://example.com/' }, { scanDepth: 10 }))

    expect(urls).toEqual(['https://example.com/soup'])
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      'https://example.com/robots.txt',
      'https://example.com/sitemap_index.xml',
      'https://example.com/sitemap.xml',
    ])
  })

  it('visits post and recipe children first', async () => {
    const { discovery, fetch } = discoveryFor({
      'https://example.com/sitemap_index.xml': index(
        'https://example.com/page-sitemap.xml',
        'https://example.com/recipe-sitemap.xml'
      ),
      'https://example.com/page-sitemap.xml': urlset(['https://example.com/about']),
      'https://example.com/recipe-sitemap.xml': urlset(['https://example.com/soup']),
    })

    await collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 10 }))

    const fetched = fetch.mock.calls.map(([url]) => url)
    expect(fetched.indexOf('https://example.com/recipe-sitemap.xml')).toBeLessThan(
      fetched.indexOf('https://example.com/page-sitemap.xml')
    )
  })

  it('terminates on self-referencing and cyclic indexes', async () => {
    const { discovery, fetch } = discoveryFor({
      'https://example.com/sitemap_index.xml': index(
        'https://example.com/sitemap_index.xml',
        'https://example.com/a.xml'
      ),
      'https://example.com/a.xml': index('https://example.com/b.xml'),
      'https://example.com/b.xml': index('https://example.com/a.xml', 'https://example.com/posts.xml'),
      'https://example.com/posts.xml': urlset(['https://example.com/soup']),
    })

    const urls = await collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 10 }))

    expect(urls).toEqual(['https://example.com/soup'])
    const fetched = fetch.mock.calls.map(([url]) => url)
    expect(new Set(fetched).size).toBe(fetched.length)
  })

  it('bounds the number of documents fetched', async () => {
    const children = Array.from({ length: 10 }, (_, i) => `https://example.com/s${i}.xml`)
    const pages: Record<string, string> = { 'https://example.com/sitemap_index.xml': index(...children) }
    for (const child of children) {
      pages[child] = urlset([`${child}/entry`])
    }
    const { discovery, fetch } = discoveryFor(pages, { maxDocuments: 4 })

    const urls = await collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 100 }))

    // robots.txt plus four sitemap documents: the index and its first three children
    expect(fetch).toHaveBeenCalledTimes(1 + 4)
    expect(urls).toHaveLength(3)
  })

  it('caps the yielded entries at scanDepth', async () => {
    const { discovery } = discoveryFor({
      'https://example.com/sitemap.xml': urlset(
        ['https://example.com/a', '2026-01-01'],
        ['https://example.com/b', '2026-01-03'],
        ['https://example.com/c', '2026-01-02']
      ),
    })

    const urls = await collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 2 }))

    expect(urls).toEqual(['https://example.com/b', 'https://example.com/c'])
  })

  it('throws DiscoveryError when no sitemap exists', async () => {
    const { discovery } = discoveryFor({})

    await expect(collect(discovery.discover({ url: 'https://example.com' }, { scanDepth: 10 }))).rejects.toBeInstanceOf(
      DiscoveryError
    )
  })
})
