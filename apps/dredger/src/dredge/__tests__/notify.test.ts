import { describe, it, expect, vi, afterEach } from 'vitest'
import { formatRunSummary, sendRunSummary } from '../notify.js'
import { emptyRejectCounts, type RunReport } from '../types.js'

const report: RunReport = {
  dryRun: false,
  sitesScanned: 2,
  sitesSkipped: 1,
  examined: 40,
  found: 5,
  imported: 4,
  rejected: { ...emptyRejectCounts(), filtered: 30, 'not-a-recipe': 4, 'import-failed': 1 },
  deferred: 1,
  libraryCalls: 5,
  cancelled: false,
  durationMs: 1000,
  sites: [],
}

describe('formatRunSummary', () => {
  it('lists the run totals', () => {
    expect(formatRunSummary(report)).toBe(
      [
        'Recipe Dredger live finished',
        'Sites: 2 scanned, 1 skipped',
        'Examined: 40',
        'Recipes found: 5, imported: 4',
        'Rejected: 35',
        'Deferred (transient errors): 1',
      ].join('\n')
    )
  })
})

describe('sendRunSummary', () => {
  const originalFetch = globalThis.fetch

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('posts content and text to the webhook', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response(null, { status: 204 }))
    globalThis.fetch = fetchSpy

    expect(await sendRunSummary('https://hooks.example/test', report)).toEqual({ success: true })

    const [url, init] = fetchSpy.mock.calls[0] ?? []
    expect(url).toBe('https://hooks.example/test')
    const body = JSON.parse(String(init?.body))
    expect(body.content).toBe(formatRunSummary(report))
    expect(body.text).toBe(body.content)
  })

  it('reports failures without throwing', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'))

    expect(await sendRunSummary('https://hooks.example/test', report)).toEqual({ success: false, error: 'fetch failed' })
  })

  it('reports rejected posts', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('nope', { status: 400 }))

    expect(await sendRunSummary('https://hooks.example/test', report)).toEqual({ success: false, error: 'HTTP 400' })
  })

  it('skips when no webhook is configured', async () => {
    const fetchSpy = vi.fn()
    globalThis.fetch = fetchSpy

    expect((await sendRunSummary('', report)).success).toBe(false)
    expect(fetchSpy).not.toHaveBeenCalled()
  })
})
