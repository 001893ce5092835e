import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { InMemoryMemoryStore, JsonFileMemoryStore, storeKey } from '../memory-store.js'

const fixedNow = () => new Date('2026-02-01T12:00:00.000Z')

describe('storeKey', () => {
  it('canonicalizes URLs', () => {
    expect(storeKey('http://WWW.Example.com/soup/?utm_source=x#top')).toBe('https://www.example.com/soup')
  })

  it('keeps unparseable input verbatim', () => {
    expect(storeKey('  not a url ')).toBe('not a url')
  })
})

describe('InMemoryMemoryStore', () => {
  it('keeps a URL in at most one mapping', async () => {
    const store = new InMemoryMemoryStore(fixedNow)

    expect(await store.recordReject('https://example.com/a', 'filtered', 'keyword-travel')).toBe(true)
    expect(await store.recordImported('https://example.com/a', { simulated: true })).toBe(false)
    expect(await store.recordReject('https://example.com/a', 'not-a-recipe')).toBe(false)

    expect(store.isRejected('https://example.com/a/')).toBe(true)
    expect(store.isImported('https://example.com/a')).toBe(false)
    expect(store.getReject('https://example.com/a')).toEqual({
      url: 'https://example.com/a',
      reason: 'filtered',
      rejectedAt: '2026-02-01T12:00:00.000Z',
      detail: 'keyword-travel',
    })
  })

  it('counts records', async () => {
    const store = new InMemoryMemoryStore()
    await store.recordReject('https://example.com/a', 'filtered')
    await store.recordImported('https://example.com/b', { simulated: false, recipeId: 'soup', library: 'mealie' })

    expect(store.counts()).toEqual({ rejected: 1, imported: 1 })
  })
})

describe('JsonFileMemoryStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dredger-store-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('starts empty when files are missing', async () => {
    const store = new JsonFileMemoryStore({ dataDir: join(dir, 'nested') })
    await store.load()

    expect(store.counts()).toEqual({ rejected: 0, imported: 0 })
  })

  it('writes every record immediately and reloads it', async () => {
    const store = new JsonFileMemoryStore({ dataDir: dir, now: fixedNow })
    await store.load()
    await store.recordImported('https://example.com/soup', { simulated: false, recipeId: 'creamy-soup', library: 'mealie' })
    await store.recordReject('https://example.com/travel-to-rome', 'filtered', 'keyword-travel')

    const onDisk = JSON.parse(await readFile(join(dir, 'imported.json'), 'utf8'))
    expect(onDisk).toEqual({
      'https://example.com/soup': {
        url: 'https://example.com/soup',
        importedAt: '2026-02-01T12:00:00.000Z',
        simulated: false,
        recipeId: 'creamy-soup',
        library: 'mealie',
      },
    })

    const reloaded = new JsonFileMemoryStore({ dataDir: dir })
    await reloaded.load()
    expect(reloaded.isImported('https://example.com/soup')).toBe(true)
    expect(reloaded.getReject('https://example.com/travel-to-rome')?.reason).toBe('filtered')
    expect((await readdir(dir)).filter((f) => f.endsWith('.tmp'))).toEqual([])
  })

  it('serializes concurrent writes', async () => {
    const store = new JsonFileMemoryStore({ dataDir: dir })
    await store.load()

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => store.recordReject(`https://example.com/page-${i}`, 'not-a-recipe'))
    )
    await store.flush()

    const onDisk = JSON.parse(await readFile(join(dir, 'rejects.json'), 'utf8'))
    expect(Object.keys(onDisk)).toHaveLength(20)
  })

  it('starts empty on a corrupt file and moves it aside', async () => {
    await writeFile(join(dir, 'rejects.json'), '{ this is not json')
    await writeFile(join(dir, 'imported.json'), JSON.stringify({}))

    const store = new JsonFileMemoryStore({ dataDir: dir })
    await store.load()

    expect(store.counts()).toEqual({ rejected: 0, imported: 0 })
    const files = await readdir(dir)
    expect(files.some((f) => f.startsWith('rejects.json.corrupt-'))).toBe(true)
  })

  it('migrates legacy URL arrays', async () => {
    await writeFile(join(dir, 'rejects.json'), JSON.stringify(['http://example.com/old-listicle/']))
    await writeFile(join(dir, 'imported.json'), JSON.stringify(['https://example.com/soup?utm_medium=rss']))

    const store = new JsonFileMemoryStore({ dataDir: dir, now: fixedNow })
    await store.load()

    expect(store.getReject('https://example.com/old-listicle')).toEqual({
      url: 'https://example.com/old-listicle',
      reason: 'legacy',
      rejectedAt: '2026-02-01T12:00:00.000Z',
    })
    expect(store.getImported('https://example.com/soup')).toEqual({
      url: 'https://example.com/soup',
      importedAt: '2026-02-01T12:00:00.000Z',
      simulated: false,
    })
  })

  it('drops reject entries for URLs that were also imported', async () => {
    await writeFile(
      join(dir, 'rejects.json'),
      JSON.stringify({
        'https://example.com/soup': { url: 'https://example.com/soup', reason: 'fetch-failed', rejectedAt: '2026-01-01T00:00:00.000Z' },
      })
    )
    await writeFile(join(dir, 'imported.json'), JSON.stringify(['https://example.com/soup']))

    const store = new JsonFileMemoryStore({ dataDir: dir })
    await store.load()

    expect(store.isImported('https://example.com/soup')).toBe(true)
    expect(store.isRejected('https://example.com/soup')).toBe(false)
  })
})
