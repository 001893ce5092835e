import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_SITES, loadSites, normalizeSites, parseSitesFile } from '../sites.js'
import { ConfigurationError } from '../errors.js'

describe('normalizeSites', () => {
  it('drops non-http items, trailing slashes and duplicates', () => {
    expect(
      normalizeSites(['https://a.example/', 'ftp://b.example', { url: 'https://a.example' }, { url: 'http://c.example', tags: ['baking'] }])
    ).toEqual([{ url: 'https://a.example' }, { url: 'http://c.example', tags: ['baking'] }])
  })
})

describe('parseSitesFile', () => {
  it('accepts a bare array or a sites object', () => {
    expect(parseSitesFile('["https://a.example"]', 'sites.json')).toEqual([{ url: 'https://a.example' }])
    expect(parseSitesFile('{"sites":[{"url":"https://b.example","tags":["thai"]}]}', 'sites.json')).toEqual([
      { url: 'https://b.example', tags: ['thai'] },
    ])
  })

  it('rejects invalid JSON and shapes', () => {
    expect(() => parseSitesFile('{', 'sites.json')).toThrow(ConfigurationError)
    expect(() => parseSitesFile('{"sites": 3}', 'sites.json')).toThrow(ConfigurationError)
  })
})

describe('loadSites', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dredger-sites-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('prefers an explicit file over everything else', async () => {
    await writeFile(join(dir, 'mine.json'), '["https://explicit.example"]')
    await writeFile(join(dir, 'sites.json'), '["https://local.example"]')

    const loaded = await loadSites({ sitesFile: 'mine.json', cwd: dir, envSites: ['https://env.example'] })

    expect(loaded).toEqual({ sites: [{ url: 'https://explicit.example' }], source: 'file' })
  })

  it('fails on a missing explicit file', async () => {
    await expect(loadSites({ sitesFile: 'nope.json', cwd: dir })).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('reads sites.json from the working directory before the environment', async () => {
    await writeFile(join(dir, 'sites.json'), '{"sites":["https://local.example"]}')

    expect(await loadSites({ cwd: dir, envSites: ['https://env.example'] })).toEqual({
      sites: [{ url: 'https://local.example' }],
      source: 'local',
    })
  })

  it('falls back to the environment, then the defaults', async () => {
    expect(await loadSites({ cwd: dir, envSites: ['https://env.example'] })).toEqual({
      sites: [{ url: 'https://env.example' }],
      source: 'env',
    })

    const defaults = await loadSites({ cwd: dir })
    expect(defaults.source).toBe('default')
    expect(defaults.sites).toHaveLength(DEFAULT_SITES.length)
  })
})
