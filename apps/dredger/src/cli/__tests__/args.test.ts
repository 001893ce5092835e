import { describe, it, expect } from 'vitest'
import { parseArgs } from '../args.js'

describe('parseArgs', () => {
  it('defaults to a run with no overrides', () => {
    expect(parseArgs([])).toEqual({ command: 'run', options: { overrides: {}, sitesFile: null } })
  })

  it('collects overrides and the sites file', () => {
    expect(parseArgs(['--live', '--limit', '5', '--depth', '200', '--concurrency', '2', '--sites', 'my-sites.json'])).toEqual({
      command: 'run',
      options: {
        overrides: { dryRun: false, targetRecipesPerSite: 5, scanDepth: 200, siteConcurrency: 2 },
        sitesFile: 'my-sites.json',
      },
    })
  })

  it('lets the last mode flag win', () => {
    const parsed = parseArgs(['--live', '--dry-run'])
    expect(parsed.command === 'run' && parsed.options.overrides.dryRun).toBe(true)
  })

  it('rejects bad numbers and unknown flags', () => {
    expect(parseArgs(['--limit', 'ten'])).toEqual({ command: 'error', message: '--limit needs a positive integer, got ten' })
    expect(parseArgs(['--depth'])).toEqual({ command: 'error', message: '--depth needs a positive integer, got nothing' })
    expect(parseArgs(['--sites'])).toEqual({ command: 'error', message: '--sites needs a file path' })
    expect(parseArgs(['--fast'])).toEqual({ command: 'error', message: 'Unknown argument: --fast' })
  })

  it('caps --concurrency like SITE_CONCURRENCY', () => {
    expect(parseArgs(['--concurrency', '16'])).toEqual({
      command: 'run',
      options: { overrides: { siteConcurrency: 16 }, sitesFile: null },
    })
    expect(parseArgs(['--concurrency', '17'])).toEqual({ command: 'error', message: '--concurrency must be at most 16, got 17' })
  })

  it('recognizes help and version', () => {
    expect(parseArgs(['-h'])).toEqual({ command: 'help' })
    expect(parseArgs(['--limit', '3', '--version'])).toEqual({ command: 'version' })
  })
})
