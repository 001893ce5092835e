/**
 * Site List
 *
 * Resolution order:
 * 1. --sites <file>      (missing or unreadable file is a ConfigurationError)
 * 2. ./sites.json        (ignored when absent)
 * 3. SITES env var       (comma-separated URLs)
 * 4. DEFAULT_SITES
 *
 * Files hold an array or { "sites": [...] }; items are URL strings or { "url", "tags" }.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { ConfigurationError } from './errors.js'
import type { SiteSource } from './types.js'

const log = loggers.cli

export const LOCAL_SITES_FILE = 'sites.json'

export const DEFAULT_SITES: readonly SiteSource[] = [
  { url: 'https://www.seriouseats.com' },
  { url: 'https://www.bonappetit.com' },
  { url: 'https://www.recipetineats.com' },
  { url: 'https://smittenkitchen.com' },
  { url: 'https://minimalistbaker.com' },
  { url: 'https://www.justonecookbook.com', tags: ['japanese'] },
  { url: 'https://thewoksoflife.com', tags: ['chinese'] },
  { url: 'https://sallysbakingaddiction.com', tags: ['baking'] },
  { url: 'https://www.skinnytaste.com' },
  { url: 'https://www.budgetbytes.com' },
]

const siteItemSchema = z.union([
  z.string(),
  z.object({
    url: z.string(),
    tags: z.array(z.string()).optional(),
  }),
])

const sitesFileSchema = z.union([z.array(siteItemSchema), z.object({ sites: z.array(siteItemSchema) })])

export type SitesSource = 'file' | 'local' | 'env' | 'default'

export interface LoadSitesOptions {
  /** Explicit --sites path */
  sitesFile?: string
  /** Parsed SITES env var */
  envSites?: string[]
  /** Directory searched for sites.json (default: process.cwd()) */
  cwd?: string
}

export interface LoadedSites {
  sites: SiteSource[]
  source: SitesSource
}

/**
 * Normalize raw items: trim, drop non-http entries and duplicates.
 */
export function normalizeSites(items: Array<string | SiteSource>): SiteSource[] {
  const seen = new Set<string>()
  const sites: SiteSource[] = []

  for (const item of items) {
    const site = typeof item === 'string' ? { url: item } : item
    const url = site.url.trim().replace(/\/+$/, '')

    if (!/^https?:\/\//i.test(url)) {
      log.warn('Ignoring site without an http(s) URL', { site: site.url })
      continue
    }
    if (seen.has(url)) continue
    seen.add(url)

    sites.push(site.tags && site.tags.length > 0 ? { url, tags: site.tags } : { url })
  }

  return sites
}

/**
 * Parse the contents of a sites file.
 *
 * @throws ConfigurationError if the JSON or its shape is invalid
 */
export function parseSitesFile(text: string, file: string): SiteSource[] {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Sites file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }

  const parsed = sitesFileSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Sites file ${file} has an invalid shape`, issues)
  }

  return normalizeSites(Array.isArray(parsed.data) ? parsed.data : parsed.data.sites)
}

export async function loadSites(options: LoadSitesOptions = {}): Promise<LoadedSites> {
  if (options.sitesFile) {
    const file = resolve(options.cwd ?? process.cwd(), options.sitesFile)
    let text: string
    try {
      text = await readFile(file, 'utf8')
    } catch (error) {
      throw new ConfigurationError(`Cannot read sites file ${file}: ${error instanceof Error ? error.message : String(error)}`)
    }
    return { sites: parseSitesFile(text, file), source: 'file' }
  }

  const localFile = resolve(options.cwd ?? process.cwd(), LOCAL_SITES_FILE)
  const localText = await readOptional(localFile)
  if (localText !== null) {
    return { sites: parseSitesFile(localText, localFile), source: 'local' }
  }

  if (options.envSites && options.envSites.length > 0) {
    return { sites: normalizeSites(options.envSites), source: 'env' }
  }

  return { sites: [...DEFAULT_SITES], source: 'default' }
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await readFile(file, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null
    }
    throw new ConfigurationError(`Cannot read sites file ${file}: ${error instanceof Error ? error.message : String(error)}`)
  }
}
