/**
 * Command-line arguments
 */

import { MAX_SITE_CONCURRENCY, type SettingsOverrides } from '../config/settings.js'

export interface CliOptions {
  overrides: SettingsOverrides
  sitesFile: string | null
}

export type ParsedArgs =
  | { command: 'run'; options: CliOptions }
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'error'; message: string }

export const USAGE = `Usage: dredger [options]

Scans recipe blog sitemaps, verifies recipe pages and imports them into Mealie or Tandoor.

Options:
  --dry-run            Verify only, never call the library (default unless DRY_RUN=false)
  --live               Import into the configured libraries
  --limit <n>          Recipes to find per site (TARGET_RECIPES_PER_SITE)
  --depth <n>          Sitemap entries to examine per site (SCAN_DEPTH)
  --sites <file>       JSON file with the sites to scan
  --concurrency <n>    Sites scanned at once, up to ${MAX_SITE_CONCURRENCY} (SITE_CONCURRENCY)
  --version            Print the version
  -h, --help           Show this help
`

function positiveInt(flag: string, value: string | undefined, max = Number.MAX_SAFE_INTEGER): number | string {
  const n = Number(value)
  if (value === undefined || !Number.isInteger(n) || n < 1) {
    return `${flag} needs a positive integer, got ${value ?? 'nothing'}`
  }
  if (n > max) {
    return `${flag} must be at most ${max}, got ${n}`
  }
  return n
}

export function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { overrides: {}, sitesFile: null }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '--dry-run':
        options.overrides.dryRun = true
        break
      case '--live':
        options.overrides.dryRun = false
        break
      case '--limit': {
        const n = positiveInt(arg, argv[++i])
        if (typeof n === 'string') return { command: 'error', message: n }
        options.overrides.targetRecipesPerSite = n
        break
      }
      case '--depth': {
        const n = positiveInt(arg, argv[++i])
        if (typeof n === 'string') return { command: 'error', message: n }
        options.overrides.scanDepth = n
        break
      }
      case '--concurrency': {
        const n = positiveInt(arg, argv[++i], MAX_SITE_CONCURRENCY)
        if (typeof n === 'string') return { command: 'error', message: n }
        options.overrides.siteConcurrency = n
        break
      }
      case '--sites': {
        const file = argv[++i]
        if (!file) return { command: 'error', message: '--sites needs a file path' }
        options.sitesFile = file
        break
      }
      case '--version':
        return { command: 'version' }
      case '--help':
      case '-h':
        return { command: 'help' }
      default:
        return { command: 'error', message: `Unknown argument: ${arg}` }
    }
  }

  return { command: 'run', options }
}
