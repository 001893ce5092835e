/**
 * Dredger Settings
 *
 * Reads process.env (after env.ts has loaded .env files) into a typed, validated object.
 * CLI flags are layered on top by the caller with applyOverrides().
 */

import { z } from 'zod'
import { ConfigurationError } from '../dredge/errors.js'

export const VERSION = '1.0.0'

/** Defaults shipped in .env.example; a credential still equal to one was never configured. */
export const PLACEHOLDER_MEALIE_TOKEN = 'your-token'
export const PLACEHOLDER_TANDOOR_KEY = 'your-key'

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback
      const normalized = value.trim().toLowerCase()
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true
      if (['false', '0', 'no', 'off'].includes(normalized)) return false
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` })
      return z.NEVER
    })

const baseUrl = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : fallback))
    .pipe(z.string().url())
    .transform((value) => value.replace(/\/+$/, ''))

/** Sites scanned at once, at most */
export const MAX_SITE_CONCURRENCY = 16

const envSchema = z.object({
  DRY_RUN: booleanFlag(true),
  TARGET_RECIPES_PER_SITE: z.coerce.number().int().min(1).default(50),
  SCAN_DEPTH: z.coerce.number().int().min(1).default(1000),
  CRAWL_DELAY: z.coerce.number().min(0).default(2),
  CRAWL_JITTER: z.coerce.number().min(0).max(1).default(0.5),
  RESPECT_ROBOTS_TXT: booleanFlag(true),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  DATA_DIR: z.string().min(1).default('data'),
  SITE_CONCURRENCY: z.coerce.number().int().min(1).max(MAX_SITE_CONCURRENCY).default(1),
  SYNC_LIBRARY: booleanFlag(true),
  LANGUAGE_FILTER: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() ?? '')
    .pipe(z.union([z.literal(''), z.string().regex(/^[a-z]{2,3}$/, 'expected an ISO 639-1 or 639-3 code')])),
  NOTIFICATION_WEBHOOK_URL: z
    .string()
    .optional()
    .transform((value) => value?.trim() ?? '')
    .pipe(z.union([z.literal(''), z.string().url()])),
  SITES: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((site) => site.trim())
        .filter(Boolean)
    ),
  MEALIE_ENABLED: booleanFlag(true),
  MEALIE_URL: baseUrl('http://localhost:9000'),
  MEALIE_API_TOKEN: z.string().default(PLACEHOLDER_MEALIE_TOKEN),
  TANDOOR_ENABLED: booleanFlag(false),
  TANDOOR_URL: baseUrl('http://localhost:8080'),
  TANDOOR_API_KEY: z.string().default(PLACEHOLDER_TANDOOR_KEY),
})

export interface LibrarySettings {
  enabled: boolean
  url: string
  credential: string
}

export interface Settings {
  dryRun: boolean
  targetRecipesPerSite: number
  scanDepth: number
  /** Seconds between requests to one host */
  crawlDelay: number
  /** Fraction of crawlDelay added at random, upward only */
  crawlJitter: number
  respectRobotsTxt: boolean
  fetchTimeoutMs: number
  fetchMaxAttempts: number
  dataDir: string
  siteConcurrency: number
  syncLibrary: boolean
  /** ISO 639 code recipes must be written in; empty allows every language */
  languageFilter: string
  notificationWebhookUrl: string
  sites: string[]
  mealie: LibrarySettings
  tandoor: LibrarySettings
}

/**
 * Parse settings from an environment map.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues)
  }

  const e = result.data
  return {
    dryRun: e.DRY_RUN,
    targetRecipesPerSite: e.TARGET_RECIPES_PER_SITE,
    scanDepth: e.SCAN_DEPTH,
    crawlDelay: e.CRAWL_DELAY,
    crawlJitter: e.CRAWL_JITTER,
    respectRobotsTxt: e.RESPECT_ROBOTS_TXT,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    fetchMaxAttempts: e.FETCH_MAX_ATTEMPTS,
    dataDir: e.DATA_DIR,
    siteConcurrency: e.SITE_CONCURRENCY,
    syncLibrary: e.SYNC_LIBRARY,
    languageFilter: e.LANGUAGE_FILTER,
    notificationWebhookUrl: e.NOTIFICATION_WEBHOOK_URL,
    sites: e.SITES,
    mealie: { enabled: e.MEALIE_ENABLED, url: e.MEALIE_URL, credential: e.MEALIE_API_TOKEN },
    tandoor: { enabled: e.TANDOOR_ENABLED, url: e.TANDOOR_URL, credential: e.TANDOOR_API_KEY },
  }
}

export type SettingsOverrides = Partial<
  Pick<Settings, 'dryRun' | 'targetRecipesPerSite' | 'scanDepth' | 'siteConcurrency'>
>

export function applyOverrides(settings: Settings, overrides: SettingsOverrides): Settings {
  return {
    ...settings,
    dryRun: overrides.dryRun ?? settings.dryRun,
    targetRecipesPerSite: overrides.targetRecipesPerSite ?? settings.targetRecipesPerSite,
    scanDepth: overrides.scanDepth ?? settings.scanDepth,
    siteConcurrency: overrides.siteConcurrency ?? settings.siteConcurrency,
  }
}

/**
 * Misconfigurations that are worth a warning but do not stop a run.
 */
export function validateSettings(settings: Settings): string[] {
  const warnings: string[] = []

  if (!settings.mealie.enabled && !settings.tandoor.enabled && !settings.dryRun) {
    warnings.push('Both Mealie and Tandoor are disabled. Nothing will be imported')
  }

  if (settings.mealie.enabled && !isLibraryConfigured(settings.mealie, PLACEHOLDER_MEALIE_TOKEN)) {
    warnings.push('MEALIE_API_TOKEN not configured (still set to default)')
  }

  if (settings.tandoor.enabled && !isLibraryConfigured(settings.tandoor, PLACEHOLDER_TANDOOR_KEY)) {
    warnings.push('TANDOOR_API_KEY not configured (still set to default)')
  }

  return warnings
}

/**
 * Whether a library is enabled and carries a real credential.
 */
export function isLibraryConfigured(library: LibrarySettings, placeholder: string): boolean {
  return library.enabled && library.credential !== '' && library.credential !== placeholder
}
