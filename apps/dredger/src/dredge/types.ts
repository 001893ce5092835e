/**
 * Dredge Pipeline Core Types
 *
 * Shared contracts between discovery, filtering, fetching, verification, the memory
 * store and the orchestrator.
 */

import type { FetchError } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Sites and Sitemap Entries
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A curated blog to scan. Immutable once loaded.
 */
export interface SiteSource {
  /** Base URL (scheme + host, optional path prefix) */
  url: string

  /** Optional cuisine/category labels, carried into log context only */
  tags?: string[]
}

/**
 * One <url> from a leaf sitemap.
 */
export interface SitemapEntry {
  url: string

  /** Parsed <lastmod>; absent or unparseable dates sort as oldest */
  lastModified?: Date
}

/**
 * A sitemap entry that survived quick filtering, with its provenance.
 */
export interface CandidateUrl extends SitemapEntry {
  canonicalUrl: string
  site: SiteSource
}

// ═══════════════════════════════════════════════════════════════════════════════
// Persistent Records
// ═══════════════════════════════════════════════════════════════════════════════

export const REJECT_REASONS = [
  'filtered',
  'not-a-recipe',
  'verify-error',
  'fetch-failed',
  'import-failed',
  'robots-disallowed',
  'legacy',
] as const

/**
 * Why a URL was permanently set aside.
 * - legacy: migrated from a store written before reasons were tracked
 */
export type RejectReason = (typeof REJECT_REASONS)[number]

export interface RejectRecord {
  url: string
  reason: RejectReason
  /** ISO 8601 */
  rejectedAt: string
  /** Matched rule id, HTTP status or error message */
  detail?: string
}

export interface ImportedRecord {
  url: string
  /** ISO 8601 */
  importedAt: string
  /** Identifier returned by the recipe library (slug or numeric id) */
  recipeId?: string
  /** True when written by a dry run without calling the library */
  simulated: boolean
  /** Library that accepted the import */
  library?: string
}

export interface ImportedRecordInput {
  recipeId?: string
  simulated: boolean
  library?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetching (Resilient Fetcher)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What is being fetched. Drives Accept headers and log context.
 */
export type FetchKind = 'page' | 'sitemap' | 'robots'

export interface FetchOptions {
  kind: FetchKind

  /** Cooperative cancellation; an aborted signal is never retried */
  signal?: AbortSignal
}

export type FetchOutcome =
  | { ok: true; body: string; statusCode: number; attempts: number; durationMs: number }
  | { ok: false; error: FetchError }

/**
 * Fetcher interface. Implementations own retry, backoff and politeness.
 */
export interface Fetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchOutcome>
}

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Politeness
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-host politeness scheduler.
 *
 * DOMAIN DEFINITION: slots are keyed by registrable domain (eTLD+1), so
 * www.example.com and example.com share one interval.
 */
export interface RateLimiter {
  /**
   * Wait until the URL's domain may be requested again, then claim the slot.
   */
  acquire(url: string, signal?: AbortSignal): Promise<void>

  /**
   * Raise the minimum interval for a domain (e.g. from robots.txt Crawl-delay).
   */
  setMinDelay(domain: string, minDelayMs: number): void

  getMinDelay(domain: string): number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Robots
// ═══════════════════════════════════════════════════════════════════════════════

export interface RobotsRules {
  /** Absolute sitemap URLs declared with Sitemap: */
  sitemaps: string[]
  /** Disallow prefixes for User-agent: * */
  globalDisallowed: string[]
  /** Disallow prefixes for our own agent token */
  agentDisallowed: string[]
  /** Crawl-delay in seconds (null if not specified) */
  crawlDelay: number | null
  /** Whether robots.txt was retrieved (404 counts as retrieved and empty) */
  fetchSucceeded: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Verification
// ═══════════════════════════════════════════════════════════════════════════════

export interface VerificationResult {
  isRecipe: boolean
  /** Which signal decided: 'json-ld', 'microdata', 'plugin:<id>', 'listicle-title', 'language-mismatch', or null */
  signalFound: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestration
// ═══════════════════════════════════════════════════════════════════════════════

export type SiteScanPhase =
  | 'scanning'
  | 'filtering'
  | 'fetching'
  | 'verifying'
  | 'deduping'
  | 'importing'
  | 'done'
  | 'skipped'
  | 'cancelled'

export type SiteOutcome = Extract<SiteScanPhase, 'done' | 'skipped' | 'cancelled'>

export type RejectCounts = Record<RejectReason, number>

export function emptyRejectCounts(): RejectCounts {
  return {
    filtered: 0,
    'not-a-recipe': 0,
    'verify-error': 0,
    'fetch-failed': 0,
    'import-failed': 0,
    'robots-disallowed': 0,
    legacy: 0,
  }
}

/**
 * Per-site, per-run counters. Owned by the orchestrator for one site scan.
 */
export interface ScanState {
  /** Verified recipes that were new to the library and memory */
  found: number
  /** Sitemap entries pulled from discovery */
  examined: number
  imported: number
  rejected: RejectCounts
  /** Entries skipped because the library or the store already knew them */
  alreadyKnown: number
  /** Entries skipped after transient fetch failures (retried on a later run) */
  deferred: number
  /** importFromUrl calls made */
  libraryCalls: number
}

export interface SiteReport extends ScanState {
  site: string
  outcome: SiteOutcome
  /** Set when the site was skipped */
  skipReason?: string
  durationMs: number
}

export interface RunReport {
  dryRun: boolean
  sitesScanned: number
  sitesSkipped: number
  examined: number
  found: number
  imported: number
  rejected: RejectCounts
  deferred: number
  libraryCalls: number
  cancelled: boolean
  durationMs: number
  sites: SiteReport[]
}

export interface ScanLimits {
  /** Stop once this many new recipes were found on a site */
  targetRecipesPerSite: number
  /** Stop once this many sitemap entries were examined on a site */
  scanDepth: number
}
