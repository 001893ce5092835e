/**
 * Import Orchestrator
 *
 * Runs one site scan: pulls sitemap entries newest first and pushes each through
 * dedupe → filter → robots → fetch → verify → import, recording every outcome in the
 * memory store. Owns the per-site ScanState and discards it when the scan ends.
 *
 * Bounds: at most scanDepth entries examined, at most targetRecipesPerSite recipes found.
 * Nothing per-URL is fatal; only cancellation ends a scan early.
 */

import type { ILogger } from '@dredger/logger'
import { loggers } from '../config/logger.js'
import type { DiscoverOptions } from './discovery/sitemap.js'
import { ConfigurationError, DiscoveryError, VerificationError, formatErrorForLog } from './errors.js'
import type { FilterMatch } from './filter/candidate-filter.js'
import type { RecipeLibrary } from './library/types.js'
import { recordSiteCompleted, recordSiteSkipped } from './metrics.js'
import type { MemoryStore } from './store/memory-store.js'
import { storeKey } from './store/memory-store.js'
import {
  emptyRejectCounts,
  type Fetcher,
  type RateLimiter,
  type RejectReason,
  type ScanLimits,
  type ScanState,
  type SiteReport,
  type SiteScanPhase,
  type SiteSource,
  type SitemapEntry,
  type VerificationResult,
} from './types.js'
import { getRegistrableDomain } from './utils/url.js'

export interface SiteDiscovery {
  discover(site: SiteSource, options: DiscoverOptions): AsyncIterable<SitemapEntry>
}

export interface UrlFilter {
  match(url: string): FilterMatch | null
}

export interface PageVerifier {
  /** @throws VerificationError */
  verify(body: string): VerificationResult
}

export interface RobotsPolicy {
  isAllowed(url: string, signal?: AbortSignal): Promise<boolean>
  getCrawlDelayMs(url: string, signal?: AbortSignal): Promise<number | null>
}

export interface OrchestratorDeps {
  store: MemoryStore
  discovery: SiteDiscovery
  filter: UrlFilter
  fetcher: Fetcher
  verifier: PageVerifier
  /** Required for live runs; never called on dry runs */
  library: RecipeLibrary | null
  /** Set when robots.txt Disallow and Crawl-delay are honored */
  robots?: RobotsPolicy | null
  /** Receives robots.txt Crawl-delay */
  rateLimiter?: RateLimiter
}

export interface OrchestratorOptions {
  dryRun: boolean
  limits: ScanLimits
}

/** Mutable bookkeeping for one site scan */
interface SiteScan {
  site: SiteSource
  state: ScanState
  phase: SiteScanPhase
  log: ILogger
  signal?: AbortSignal
}

export class ImportOrchestrator {
  private readonly deps: OrchestratorDeps
  private readonly options: OrchestratorOptions

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    if (!options.dryRun && !deps.library) {
      throw new ConfigurationError('A live run needs at least one enabled recipe library')
    }
    this.deps = deps
    this.options = options
  }

  get dryRun(): boolean {
    return this.options.dryRun
  }

  /**
   * Scan one site until its quota or depth is reached, its sitemap runs out, or the signal aborts.
   *
   * @param existingLibraryUrls canonical URLs already in the library (empty on dry runs)
   */
  async runSite(site: SiteSource, existingLibraryUrls: ReadonlySet<string>, signal?: AbortSignal): Promise<SiteReport> {
    const startTime = Date.now()
    const scan: SiteScan = {
      site,
      state: {
        found: 0,
        examined: 0,
        imported: 0,
        rejected: emptyRejectCounts(),
        alreadyKnown: 0,
        deferred: 0,
        libraryCalls: 0,
      },
      phase: 'scanning',
      log: loggers.orchestrator.child(site.tags ? { site: site.url, tags: site.tags } : { site: site.url }),
      signal,
    }
    const { targetRecipesPerSite, scanDepth } = this.options.limits

    scan.log.info('Site scan started', { dryRun: this.options.dryRun, targetRecipesPerSite, scanDepth })

    try {
      await this.applyCrawlDelay(scan)

      for await (const entry of this.deps.discovery.discover(site, { scanDepth, signal })) {
        if (signal?.aborted) break
        if (scan.state.found >= targetRecipesPerSite) break
        if (scan.state.examined >= scanDepth) break

        scan.state.examined += 1
        const stop = await this.processEntry(scan, entry, existingLibraryUrls)
        if (stop) break
      }
    } catch (error) {
      if (!(error instanceof DiscoveryError)) throw error

      scan.phase = 'skipped'
      recordSiteSkipped({ site: site.url, reason: error.message })
      return this.report(scan, startTime, error.message)
    }

    scan.phase = signal?.aborted ? 'cancelled' : 'done'
    const report = this.report(scan, startTime)
    recordSiteCompleted(report)
    return report
  }

  /**
   * One sitemap entry. Returns true when the scan must stop (cancellation).
   */
  private async processEntry(
    scan: SiteScan,
    entry: SitemapEntry,
    existingLibraryUrls: ReadonlySet<string>
  ): Promise<boolean> {
    const { store, filter, fetcher, verifier, robots } = this.deps
    const { state, signal } = scan
    const url = entry.url
    const key = storeKey(url)

    this.enter(scan, 'deduping', url)
    if (existingLibraryUrls.has(key) || store.isImported(key) || store.isRejected(key)) {
      state.alreadyKnown += 1
      return false
    }

    this.enter(scan, 'filtering', url)
    const match = filter.match(url)
    if (match) {
      await this.reject(scan, url, 'filtered', match.ruleId)
      return false
    }

    if (robots && !(await robots.isAllowed(url, signal))) {
      await this.reject(scan, url, 'robots-disallowed')
      return false
    }

    this.enter(scan, 'fetching', url)
    const outcome = await fetcher.fetch(url, { kind: 'page', signal })
    if (!outcome.ok) {
      switch (outcome.error.kind) {
        case 'cancelled':
          return true
        case 'transient':
          // Left unrecorded so a later run tries again
          state.deferred += 1
          scan.log.debug('Deferred after transient failure', { url, attempts: outcome.error.attempts })
          return false
        case 'permanent':
          await this.reject(scan, url, 'fetch-failed', outcome.error.message)
          return false
      }
    }

    this.enter(scan, 'verifying', url)
    let verdict: VerificationResult
    try {
      verdict = verifier.verify(outcome.body)
    } catch (error) {
      const message = error instanceof VerificationError ? error.message : String(error)
      await this.reject(scan, url, 'verify-error', message)
      return false
    }

    if (!verdict.isRecipe) {
      await this.reject(scan, url, 'not-a-recipe', verdict.signalFound ?? undefined)
      return false
    }

    state.found += 1
    this.enter(scan, 'importing', url)

    if (this.options.dryRun || !this.deps.library) {
      await store.recordImported(url, { simulated: true })
      state.imported += 1
      scan.log.info('Would import recipe (dry run)', { url, signal: verdict.signalFound })
      return false
    }

    state.libraryCalls += 1
    try {
      const receipt = await this.deps.library.importFromUrl(url, signal)
      await store.recordImported(url, { simulated: false, recipeId: receipt.recipeId, library: receipt.library })
      state.imported += 1
      scan.log.info('Imported recipe', { url, library: receipt.library, recipeId: receipt.recipeId })
    } catch (error) {
      if (signal?.aborted) {
        // Interrupted mid-import: leave the URL unrecorded so the next run retries it
        scan.log.debug('Import cancelled', { url })
        return true
      }
      const message = error instanceof Error ? error.message : String(error)
      await this.reject(scan, url, 'import-failed', message)
      scan.log.warn('Import failed', { url, ...formatErrorForLog(error) })
    }

    return false
  }

  private async applyCrawlDelay(scan: SiteScan): Promise<void> {
    const { robots, rateLimiter } = this.deps
    if (!robots || !rateLimiter) return

    const delayMs = await robots.getCrawlDelayMs(scan.site.url, scan.signal)
    if (delayMs !== null) {
      const domain = getRegistrableDomain(scan.site.url)
      rateLimiter.setMinDelay(domain, delayMs)
      scan.log.debug('Applied robots.txt crawl delay', { domain, delayMs: rateLimiter.getMinDelay(domain) })
    }
  }

  private async reject(scan: SiteScan, url: string, reason: RejectReason, detail?: string): Promise<void> {
    if (await this.deps.store.recordReject(url, reason, detail)) {
      scan.state.rejected[reason] += 1
    }
    scan.log.debug('Rejected', { url, reason, detail })
  }

  private enter(scan: SiteScan, phase: SiteScanPhase, url: string): void {
    scan.phase = phase
    scan.log.debug('Phase', { phase, url })
  }

  private report(scan: SiteScan, startTime: number, skipReason?: string): SiteReport {
    const outcome = scan.phase === 'skipped' ? 'skipped' : scan.phase === 'cancelled' ? 'cancelled' : 'done'
    return {
      site: scan.site.url,
      outcome,
      ...(skipReason ? { skipReason } : {}),
      ...scan.state,
      rejected: { ...scan.state.rejected },
      durationMs: Date.now() - startTime,
    }
  }
}
