/**
 * Dredge Run
 *
 * Wires the pipeline from Settings and drives one run across every site:
 * - store load before the first site
 * - bounded parallelism across sites (each site is scanned by one worker)
 * - library sync before a live run
 * - cooperative cancellation between sites
 * - store flush on every exit path
 */

import type { Settings } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { SitemapDiscovery } from './discovery/sitemap.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { HostRateLimiter } from './fetch/rate-limiter.js'
import { RobotsReader } from './fetch/robots.js'
import { CandidateFilter } from './filter/candidate-filter.js'
import { createLibrary } from './library/index.js'
import type { RecipeLibrary } from './library/types.js'
import { recordRunCompleted } from './metrics.js'
import { ImportOrchestrator } from './orchestrator.js'
import { JsonFileMemoryStore, type MemoryStore } from './store/memory-store.js'
import { DEFAULT_RETRY_POLICY, REJECT_REASONS, emptyRejectCounts, type RunReport, type SiteReport, type SiteSource } from './types.js'
import { RecipeVerifier, loadSignatures } from './verify/recipe-verifier.js'

const log = loggers.orchestrator

export interface Dredge {
  orchestrator: ImportOrchestrator
  store: MemoryStore
  library: RecipeLibrary | null
}

export interface RunOptions {
  sites: SiteSource[]
  /** Sites scanned at once (default: 1, list order) */
  siteConcurrency?: number
  /** Pull existing library URLs before a live run (default: true) */
  syncLibrary?: boolean
  signal?: AbortSignal
}

/**
 * Build the production pipeline. The store is loaded by runDredge.
 *
 * @throws ConfigurationError for a live run with no library enabled
 */
export function createDredge(settings: Settings): Dredge {
  const library = createLibrary(settings)

  const rateLimiter = new HostRateLimiter({
    minDelayMs: settings.crawlDelay * 1000,
    jitter: settings.crawlJitter,
  })
  const fetcher = new HttpFetcher({
    rateLimiter,
    timeoutMs: settings.fetchTimeoutMs,
    retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: settings.fetchMaxAttempts },
  })
  const robots = new RobotsReader(fetcher)
  const store = new JsonFileMemoryStore({ dataDir: settings.dataDir })

  const orchestrator = new ImportOrchestrator(
    {
      store,
      discovery: new SitemapDiscovery(fetcher, robots),
      filter: new CandidateFilter(),
      fetcher,
      verifier: new RecipeVerifier(loadSignatures(), { language: settings.languageFilter }),
      library,
      robots: settings.respectRobotsTxt ? robots : null,
      rateLimiter,
    },
    {
      dryRun: settings.dryRun,
      limits: { targetRecipesPerSite: settings.targetRecipesPerSite, scanDepth: settings.scanDepth },
    }
  )

  return { orchestrator, store, library }
}

/**
 * Scan every site and aggregate the reports. Resolves with a partial report when cancelled.
 */
export async function runDredge(dredge: Dredge, options: RunOptions): Promise<RunReport> {
  const { orchestrator, store, library } = dredge
  const { sites, signal } = options
  const startTime = Date.now()
  const concurrency = Math.max(1, Math.min(options.siteConcurrency ?? 1, sites.length || 1))

  log.info('Run started', { dryRun: orchestrator.dryRun, sites: sites.length, concurrency })

  await store.load()

  try {
    const existing = await syncExistingUrls(orchestrator.dryRun, library, options.syncLibrary ?? true, signal)

    const reports: Array<SiteReport | undefined> = new Array(sites.length)
    let next = 0

    // Workers pull the next site in list order; results keep list order
    const worker = async (): Promise<void> => {
      while (next < sites.length && !signal?.aborted) {
        const index = next++
        const site = sites[index]
        if (!site) continue
        reports[index] = await orchestrator.runSite(site, existing, signal)
      }
    }

    // Every worker finishes its site before an unexpected failure ends the run
    const settled = await Promise.allSettled(Array.from({ length: concurrency }, () => worker()))
    const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected')
    if (failure) throw failure.reason

    const report = aggregate(
      reports.filter((r): r is SiteReport => r !== undefined),
      orchestrator.dryRun,
      signal?.aborted ?? false,
      Date.now() - startTime
    )
    recordRunCompleted(report)
    return report
  } finally {
    await store.flush()
  }
}

async function syncExistingUrls(
  dryRun: boolean,
  library: RecipeLibrary | null,
  syncLibrary: boolean,
  signal?: AbortSignal
): Promise<Set<string>> {
  if (dryRun || !library || !syncLibrary) {
    return new Set()
  }

  const urls = await library.listExistingRecipeUrls(signal)
  log.info('Library sync complete', { library: library.name, existing: urls.size })
  return urls
}

export function aggregate(sites: SiteReport[], dryRun: boolean, cancelled: boolean, durationMs: number): RunReport {
  const rejected = emptyRejectCounts()
  const report: RunReport = {
    dryRun,
    sitesScanned: 0,
    sitesSkipped: 0,
    examined: 0,
    found: 0,
    imported: 0,
    rejected,
    deferred: 0,
    libraryCalls: 0,
    cancelled,
    durationMs,
    sites,
  }

  for (const site of sites) {
    if (site.outcome === 'skipped') {
      report.sitesSkipped += 1
    } else {
      report.sitesScanned += 1
    }
    report.examined += site.examined
    report.found += site.found
    report.imported += site.imported
    report.deferred += site.deferred
    report.libraryCalls += site.libraryCalls
    for (const reason of REJECT_REASONS) {
      rejected[reason] += site.rejected[reason]
    }
  }

  return report
}

/** Total rejects across every reason */
export function totalRejected(report: Pick<RunReport, 'rejected'>): number {
  return Object.values(report.rejected).reduce((sum, n) => sum + n, 0)
}
