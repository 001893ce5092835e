/**
 * Recipe Dredger
 *
 * Library entry point for embedding the pipeline. The CLI lives in cli.ts.
 */

export { loadSettings, applyOverrides, validateSettings, VERSION } from './config/settings.js'
export type { Settings, SettingsOverrides, LibrarySettings } from './config/settings.js'

export * from './dredge/errors.js'
export * from './dredge/types.js'

export { canonicalizeUrl, tryCanonicalizeUrl, getRegistrableDomain } from './dredge/utils/url.js'
export { HttpFetcher, DEFAULT_USER_AGENT } from './dredge/fetch/http-fetcher.js'
export { HostRateLimiter } from './dredge/fetch/rate-limiter.js'
export { RobotsReader, parseRobotsTxt } from './dredge/fetch/robots.js'
export { SitemapDiscovery, parseSitemapXml, rankEntries } from './dredge/discovery/sitemap.js'
export { CandidateFilter, loadFilterRules } from './dredge/filter/candidate-filter.js'
export { RecipeVerifier, loadSignatures, resolveLanguage } from './dredge/verify/recipe-verifier.js'
export type { RecipeVerifierOptions } from './dredge/verify/recipe-verifier.js'
export { InMemoryMemoryStore, JsonFileMemoryStore, storeKey } from './dredge/store/memory-store.js'
export type { MemoryStore, StoreCounts } from './dredge/store/memory-store.js'
export * from './dredge/library/index.js'
export { ImportOrchestrator } from './dredge/orchestrator.js'
export type { OrchestratorDeps, OrchestratorOptions, PageVerifier, RobotsPolicy, SiteDiscovery, UrlFilter } from './dredge/orchestrator.js'
export { createDredge, runDredge } from './dredge/run.js'
export type { Dredge, RunOptions } from './dredge/run.js'
export { loadSites, DEFAULT_SITES } from './dredge/sites.js'
export { sendRunSummary, formatRunSummary } from './dredge/notify.js'
