#!/usr/bin/env tsx
/**
 * Recipe Dredger CLI
 *
 * Usage:
 *   npm run dredge -- [--dry-run | --live] [--limit 50] [--depth 1000] [--sites sites.json] [--concurrency 1]
 *
 * Exit codes: 0 on a finished or cancelled run, 1 on bad arguments, bad configuration
 * or an unreachable library.
 */

import './env.js'

import { USAGE, parseArgs, type CliOptions } from './cli/args.js'
import { loggers } from './config/logger.js'
import { VERSION, applyOverrides, loadSettings, validateSettings } from './config/settings.js'
import { ConfigurationError, LibraryConnectionError, formatErrorForLog } from './dredge/errors.js'
import { formatRunSummary, sendRunSummary } from './dredge/notify.js'
import { createDredge, runDredge } from './dredge/run.js'
import { loadSites } from './dredge/sites.js'

const log = loggers.cli

async function run(options: CliOptions): Promise<number> {
  const settings = applyOverrides(loadSettings(), options.overrides)
  for (const warning of validateSettings(settings)) {
    log.warn(warning)
  }

  const { sites, source } = await loadSites({ sitesFile: options.sitesFile ?? undefined, envSites: settings.sites })
  if (sites.length === 0) {
    throw new ConfigurationError('No sites to scan')
  }

  const dredge = createDredge(settings)
  log.info('Recipe Dredger starting', {
    version: VERSION,
    mode: settings.dryRun ? 'dry-run' : 'live',
    sites: sites.length,
    sitesFrom: source,
    targetRecipesPerSite: settings.targetRecipesPerSite,
    scanDepth: settings.scanDepth,
    dataDir: settings.dataDir,
  })

  if (!settings.dryRun && dredge.library) {
    await dredge.library.checkConnectivity()
  }

  const controller = new AbortController()
  let interrupted = false
  const onSignal = (signal: NodeJS.Signals) => {
    if (interrupted) {
      log.warn('Second interrupt, exiting without waiting', { signal })
      process.exit(130)
    }
    interrupted = true
    log.warn('Interrupted, finishing the current page and saving progress', { signal })
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  try {
    const report = await runDredge(dredge, {
      sites,
      siteConcurrency: settings.siteConcurrency,
      syncLibrary: settings.syncLibrary,
      signal: controller.signal,
    })

    console.log(`\n${formatRunSummary(report)}`)
    console.log(`Memory: ${dredge.store.counts().rejected} rejected, ${dredge.store.counts().imported} imported`)

    if (settings.notificationWebhookUrl) {
      await sendRunSummary(settings.notificationWebhookUrl, report)
    }
    return 0
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2))

  switch (parsed.command) {
    case 'help':
      console.log(USAGE)
      return 0
    case 'version':
      console.log(VERSION)
      return 0
    case 'error':
      console.error(parsed.message)
      console.error(USAGE)
      return 1
    case 'run':
      break
  }

  try {
    return await run(parsed.options)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error('Configuration error', { issues: error.issues }, error)
      return 1
    }
    if (error instanceof LibraryConnectionError) {
      log.error('Recipe library check failed', { code: error.code }, error)
      return 1
    }
    log.fatal('Run failed', formatErrorForLog(error), error)
    return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
