/**
 * Dredge Metrics
 *
 * Emits structured log events only.
 */

import { loggers } from '../config/logger.js'
import type { RunReport, SiteReport } from './types.js'

const log = loggers.orchestrator

/** Share of fetched pages that failed permanently before an alert is logged */
const FETCH_FAILURE_ALERT_THRESHOLD = 0.5
const MIN_FETCHES_FOR_ALERT = 20

export function recordSiteCompleted(report: SiteReport): void {
  log.info('DREDGE_SITE_COMPLETED', {
    event_name: 'DREDGE_SITE_COMPLETED',
    site: report.site,
    outcome: report.outcome,
    examined: report.examined,
    found: report.found,
    imported: report.imported,
    alreadyKnown: report.alreadyKnown,
    deferred: report.deferred,
    rejected: report.rejected,
    durationMs: report.durationMs,
  })

  const fetched = report.found + report.rejected['not-a-recipe'] + report.rejected['verify-error'] + report.rejected['fetch-failed']
  const failureRate = fetched === 0 ? 0 : report.rejected['fetch-failed'] / fetched
  if (fetched >= MIN_FETCHES_FOR_ALERT && failureRate > FETCH_FAILURE_ALERT_THRESHOLD) {
    log.warn('DREDGE_ALERT_HIGH_FETCH_FAILURE_RATE', {
      event_name: 'DREDGE_ALERT_HIGH_FETCH_FAILURE_RATE',
      site: report.site,
      failureRate,
      fetched,
    })
  }
}

export function recordSiteSkipped(payload: { site: string; reason: string }): void {
  log.warn('DREDGE_SITE_SKIPPED', {
    event_name: 'DREDGE_SITE_SKIPPED',
    ...payload,
  })
}

export function recordRunCompleted(report: RunReport): void {
  log.info('DREDGE_RUN_COMPLETED', {
    event_name: 'DREDGE_RUN_COMPLETED',
    dryRun: report.dryRun,
    cancelled: report.cancelled,
    sitesScanned: report.sitesScanned,
    sitesSkipped: report.sitesSkipped,
    examined: report.examined,
    found: report.found,
    imported: report.imported,
    deferred: report.deferred,
    libraryCalls: report.libraryCalls,
    rejected: report.rejected,
    durationMs: report.durationMs,
  })
}
