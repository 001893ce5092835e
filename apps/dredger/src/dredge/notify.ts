/**
 * Run Summary Notification
 *
 * POSTs { content, text } to a webhook so both Discord (content) and Slack (text)
 * render it. Never throws: a failed notification is a warning, not a failed run.
 */

import { loggers } from '../config/logger.js'
import type { RunReport } from './types.js'
import { totalRejected } from './run.js'

const log = loggers.cli

const NOTIFY_TIMEOUT_MS = 10_000

export interface NotifyResult {
  success: boolean
  error?: string
}

export function formatRunSummary(report: RunReport): string {
  const mode = report.dryRun ? 'dry run' : 'live'
  const lines = [
    `Recipe Dredger ${mode} ${report.cancelled ? 'cancelled' : 'finished'}`,
    `Sites: ${report.sitesScanned} scanned, ${report.sitesSkipped} skipped`,
    `Examined: ${report.examined}`,
    `Recipes found: ${report.found}, ${report.dryRun ? 'would import' : 'imported'}: ${report.imported}`,
    `Rejected: ${totalRejected(report)}`,
  ]
  if (report.deferred > 0) {
    lines.push(`Deferred (transient errors): ${report.deferred}`)
  }
  return lines.join('\n')
}

export async function sendRunSummary(webhookUrl: string, report: RunReport): Promise<NotifyResult> {
  if (!webhookUrl) {
    return { success: false, error: 'No webhook configured' }
  }

  const message = formatRunSummary(report)

  try {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: message, text: message }),
      signal: AbortSignal.timeout(NOTIFY_TIMEOUT_MS),
    })

    if (!response.ok) {
      log.warn('Run summary notification rejected', { status: response.status })
      return { success: false, error: `HTTP ${response.status}` }
    }

    log.debug('Run summary notification sent')
    return { success: true }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log.warn('Run summary notification failed', { error: message })
    return { success: false, error: message }
  }
}
