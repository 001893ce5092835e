/**
 * Dredger Logger Configuration
 *
 * Pre-configured loggers for pipeline components
 */

import { createLogger } from '@dredger/logger'

// Root logger for the dredger
export const logger = createLogger('dredger')

export const loggers = {
  discovery: logger.child('discovery'),
  fetch: logger.child('fetch'),
  store: logger.child('store'),
  library: logger.child('library'),
  orchestrator: logger.child('orchestrator'),
  cli: logger.child('cli'),
}
