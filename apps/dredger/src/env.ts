/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/dredger/.env and then the working directory's .env. Variables already set in
 * the process environment are never overwritten.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const here = dirname(fileURLToPath(import.meta.url))

if (process.env.NODE_ENV !== 'production') {
  config({ path: resolve(here, '..', '.env') })
  config()
}
