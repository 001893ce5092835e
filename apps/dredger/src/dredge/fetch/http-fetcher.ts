/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch (undici keeps connections alive per origin).
 * Supports per-attempt timeout, size limits, exponential backoff and per-host politeness.
 *
 * Never throws: every failure is returned as a classified FetchError.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { loggers } from '../../config/logger.js'
import { VERSION } from '../../config/settings.js'
import { FetchError, isNetworkError } from '../errors.js'
import type { Fetcher, FetchKind, FetchOptions, FetchOutcome, RateLimiter, RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'

const log = loggers.fetch

export const DEFAULT_USER_AGENT = `Mozilla/5.0 (Windows NT 10.0; Win64; x64) RecipeDredger/${VERSION}`

const ACCEPT_HEADERS: Record<FetchKind, string> = {
  page: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
  sitemap: 'application/xml,text/xml;q=0.9,*/*;q=0.8',
  robots: 'text/plain,*/*;q=0.8',
}

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Politeness slot acquired before every attempt */
  rateLimiter?: RateLimiter

  /** Per-attempt timeout (default: 20000) */
  timeoutMs?: number

  /** Largest body accepted (default: 10 MB) */
  maxSizeBytes?: number

  userAgent?: string

  /** Injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

/** Result of a single attempt, before retry decisions */
type AttemptResult =
  | { type: 'ok'; body: string; statusCode: number }
  | { type: 'transient'; message: string; statusCode?: number; retryAfterMs?: number; cause?: unknown }
  | { type: 'permanent'; message: string; statusCode?: number; cause?: unknown }
  | { type: 'cancelled'; cause?: unknown }

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal })
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined

  const seconds = Number(value.trim())
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000)
  }

  const date = Date.parse(value)
  if (!isNaN(date)) {
    return Math.max(0, date - now)
  }

  return undefined
}

function charsetOf(contentType: string | null): string {
  const match = contentType?.match(/charset=["']?([^;"'\s]+)/i)
  return match?.[1]?.toLowerCase() ?? 'utf-8'
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly rateLimiter?: RateLimiter
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number
  private readonly userAgent: string
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.rateLimiter = options.rateLimiter
    this.timeoutMs = options.timeoutMs ?? 20000
    this.maxSizeBytes = options.maxSizeBytes ?? 10 * 1024 * 1024
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * Backoff before the attempt after `attempt`: initialDelayMs * multiplier^(attempt-1), capped.
   */
  backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchOutcome> {
    const startTime = Date.now()
    const { signal, kind } = options
    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts)

    let last: Extract<AttemptResult, { type: 'transient' }> | null = null

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.cancelled(url, attempt - 1, signal.reason)
      }

      try {
        await this.rateLimiter?.acquire(url, signal)
      } catch (error) {
        return this.cancelled(url, attempt - 1, error)
      }

      const result = await this.fetchOnce(url, kind, signal)

      switch (result.type) {
        case 'ok':
          return {
            ok: true,
            body: result.body,
            statusCode: result.statusCode,
            attempts: attempt,
            durationMs: Date.now() - startTime,
          }
        case 'cancelled':
          return this.cancelled(url, attempt, result.cause)
        case 'permanent':
          return {
            ok: false,
            error: new FetchError('permanent', url, result.message, {
              attempts: attempt,
              statusCode: result.statusCode,
              cause: result.cause,
            }),
          }
        case 'transient':
          last = result
          break
      }

      if (attempt < maxAttempts) {
        let waitMs = this.backoffDelay(attempt)
        if (result.retryAfterMs !== undefined && result.retryAfterMs > waitMs) {
          waitMs = Math.min(result.retryAfterMs, this.retryPolicy.maxDelayMs)
        }

        log.debug('Retrying after transient failure', {
          url,
          attempt,
          waitMs,
          statusCode: result.statusCode,
          reason: result.message,
        })

        try {
          await this.sleep(waitMs, signal)
        } catch (error) {
          return this.cancelled(url, attempt, error)
        }
      }
    }

    return {
      ok: false,
      error: new FetchError('transient', url, last?.message ?? 'Unknown error after retries', {
        attempts: maxAttempts,
        statusCode: last?.statusCode,
        cause: last?.cause,
      }),
    }
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(url: string, kind: FetchKind, signal?: AbortSignal): Promise<AttemptResult> {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeoutMs)
    const forwardAbort = () => controller.abort()
    signal?.addEventListener('abort', forwardAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: ACCEPT_HEADERS[kind],
          'Accept-Language': 'en-US,en;q=0.9',
        },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        const message = `HTTP ${response.status}: ${response.statusText}`

        if (response.status >= 500 || this.retryPolicy.retryableStatusCodes.includes(response.status)) {
          return {
            type: 'transient',
            message,
            statusCode: response.status,
            retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
          }
        }
        return { type: 'permanent', message, statusCode: response.status }
      }

      // Check content length header for early size check
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > this.maxSizeBytes) {
        await response.body?.cancel()
        return {
          type: 'permanent',
          message: `Response too large: ${contentLength} bytes`,
          statusCode: response.status,
        }
      }

      const bytes = await this.readBodyWithLimit(response)
      if (bytes === null) {
        return { type: 'permanent', message: 'Response exceeded size limit', statusCode: response.status }
      }

      try {
        const body = new TextDecoder(charsetOf(response.headers.get('content-type'))).decode(bytes)
        return { type: 'ok', body, statusCode: response.status }
      } catch (error) {
        return { type: 'permanent', message: 'Undecodable response body', statusCode: response.status, cause: error }
      }
    } catch (error) {
      if (signal?.aborted) {
        return { type: 'cancelled', cause: error }
      }

      if (timedOut) {
        return { type: 'transient', message: `Request timed out after ${this.timeoutMs}ms`, cause: error }
      }

      if (isNetworkError(error)) {
        return {
          type: 'transient',
          message: error instanceof Error ? error.message : String(error),
          cause: error,
        }
      }

      return {
        type: 'permanent',
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      }
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', forwardAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response): Promise<Uint8Array | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return new Uint8Array()
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > this.maxSizeBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return Buffer.concat(chunks)
    } finally {
      reader.releaseLock()
    }
  }

  private cancelled(url: string, attempts: number, cause: unknown): FetchOutcome {
    return {
      ok: false,
      error: new FetchError('cancelled', url, 'Request cancelled', { attempts, cause }),
    }
  }
}
