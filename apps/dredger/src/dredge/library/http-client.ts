/**
 * Shared HTTP plumbing for recipe library clients.
 */

import { loggers } from '../../config/logger.js'
import { ERROR_CODES, ImportError, LibraryConnectionError } from '../errors.js'
import type { ILogger } from '@dredger/logger'

export interface LibraryClientOptions {
  /** Base URL without trailing slash */
  baseUrl: string
  /** Bearer token or API key */
  credential: string
  /** Per-request timeout (default: 20000) */
  timeoutMs?: number
}

export interface LibraryResponse {
  status: number
  body: unknown
}

/** Safety stop for paginated listings */
export const MAX_LISTING_PAGES = 1000

export abstract class HttpLibraryClient {
  abstract readonly name: string

  protected readonly baseUrl: string
  protected readonly timeoutMs: number
  private readonly credential: string

  constructor(options: LibraryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.credential = options.credential
    this.timeoutMs = options.timeoutMs ?? 20000
  }

  protected get log(): ILogger {
    return loggers.library.child(this.name)
  }

  /**
   * One JSON request. Network failures throw; HTTP statuses are returned.
   */
  protected async request(
    method: 'GET' | 'POST',
    pathOrUrl: string,
    options: { json?: unknown; signal?: AbortSignal } = {}
  ): Promise<LibraryResponse> {
    const url = pathOrUrl.startsWith('http') ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)
    const forwardAbort = () => controller.abort()
    options.signal?.addEventListener('abort', forwardAbort, { once: true })
    if (options.signal?.aborted) controller.abort()

    let response: Response
    let text: string
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.credential}`,
          Accept: 'application/json',
          ...(options.json === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: options.json === undefined ? undefined : JSON.stringify(options.json),
        signal: controller.signal,
      })
      text = await response.text()
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', forwardAbort)
    }

    let body: unknown = text
    if (text) {
      try {
        body = JSON.parse(text)
      } catch {
        // Non-JSON bodies are kept as text
        body = text
      }
    }

    return { status: response.status, body }
  }

  /**
   * Shared connectivity check: 200 ok, 401/403 fatal, other statuses a warning, unreachable fatal.
   */
  protected async checkEndpoint(path: string): Promise<void> {
    let response: LibraryResponse
    try {
      response = await this.request('GET', path)
    } catch (error) {
      throw new LibraryConnectionError(
        ERROR_CODES.LIBRARY_UNREACHABLE,
        `Cannot reach ${this.name} at ${this.baseUrl}`,
        error
      )
    }

    if (response.status === 401 || response.status === 403) {
      throw new LibraryConnectionError(
        ERROR_CODES.LIBRARY_UNAUTHORIZED,
        `${this.name} rejected the API credential (HTTP ${response.status})`
      )
    }

    if (response.status !== 200) {
      this.log.warn('Library returned unexpected status, proceeding anyway', {
        baseUrl: this.baseUrl,
        status: response.status,
      })
      return
    }

    this.log.info('Library connectivity OK', { baseUrl: this.baseUrl })
  }

  protected importFailed(url: string, message: string, statusCode?: number, cause?: unknown): ImportError {
    return new ImportError(url, `${this.name}: ${message}`, { statusCode, cause })
  }
}
