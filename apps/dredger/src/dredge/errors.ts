/**
 * Error Taxonomy
 *
 * Every failure the pipeline can meet maps to one of these classes. None of them is fatal
 * at the per-URL level; only ConfigurationError stops a run, and only at bootstrap.
 */

export const ERROR_CODES = {
  // Discovery
  SITEMAP_NOT_FOUND: 'SITEMAP_NOT_FOUND',

  // Fetch
  FETCH_TRANSIENT: 'FETCH_TRANSIENT',
  FETCH_PERMANENT: 'FETCH_PERMANENT',
  FETCH_CANCELLED: 'FETCH_CANCELLED',

  // Verification
  VERIFICATION_FAILED: 'VERIFICATION_FAILED',

  // Library
  IMPORT_FAILED: 'IMPORT_FAILED',
  LIBRARY_UNREACHABLE: 'LIBRARY_UNREACHABLE',
  LIBRARY_UNAUTHORIZED: 'LIBRARY_UNAUTHORIZED',

  // Store
  STORE_CORRUPT: 'STORE_CORRUPT',

  // Bootstrap
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Anything else
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Base class. `code` is stable and safe to alert on; `details` is structured log context.
 */
export class DredgeError extends Error {
  readonly code: ErrorCode
  readonly isRetryable: boolean
  readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    options: { isRetryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.isRetryable = options.isRetryable ?? false
    this.details = options.details
  }
}

/**
 * No sitemap could be located or parsed for a site. The site is skipped.
 */
export class DiscoveryError extends DredgeError {
  readonly site: string

  constructor(site: string, message = `No sitemap found for ${site}`, cause?: unknown) {
    super(ERROR_CODES.SITEMAP_NOT_FOUND, message, { details: { site }, cause })
    this.site = site
  }
}

/**
 * - transient: network error, timeout, 5xx or 429 after every attempt was spent
 * - permanent: 4xx (other than 429), oversized or undecodable response
 * - cancelled: the caller's signal aborted the request
 */
export type FetchErrorKind = 'transient' | 'permanent' | 'cancelled'

const FETCH_ERROR_CODES: Record<FetchErrorKind, ErrorCode> = {
  transient: ERROR_CODES.FETCH_TRANSIENT,
  permanent: ERROR_CODES.FETCH_PERMANENT,
  cancelled: ERROR_CODES.FETCH_CANCELLED,
}

export class FetchError extends DredgeError {
  readonly kind: FetchErrorKind
  readonly url: string
  readonly attempts: number
  readonly statusCode?: number

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    options: { attempts: number; statusCode?: number; cause?: unknown }
  ) {
    super(FETCH_ERROR_CODES[kind], message, {
      isRetryable: kind === 'transient',
      details: { url, attempts: options.attempts, statusCode: options.statusCode },
      cause: options.cause,
    })
    this.kind = kind
    this.url = url
    this.attempts = options.attempts
    this.statusCode = options.statusCode
  }
}

/**
 * The verifier could not inspect a page. Treated as a negative verification.
 */
export class VerificationError extends DredgeError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_CODES.VERIFICATION_FAILED, message, { cause })
  }
}

/**
 * The recipe library refused or failed an import.
 */
export class ImportError extends DredgeError {
  readonly url: string
  readonly statusCode?: number

  constructor(url: string, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(ERROR_CODES.IMPORT_FAILED, message, {
      details: { url, statusCode: options.statusCode },
      cause: options.cause,
    })
    this.url = url
    this.statusCode = options.statusCode
  }
}

/**
 * The recipe library could not be reached or rejected our credential.
 */
export class LibraryConnectionError extends DredgeError {
  constructor(code: typeof ERROR_CODES.LIBRARY_UNREACHABLE | typeof ERROR_CODES.LIBRARY_UNAUTHORIZED, message: string, cause?: unknown) {
    super(code, message, { cause })
  }
}

/**
 * A persisted store file could not be read back. The store starts empty.
 */
export class StoreCorruptionError extends DredgeError {
  readonly file: string

  constructor(file: string, message: string, cause?: unknown) {
    super(ERROR_CODES.STORE_CORRUPT, message, { details: { file }, cause })
    this.file = file
  }
}

/**
 * Unusable configuration. The only error class that ends a run.
 */
export class ConfigurationError extends DredgeError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, { details: { issues } })
    this.issues = issues
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
])

function errorCodeOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code
  }
  return undefined
}

/**
 * Whether a thrown value looks like a connection-level failure worth retrying.
 * Native fetch wraps socket errors as `TypeError: fetch failed` with the code on `cause`.
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false

  const code = errorCodeOf(error) ?? errorCodeOf(error.cause)
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true
  }

  if (error.name === 'TimeoutError') {
    return true
  }

  return error instanceof TypeError && error.message === 'fetch failed'
}

/**
 * Whether a thrown value is an abort triggered by a caller's signal.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * Normalize anything thrown into a DredgeError for logging and reporting.
 */
export function classifyError(error: unknown): DredgeError {
  if (error instanceof DredgeError) {
    return error
  }

  if (error instanceof Error) {
    if (isNetworkError(error)) {
      return new DredgeError(ERROR_CODES.FETCH_TRANSIENT, `Network error: ${error.message}`, {
        isRetryable: true,
        details: { errorCode: errorCodeOf(error) ?? errorCodeOf(error.cause) },
        cause: error,
      })
    }

    if (isAbortError(error)) {
      return new DredgeError(ERROR_CODES.FETCH_CANCELLED, error.message, { cause: error })
    }

    return new DredgeError(ERROR_CODES.UNEXPECTED_ERROR, error.message || 'An unexpected error occurred', {
      cause: error,
    })
  }

  return new DredgeError(ERROR_CODES.UNEXPECTED_ERROR, String(error))
}

/**
 * Flatten an error into log metadata.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  const classified = classifyError(error)
  return {
    errorCode: classified.code,
    errorMessage: classified.message,
    retryable: classified.isRetryable,
    ...(classified.details ? { errorDetails: classified.details } : {}),
  }
}
