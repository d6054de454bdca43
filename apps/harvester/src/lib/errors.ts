/**
 * Error Classification
 *
 * Fetch failures are classified into ErrorKind values that decide retry
 * behaviour. Run-level errors carry a code and category for logging.
 */

import { ZodError } from 'zod'
import type { ErrorKind, RunReport } from '../scraper/types.js'

export type ErrorCategory =
  | 'configuration' // Caller supplied invalid settings
  | 'fetch' // Network or HTTP failure for a single URL
  | 'writer' // Output could not be persisted
  | 'internal' // Fault inside the pipeline machinery

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  PIPELINE_ABORTED: 'PIPELINE_ABORTED',
  WRITE_FAILED: 'WRITE_FAILED',
  INVALID_STATE: 'INVALID_STATE',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class HarvestError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly isRetryable: boolean
  readonly details?: Record<string, unknown>

  constructor(
    message: string,
    options: {
      code: ErrorCode
      category: ErrorCategory
      isRetryable?: boolean
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    super(message, { cause: options.cause })
    this.name = 'HarvestError'
    this.code = options.code
    this.category = options.category
    this.isRetryable = options.isRetryable ?? false
    this.details = options.details
  }
}

export interface ConfigIssue {
  path: string
  message: string
}

export class ConfigurationError extends HarvestError {
  readonly issues: ConfigIssue[]

  constructor(message: string, issues: ConfigIssue[] = [], cause?: unknown) {
    super(message, {
      code: ERROR_CODES.CONFIGURATION_ERROR,
      category: 'configuration',
      details: { issues },
      cause,
    })
    this.name = 'ConfigurationError'
    this.issues = issues
  }

  static fromZod(error: ZodError, prefix = 'Invalid configuration'): ConfigurationError {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    const summary = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
    return new ConfigurationError(`${prefix}: ${summary}`, issues, error)
  }
}

/**
 * Raised when the run cannot continue. The report holds whatever
 * was completed and written before the abort.
 */
export class PipelineAbortedError extends HarvestError {
  readonly report: RunReport

  constructor(message: string, report: RunReport, cause?: unknown) {
    super(message, { code: ERROR_CODES.PIPELINE_ABORTED, category: 'internal', cause })
    this.name = 'PipelineAbortedError'
    this.report = report
  }
}

export class WriterError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: ERROR_CODES.WRITE_FAILED, category: 'writer', cause })
    this.name = 'WriterError'
  }
}

/**
 * Normalize anything thrown into a HarvestError.
 */
export function classifyError(error: unknown): HarvestError {
  if (error instanceof HarvestError) {
    return error
  }
  if (error instanceof ZodError) {
    return ConfigurationError.fromZod(error)
  }
  const message = error instanceof Error ? error.message : String(error)
  return new HarvestError(message, {
    code: ERROR_CODES.INVALID_STATE,
    category: 'internal',
    cause: error,
  })
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Error Kinds
// ═══════════════════════════════════════════════════════════════════════════════

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'timeout',
  'connection_reset',
  'network',
  'rate_limited',
  'server_error',
])

export function isTransientErrorKind(kind: ErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind)
}

/**
 * Map an HTTP status that is not 2xx to an error kind.
 */
export function errorKindForStatus(status: number): ErrorKind {
  if (status === 429) return 'rate_limited'
  if (status === 404 || status === 410) return 'not_found'
  if (status === 408) return 'timeout'
  if (status >= 500) return 'server_error'
  return 'client_error'
}

const SYSCALL_KINDS: Record<string, ErrorKind> = {
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  ECONNRESET: 'connection_reset',
  EPIPE: 'connection_reset',
  UND_ERR_SOCKET: 'connection_reset',
  ECONNREFUSED: 'network',
  EHOSTUNREACH: 'network',
  ENETUNREACH: 'network',
  ETIMEDOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  UND_ERR_HEADERS_TIMEOUT: 'timeout',
  UND_ERR_BODY_TIMEOUT: 'timeout',
}

function errorCode(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value) {
    const code = value.code
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}

/**
 * Classify an exception thrown by `fetch` (or raised while reading the body).
 * Node's fetch wraps socket errors as `TypeError('fetch failed')` with the
 * system error in `cause`.
 */
export function classifyFetchError(error: unknown): ErrorKind {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return 'timeout'
    }

    const code = errorCode(error) ?? errorCode(error.cause)
    if (code && SYSCALL_KINDS[code]) {
      return SYSCALL_KINDS[code]
    }

    if (error.cause instanceof Error && error.cause.name === 'ConnectTimeoutError') {
      return 'timeout'
    }

    // new URL() and fetch() reject bad input with a TypeError that has no cause
    if (error instanceof TypeError && !error.cause && /url/i.test(error.message)) {
      return 'invalid_url'
    }
  }

  return 'network'
}
