import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  ConfigurationError,
  ERROR_CODES,
  HarvestError,
  classifyError,
  classifyFetchError,
  errorKindForStatus,
  isTransientErrorKind,
} from '../errors.js'

describe('errorKindForStatus', () => {
  it.each([
    [429, 'rate_limited'],
    [404, 'not_found'],
    [410, 'not_found'],
    [408, 'timeout'],
    [500, 'server_error'],
    [503, 'server_error'],
    [400, 'client_error'],
    [403, 'client_error'],
  ] as const)('maps %i to %s', (status, kind) => {
    expect(errorKindForStatus(status)).toBe(kind)
  })
})

describe('isTransientErrorKind', () => {
  it('retries only transient kinds', () => {
    expect(isTransientErrorKind('timeout')).toBe(true)
    expect(isTransientErrorKind('connection_reset')).toBe(true)
    expect(isTransientErrorKind('rate_limited')).toBe(true)
    expect(isTransientErrorKind('server_error')).toBe(true)
    expect(isTransientErrorKind('not_found')).toBe(false)
    expect(isTransientErrorKind('blocked')).toBe(false)
    expect(isTransientErrorKind('invalid_url')).toBe(false)
  })
})

describe('classifyFetchError', () => {
  it('reads the system error code from the cause', () => {
    const cause = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })
    expect(classifyFetchError(new TypeError('fetch failed', { cause }))).toBe('connection_reset')
  })

  it('maps DNS failures', () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND'), { code: 'ENOTFOUND' })
    expect(classifyFetchError(new TypeError('fetch failed', { cause }))).toBe('dns')
  })

  it('treats aborts as timeouts', () => {
    const error = new Error('This operation was aborted')
    error.name = 'AbortError'
    expect(classifyFetchError(error)).toBe('timeout')
  })

  it('recognizes invalid URLs', () => {
    expect(classifyFetchError(new TypeError('Invalid URL'))).toBe('invalid_url')
  })

  it('falls back to network', () => {
    expect(classifyFetchError('boom')).toBe('network')
  })
})

describe('ConfigurationError.fromZod', () => {
  it('joins every issue into the message', () => {
    const schema = z.object({ pages: z.number().min(1), name: z.string() })
    const parsed = schema.safeParse({ pages: 0, name: 1 })
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    const error = ConfigurationError.fromZod(parsed.error)

    expect(error.code).toBe(ERROR_CODES.CONFIGURATION_ERROR)
    expect(error.issues.map(issue => issue.path)).toEqual(['pages', 'name'])
    expect(error.message).toBe(
      `Invalid configuration: pages: ${error.issues[0].message}; name: ${error.issues[1].message}`
    )
  })
})

describe('classifyError', () => {
  it('passes HarvestErrors through', () => {
    const error = new HarvestError('x', { code: ERROR_CODES.WRITE_FAILED, category: 'writer' })
    expect(classifyError(error)).toBe(error)
  })

  it('wraps anything else as an internal error', () => {
    const classified = classifyError(new Error('disk full'))
    expect(classified.message).toBe('disk full')
    expect(classified.category).toBe('internal')
    expect(classified.isRetryable).toBe(false)
  })
})
