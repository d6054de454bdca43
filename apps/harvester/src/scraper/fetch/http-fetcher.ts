/**
 * HTTP Page Fetcher
 *
 * Single-attempt GET using native fetch, with timeout, size limit, default
 * headers and blocked-page detection. Failures come back classified; retrying
 * is the work queue's job, so nothing here sleeps or loops.
 */

import { classifyFetchError, errorKindForStatus } from '../../lib/errors.js'
import type { PageFetcher, PageFetchOptions, PageResponse } from '../types.js'

/**
 * Browser-like defaults; the target serves a reduced page to unknown agents.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_MAX_RESPONSE_BYTES = 10 * 1024 * 1024

export interface HttpFetcherOptions {
  /** Headers merged over DEFAULT_FETCH_HEADERS */
  headers?: Record<string, string>

  maxResponseBytes?: number
}

export class HttpFetcher implements PageFetcher {
  private readonly headers: Record<string, string>
  private readonly maxResponseBytes: number

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES
  }

  async fetch(url: string, options: PageFetchOptions): Promise<PageResponse> {
    let target: URL
    try {
      target = new URL(url)
    } catch {
      return { ok: false, errorKind: 'invalid_url', message: `Invalid URL: ${url}` }
    }
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      return { ok: false, errorKind: 'invalid_url', message: `Unsupported protocol: ${target.protocol}` }
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs)

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          return {
            ok: false,
            errorKind: 'blocked',
            status: response.status,
            message: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          ok: false,
          errorKind: errorKindForStatus(response.status),
          status: response.status,
          message: `HTTP ${response.status}: ${response.statusText}`,
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > this.maxResponseBytes) {
        return {
          ok: false,
          errorKind: 'too_large',
          status: response.status,
          message: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await readBodyWithLimit(response, this.maxResponseBytes)
      if (body === null) {
        return {
          ok: false,
          errorKind: 'too_large',
          status: response.status,
          message: 'Response exceeded size limit',
        }
      }

      return { ok: true, status: response.status, body }
    } catch (error) {
      const errorKind = controller.signal.aborted ? 'timeout' : classifyFetchError(error)
      return {
        ok: false,
        errorKind,
        message:
          errorKind === 'timeout'
            ? `Request timed out after ${options.timeoutMs}ms`
            : error instanceof Error
              ? error.message
              : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

/**
 * Read response body with size limit.
 * Returns null if size exceeds limit.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }

      chunks.push(value)
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000
  }

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
]

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}
