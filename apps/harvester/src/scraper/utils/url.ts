/**
 * URL Canonicalization Utilities
 *
 * Rules:
 * 1. Enforce https (upgrade http)
 * 2. Lowercase hostname
 * 3. Remove tracking parameters: utm_*, fbclid, gclid, ref, source, campaign
 * 4. Remove empty query parameters
 * 5. Sort query parameters alphabetically (for consistent hashing)
 * 6. Remove fragment identifiers (#...)
 * 7. Remove trailing slash (except root path)
 */

import { createHash } from 'crypto'
import psl from 'psl'

/**
 * Tracking parameters to remove from URLs.
 * These are marketing/analytics parameters that don't affect page content.
 */
const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
])

/**
 * Canonicalize a URL so the same page is admitted to a run only once.
 *
 * @throws TypeError if the URL cannot be parsed
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Validate that a URL parses and uses http or https.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Resolve a possibly relative href against the page it appeared on.
 * Returns undefined for hrefs that do not resolve to http(s).
 */
export function resolveHref(href: string | undefined, pageUrl: string): string | undefined {
  if (!href) return undefined
  try {
    const resolved = new URL(href.trim(), pageUrl).toString()
    return isValidUrl(resolved) ? resolved : undefined
  } catch {
    return undefined
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 * Uses the Public Suffix List so multi-part TLDs like .co.in resolve correctly.
 *
 * @returns e.g. "olx.in" for "https://www.olx.in/items"
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()

  const parsedDomain = psl.parse(hostname)
  if (parsedDomain.error) {
    return hostname
  }

  return parsedDomain.domain || hostname
}

/**
 * Host plus path of a URL, without protocol, query or trailing slash.
 * Identifies a listing page independently of tracking or sort parameters.
 */
export function listingLocator(url: string): string {
  try {
    const parsed = new URL(url)
    const path = parsed.pathname !== '/' ? parsed.pathname.replace(/\/+$/, '') : ''
    return `${parsed.hostname.toLowerCase()}${path}`
  } catch {
    return url.trim().toLowerCase()
  }
}

/**
 * SHA-256 of a value, first 16 hex characters.
 */
export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16)
}
