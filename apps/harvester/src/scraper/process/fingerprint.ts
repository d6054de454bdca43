import type { CandidateRecord, Fingerprint } from '../types.js'
import { hashUrl, listingLocator } from '../utils/url.js'

/**
 * Lowercase, strip punctuation, collapse whitespace.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Identity of a listing within a run: normalized title plus the host and
 * path of its source URL. Size is not part of the key, so a later copy
 * of the same listing that adds a size lands on the same key.
 */
export function computeFingerprint(record: Pick<CandidateRecord, 'title' | 'sourceUrl'>): Fingerprint {
  return hashUrl(`${normalizeTitle(record.title)}|${listingLocator(record.sourceUrl)}`)
}
