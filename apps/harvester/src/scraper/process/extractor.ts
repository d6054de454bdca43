/**
 * Listing Extractor
 *
 * Turns a fetched listing page into a CandidateRecord. A page only counts
 * as a listing when it carries a listing signal: the site's own title or
 * description markup, an embedded JSON-LD Product, an og:title, or a hint
 * carried over from a search card. Generic <h1> and <title> text only fills
 * in the title once a signal is present, so "not found" and empty result
 * pages are not mistaken for listings. Classification runs on the combined
 * title and description text.
 */

import type * as cheerio from 'cheerio'
import type { CandidateRecord, FetchSuccess } from '../types.js'
import { cleanText, firstAttr, firstText, loadHtml } from '../utils/html.js'
import { extractJsonLdProduct, normalizeArray } from '../utils/json-ld.js'
import type { JsonLdProduct } from '../utils/json-ld.js'
import { canonicalizeUrl } from '../utils/url.js'
import { classifySpecs, parsePrice } from './classify.js'

export interface ListingSelectors {
  title: string
  description: string
  price: string
  location: string
  images: string
  jsonLd: string
}

/**
 * Title and description joined by a newline, whitespace collapsed within each.
 */
export function buildRawText(title: string, description: string): string {
  return [cleanText(title), cleanText(description)].filter(Boolean).join('\n')
}

function firstNonEmpty(...values: Array<string | undefined | null>): string {
  for (const value of values) {
    const cleaned = cleanText(value)
    if (cleaned) return cleaned
  }
  return ''
}

function jsonLdPrice(product: JsonLdProduct | null): string | number | undefined {
  for (const offer of normalizeArray(product?.offers)) {
    if (offer.price !== undefined) return offer.price
  }
  return undefined
}

function countImages($: cheerio.CheerioAPI, selector: string, pageUrl: string): number {
  const sources = new Set<string>()
  $(selector).each((_, element) => {
    const img = $(element)
    const src = img.attr('src') ?? img.attr('data-src')
    if (!src || src.startsWith('data:')) return
    try {
      sources.add(new URL(src.trim(), pageUrl).toString())
    } catch {
      sources.add(src.trim())
    }
  })
  return sources.size
}

/**
 * @param $ the already-parsed page, when the caller has one
 * @returns null when the page carries no listing signal, or no title or description
 */
export function extractListing(
  page: FetchSuccess,
  selectors: ListingSelectors,
  $: cheerio.CheerioAPI = loadHtml(page.body)
): CandidateRecord | null {
  const product = extractJsonLdProduct($, selectors.jsonLd)
  const hint = page.item.hint ?? {}

  const siteTitle = firstText($, selectors.title)
  const siteDescription = firstText($, selectors.description)
  const ogTitle = firstAttr($, 'meta[property="og:title"]', 'content')

  const hasSignal =
    siteTitle !== '' ||
    siteDescription !== '' ||
    product !== null ||
    ogTitle !== undefined ||
    page.item.hint !== undefined
  if (!hasSignal) {
    return null
  }

  const title = firstNonEmpty(
    siteTitle,
    product?.name,
    ogTitle,
    hint.title,
    firstText($, 'h1'),
    firstText($, 'title')
  )

  const description = firstNonEmpty(
    siteDescription,
    product?.description,
    firstAttr($, 'meta[property="og:description"]', 'content'),
    firstAttr($, 'meta[name="description"]', 'content')
  )

  if (!title && !description) {
    return null
  }

  const price =
    parsePrice(firstText($, selectors.price)) ??
    parsePrice(jsonLdPrice(product)) ??
    parsePrice(hint.priceText)

  const location = firstNonEmpty(firstText($, selectors.location), hint.location) || null

  const rawText = buildRawText(title, description)

  return {
    sourceUrl: canonicalizeUrl(page.url),
    title,
    price,
    location,
    imageCount: countImages($, selectors.images, page.url),
    rawText,
    scrapedAt: page.fetchedAt,
    ...classifySpecs(rawText),
  }
}
