import type * as cheerio from 'cheerio'
import type {
  CandidateRecord,
  DiscoveredLink,
  FetchSuccess,
  ListingHint,
  PageOutcome,
  SiteAdapter,
} from '../../types.js'
import { extractListing } from '../../process/extractor.js'
import { cleanText, firstAttr, loadHtml } from '../../utils/html.js'
import { resolveHref } from '../../utils/url.js'
import { SELECTORS } from './selectors.js'

const ADAPTER_ID = 'olx'
const ADAPTER_VERSION = '1.0.0'
const ADAPTER_DOMAIN = 'olx.in'

function buildSearchUrl(baseUrl: string, searchTerm: string, page: number): string {
  const url = new URL(`/items/q-${encodeURIComponent(searchTerm.trim())}`, baseUrl)
  url.searchParams.set('page', String(page))
  return url.toString()
}

function buildHint(title: string, priceText: string, location: string): ListingHint | undefined {
  const hint: ListingHint = {}
  if (title) hint.title = title
  if (priceText) hint.priceText = priceText
  if (location) hint.location = location
  return Object.keys(hint).length > 0 ? hint : undefined
}

function parseSearchPage($: cheerio.CheerioAPI, pageUrl: string): PageOutcome {
  const links: DiscoveredLink[] = []

  $(SELECTORS.searchCard).each((_, element) => {
    const card = $(element)
    const url = resolveHref(card.find(SELECTORS.cardLink).first().attr('href'), pageUrl)
    if (!url) return

    const hint = buildHint(
      cleanText(card.find(SELECTORS.cardTitle).first().text()),
      cleanText(card.find(SELECTORS.cardPrice).first().text()),
      cleanText(card.find(SELECTORS.cardLocation).first().text())
    )
    links.push(hint ? { url, kind: 'listing', hint } : { url, kind: 'listing' })
  })

  const nextPage = resolveHref(firstAttr($, SELECTORS.nextPage, 'href'), pageUrl)
  return nextPage ? { type: 'search', links, nextPage } : { type: 'search', links }
}

function extract(page: FetchSuccess): CandidateRecord | null {
  return extractListing(page, SELECTORS)
}

function process(page: FetchSuccess): PageOutcome {
  const $ = loadHtml(page.body)
  const kind = page.item.kind

  if (kind === 'search' || (kind === 'auto' && $(SELECTORS.searchCard).length > 0)) {
    return parseSearchPage($, page.url)
  }

  const record = extractListing(page, SELECTORS, $)
  if (!record) {
    return { type: 'unrecognized', reason: 'No listing content found' }
  }
  return { type: 'listing', record }
}

export const olxAdapter: SiteAdapter = {
  id: ADAPTER_ID,
  version: ADAPTER_VERSION,
  domain: ADAPTER_DOMAIN,
  searchUrl: buildSearchUrl,
  process,
  extract,
}
