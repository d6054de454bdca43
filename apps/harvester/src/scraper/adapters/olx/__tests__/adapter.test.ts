import { describe, it, expect } from 'vitest'
import { olxAdapter } from '../adapter.js'
import type { FetchSuccess, WorkItem } from '../../../types.js'

const FETCHED_AT = new Date('2026-03-01T10:00:00Z')

function page(url: string, body: string, item: Partial<WorkItem> = {}): FetchSuccess {
  return {
    ok: true,
    url,
    body,
    status: 200,
    fetchedAt: FETCHED_AT,
    item: { url, attempt: 0, enqueuedAt: 0, kind: 'auto', depth: 1, ...item },
  }
}

const SEARCH_HTML = `
<html>
  <head><link rel="next" href="/items/q-car-cover?page=2"></head>
  <body>
    <ul>
      <li data-aut-id="itemBox">
        <a data-aut-id="itemAd" href="/item/car-cover-iid-1">
          <span data-aut-id="itemPrice">₹ 1,200</span>
          <span data-aut-id="itemTitle">SUV  cover</span>
          <span data-aut-id="item-location">Delhi</span>
        </a>
      </li>
      <li data-aut-id="itemBox">
        <a data-aut-id="itemAd" href="https://www.olx.in/item/car-cover-iid-2">
          <span data-aut-id="itemTitle">Sedan cover</span>
        </a>
      </li>
      <li data-aut-id="itemBox"><span>Sponsored</span></li>
    </ul>
  </body>
</html>`

const LISTING_HTML = `
<html>
  <head><title>Cover | OLX</title></head>
  <body>
    <h1 data-aut-id="itemTitle">Waterproof Polyester Car Cover for SUV</h1>
    <span data-aut-id="itemPrice">₹ 1,499</span>
    <div data-aut-id="itemDescription">
      <div data-aut-id="itemDescriptionContent">Size 450x190cm.
        UV protection.</div>
    </div>
    <span data-aut-id="itemLocation">Andheri, Mumbai</span>
    <figure><img src="/img/1.jpg"></figure>
    <figure><img src="/img/2.jpg"></figure>
    <figure><img src="/img/1.jpg"></figure>
  </body>
</html>`

describe('olxAdapter', () => {
  it('builds search page URLs', () => {
    expect(olxAdapter.searchUrl('https://www.olx.in', 'car-cover', 2)).toBe(
      'https://www.olx.in/items/q-car-cover?page=2'
    )
    expect(olxAdapter.searchUrl('https://www.olx.in/', 'car cover', 1)).toBe(
      'https://www.olx.in/items/q-car%20cover?page=1'
    )
  })

  it('turns search cards into listing links with hints', () => {
    const outcome = olxAdapter.process(
      page('https://www.olx.in/items/q-car-cover?page=1', SEARCH_HTML, { kind: 'search' })
    )

    expect(outcome).toEqual({
      type: 'search',
      links: [
        {
          url: 'https://www.olx.in/item/car-cover-iid-1',
          kind: 'listing',
          hint: { title: 'SUV cover', priceText: '₹ 1,200', location: 'Delhi' },
        },
        {
          url: 'https://www.olx.in/item/car-cover-iid-2',
          kind: 'listing',
          hint: { title: 'Sedan cover' },
        },
      ],
      nextPage: 'https://www.olx.in/items/q-car-cover?page=2',
    })
  })

  it('recognizes a search page when the kind is unknown', () => {
    const outcome = olxAdapter.process(page('https://www.olx.in/items/q-car-cover', SEARCH_HTML))
    expect(outcome.type).toBe('search')
  })

  it('reports an empty search page as search with no links', () => {
    const outcome = olxAdapter.process(
      page('https://www.olx.in/items/q-car-cover?page=9', '<html><body><p>No results</p></body></html>', {
        kind: 'search',
      })
    )
    expect(outcome).toEqual({ type: 'search', links: [] })
  })

  it('extracts a listing page into a classified record', () => {
    const outcome = olxAdapter.process(
      page('https://www.olx.in/item/waterproof-cover-iid-1001?utm_source=share', LISTING_HTML, { kind: 'listing' })
    )

    expect(outcome).toEqual({
      type: 'listing',
      record: {
        sourceUrl: 'https://www.olx.in/item/waterproof-cover-iid-1001',
        title: 'Waterproof Polyester Car Cover for SUV',
        price: 1499,
        location: 'Andheri, Mumbai',
        imageCount: 2,
        rawText: 'Waterproof Polyester Car Cover for SUV\nSize 450x190cm. UV protection.',
        scrapedAt: FETCHED_AT,
        material: 'Polyester',
        vehicleType: 'SUV',
        waterproof: true,
        uvProtected: true,
        size: { widthCm: 450, heightCm: 190 },
      },
    })
  })

  it('skips pages with no listing content', () => {
    const outcome = olxAdapter.process(
      page('https://www.olx.in/help', '<html><body><p></p></body></html>', { kind: 'listing' })
    )
    expect(outcome).toEqual({ type: 'unrecognized', reason: 'No listing content found' })
  })

  it('does not treat a removed-ad page as a listing', () => {
    const outcome = olxAdapter.process(
      page(
        'https://www.olx.in/item/deleted-iid-9',
        '<html><head><title>Car Cover in India | OLX</title></head><body><h1>This ad is no longer available</h1></body></html>',
        { kind: 'listing' }
      )
    )
    expect(outcome).toEqual({ type: 'unrecognized', reason: 'No listing content found' })
  })

  it('extracts the same record from the same page every time', () => {
    const input = page('https://www.olx.in/item/waterproof-cover-iid-1001', LISTING_HTML, { kind: 'listing' })
    expect(olxAdapter.extract(input)).toEqual(olxAdapter.extract(input))
  })
})
