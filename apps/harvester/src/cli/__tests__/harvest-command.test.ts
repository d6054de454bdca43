import { EventEmitter } from 'events'
import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '@cover-harvest/logger'
import type { PageFetcher, PageResponse, RecordWriter } from '../../scraper/types.js'
import { flagsToOverrides, runHarvestCommand } from '../commands/harvest.js'

const SEARCH_1 = 'https://www.olx.in/items/q-car-cover?page=1'
const LISTING = 'https://www.olx.in/item/nylon-cover-iid-7'

const FAST_ENV = {
  HARVEST_THROTTLE_INTERVAL_MS: '0',
  HARVEST_THROTTLE_JITTER_MS: '0',
  HARVEST_RETRY_INITIAL_DELAY_MS: '1',
  HARVEST_RETRY_MAX_DELAY_MS: '1',
}

const SITE: Record<string, string> = {
  [SEARCH_1]:
    '<ul><li data-aut-id="itemBox"><a data-aut-id="itemAd" href="/item/nylon-cover-iid-7">Nylon cover</a></li></ul>',
  [LISTING]: '<h1 data-aut-id="itemTitle">Nylon Car Cover Sedan</h1>',
}

function siteFetcher(onFetch?: (url: string) => void) {
  return vi.fn<PageFetcher['fetch']>(async (url): Promise<PageResponse> => {
    onFetch?.(url)
    const body = SITE[url]
    return body === undefined
      ? { ok: false, errorKind: 'not_found', status: 404, message: 'HTTP 404: Not Found' }
      : { ok: true, status: 200, body }
  })
}

const okWriter = (): RecordWriter => ({
  format: 'csv',
  write: async records => ({ format: 'csv', ok: true, path: 'out.csv', rows: records.length }),
})

function capture() {
  const out: string[] = []
  const err: string[] = []
  return { out, err, print: (line: string) => out.push(line), printError: (line: string) => err.push(line) }
}

describe('flagsToOverrides', () => {
  it('maps flags onto config fields', () => {
    expect(
      flagsToOverrides({
        pages: '3',
        'max-pages': '4',
        timeout: '5000',
        url: ['https://www.olx.in/item/a'],
        format: 'csv,parquet',
        verbose: true,
      })
    ).toEqual({
      pages: '3',
      maxPages: '4',
      requestTimeoutMs: '5000',
      seedUrls: ['https://www.olx.in/item/a'],
      outputFormats: ['csv', 'parquet'],
    })
  })
})

describe('runHarvestCommand', () => {
  it('returns 2 for invalid configuration', async () => {
    const io = capture()
    const code = await runHarvestCommand({ flags: { concurrency: '0' }, env: {}, ...io })

    expect(code).toBe(2)
    expect(io.err).toHaveLength(1)
    expect(io.err[0].startsWith('Invalid configuration: concurrency: ')).toBe(true)
  })

  it('returns 2 when no adapter handles the base URL', async () => {
    const io = capture()
    const code = await runHarvestCommand({ flags: { 'base-url': 'https://shop.example.com' }, env: {}, ...io })

    expect(code).toBe(2)
    expect(io.err).toEqual(['No site adapter for https://shop.example.com'])
  })

  it('runs the search pages and prints the report', async () => {
    const io = capture()
    const fetch = siteFetcher()
    const signals = new EventEmitter()

    const code = await runHarvestCommand({
      flags: { pages: '1' },
      env: FAST_ENV,
      signals,
      deps: { pageFetcher: { fetch }, writers: [okWriter()], logger: silentLogger },
      ...io,
    })

    expect(code).toBe(0)
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([SEARCH_1, LISTING])
    expect(io.out.slice(1)).toEqual([
      '  records:   1 (deduplicated 0)',
      '  fetched:   2 attempts, 2 ok, 0 failed, 0 retried',
      '  pages:     1 discovered, 0 skipped, 0 dropped',
      '  csv: out.csv (1 rows)',
    ])
    expect(signals.listenerCount('SIGINT')).toBe(0)
  })

  it('returns 1 when a writer fails', async () => {
    const io = capture()
    const failing: RecordWriter = {
      format: 'parquet',
      write: async () => {
        throw new Error('disk full')
      },
    }

    const code = await runHarvestCommand({
      flags: { pages: '1' },
      env: FAST_ENV,
      signals: new EventEmitter(),
      deps: { pageFetcher: { fetch: siteFetcher() }, writers: [okWriter(), failing], logger: silentLogger },
      ...io,
    })

    expect(code).toBe(1)
    expect(io.out.slice(-2)).toEqual(['  csv: out.csv (1 rows)', '  parquet: FAILED disk full'])
  })

  it('stops cooperatively on the first SIGINT', async () => {
    const io = capture()
    const signals = new EventEmitter()
    const fetch = siteFetcher(url => {
      if (url === SEARCH_1) signals.emit('SIGINT')
    })

    const code = await runHarvestCommand({
      flags: { pages: '1' },
      env: FAST_ENV,
      signals,
      deps: { pageFetcher: { fetch }, writers: [okWriter()], logger: silentLogger },
      ...io,
    })

    expect(code).toBe(0)
    expect(io.err).toEqual(['Stopping after in-flight pages finish (Ctrl-C again to stop now)'])
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(io.out[1]).toBe('  records:   0 (deduplicated 0)')
    expect(signals.listenerCount('SIGINT')).toBe(0)
  })
})
